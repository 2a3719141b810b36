/**
 * Backend route constants
 * Paths used by both the HTTP client and the route table.
 */

export const BACKEND_ROUTES = {
  FULFILL: '/fulfill',
  HEALTH: '/health',
  session: (sessionId: string) => `/session/${encodeURIComponent(sessionId)}`,
  cached: (sessionId: string) => `/session/${encodeURIComponent(sessionId)}/cached`,
} as const;
