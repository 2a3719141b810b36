/**
 * Zod schemas for client settings and server configuration, plus loaders that
 * read them from the environment. Every field falls back to its default when
 * missing or undefined.
 */

import { z } from 'zod';
import {
  DEFAULT_FULFILLMENT_SETTINGS as D,
  DEFAULT_SERVER_CONFIG as S,
  type FulfillmentSettings,
  type ServerConfig,
} from '../types/settings';
import { validateInput } from './wireSchemas';

export const FulfillmentSettingsSchema = z.object({
  backendUrl: z.string().url().default(D.backendUrl),
  charThreshold: z.number().int().min(1).max(10000).default(D.charThreshold),
  idleTimeoutMs: z.number().int().min(0).max(600000).default(D.idleTimeoutMs),
  pollIntervalMs: z.number().int().min(100).max(600000).default(D.pollIntervalMs),
  requestTimeoutMs: z.number().int().min(100).max(600000).default(D.requestTimeoutMs),
  feedCapacityPerKind: z.number().int().min(1).max(100).default(D.feedCapacityPerKind),
  idleFallbackMs: z.number().int().min(0).max(3600000).default(D.idleFallbackMs),
  driftTolerance: z.number().int().min(0).max(10000).default(D.driftTolerance),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1).max(255).default(S.host),
  port: z.number().int().min(0).max(65535).default(S.port),
  sessionTtlMs: z.number().int().min(1000).default(S.sessionTtlMs),
  fulfillerTimeoutMs: z.number().int().min(100).max(600000).default(S.fulfillerTimeoutMs),
  cardsPerKind: z.number().int().min(1).max(100).default(S.cardsPerKind),
});

export function resolveFulfillmentSettings(
  overrides: Partial<FulfillmentSettings> = {},
): FulfillmentSettings {
  return validateInput(FulfillmentSettingsSchema, overrides);
}

export function resolveServerConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return validateInput(ServerConfigSchema, overrides);
}

type Env = Record<string, string | undefined>;

function numberFromEnv(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid input: ${key}: expected a number, received "${raw}"`);
  }
  return value;
}

/** Client settings from FULFILLMENT_* variables. */
export function loadFulfillmentSettingsFromEnv(env: Env): FulfillmentSettings {
  return resolveFulfillmentSettings({
    backendUrl: env.FULFILLMENT_BACKEND_URL || undefined,
    charThreshold: numberFromEnv(env, 'FULFILLMENT_CHAR_THRESHOLD'),
    idleTimeoutMs: numberFromEnv(env, 'FULFILLMENT_IDLE_TIMEOUT_MS'),
    pollIntervalMs: numberFromEnv(env, 'FULFILLMENT_POLL_INTERVAL_MS'),
    requestTimeoutMs: numberFromEnv(env, 'FULFILLMENT_REQUEST_TIMEOUT_MS'),
    feedCapacityPerKind: numberFromEnv(env, 'FULFILLMENT_FEED_CAPACITY'),
    idleFallbackMs: numberFromEnv(env, 'FULFILLMENT_IDLE_FALLBACK_MS'),
    driftTolerance: numberFromEnv(env, 'FULFILLMENT_DRIFT_TOLERANCE'),
  });
}

export function loadServerConfigFromEnv(env: Env): ServerConfig {
  return resolveServerConfig({
    host: env.FULFILLMENT_HOST || undefined,
    port: numberFromEnv(env, 'FULFILLMENT_PORT'),
    sessionTtlMs: numberFromEnv(env, 'FULFILLMENT_SESSION_TTL_MS'),
    fulfillerTimeoutMs: numberFromEnv(env, 'FULFILLMENT_FULFILLER_TIMEOUT_MS'),
    cardsPerKind: numberFromEnv(env, 'FULFILLMENT_CARDS_PER_KIND'),
  });
}
