import { createHash } from 'crypto';
import type { FulfillmentContext } from '@shared/types';

/**
 * Stable session id for a document identity. The same scope root and plan
 * path always map to the same id, so a reopened document picks up whatever
 * the backend still holds for it.
 */
export function deriveSessionId(context: FulfillmentContext): string {
  const combined = `${context.scopeRoot}:${context.planPath ?? ''}`;
  const digest = createHash('sha256').update(combined).digest('hex');
  return `session-${digest.slice(0, 16)}`;
}
