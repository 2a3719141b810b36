/**
 * Zod schemas for everything crossing the client/backend boundary.
 *
 * Requests are validated by the route handlers; responses are validated by the
 * client. Cards are checked one at a time so a single unknown card type does
 * not throw away the rest of a batch.
 */

import { z } from 'zod';
import { CARD_KINDS } from '../types/card';
import type { WireCard } from '../types/card';

// ── Cards ──────────────────────────────────────────────────────────────────

export const WireCardSchema = z.object({
  header: z.string().max(1000),
  text: z.string(),
  type: z.enum(CARD_KINDS),
  metadata: z.record(z.unknown()).optional(),
});

// ── Requests ───────────────────────────────────────────────────────────────

export const SessionIdSchema = z.string().min(1).max(256);

export const CursorSchema = z.tuple([
  z.number().int().nonnegative(),
  z.number().int().nonnegative(),
]);

export const FulfillmentContextSchema = z.object({
  scopeRoot: z.string().max(4096),
  planPath: z.string().max(4096).optional(),
});

export const FulfillRequestSchema = z.object({
  sessionId: SessionIdSchema,
  documentText: z.string(),
  cursor: CursorSchema,
  context: FulfillmentContextSchema,
});

// ── Responses ──────────────────────────────────────────────────────────────

export const FulfillResponseEnvelopeSchema = z.object({
  cards: z.array(z.unknown()),
  processing: z.boolean(),
});

export const HealthResponseSchema = z.object({
  status: z.string(),
  fulfillers: z.record(z.boolean()),
});

// ── Helpers ────────────────────────────────────────────────────────────────

/**
 * Validate `input` against `schema`. Returns parsed data on success, or
 * throws an Error listing every issue as `path: message`.
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid input: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join('.') || 'input'}: ${i.message}`)
    .join('; ');
}

export interface ParsedWireCards {
  cards: WireCard[];
  dropped: number;
}

export function parseWireCards(raw: readonly unknown[]): ParsedWireCards {
  const cards: WireCard[] = [];
  let dropped = 0;
  for (const item of raw) {
    const result = WireCardSchema.safeParse(item);
    if (result.success) {
      cards.push(result.data);
    } else {
      dropped++;
    }
  }
  return { cards, dropped };
}
