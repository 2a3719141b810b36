/**
 * FulfillmentClient — typed HTTP wrapper around the fulfillment backend.
 *
 * Every call is bounded by a timeout. Failures surface as TransportError (no
 * HTTP answer) or BackendError (non-2xx status, unreadable body). Retry
 * policy belongs to the caller; nothing is retried here.
 */

import type { FulfillRequest, FulfillResponse, HealthResponse } from '@shared/types';
import { DEFAULT_FULFILLMENT_SETTINGS } from '@shared/types';
import { BACKEND_ROUTES } from '@shared/constants';
import { BackendError, TransportError } from '@shared/errors';
import {
  FulfillResponseEnvelopeSchema,
  HealthResponseSchema,
  formatIssues,
  parseWireCards,
} from '@shared/schemas';

/** The three calls the fulfillment core depends on. */
export interface FulfillmentBackend {
  submit(request: FulfillRequest): Promise<FulfillResponse>;
  poll(sessionId: string): Promise<FulfillResponse>;
  clear(sessionId: string): Promise<void>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FulfillmentClientOptions {
  timeoutMs?: number;
  /** Replaces the global fetch (in-process backends, tests). */
  fetch?: FetchLike;
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';

interface RawResponse {
  status: number;
  body: unknown;
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'TimeoutError'
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FulfillmentClient implements FulfillmentBackend {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(baseUrl: string, options: FulfillmentClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FULFILLMENT_SETTINGS.requestTimeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * POST /fulfill: start a cycle. Returns the cards that were cheap to
   * compute plus whether slower fulfillers are still running.
   */
  async submit(request: FulfillRequest): Promise<FulfillResponse> {
    const raw = await this.request('POST', BACKEND_ROUTES.FULFILL, request);
    return this.toFulfillResponse(raw, 'POST', BACKEND_ROUTES.FULFILL);
  }

  /**
   * GET /session/{id}/cached: current accumulated cards for the session.
   */
  async poll(sessionId: string): Promise<FulfillResponse> {
    const path = BACKEND_ROUTES.cached(sessionId);
    const raw = await this.request('GET', path);
    return this.toFulfillResponse(raw, 'GET', path);
  }

  /**
   * DELETE /session/{id}: drop server-side state. Safe on unknown sessions.
   */
  async clear(sessionId: string): Promise<void> {
    await this.request('DELETE', BACKEND_ROUTES.session(sessionId));
  }

  /**
   * GET /health. Advisory only.
   */
  async health(): Promise<HealthResponse> {
    const raw = await this.request('GET', BACKEND_ROUTES.HEALTH);
    const result = HealthResponseSchema.safeParse(raw.body);
    if (!result.success) {
      throw new BackendError(raw.status, `Malformed response from GET ${BACKEND_ROUTES.HEALTH}: ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async request(method: HttpMethod, path: string, payload?: unknown): Promise<RawResponse> {
    const label = `${method} ${path}`;

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new TransportError(`${label} timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new TransportError(`${label} failed: ${describe(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new BackendError(response.status, `${label} failed: ${response.status} ${response.statusText}`.trim());
    }

    if (response.status === 204) {
      return { status: response.status, body: null };
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError(`${label} failed while reading the body: ${describe(error)}`, { cause: error });
    }

    if (text.trim() === '') {
      return { status: response.status, body: null };
    }

    try {
      return { status: response.status, body: JSON.parse(text) };
    } catch {
      throw new BackendError(response.status, `Malformed response from ${label}: body is not JSON`);
    }
  }

  private toFulfillResponse(raw: RawResponse, method: HttpMethod, path: string): FulfillResponse {
    const envelope = FulfillResponseEnvelopeSchema.safeParse(raw.body);
    if (!envelope.success) {
      throw new BackendError(raw.status, `Malformed response from ${method} ${path}: ${formatIssues(envelope.error)}`);
    }

    const { cards, dropped } = parseWireCards(envelope.data.cards);
    if (dropped > 0) {
      console.warn(`[FulfillmentClient] Dropped ${dropped} unrecognised card(s) from ${method} ${path}`);
    }
    return { cards, processing: envelope.data.processing };
  }
}
