import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { WireCard } from '@shared/types';
import { SessionRegistry } from '../services/session/SessionRegistry';
import type { Fulfiller } from '../services/fulfillment/Fulfiller';
import { FulfillmentOrchestrator } from '../services/fulfillment/FulfillmentOrchestrator';
import { createRequestHandler, type RequestHandler } from './routes';

const BASE = 'http://backend.test';

const fixed = (name: string, cards: WireCard[]): Fulfiller => ({
  name,
  mode: 'immediate',
  isAvailable: () => true,
  fulfill: async () => cards,
});

const post = (path: string, body: string) =>
  new Request(`${BASE}${path}`, { method: 'POST', body, headers: { 'Content-Type': 'application/json' } });

const VALID_BODY = JSON.stringify({
  sessionId: 's1',
  documentText: 'Hello',
  cursor: [0, 5],
  context: { scopeRoot: '/work' },
});

describe('routes', () => {
  let handle: RequestHandler;
  let orchestrator: FulfillmentOrchestrator;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    orchestrator = new FulfillmentOrchestrator({
      sessions: new SessionRegistry(),
      fulfillers: [fixed('questions', [{ header: 'Q1', text: 'Why?', type: 'question' }])],
    });
    handle = createRequestHandler(orchestrator);
  });

  it('POST /fulfill returns the cycle result', async () => {
    const response = await handle(post('/fulfill', VALID_BODY));
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/json');
    expect(await response.json()).toEqual({
      cards: [{ header: 'Q1', text: 'Why?', type: 'question' }],
      processing: false,
    });
  });

  it('POST /fulfill rejects an invalid body with the issue list', async () => {
    const response = await handle(
      post('/fulfill', JSON.stringify({ sessionId: 's1', documentText: 'x', cursor: [0], context: { scopeRoot: '/w' } })),
    );
    expect(response.status).toBe(400);
    const body: unknown = await response.json();
    expect(body).toEqual({ error: expect.stringMatching(/^Invalid input: cursor/) });
  });

  it('POST /fulfill rejects a body that is not JSON', async () => {
    const response = await handle(post('/fulfill', '{nope'));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Invalid input: body is not valid JSON' });
  });

  it('GET /session/{id}/cached returns the accumulated cards', async () => {
    await handle(post('/fulfill', VALID_BODY));
    const response = await handle(new Request(`${BASE}/session/s1/cached`));
    expect(await response.json()).toEqual({
      cards: [{ header: 'Q1', text: 'Why?', type: 'question' }],
      processing: false,
    });
  });

  it('GET /session/{id}/cached on an unknown session is empty', async () => {
    const response = await handle(new Request(`${BASE}/session/unknown/cached`));
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ cards: [], processing: false });
  });

  it('decodes percent-encoded session ids', async () => {
    const body = JSON.stringify({ sessionId: 'a/b', documentText: '', cursor: [0, 0], context: { scopeRoot: '/' } });
    await handle(post('/fulfill', body));
    const response = await handle(new Request(`${BASE}/session/a%2Fb/cached`));
    expect(await response.json()).toMatchObject({ cards: [{ header: 'Q1' }] });
  });

  it('DELETE /session/{id} answers 204 whether or not the session exists', async () => {
    await handle(post('/fulfill', VALID_BODY));
    const first = await handle(new Request(`${BASE}/session/s1`, { method: 'DELETE' }));
    const second = await handle(new Request(`${BASE}/session/s1`, { method: 'DELETE' }));
    expect([first.status, second.status]).toEqual([204, 204]);

    const cached = await handle(new Request(`${BASE}/session/s1/cached`));
    expect(await cached.json()).toEqual({ cards: [], processing: false });
  });

  it('GET /health lists fulfillers', async () => {
    const response = await handle(new Request(`${BASE}/health`));
    expect(await response.json()).toEqual({ status: 'healthy', fulfillers: { questions: true } });
  });

  it('answers 404 for unknown routes and methods', async () => {
    const unknown = await handle(new Request(`${BASE}/nowhere`));
    const wrongMethod = await handle(new Request(`${BASE}/fulfill`));
    expect(unknown.status).toBe(404);
    expect(await wrongMethod.json()).toEqual({ error: 'Not found: GET /fulfill' });
  });

  it('answers 500 when the orchestrator throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(orchestrator, 'health').mockImplementation(() => {
      throw new Error('boom');
    });
    const response = await handle(new Request(`${BASE}/health`));
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Internal server error' });
  });
});
