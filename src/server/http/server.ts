/**
 * Adapts node:http to the web Request/Response route handler.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { RequestHandler } from './routes';

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

function toHeaders(req: IncomingMessage): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }
  return headers;
}

async function toRequest(req: IncomingMessage, origin: string): Promise<Request> {
  const method = req.method ?? 'GET';
  const hasBody = method !== 'GET' && method !== 'HEAD';
  return new Request(new URL(req.url ?? '/', origin), {
    method,
    headers: toHeaders(req),
    body: hasBody ? await readBody(req) : undefined,
  });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => res.setHeader(name, value));
  const body = Buffer.from(await response.arrayBuffer());
  res.end(body);
}

export function createHttpServer(handler: RequestHandler): Server {
  return createServer((req, res) => {
    const origin = `http://${req.headers.host ?? 'localhost'}`;
    toRequest(req, origin)
      .then((request) => handler(request))
      .then((response) => writeResponse(res, response))
      .catch((error: unknown) => {
        console.error('[Server] Failed to handle request:', error);
        if (!res.headersSent) res.statusCode = 500;
        res.end();
      });
  });
}

export function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}
