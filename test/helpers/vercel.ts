/* test/helpers/vercel.ts */
// In-process stand-ins for the Vercel request / response pair.

import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import type { VercelRequest, VercelResponse } from '@vercel/node';

export interface RequestInit {
  method?: string;
  body?: unknown;
  query?: Record<string, string | string[]>;
}

export function createRequest(init: RequestInit = {}): VercelRequest {
  const req = new IncomingMessage(new Socket());
  req.method = init.method ?? 'POST';
  const cookies: Record<string, string> = {};
  return Object.assign(req, { query: init.query ?? {}, cookies, body: init.body });
}

export interface ResponseProbe {
  res: VercelResponse;
  /** Last payload handed to json() or send(). */
  body: () => unknown;
}

export function createResponse(req: VercelRequest): ResponseProbe {
  let payload: unknown;
  const base = new ServerResponse(req);

  const res: VercelResponse = Object.assign(base, {
    status(code: number) {
      base.statusCode = code;
      return res;
    },
    json(jsonBody: unknown) {
      payload = jsonBody;
      return res;
    },
    send(body: unknown) {
      payload = body;
      return res;
    },
    redirect(statusOrUrl: string | number, url?: string) {
      base.statusCode = typeof statusOrUrl === 'number' ? statusOrUrl : 307;
      base.setHeader('Location', url ?? String(statusOrUrl));
      return res;
    }
  });

  return { res, body: () => payload };
}

export function call(init: RequestInit = {}) {
  const req = createRequest(init);
  const probe = createResponse(req);
  return { req, ...probe };
}
