// api/__tests__/fakeHttp.ts
// In-process stand-ins for the Vercel request/response pair.

import type { HandlerRequest, HandlerResponse } from '../../engine/httpTypes';

export class FakeResponse implements HandlerResponse {
  statusCode = 200;
  headers: Record<string, string> = {};
  body: unknown = undefined;

  setHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }

  send(body: unknown): this {
    this.body = body;
    return this;
  }
}

export function post(body: unknown): HandlerRequest {
  return { method: 'POST', body, query: {} };
}

export function get(query: Record<string, string> = {}): HandlerRequest {
  return { method: 'GET', body: undefined, query };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Narrow a JSON body to an object for field assertions. */
export function bodyOf(res: FakeResponse): Record<string, unknown> {
  if (!isRecord(res.body)) throw new Error(`expected a JSON object body, got ${String(res.body)}`);
  return res.body;
}
