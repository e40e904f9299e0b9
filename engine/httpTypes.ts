// engine/httpTypes.ts
// The slice of the Vercel request/response the handlers touch.
// VercelRequest / VercelResponse satisfy these structurally.

import type { VercelRequest } from '@vercel/node';

export type HandlerRequest = Pick<VercelRequest, 'method' | 'body' | 'query'>;

export interface HandlerResponse {
  setHeader(name: string, value: string): unknown;
  status(code: number): HandlerResponse;
  json(body: unknown): unknown;
  send(body: unknown): unknown;
}

export function rejectMethod(res: HandlerResponse, allowed: 'GET' | 'POST'): void {
  res.setHeader('Allow', allowed);
  res.status(405).json({ error: 'Method Not Allowed' });
}

/** First value of a query parameter. */
export function queryValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
