import { mock } from 'node:test';

export interface RecordedRequest {
  url: string;
  method: string;
  body: unknown;
}

export type StubReply = (request: RecordedRequest) => Response | Promise<Response>;

function toUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/** Replaces global fetch for the current test; returns the request log */
export function stubGateway(reply: StubReply): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    const rawBody = init?.body;
    const request: RecordedRequest = {
      url: toUrl(input),
      method: init?.method ?? 'GET',
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
    };
    requests.push(request);
    return reply(request);
  });
  return requests;
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
