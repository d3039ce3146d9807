/**
 * In-process stand-in for the PostgREST / GoTrue HTTP endpoints the
 * Supabase client talks to. Every request is recorded and answered by the
 * test's responder; nothing leaves the process.
 */

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

export type Responder = (request: RecordedRequest) => Response;

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

export const emptyResponse = (status = 204) => new Response(null, { status });

export const createFakeFetch = (responder: Responder) => {
  const requests: RecordedRequest[] = [];

  const fakeFetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const recorded: RecordedRequest = {
      method: init?.method ?? 'GET',
      url,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    requests.push(recorded);
    return responder(recorded);
  };

  return { fakeFetch, requests };
};
