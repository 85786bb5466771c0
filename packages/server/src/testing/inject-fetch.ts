// fetch backed by Fastify's inject
//
// Lets the tRPC client and the HTTP host talk to an app without a socket.

import type { FastifyInstance } from 'fastify';

function urlOf(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

export function createInjectFetch(app: FastifyInstance): typeof fetch {
  return async (input, init) => {
    const url = urlOf(input);
    const response = await app.inject({
      method: init?.method === 'POST' ? 'POST' : 'GET',
      url: `${url.pathname}${url.search}`,
      headers: Object.fromEntries(new Headers(init?.headers)),
      payload: typeof init?.body === 'string' ? init.body : undefined,
    });

    const contentType = response.headers['content-type'];
    return new Response(response.body, {
      status: response.statusCode,
      headers: typeof contentType === 'string' ? { 'content-type': contentType } : {},
    });
  };
}
