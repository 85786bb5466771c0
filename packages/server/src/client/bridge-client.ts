// Producer client for a remote bridge
//
// Typed through the server's AppRouter; superjson on both ends.

import { createTRPCClient, httpBatchLink } from '@trpc/client';
import superjson from 'superjson';
import type { AppRouter } from '../trpc/routers/index.js';

export type BridgeClientOptions = {
  /** Server base URL, e.g. http://127.0.0.1:8001 */
  url: string;

  /** Replacement fetch (tests, custom agents) */
  fetch?: typeof fetch;

  headers?: Record<string, string>;
};

/**
 * Create the raw tRPC client.
 */
export function createBridgeTRPCClient(options: BridgeClientOptions) {
  const base = options.url.replace(/\/+$/, '');
  return createTRPCClient<AppRouter>({
    links: [
      httpBatchLink({
        url: `${base}/trpc`,
        transformer: superjson,
        headers: () => options.headers ?? {},
        ...(options.fetch ? { fetch: options.fetch } : {}),
      }),
    ],
  });
}

/**
 * Create a producer client with one method per bridge operation.
 *
 * Usage:
 * ```ts
 * const client = createBridgeClient({ url: 'http://127.0.0.1:8001' });
 * const { commandId } = await client.submit('modify', { reference: 'the curve', properties: { color: 'red' } });
 * const outcome = await client.await(commandId, 5000);
 * ```
 */
export function createBridgeClient(options: BridgeClientOptions) {
  const trpc = createBridgeTRPCClient(options);

  return {
    trpc,

    submit: (type: string, parameters: Record<string, unknown> = {}) =>
      trpc.commands.submit.mutate({ type, parameters }),

    await: (commandId: string, timeoutMs?: number) =>
      trpc.commands.await.query({ commandId, timeoutMs }),

    execute: (type: string, parameters: Record<string, unknown> = {}, timeoutMs?: number) =>
      trpc.commands.execute.mutate({ type, parameters, timeoutMs }),

    poll: (commandId: string) => trpc.commands.poll.query({ commandId }),

    availableCommands: () => trpc.commands.available.query(),

    resolveReference: (hint: string, type?: string | string[]) =>
      trpc.entities.resolve.query({ hint, type }),

    lookup: (entityId: string) => trpc.entities.lookup.query({ entityId }),

    recent: (limit = 10, type?: string | string[]) => trpc.entities.recent.query({ limit, type }),

    reset: () => trpc.session.reset.mutate(),

    status: () => trpc.session.status.query(),
  };
}

export type BridgeClient = ReturnType<typeof createBridgeClient>;
