// tRPC request context
//
// Every procedure works against the one bridge session of this process.

import type { BridgeLogger, CommandBridge } from '@cmdbridge/runtime';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  /** The bridge session: queue, results and entity registry */
  bridge: CommandBridge;

  logger: BridgeLogger;
};

/**
 * Build the context factory handed to the transport adapter.
 */
export function createContextFactory(context: Context): () => Context {
  return () => context;
}
