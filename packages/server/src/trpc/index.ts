// tRPC initialization
//
// Sets up tRPC with the superjson transformer and maps bridge errors onto
// tRPC error codes.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import { BridgeError } from '@cmdbridge/runtime';
import type { Context } from './context.js';
import { errorDetails, mappingFor } from '../errors.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    const cause = error.cause;
    return {
      ...shape,
      data: {
        ...shape.data,
        // Bridge error code for client-side handling
        bridgeCode: cause instanceof BridgeError ? cause.code : null,
        details: cause instanceof BridgeError ? (errorDetails(cause) ?? null) : null,
      },
    };
  },
});

export const router = t.router;

export const middleware = t.middleware;

export const createCallerFactory = t.createCallerFactory;

/**
 * Rethrow BridgeErrors with the matching tRPC code, keeping the original
 * as the cause.
 */
const mapBridgeErrors = middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok && result.error.cause instanceof BridgeError) {
    const cause = result.error.cause;
    throw new TRPCError({ code: mappingFor(cause).trpc, message: cause.message, cause });
  }
  return result;
});

/**
 * Base procedure for every route.
 */
export const publicProcedure = t.procedure.use(mapBridgeErrors);

export { TRPCError };
