// HTTP transport
//
// Host-facing polling endpoints, served at the root and under
// /grasshopper for Grasshopper hosts that poll the legacy paths:
//   GET  /pending_commands   drain up to DRAIN_BATCH_SIZE commands
//   POST /command_result     report one command's outcome
//   GET  /health, /status
// The producer-facing tRPC router is mounted at /trpc.

import {
  fastify,
  type FastifyError,
  type FastifyInstance,
  type FastifyRequest,
} from 'fastify';
import { fastifyTRPCPlugin, type FastifyTRPCPluginOptions } from '@trpc/server/adapters/fastify';
import { ZodError } from 'zod';
import {
  fromWireResult,
  isWireCommandResult,
  toWireCommand,
  validateWireResult,
  type WireCommand,
} from '@cmdbridge/protocol';
import {
  BridgeError,
  silentLogger,
  type BridgeLogger,
  type CommandBridge,
} from '@cmdbridge/runtime';
import { errorDetails, InvalidResultError, mappingFor } from '../errors.js';
import { appRouter, type AppRouter } from '../trpc/routers/index.js';
import { createContextFactory } from '../trpc/context.js';
import {
  AVAILABLE_COMMANDS_HEADER,
  parseAvailableCommandsHeader,
  pendingCommandsQuerySchema,
  toStatusResponse,
  type ErrorResponse,
  type HealthResponse,
  type StatusResponse,
} from './schemas.js';

export const HOST_ROUTE_PREFIXES = ['', '/grasshopper'] as const;

export const DEFAULT_DRAIN_BATCH_SIZE = 20;

export type BridgeAppDependencies = {
  bridge: CommandBridge;
  logger?: BridgeLogger;

  /** Upper bound on commands returned by one poll */
  drainBatchSize?: number;
};

function toErrorResponse(error: Error): { status: number; body: ErrorResponse } {
  if (error instanceof BridgeError) {
    const details = errorDetails(error);
    return {
      status: mappingFor(error).status,
      body: { error: { code: error.code, message: error.message, ...(details ? { details } : {}) } },
    };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: {
          code: 'INVALID_REQUEST',
          message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        },
      },
    };
  }

  // Fastify's own client errors (bad JSON, wrong content type)
  const statusCode =
    'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
  if (statusCode >= 400 && statusCode < 500) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : 'BAD_REQUEST';
    return { status: statusCode, body: { error: { code, message: error.message } } };
  }

  return { status: 500, body: { error: { code: 'INTERNAL_ERROR', message: error.message } } };
}

/**
 * Create the HTTP application for a bridge session.
 */
export function createBridgeApp(dependencies: BridgeAppDependencies): FastifyInstance {
  const { bridge } = dependencies;
  const logger = dependencies.logger ?? silentLogger;
  const drainBatchSize = dependencies.drainBatchSize ?? DEFAULT_DRAIN_BATCH_SIZE;

  // tRPC batching puts procedure names in the path
  const app = fastify({ logger: false, maxParamLength: 5000 });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const { status, body } = toErrorResponse(error);
    const data = {
      method: request.method,
      url: request.url,
      status,
      code: body.error.code,
      error: body.error.message,
    };
    if (status >= 500) {
      logger.error('Request failed', data);
    } else {
      logger.warn('Request rejected', data);
    }
    void reply.status(status).send(body);
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.debug('Request completed', {
      method: request.method,
      url: request.url,
      status: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  const health = async (): Promise<HealthResponse> => ({
    status: 'healthy',
    session_id: bridge.sessionId,
    host: bridge.hostStatus().state,
    server_time: new Date().toISOString(),
  });

  const status = async (): Promise<StatusResponse> => toStatusResponse(bridge.status());

  const pendingCommands = async (request: FastifyRequest): Promise<WireCommand[]> => {
    const query = pendingCommandsQuerySchema.parse(request.query);

    const advertised = parseAvailableCommandsHeader(request.headers[AVAILABLE_COMMANDS_HEADER]);
    if (advertised) {
      bridge.advertiseCommands(advertised);
    }

    const limit = Math.min(query.limit ?? drainBatchSize, drainBatchSize);
    const commands = await bridge.drain(limit);
    if (commands.length > 0) {
      logger.info('Host polled commands', { count: commands.length });
    }
    return commands.map(toWireCommand);
  };

  const commandResult = async (
    request: FastifyRequest
  ): Promise<{ status: 'received'; command_id: string }> => {
    const body: unknown = request.body;
    if (!isWireCommandResult(body)) {
      throw new InvalidResultError(validateWireResult(body).errors);
    }

    await bridge.complete(body.command_id, fromWireResult(body));
    return { status: 'received', command_id: body.command_id };
  };

  for (const prefix of HOST_ROUTE_PREFIXES) {
    app.get(`${prefix}/health`, health);
    app.get(`${prefix}/status`, status);
    app.get(`${prefix}/pending_commands`, pendingCommands);
    app.post(`${prefix}/command_result`, commandResult);
  }

  void app.register(fastifyTRPCPlugin, {
    prefix: '/trpc',
    trpcOptions: {
      router: appRouter,
      createContext: createContextFactory({ bridge, logger }),
      onError({ path, error }) {
        if (error.code === 'INTERNAL_SERVER_ERROR') {
          logger.error('tRPC procedure failed', { path, error: error.message });
        }
      },
    } satisfies FastifyTRPCPluginOptions<AppRouter>['trpcOptions'],
  });

  return app;
}
