// Bridge server assembly
//
// Wires the configured registry store, the bridge session, the HTTP app
// and, when enabled, an in-process host executor over the simulated
// document. main.ts adds process concerns (signals, exit codes).

import type { FastifyInstance } from 'fastify';
import {
  createFilesystemEntityLogStore,
  createInMemoryEntityLogStore,
  postgres,
  type EntityLogStore,
} from '@cmdbridge/repositories';
import {
  CommandBridge,
  DispatchTable,
  EntityRegistry,
  HostExecutor,
  SimulatedDocument,
  createSimulatedHandlers,
  describeError,
  type BridgeLogger,
  type ProtocolViolation,
} from '@cmdbridge/runtime';
import { ConfigError, type BridgeConfig } from './config/config.js';
import { createBridgeApp } from './http/app.js';

export type BridgeServer = {
  app: FastifyInstance;
  bridge: CommandBridge;
  registry: EntityRegistry;

  /** In-process host, when IN_PROCESS_HOST is set */
  executor: HostExecutor | null;

  /** Listen, then start the sweep timer and the in-process host */
  start(): Promise<string>;

  stop(): Promise<void>;
};

export type BridgeServerOptions = {
  logger: BridgeLogger;

  /** Use this store instead of the configured backend */
  store?: EntityLogStore;

  /** Called when the bridge or the in-process host sees a protocol violation */
  onProtocolViolation?: (error: ProtocolViolation) => void;
};

/**
 * Build the registry store for the configured backend.
 */
export function createEntityLogStore(config: BridgeConfig): EntityLogStore {
  switch (config.registry.backend) {
    case 'file':
      return createFilesystemEntityLogStore({ directory: config.dataDir });
    case 'memory':
      return createInMemoryEntityLogStore();
    case 'postgres':
      if (!config.registry.databaseUrl) {
        throw new ConfigError('DATABASE_URL is required when REGISTRY_BACKEND is postgres');
      }
      return postgres.createPgEntityLogStore({ connectionString: config.registry.databaseUrl });
  }
}

export async function createBridgeServer(
  config: BridgeConfig,
  options: BridgeServerOptions
): Promise<BridgeServer> {
  const { logger } = options;
  const onProtocolViolation =
    options.onProtocolViolation ??
    ((error: ProtocolViolation) => {
      logger.error('Protocol violation', { code: error.code, error: error.message });
    });

  const store = options.store ?? createEntityLogStore(config);
  const registry = await EntityRegistry.open({
    store,
    logger,
    compactEvery: config.registry.compactEvery,
  });

  const bridge = new CommandBridge({
    registry,
    logger,
    defaultAwaitTimeoutMs: config.awaitTimeoutMs,
    maxAwaitTimeoutMs: config.maxAwaitTimeoutMs,
    resultRetentionMs: config.resultRetentionMs,
    hostStaleAfterMs: config.hostStaleAfterMs,
    onProtocolViolation,
  });

  const app = createBridgeApp({ bridge, logger, drainBatchSize: config.drainBatchSize });

  let executor: HostExecutor | null = null;
  if (config.inProcessHost) {
    const dispatch = new DispatchTable(logger);
    dispatch.registerAll(createSimulatedHandlers(new SimulatedDocument()));
    bridge.advertiseCommands(dispatch.getRegisteredTypes());
    executor = new HostExecutor({
      source: bridge,
      sink: bridge,
      dispatch,
      logger,
      handlerTimeoutMs: config.handlerTimeoutMs,
      batchSize: config.drainBatchSize,
      onProtocolViolation,
    });
  }

  let sweepTimer: NodeJS.Timeout | null = null;

  return {
    app,
    bridge,
    registry,
    executor,

    async start() {
      const address = await app.listen({ host: config.host, port: config.port });

      sweepTimer = setInterval(() => {
        bridge.sweep();
      }, config.sweepIntervalMs);
      sweepTimer.unref();

      executor?.start();

      logger.info('Bridge listening', {
        address,
        sessionId: bridge.sessionId,
        registryBackend: config.registry.backend,
        inProcessHost: executor !== null,
      });
      return address;
    },

    async stop() {
      if (sweepTimer) {
        clearInterval(sweepTimer);
        sweepTimer = null;
      }
      await executor?.stop();
      await app.close();
      await registry.whenIdle();
      try {
        await store.close();
      } catch (error) {
        logger.error('Failed to close registry store', { error: describeError(error) });
      }
      logger.info('Bridge stopped', { sessionId: bridge.sessionId });
    },
  };
}
