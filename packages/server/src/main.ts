// Bridge server entry point
//
// Usage: BRIDGE_PORT=8001 IN_PROCESS_HOST=1 tsx src/main.ts

import { describeError } from '@cmdbridge/runtime';
import { loadConfig } from './config/config.js';
import { createLogger, toBridgeLogger } from './logging/logger.js';
import { createBridgeServer, type BridgeServer } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = toBridgeLogger(createLogger(config.logging));

  let server: BridgeServer | null = null;
  let stopping = false;

  const shutdown = (reason: string, exitCode: number) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { reason });

    const stopped = server ? server.stop() : Promise.resolve();
    void stopped.then(
      () => process.exit(exitCode),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: describeError(error) });
        process.exit(1);
      }
    );
  };

  server = await createBridgeServer(config, {
    logger,
    onProtocolViolation(error) {
      logger.error('Protocol violation; the host may have executed a command twice', {
        code: error.code,
        error: error.message,
      });
      shutdown(error.code, 1);
    },
  });

  process.once('SIGINT', () => shutdown('SIGINT', 0));
  process.once('SIGTERM', () => shutdown('SIGTERM', 0));

  await server.start();
}

main().catch((error: unknown) => {
  const logger = createLogger({ level: 'error', pretty: false, file: null });
  logger.fatal({ err: error }, 'Bridge failed to start');
  process.exit(1);
});
