// pino logging for the server process
//
// Core packages log through BridgeLogger; this module backs it with pino.
// Pretty printing and file output are pino transport targets.

import { pino, type DestinationStream, type Logger, type TransportTargetOptions } from 'pino';
import type { BridgeLogger } from '@cmdbridge/runtime';
import type { LogLevel } from '../config/config.js';

export type LoggerOptions = {
  level: LogLevel;
  pretty: boolean;
  file: string | null;
  name?: string;
};

/**
 * Transport targets for the given options. Empty means plain JSON to stdout.
 */
export function resolveTransportTargets(options: LoggerOptions): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [];

  if (options.pretty) {
    targets.push({
      target: 'pino-pretty',
      level: options.level,
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  }

  if (options.file) {
    targets.push({
      target: 'pino/file',
      level: options.level,
      options: {
        destination: options.file,
        mkdir: true,
      },
    });
  }

  return targets;
}

/**
 * Create the process logger.
 *
 * @param destination - Write here instead of stdout or transports (tests)
 */
export function createLogger(options: LoggerOptions, destination?: DestinationStream): Logger {
  const base = { level: options.level, name: options.name ?? 'cmdbridge' };

  if (destination) {
    return pino(base, destination);
  }

  const targets = resolveTransportTargets(options);
  if (targets.length === 0) {
    return pino(base);
  }
  return pino({ ...base, transport: { targets } });
}

/**
 * Adapt a pino logger to the BridgeLogger interface.
 */
export function toBridgeLogger(logger: Logger): BridgeLogger {
  return {
    debug(message, data) {
      logger.debug(data ?? {}, message);
    },
    info(message, data) {
      logger.info(data ?? {}, message);
    },
    warn(message, data) {
      logger.warn(data ?? {}, message);
    },
    error(message, data) {
      logger.error(data ?? {}, message);
    },
  };
}
