// Command handler types

import type { Command, CommandParameters } from '@cmdbridge/protocol';
import type { BridgeLogger } from '../logger.js';
import type { OwnerThread } from '../host/owner-thread.js';

/**
 * Context passed to command handlers.
 */
export type HandlerContext = {
  /** The command being executed */
  command: Command;

  /** Logger scoped to this command */
  logger: BridgeLogger;

  /** The owner thread the handler is running on */
  ownerThread: OwnerThread;
};

/**
 * A command handler performs one host operation.
 * Returns result data on success, throws on error.
 *
 * Throw ArgumentError for bad parameters and OperationError when the host
 * cannot carry out the operation; anything else is reported as unexpected.
 */
export type CommandHandler = (
  parameters: Readonly<CommandParameters>,
  ctx: HandlerContext
) => Promise<unknown> | unknown;
