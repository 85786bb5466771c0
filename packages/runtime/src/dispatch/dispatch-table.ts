// Dispatch table - maps command types to handlers

import type { Command } from '@cmdbridge/protocol';
import type { BridgeLogger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { CommandHandler, HandlerContext } from './types.js';

/**
 * Outcome of dispatching a command.
 */
export type DispatchOutcome =
  | { kind: 'handled'; data: unknown }
  | { kind: 'not_registered'; availableCommands: string[] };

/**
 * Registry for command handlers.
 * Maps command type strings to handler functions.
 *
 * Registrations are resolved once when dispatching; re-registering a type
 * replaces the previous handler and logs a warning, so handlers can be
 * hot-patched during development.
 */
export class DispatchTable {
  private handlers = new Map<string, CommandHandler>();

  constructor(private logger: BridgeLogger = silentLogger) {}

  /**
   * Register a handler for a command type. Last registration wins.
   *
   * @param commandType - The command type (e.g., 'create_curve')
   */
  register(commandType: string, handler: CommandHandler): void {
    if (this.handlers.has(commandType)) {
      this.logger.warn(`Replacing handler for command type: ${commandType}`, { commandType });
    }
    this.handlers.set(commandType, handler);
  }

  /**
   * Register several handlers at once.
   */
  registerAll(handlers: Record<string, CommandHandler>): void {
    for (const [commandType, handler] of Object.entries(handlers)) {
      this.register(commandType, handler);
    }
  }

  /**
   * Get all registered command types, sorted.
   */
  getRegisteredTypes(): string[] {
    return Array.from(this.handlers.keys()).sort();
  }

  /**
   * Run the handler for a command.
   * Handler errors propagate to the caller for classification.
   */
  async dispatch(command: Command, ctx: HandlerContext): Promise<DispatchOutcome> {
    const handler = this.handlers.get(command.type);
    if (!handler) {
      return { kind: 'not_registered', availableCommands: this.getRegisteredTypes() };
    }

    const data = await handler(command.parameters, ctx);
    return { kind: 'handled', data: data ?? null };
  }
}
