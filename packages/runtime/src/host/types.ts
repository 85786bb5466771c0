// Host executor seams
//
// The executor only sees commands and reports outcomes. The in-process
// bridge and the HTTP host client both implement these interfaces.

import type { Command, ExecutionOutcome } from '@cmdbridge/protocol';

/**
 * Where the executor gets work from.
 */
export interface CommandSource {
  /**
   * Remove and return up to `maxCount` pending commands in FIFO order.
   * Returned commands are already in the executing state.
   */
  drain(maxCount: number): Promise<Command[]>;
}

/**
 * Where the executor reports outcomes to.
 */
export interface ResultSink {
  complete(commandId: string, outcome: ExecutionOutcome): Promise<unknown>;
}

/**
 * Per-command executor stages, in order. A command passes through either
 * result_computed or exception_caught, never both.
 */
export type ExecutionStage =
  | 'received'
  | 'marshalled'
  | 'handler_invoked'
  | 'result_computed'
  | 'exception_caught'
  | 'published';
