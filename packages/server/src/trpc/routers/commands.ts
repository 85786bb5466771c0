// Commands router - producer-facing submit, await and poll

import { z } from 'zod';
import { router, publicProcedure } from '../index.js';

const parametersSchema = z.record(z.unknown()).default({});

const timeoutSchema = z.number().int().positive().optional();

export const commandsRouter = router({
  /**
   * Enqueue a command. A `reference` parameter is resolved to `entity_id`
   * before the command is queued.
   */
  submit: publicProcedure
    .input(z.object({ type: z.string(), parameters: parametersSchema }))
    .mutation(({ ctx, input }) => ctx.bridge.submit(input.type, input.parameters)),

  /**
   * Wait for a command's result. Resolves with `timed_out`,
   * `host_unavailable` or `session_reset` instead of throwing.
   */
  await: publicProcedure
    .input(z.object({ commandId: z.string(), timeoutMs: timeoutSchema }))
    .query(({ ctx, input }) => ctx.bridge.await(input.commandId, input.timeoutMs)),

  /**
   * Submit and wait in one call.
   */
  execute: publicProcedure
    .input(
      z.object({ type: z.string(), parameters: parametersSchema, timeoutMs: timeoutSchema })
    )
    .mutation(({ ctx, input }) =>
      ctx.bridge.submitAndAwait(input.type, input.parameters, input.timeoutMs)
    ),

  poll: publicProcedure
    .input(z.object({ commandId: z.string() }))
    .query(({ ctx, input }) => ctx.bridge.poll(input.commandId)),

  /**
   * Command types the host last advertised.
   */
  available: publicProcedure.query(({ ctx }) => ctx.bridge.hostStatus().availableCommands),

  history: publicProcedure
    .input(z.object({ limit: z.number().int().min(1).max(100).default(10) }))
    .query(({ ctx, input }) => ctx.bridge.recentHistory(input.limit)),
});
