// Session router - reset and status

import { router, publicProcedure } from '../index.js';

export const sessionRouter = router({
  /**
   * Clear queue, results and registry. Pending waiters resolve with
   * `session_reset`.
   */
  reset: publicProcedure.mutation(async ({ ctx }) => {
    const summary = await ctx.bridge.reset();
    ctx.logger.info('Session reset requested', { sessionId: summary.sessionId });
    return summary;
  }),

  status: publicProcedure.query(({ ctx }) => ctx.bridge.status()),

  health: publicProcedure.query(({ ctx }) => ({
    status: 'healthy' as const,
    sessionId: ctx.bridge.sessionId,
    host: ctx.bridge.hostStatus().state,
  })),
});
