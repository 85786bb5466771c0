// Entities router - registry queries and reference resolution

import { z } from 'zod';
import { router, publicProcedure } from '../index.js';

const typeFilterSchema = z.union([z.string(), z.array(z.string())]).optional();

const limitSchema = z.number().int().min(1).max(100).default(10);

export const entitiesRouter = router({
  /**
   * Resolve a vague reference ("the curve", "it") to an entity.
   */
  resolve: publicProcedure
    .input(z.object({ hint: z.string(), type: typeFilterSchema }))
    .query(({ ctx, input }) => ctx.bridge.resolveReference(input.hint, input.type)),

  /**
   * Get an entity by id.
   */
  lookup: publicProcedure
    .input(z.object({ entityId: z.string() }))
    .query(({ ctx, input }) => ctx.bridge.lookup(input.entityId)),

  /**
   * Most recently created or modified entities first.
   */
  recent: publicProcedure
    .input(z.object({ limit: limitSchema, type: typeFilterSchema }))
    .query(({ ctx, input }) => ctx.bridge.registry.recent(input.limit, input.type)),

  byType: publicProcedure
    .input(z.object({ type: z.string(), limit: limitSchema }))
    .query(({ ctx, input }) => ctx.bridge.registry.findByType(input.type, input.limit)),

  stats: publicProcedure.query(({ ctx }) => ctx.bridge.registry.stats()),
});
