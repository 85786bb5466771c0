// Root router - combines the producer-facing routers
//
// Usage from a client:
//   const { commandId } = await client.commands.submit.mutate({ type: 'create_point', parameters: { x: 0, y: 0 } });
//   const outcome = await client.commands.await.query({ commandId, timeoutMs: 5000 });

import { router } from '../index.js';
import { commandsRouter } from './commands.js';
import { entitiesRouter } from './entities.js';
import { sessionRouter } from './session.js';

export const appRouter = router({
  commands: commandsRouter,
  entities: entitiesRouter,
  session: sessionRouter,
});

/**
 * Export the router type for client-side type inference.
 */
export type AppRouter = typeof appRouter;
