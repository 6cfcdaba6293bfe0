import { Router } from 'express';
import type { ApiContext } from '../context';
import { handle, sendOutcome } from '../respond';

// Both endpoints scan every token; see computeOwnerStats.
export function ownersRouter(ctx: ApiContext): Router {
  const router = Router();

  router.get(
    '/owners/:owner/services',
    handle(async (req, res) => {
      sendOutcome(res, await ctx.registry.listByOwner(req.params.owner));
    }),
  );

  router.get(
    '/owners/:owner/stats',
    handle(async (req, res) => {
      sendOutcome(res, await ctx.registry.statsByOwner(req.params.owner));
    }),
  );

  return router;
}
