import { Router } from 'express';
import type { ApiContext } from '../context';
import { healthRouter } from './health';
import { servicesRouter } from './services';
import { ownersRouter } from './owners';
import { registryRouter } from './registry';
import { eventsRouter } from './events';

export function apiRouter(ctx: ApiContext): Router {
  const router = Router();
  router.use(healthRouter(ctx));
  router.use(servicesRouter(ctx));
  router.use(ownersRouter(ctx));
  router.use('/registry', registryRouter(ctx));
  router.use('/events', eventsRouter(ctx));
  return router;
}
