import { Router } from 'express';
import type { ApiContext } from '../context';

export function healthRouter(ctx: ApiContext): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      success: true,
      data: {
        status: 'ok',
        lifecycle: ctx.registry.lifecycle.name,
        storage: ctx.storage,
        nextId: ctx.registry.nextId(),
        timestamp: new Date().toISOString(),
      },
    });
  });

  return router;
}
