import { Router } from 'express';
import { journalQuerySchema, tokenIdSchema, validateRequest } from '@core/requests';
import type { ApiContext } from '../context';
import { badRequest, handle } from '../respond';

export function eventsRouter(ctx: ApiContext): Router {
  const router = Router();
  const { journal } = ctx;

  router.get(
    '/',
    handle(async (req, res) => {
      const query = validateRequest(journalQuerySchema, req.query);
      if (!query.success) return badRequest(res, query.error);

      res.json({ success: true, data: await journal.list(query.data) });
    }),
  );

  router.get(
    '/stats',
    handle(async (_req, res) => {
      res.json({ success: true, data: await journal.stats() });
    }),
  );

  router.get(
    '/:seq',
    handle(async (req, res) => {
      const seq = tokenIdSchema.safeParse(req.params.seq);
      if (!seq.success) return badRequest(res, `Invalid event sequence '${req.params.seq}'`);

      const entry = await journal.get(seq.data);
      if (!entry) {
        res.status(404).json({ success: false, error: 'Event not found' });
        return;
      }
      res.json({ success: true, data: entry });
    }),
  );

  return router;
}
