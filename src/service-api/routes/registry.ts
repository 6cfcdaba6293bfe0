import { Router } from 'express';
import { configureStateUriSchema, validateRequest } from '@core/requests';
import type { ApiResponse } from '@shared/types';
import type { ApiContext } from '../context';
import { badRequest, handle, reported, sendOutcome } from '../respond';

export function registryRouter(ctx: ApiContext): Router {
  const router = Router();
  const { registry } = ctx;

  router.get('/', (_req, res) => {
    const response: ApiResponse = { success: true, data: registry.collectionInfo() };
    res.json(response);
  });

  router.get(
    '/summary',
    handle(async (_req, res) => {
      const response: ApiResponse = { success: true, data: await registry.summary() };
      res.json(response);
    }),
  );

  router.get(
    '/state-uris',
    handle(async (_req, res) => {
      const response: ApiResponse = { success: true, data: await registry.stateUriTable() };
      res.json(response);
    }),
  );

  router.put(
    '/state-uris',
    handle(async (req, res) => {
      const body = validateRequest(configureStateUriSchema, req.body);
      if (!body.success) return badRequest(res, body.error);

      const outcome = await registry.configureStateURI(body.data.state, body.data.uri);
      sendOutcome(res, reported('configureStateURI', outcome));
    }),
  );

  return router;
}
