import { Router } from 'express';
import { ordinalOf } from '@core/lifecycle';
import { succeed } from '@core/outcome';
import {
  assignCompanionSchema,
  changeStateSchema,
  createServiceSchema,
  validateRequest,
} from '@core/requests';
import type { ApiContext } from '../context';
import { badRequest, handle, parseTokenId, reported, sendOutcome } from '../respond';

export function servicesRouter(ctx: ApiContext): Router {
  const router = Router();
  const { registry } = ctx;

  // --- Mutations ---

  router.post(
    '/services',
    handle(async (req, res) => {
      const body = validateRequest(createServiceSchema, req.body);
      if (!body.success) return badRequest(res, body.error);

      const outcome = await registry.createService(body.data.recipient);
      sendOutcome(res, reported('createService', outcome), 201);
    }),
  );

  router.post(
    '/services/:id/companion',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;
      const body = validateRequest(assignCompanionSchema, req.body);
      if (!body.success) return badRequest(res, body.error);

      const outcome = await registry.assignCompanion(id, body.data.companion);
      sendOutcome(res, reported('assignCompanion', outcome));
    }),
  );

  router.post(
    '/services/:id/state',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;
      const body = validateRequest(changeStateSchema, req.body);
      if (!body.success) return badRequest(res, body.error);

      const outcome = await registry.changeState(id, body.data.state, body.data.rating);
      sendOutcome(res, reported('changeState', outcome));
    }),
  );

  router.post(
    '/services/:id/paid',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;

      const outcome = await registry.markPaid(id);
      sendOutcome(res, reported('markPaid', outcome));
    }),
  );

  router.post(
    '/services/:id/finalize',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;

      const outcome = await registry.finalizeService(id);
      sendOutcome(res, reported('finalizeService', outcome));
    }),
  );

  // --- Reads ---

  router.get(
    '/services/:id',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;
      sendOutcome(res, await registry.getService(id));
    }),
  );

  router.get(
    '/services/:id/state',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;
      const state = await registry.stateOf(id);
      if (!state.ok) return sendOutcome(res, state);
      sendOutcome(
        res,
        succeed({ state: state.value, ordinal: ordinalOf(registry.lifecycle, state.value) }),
      );
    }),
  );

  router.get(
    '/services/:id/rating',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;
      const rating = await registry.ratingOf(id);
      sendOutcome(res, rating.ok ? succeed({ rating: rating.value }) : rating);
    }),
  );

  router.get(
    '/services/:id/companion',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;
      const companion = await registry.companionOf(id);
      sendOutcome(res, companion.ok ? succeed({ companion: companion.value }) : companion);
    }),
  );

  router.get(
    '/services/:id/evidence',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;
      const evidence = await registry.evidenceOf(id);
      sendOutcome(res, evidence.ok ? succeed({ evidenceId: evidence.value }) : evidence);
    }),
  );

  router.get(
    '/services/:id/uri',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;
      const uri = await registry.uriOf(id);
      sendOutcome(res, uri.ok ? succeed({ uri: uri.value }) : uri);
    }),
  );

  router.get(
    '/services/:id/owner',
    handle(async (req, res) => {
      const id = parseTokenId(res, req.params.id);
      if (id === null) return;
      const owner = await registry.ownerOf(id);
      sendOutcome(res, owner.ok ? succeed({ owner: owner.value }) : owner);
    }),
  );

  return router;
}
