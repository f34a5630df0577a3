/**
 * Pipeline definition API routes.
 *
 * GET /pipelines — Latest definition of every service
 * GET /pipelines/:service — Latest definition for a service
 * GET /pipelines/:service/versions/:version — A specific stored version
 * PUT /pipelines/:service — Validate and store a new definition version
 */

import { Router } from 'express';
import { EngineError, notFoundError, validationError } from '../domain/errors';
import { parsePipelineDefinition, registerPipeline } from '../dsl/loader';
import { Logger } from '../logger';
import { Store } from '../storage/store';
import { ActorRequest, actorOf, sendError } from './middleware';

export function createPipelineRoutes(store: Store, log: Logger): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    try {
      const all = await store.pipelines.list();
      const latest = new Map<string, (typeof all)[number]>();
      for (const definition of all) {
        const current = latest.get(definition.service);
        if (!current || definition.version > current.version) latest.set(definition.service, definition);
      }
      res.json({ pipelines: [...latest.values()] });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:service', async (req, res) => {
    try {
      const definition = await store.pipelines.getLatest(req.params.service);
      if (!definition) throw new EngineError(notFoundError('Pipeline definition', req.params.service));
      res.json({ pipeline: definition });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:service/versions/:version', async (req, res) => {
    try {
      const version = Number(req.params.version);
      if (!Number.isInteger(version)) {
        throw new EngineError(validationError('version must be an integer', { version: req.params.version }));
      }
      const definition = await store.pipelines.getVersion(req.params.service, version);
      if (!definition) {
        throw new EngineError(notFoundError('Pipeline definition', `${req.params.service}@v${version}`));
      }
      res.json({ pipeline: definition });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * PUT /pipelines/:service
   * The body's service, if present, must match the path.
   */
  router.put('/:service', async (req: ActorRequest, res) => {
    try {
      const service = req.params.service;
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new EngineError(validationError('Request body must be a pipeline definition object'));
      }
      const raw: Record<string, unknown> = { service, ...body };
      if (raw.service !== service) {
        throw new EngineError(
          validationError(`Definition service "${String(raw.service)}" does not match path "${service}"`, {
            path: '$.service',
          }),
        );
      }

      const definition = parsePipelineDefinition(raw, `api:${service}`);
      const stored = await registerPipeline(store.pipelines, definition, log);
      log.info('Pipeline definition submitted', { service, version: stored.version, actor: actorOf(req) });
      res.status(201).json({ pipeline: stored });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
