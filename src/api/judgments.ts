/**
 * Judgment gate API routes.
 *
 * GET /judgments — Pending judgment gates
 * GET /judgments/:judgmentId — A single gate, decided or not
 * POST /executions/:executionId/judgment — Approve or reject the open gate
 */

import { Router } from 'express';
import { EngineError, createTypedError } from '../domain/errors';
import { JudgmentDecision } from '../domain/judgment';
import { PipelineExecutor } from '../engine/executor';
import { JudgmentService } from '../engine/judgment-service';
import { ActorRequest, actorOf, sendError } from './middleware';

function readDecision(body: unknown): JudgmentDecision {
  const decision = typeof body === 'object' && body !== null && 'decision' in body ? body.decision : undefined;
  if (decision !== 'approve' && decision !== 'reject') {
    throw new EngineError(
      createTypedError({
        code: 'JUDGMENT.INVALID_DECISION',
        message: 'decision must be "approve" or "reject"',
        details: { decision },
      }),
    );
  }
  return decision;
}

export function createJudgmentRoutes(judgments: JudgmentService, executor: PipelineExecutor): Router {
  const router = Router();

  router.get('/judgments', async (_req, res) => {
    try {
      res.json({ judgments: await judgments.listPending() });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/judgments/:judgmentId', async (req, res) => {
    try {
      res.json({ judgment: await judgments.get(req.params.judgmentId) });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /executions/:executionId/judgment
   * Records the decision and resumes the execution in the background.
   */
  router.post('/executions/:executionId/judgment', async (req: ActorRequest, res) => {
    try {
      const decision = readDecision(req.body);
      const judgment = await executor.decide(req.params.executionId, actorOf(req), decision);
      res.json({ judgment });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
