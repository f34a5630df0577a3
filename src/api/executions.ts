/**
 * Execution API routes.
 *
 * POST /services/:service/executions — Trigger an execution for an artifact
 * GET /services/:service/executions — List a service's executions
 * GET /executions/:executionId — Get execution and stage status
 * POST /executions/:executionId/terminate — Terminate an in-flight execution
 * POST /executions/:executionId/rollback — Restore the execution-start traffic state
 * GET /executions/:executionId/audit — Audit trail for an execution
 */

import { Router } from 'express';
import { AuditLedger } from '../audit/audit-ledger';
import { Artifact } from '../domain/artifact';
import { EngineError, validationError } from '../domain/errors';
import { ExecutionStatus } from '../domain/execution';
import { PipelineExecutor } from '../engine/executor';
import { Store } from '../storage/store';
import { TriggerDispatcher } from '../trigger/dispatcher';
import { ActorRequest, actorOf, sendError } from './middleware';

function readArtifact(body: unknown): Artifact {
  const artifact = typeof body === 'object' && body !== null && 'artifact' in body ? body.artifact : undefined;
  if (typeof artifact !== 'object' || artifact === null) {
    throw new EngineError(validationError('artifact is required', { path: '$.artifact' }));
  }
  const id = 'id' in artifact ? artifact.id : undefined;
  const source = 'source' in artifact ? artifact.source : undefined;
  if (typeof id !== 'string' || id === '') {
    throw new EngineError(validationError('artifact.id must be a non-empty string', { path: '$.artifact.id' }));
  }
  if (typeof source !== 'string') {
    throw new EngineError(validationError('artifact.source must be a string', { path: '$.artifact.source' }));
  }
  return { id, source };
}

function readReason(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('reason' in body)) return undefined;
  return typeof body.reason === 'string' ? body.reason : undefined;
}

function readStatus(value: unknown): ExecutionStatus | undefined {
  if (value === undefined) return undefined;
  const status = Object.values(ExecutionStatus).find((s) => s === value);
  if (!status) {
    throw new EngineError(
      validationError(`Unknown execution status: ${String(value)}`, { allowed: Object.values(ExecutionStatus) }),
    );
  }
  return status;
}

function readPaging(value: unknown, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new EngineError(validationError(`${name} must be a non-negative integer`, { [name]: value }));
  }
  return n;
}

export function createExecutionRoutes(
  store: Store,
  ledger: AuditLedger,
  executor: PipelineExecutor,
  dispatcher: TriggerDispatcher,
): Router {
  const router = Router();

  /**
   * POST /services/:service/executions
   * 201 with a new execution, or 200 with the one that already exists for the artifact.
   */
  router.post('/services/:service/executions', async (req: ActorRequest, res) => {
    try {
      const artifact = readArtifact(req.body);
      const { execution, created } = await dispatcher.trigger(req.params.service, artifact, {
        kind: 'human',
        id: actorOf(req),
      });
      res.status(created ? 201 : 200).json({ execution, created });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/services/:service/executions', async (req, res) => {
    try {
      const executions = await store.executions.listByService(req.params.service, {
        status: readStatus(req.query.status),
        limit: readPaging(req.query.limit, 'limit'),
        offset: readPaging(req.query.offset, 'offset'),
      });
      res.json({ executions });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/executions/:executionId', async (req, res) => {
    try {
      const execution = await executor.getExecution(req.params.executionId);
      res.json({ execution, active: executor.isActive(execution.id) });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /executions/:executionId/terminate
   * Responds once the execution has reached its terminal status.
   */
  router.post('/executions/:executionId/terminate', async (req: ActorRequest, res) => {
    try {
      const execution = await executor.terminate(req.params.executionId, actorOf(req), readReason(req.body));
      res.json({ execution });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/executions/:executionId/rollback', async (req: ActorRequest, res) => {
    try {
      const execution = await executor.requestRollback(req.params.executionId, actorOf(req), readReason(req.body));
      res.json({ execution });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/executions/:executionId/audit', async (req, res) => {
    try {
      const execution = await executor.getExecution(req.params.executionId);
      const records = await ledger.history(execution.id);
      res.json({ executionId: execution.id, records });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
