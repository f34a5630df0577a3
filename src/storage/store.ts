/**
 * Storage layer interfaces.
 *
 * Defines the contract for persisted engine state with pluggable backends:
 * pipeline definitions by service, executions by id, the server group
 * registry by service and role, judgment requests, and the append-only
 * audit ledger.
 */

import { AuditRecord } from '../domain/audit';
import { ExecutionStatus, PipelineExecution } from '../domain/execution';
import { JudgmentRequest } from '../domain/judgment';
import { PipelineDefinition } from '../domain/pipeline';
import { RoleChange, ServerGroup, ServerGroupRole } from '../domain/server-group';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for pipeline definitions; every version is retained. */
export interface PipelineStore {
  put(definition: PipelineDefinition): Promise<PipelineDefinition>;
  getLatest(service: string): Promise<PipelineDefinition | null>;
  getVersion(service: string, version: number): Promise<PipelineDefinition | null>;
  list(): Promise<PipelineDefinition[]>;
}

/** Store interface for executions (stage executions are embedded). */
export interface ExecutionStore {
  create(execution: PipelineExecution): Promise<PipelineExecution>;
  getById(id: string): Promise<PipelineExecution | null>;
  update(id: string, execution: PipelineExecution): Promise<PipelineExecution | null>;
  listByService(service: string, options?: ListOptions & { status?: ExecutionStatus }): Promise<PipelineExecution[]>;
  listByStatus(statuses: ExecutionStatus[]): Promise<PipelineExecution[]>;
}

/** Outcome of a role reassignment. */
export type RoleReassignment =
  | { ok: true; groups: ServerGroup[] }
  | { ok: false; reason: string };

/** Store interface for the server group registry. */
export interface ServerGroupStore {
  create(group: ServerGroup): Promise<ServerGroup>;
  getById(id: string): Promise<ServerGroup | null>;
  update(id: string, updates: Partial<ServerGroup>): Promise<ServerGroup | null>;
  listByService(service: string): Promise<ServerGroup[]>;
  findByRole(service: string, role: ServerGroupRole): Promise<ServerGroup[]>;
  /**
   * Apply all role changes for one service in a single step. Refuses a
   * change set that would leave more than one ACTIVE group.
   */
  reassignRoles(service: string, changes: RoleChange[]): Promise<RoleReassignment>;
}

/** Store interface for judgment requests. */
export interface JudgmentStore {
  create(request: JudgmentRequest): Promise<JudgmentRequest>;
  getById(id: string): Promise<JudgmentRequest | null>;
  update(id: string, request: JudgmentRequest): Promise<JudgmentRequest | null>;
  listPending(): Promise<JudgmentRequest[]>;
  findByExecution(executionId: string): Promise<JudgmentRequest[]>;
}

/** Append-only store for audit records. No update or delete exists. */
export interface AuditStore {
  /** Rejects a record whose sequence is not last+1 for its execution. */
  append(record: AuditRecord): Promise<AuditRecord>;
  lastSequence(executionId: string): Promise<number>;
  listByExecution(executionId: string, options?: ListOptions): Promise<AuditRecord[]>;
  listByService(service: string, options?: ListOptions): Promise<AuditRecord[]>;
  /** Execution previously created for (service, artifact), if any. */
  findExecutionForArtifact(service: string, artifactId: string): Promise<string | null>;
}

/** Composite store interface. */
export interface Store {
  pipelines: PipelineStore;
  executions: ExecutionStore;
  serverGroups: ServerGroupStore;
  judgments: JudgmentStore;
  audit: AuditStore;
}
