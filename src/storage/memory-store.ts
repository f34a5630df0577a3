/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every read and
 * write goes through a deep copy, so callers never hold references into
 * store state. Sharing one store between two executor instances models a
 * process restart over durable storage.
 */

import { AuditRecord } from '../domain/audit';
import { ExecutionStatus, PipelineExecution } from '../domain/execution';
import { JudgmentRequest, JudgmentState } from '../domain/judgment';
import { PipelineDefinition } from '../domain/pipeline';
import { RoleChange, ServerGroup, ServerGroupRole } from '../domain/server-group';
import {
  Store,
  PipelineStore,
  ExecutionStore,
  ServerGroupStore,
  JudgmentStore,
  AuditStore,
  ListOptions,
  RoleReassignment,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryPipelineStore implements PipelineStore {
  /** service -> versions, ascending. */
  private data = new Map<string, PipelineDefinition[]>();

  async put(definition: PipelineDefinition): Promise<PipelineDefinition> {
    const versions = this.data.get(definition.service) ?? [];
    const filtered = versions.filter((d) => d.version !== definition.version);
    filtered.push(deepCopy(definition));
    filtered.sort((a, b) => a.version - b.version);
    this.data.set(definition.service, filtered);
    return deepCopy(definition);
  }

  async getLatest(service: string): Promise<PipelineDefinition | null> {
    const versions = this.data.get(service);
    if (!versions || versions.length === 0) return null;
    return deepCopy(versions[versions.length - 1]);
  }

  async getVersion(service: string, version: number): Promise<PipelineDefinition | null> {
    const found = this.data.get(service)?.find((d) => d.version === version);
    return found ? deepCopy(found) : null;
  }

  async list(): Promise<PipelineDefinition[]> {
    const latest: PipelineDefinition[] = [];
    for (const versions of this.data.values()) {
      if (versions.length > 0) latest.push(deepCopy(versions[versions.length - 1]));
    }
    return latest;
  }
}

class MemoryExecutionStore implements ExecutionStore {
  private data = new Map<string, PipelineExecution>();

  async create(execution: PipelineExecution): Promise<PipelineExecution> {
    this.data.set(execution.id, deepCopy(execution));
    return deepCopy(execution);
  }

  async getById(id: string): Promise<PipelineExecution | null> {
    const execution = this.data.get(id);
    return execution ? deepCopy(execution) : null;
  }

  async update(id: string, execution: PipelineExecution): Promise<PipelineExecution | null> {
    if (!this.data.has(id)) return null;
    this.data.set(id, deepCopy(execution));
    return deepCopy(execution);
  }

  async listByService(
    service: string,
    options?: ListOptions & { status?: ExecutionStatus },
  ): Promise<PipelineExecution[]> {
    const items = [...this.data.values()]
      .filter((e) => e.service === service && (!options?.status || e.status === options.status))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return applyListOptions(items.map(deepCopy), options);
  }

  async listByStatus(statuses: ExecutionStatus[]): Promise<PipelineExecution[]> {
    return [...this.data.values()].filter((e) => statuses.includes(e.status)).map(deepCopy);
  }
}

class MemoryServerGroupStore implements ServerGroupStore {
  private data = new Map<string, ServerGroup>();

  async create(group: ServerGroup): Promise<ServerGroup> {
    this.data.set(group.id, deepCopy(group));
    return deepCopy(group);
  }

  async getById(id: string): Promise<ServerGroup | null> {
    const group = this.data.get(id);
    return group ? deepCopy(group) : null;
  }

  async update(id: string, updates: Partial<ServerGroup>): Promise<ServerGroup | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates) };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async listByService(service: string): Promise<ServerGroup[]> {
    return [...this.data.values()]
      .filter((g) => g.service === service)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map(deepCopy);
  }

  async findByRole(service: string, role: ServerGroupRole): Promise<ServerGroup[]> {
    return [...this.data.values()]
      .filter((g) => g.service === service && g.role === role && !g.destroyedAt)
      .map(deepCopy);
  }

  async reassignRoles(service: string, changes: RoleChange[]): Promise<RoleReassignment> {
    const roles = new Map<string, ServerGroupRole>();
    for (const group of this.data.values()) {
      if (group.service === service && !group.destroyedAt) roles.set(group.id, group.role);
    }
    for (const change of changes) {
      if (!roles.has(change.serverGroupId)) {
        return { ok: false, reason: `Server group ${change.serverGroupId} is not a live group of ${service}` };
      }
      roles.set(change.serverGroupId, change.role);
    }
    const activeCount = [...roles.values()].filter((r) => r === ServerGroupRole.Active).length;
    if (activeCount > 1) {
      return { ok: false, reason: `Role change would leave ${activeCount} ACTIVE groups for ${service}` };
    }

    // All checks passed; apply in one synchronous step.
    const now = new Date().toISOString();
    for (const change of changes) {
      const group = this.data.get(change.serverGroupId);
      if (group) this.data.set(group.id, { ...group, role: change.role, updatedAt: now });
    }
    return { ok: true, groups: await this.listByService(service) };
  }
}

class MemoryJudgmentStore implements JudgmentStore {
  private data = new Map<string, JudgmentRequest>();

  async create(request: JudgmentRequest): Promise<JudgmentRequest> {
    this.data.set(request.id, deepCopy(request));
    return deepCopy(request);
  }

  async getById(id: string): Promise<JudgmentRequest | null> {
    const request = this.data.get(id);
    return request ? deepCopy(request) : null;
  }

  async update(id: string, request: JudgmentRequest): Promise<JudgmentRequest | null> {
    if (!this.data.has(id)) return null;
    this.data.set(id, deepCopy(request));
    return deepCopy(request);
  }

  async listPending(): Promise<JudgmentRequest[]> {
    return [...this.data.values()]
      .filter((j) => j.state === JudgmentState.Pending)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map(deepCopy);
  }

  async findByExecution(executionId: string): Promise<JudgmentRequest[]> {
    return [...this.data.values()].filter((j) => j.executionId === executionId).map(deepCopy);
  }
}

class MemoryAuditStore implements AuditStore {
  private records: AuditRecord[] = [];
  private sequences = new Map<string, number>();

  async append(record: AuditRecord): Promise<AuditRecord> {
    const last = this.sequences.get(record.executionId) ?? 0;
    if (record.sequence !== last + 1) {
      throw new Error(
        `Audit sequence gap for ${record.executionId}: expected ${last + 1}, got ${record.sequence}`,
      );
    }
    this.sequences.set(record.executionId, record.sequence);
    this.records.push(deepCopy(record));
    return deepCopy(record);
  }

  async lastSequence(executionId: string): Promise<number> {
    return this.sequences.get(executionId) ?? 0;
  }

  async listByExecution(executionId: string, options?: ListOptions): Promise<AuditRecord[]> {
    const items = this.records.filter((r) => r.executionId === executionId);
    return applyListOptions(items, { limit: options?.limit ?? Number.MAX_SAFE_INTEGER, offset: options?.offset }).map(deepCopy);
  }

  async listByService(service: string, options?: ListOptions): Promise<AuditRecord[]> {
    const items = this.records.filter((r) => r.service === service);
    return applyListOptions(items, { limit: options?.limit ?? Number.MAX_SAFE_INTEGER, offset: options?.offset }).map(deepCopy);
  }

  async findExecutionForArtifact(service: string, artifactId: string): Promise<string | null> {
    const found = this.records.find(
      (r) => r.event === 'execution.created' && r.service === service && r.payload.artifactId === artifactId,
    );
    return found ? found.executionId : null;
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    pipelines: new MemoryPipelineStore(),
    executions: new MemoryExecutionStore(),
    serverGroups: new MemoryServerGroupStore(),
    judgments: new MemoryJudgmentStore(),
    audit: new MemoryAuditStore(),
  };
}
