/**
 * In-process infrastructure controller.
 *
 * Keeps deployed groups, health answers and per-service routing weights in
 * memory. Faults can be scripted: rejected applies, health sequences,
 * weight writes that only apply half the requested entries, rejected weight
 * writes, and failing destroys.
 */

import { ServerGroupHandle, TrafficWeights } from '../domain/server-group';
import { DeploySpec, HealthReport, InfraController } from './interfaces';

export class MemoryInfraController implements InfraController {
  readonly applied: DeploySpec[] = [];
  readonly destroyed: string[] = [];
  /** Every weight map requested, in call order. */
  readonly weightWrites: Array<{ service: string; weights: TrafficWeights }> = [];

  private counter = 0;
  private weights = new Map<string, TrafficWeights>();
  private healthAnswers = new Map<string, boolean[]>();
  private applyFailures = 0;
  private partialWrites = 0;
  private rejectedWrites = 0;
  private destroyFailures = 0;
  /** Resolves once per setTrafficWeights call; tests use it to interleave work. */
  private writeHook?: (service: string, weights: TrafficWeights) => Promise<void>;

  rejectNextApplies(count: number): void {
    this.applyFailures = count;
  }

  /** Apply only the first half of the entries of the next `count` weight writes. */
  partiallyApplyNextWrites(count: number): void {
    this.partialWrites = count;
  }

  rejectNextWeightWrites(count: number): void {
    this.rejectedWrites = count;
  }

  failNextDestroys(count: number): void {
    this.destroyFailures = count;
  }

  /** Script health answers for a handle; the last answer repeats. */
  scriptHealth(handleId: string, answers: boolean[]): void {
    this.healthAnswers.set(handleId, [...answers]);
  }

  onWeightWrite(hook: (service: string, weights: TrafficWeights) => Promise<void>): void {
    this.writeHook = hook;
  }

  /** Seed the current weights of a service without recording a write. */
  seedWeights(service: string, weights: TrafficWeights): void {
    this.weights.set(service, { ...weights });
  }

  async apply(spec: DeploySpec): Promise<ServerGroupHandle> {
    if (this.applyFailures > 0) {
      this.applyFailures--;
      throw new Error(`apply rejected for ${spec.service}`);
    }
    this.counter++;
    this.applied.push({ ...spec });
    const id = `${spec.service}-v${this.counter}`;
    return { id, endpoint: `http://${id}.${spec.environment}.internal` };
  }

  async health(handle: ServerGroupHandle): Promise<HealthReport> {
    const answers = this.healthAnswers.get(handle.id);
    if (!answers || answers.length === 0) return { ready: true };
    const ready = answers.length > 1 ? answers.shift() ?? true : answers[0];
    return { ready, detail: ready ? 'all replicas ready' : 'replicas starting' };
  }

  async setTrafficWeights(service: string, weights: TrafficWeights): Promise<void> {
    this.weightWrites.push({ service, weights: { ...weights } });
    if (this.writeHook) await this.writeHook(service, weights);
    if (this.rejectedWrites > 0) {
      this.rejectedWrites--;
      throw new Error(`load balancer rejected weights for ${service}`);
    }
    const entries = Object.entries(weights);
    const current = { ...(this.weights.get(service) ?? {}) };
    if (this.partialWrites > 0) {
      this.partialWrites--;
      for (const [id, weight] of entries.slice(0, Math.ceil(entries.length / 2))) {
        current[id] = weight;
      }
      this.weights.set(service, current);
      return;
    }
    this.weights.set(service, Object.fromEntries(entries));
  }

  async getTrafficWeights(service: string): Promise<TrafficWeights> {
    return { ...(this.weights.get(service) ?? {}) };
  }

  async destroy(handle: ServerGroupHandle): Promise<void> {
    if (this.destroyFailures > 0) {
      this.destroyFailures--;
      throw new Error(`destroy failed for ${handle.id}`);
    }
    this.destroyed.push(handle.id);
  }
}
