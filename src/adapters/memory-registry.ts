/**
 * In-process artifact registry used by tests and the reference server.
 */

import { Artifact, ArtifactSelector } from '../domain/artifact';
import { ArtifactRegistry } from './interfaces';

export class MemoryArtifactRegistry implements ArtifactRegistry {
  private artifacts = new Map<string, Artifact[]>();
  private failures = 0;

  /** Publish a new artifact for a service; it becomes the latest. */
  publish(service: string, artifact: Artifact): void {
    const list = this.artifacts.get(service) ?? [];
    list.push({ ...artifact });
    this.artifacts.set(service, list);
  }

  /** Make the next `count` calls to latest() reject. */
  failNext(count: number): void {
    this.failures = count;
  }

  async latest(selector: ArtifactSelector): Promise<Artifact | null> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('registry unreachable');
    }
    const list = (this.artifacts.get(selector.service) ?? []).filter(
      (a) => !selector.channel || a.id.startsWith(selector.channel),
    );
    const latest = list[list.length - 1];
    return latest ? { ...latest } : null;
  }
}
