/**
 * In-process metrics provider.
 *
 * Series are defined per (query template, server group). A source is a
 * constant, a fixed list of points, or a function of the query window.
 */

import { MetricsProvider, PopulationRef, TimeWindow } from './interfaces';

export type SeriesSource = number | number[] | ((window: TimeWindow, call: number) => number[]);

function key(template: string, serverGroupId: string): string {
  return `${template}::${serverGroupId}`;
}

export class MemoryMetricsProvider implements MetricsProvider {
  private series = new Map<string, SeriesSource>();
  private failures = new Map<string, number>();
  private calls = new Map<string, number>();

  define(template: string, serverGroupId: string, source: SeriesSource): void {
    this.series.set(key(template, serverGroupId), source);
  }

  /** Make the next `count` queries for this series reject. */
  failNext(template: string, serverGroupId: string, count: number): void {
    this.failures.set(key(template, serverGroupId), count);
  }

  async query(template: string, population: PopulationRef, window: TimeWindow): Promise<number[]> {
    const k = key(template, population.serverGroupId);
    const call = (this.calls.get(k) ?? 0) + 1;
    this.calls.set(k, call);

    const remainingFailures = this.failures.get(k) ?? 0;
    if (remainingFailures > 0) {
      this.failures.set(k, remainingFailures - 1);
      throw new Error(`metrics backend error for ${template}`);
    }

    const source = this.series.get(k);
    if (source === undefined) throw new Error(`no series for ${template} on ${population.serverGroupId}`);
    if (typeof source === 'number') return [source];
    if (Array.isArray(source)) return [...source];
    return source(window, call);
  }
}
