/**
 * In-process verification runner.
 *
 * Outcomes are scripted per suite; a suite marked as hanging never
 * completes until its abort signal fires.
 */

import { VerificationTestSpec } from '../domain/pipeline';
import { AbortError } from '../clock';
import { VerificationOutcome, VerificationRunner } from './interfaces';

export class MemoryVerificationRunner implements VerificationRunner {
  readonly runs: Array<{ suite: string; endpoint: string }> = [];
  private outcomes = new Map<string, VerificationOutcome>();
  private hanging = new Set<string>();

  setOutcome(suite: string, outcome: VerificationOutcome): void {
    this.outcomes.set(suite, outcome);
  }

  hang(suite: string): void {
    this.hanging.add(suite);
  }

  async run(test: VerificationTestSpec, endpoint: string, signal?: AbortSignal): Promise<VerificationOutcome> {
    this.runs.push({ suite: test.suite, endpoint });
    if (this.hanging.has(test.suite)) {
      await new Promise<void>((_resolve, reject) => {
        if (signal?.aborted) reject(new AbortError());
        signal?.addEventListener('abort', () => reject(new AbortError()), { once: true });
      });
    }
    return this.outcomes.get(test.suite) ?? { success: true, report: `${test.suite}: all checks passed` };
  }
}
