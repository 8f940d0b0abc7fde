import type { AttackResult } from "./attackOrchestrator.js";
import type { AttackMethod } from "./shared/types.js";

/**
 * Per-method aggregate over the attack log.
 */
export interface MethodStatistics {
  runs: number;
  successes: number;
  attempts: number;
  successRate: number;
}

export interface AttackStatistics {
  totalRuns: number;
  totalSuccesses: number;
  totalAttempts: number;
  successRate: number;
  methods: Partial<Record<AttackMethod, MethodStatistics>>;
}

/**
 * Append-only, in-memory record of attack results.
 */
export class AttackLog {
  private readonly results: AttackResult[] = [];

  append(result: AttackResult): void {
    this.results.push(result);
  }

  /**
   * All results in the order they were recorded.
   */
  entries(): readonly AttackResult[] {
    return [...this.results];
  }

  get size(): number {
    return this.results.length;
  }

  /**
   * Aggregate the log by method. Recomputed from scratch on every call.
   */
  statistics(): AttackStatistics {
    const methods: Partial<Record<AttackMethod, MethodStatistics>> = {};
    let totalSuccesses = 0;
    let totalAttempts = 0;

    for (const result of this.results) {
      const entry = methods[result.method] ?? { runs: 0, successes: 0, attempts: 0, successRate: 0 };
      entry.runs++;
      entry.attempts += result.attempts;
      if (result.success) {
        entry.successes++;
        totalSuccesses++;
      }
      entry.successRate = entry.successes / entry.runs;
      methods[result.method] = entry;
      totalAttempts += result.attempts;
    }

    return {
      totalRuns: this.results.length,
      totalSuccesses,
      totalAttempts,
      successRate: this.results.length > 0 ? totalSuccesses / this.results.length : 0,
      methods,
    };
  }
}
