/**
 * Diagnostics Collector
 *
 * Call-scoped trace of every condition evaluated during one resolve call.
 * Attached to failures so callers can report which conditions fired and
 * with what values.
 */

import type { DiagnosticEntry, MaybeValue } from "./types";

export class DiagnosticsCollector {
  private readonly entries: DiagnosticEntry[] = [];
  private lastReportedError: string | undefined;

  /**
   * Record a fresh (non-memoized) condition evaluation
   */
  record(entry: {
    conditionIndex: number;
    fn: string;
    binding?: string;
    value: MaybeValue;
    outcome: boolean;
  }): void {
    this.entries.push({ ...entry });
  }

  /**
   * Called by rule functions to explain an absent result
   */
  reportError(message: string): void {
    this.lastReportedError = message;
  }

  get trace(): DiagnosticEntry[] {
    return [...this.entries];
  }

  get lastError(): string | undefined {
    return this.lastReportedError;
  }

  get size(): number {
    return this.entries.length;
  }
}
