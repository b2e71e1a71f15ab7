import type { AnalyzerHealth } from "@triage/shared";

import type { CalibrationRun } from "../types/domain.js";

export type CalibrationEntry = {
  analyzerId: string;
  status: AnalyzerHealth;
  multiplier: number;
  /** The run that put this entry into effect; null for entries created without a run. */
  runId: string | null;
  updatedAt: Date | null;
};

export function entryFromRun(run: CalibrationRun): CalibrationEntry {
  return {
    analyzerId: run.analyzerId,
    status: run.status,
    multiplier: run.multiplier,
    runId: run.id,
    updatedAt: run.ranAt,
  };
}

/**
 * Per-analyzer calibration state read by every routing decision.
 *
 * Readers see an immutable snapshot; writers build a new map and swap it in, bumping
 * `version`. Concurrent writers are last-writer-wins.
 */
export class CalibrationTable {
  private snapshot: ReadonlyMap<string, CalibrationEntry> = new Map();
  private current = 0;

  get version() {
    return this.current;
  }

  lookup(analyzerId: string): CalibrationEntry {
    return (
      this.snapshot.get(analyzerId) ?? { analyzerId, status: "UNKNOWN", multiplier: 1, runId: null, updatedAt: null }
    );
  }

  has(analyzerId: string) {
    return this.snapshot.has(analyzerId);
  }

  replace(entry: CalibrationEntry) {
    const next = new Map(this.snapshot);
    next.set(entry.analyzerId, { ...entry });
    this.swap(next);
  }

  /**
   * Rebuilds the table from the latest stored run per analyzer. Entries without a run
   * (fixture-less analyzers) are kept. A no-op when nothing changed, so polling does
   * not churn the version.
   */
  load(latestRuns: readonly CalibrationRun[]) {
    const next = new Map(this.snapshot);
    let changed = false;
    for (const run of latestRuns) {
      if (next.get(run.analyzerId)?.runId === run.id) continue;
      next.set(run.analyzerId, entryFromRun(run));
      changed = true;
    }
    if (changed) this.swap(next);
  }

  entries(): CalibrationEntry[] {
    return [...this.snapshot.values()].sort((a, b) => a.analyzerId.localeCompare(b.analyzerId));
  }

  private swap(next: Map<string, CalibrationEntry>) {
    this.snapshot = next;
    this.current += 1;
  }
}
