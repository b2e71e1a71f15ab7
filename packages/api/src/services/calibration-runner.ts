import { randomUUID } from "node:crypto";

import type { AnalyzerHealth, CalibrationFixtureFile, CalibrationStatus, PiiEntity } from "@triage/shared";
import type { CalibrationPolicy, CrossValidationPolicy } from "../lib/config.js";
import { calibrationFixtureMissing, notFound, validationError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { textSimilarity, wordErrorRate } from "../lib/text-metrics.js";
import { withTimeout } from "../lib/timeout.js";
import type { TriageStore } from "../store/types.js";
import type { AnalyzerReport, CalibrationRun, Clock } from "../types/domain.js";
import type { AuditTrail } from "./audit.js";
import { entryFromRun, type CalibrationTable } from "./calibration-table.js";
import type { FixtureSource } from "./calibration-fixtures.js";
import { entityKey } from "./cross-validation/pii.js";

const log = createLogger("calibration");

type TargetBase = {
  analyzerId: string;
  /** Overrides the global minimum for this analyzer. */
  minAccuracy?: number;
  hardFloor?: number;
};

/** An analyzer registered for self-tests, callable on a fixture input. */
export type CalibrationTarget =
  | (TargetBase & {
      contentType: "ocr" | "caption" | "transcription";
      analyze(input: string, signal: AbortSignal): Promise<string>;
    })
  | (TargetBase & {
      contentType: "pii";
      analyze(input: string, signal: AbortSignal): Promise<PiiEntity[]>;
    });

export type CalibrationOutcome = {
  analyzerId: string;
  status: AnalyzerHealth;
  multiplier: number;
  fixtureMissing: boolean;
  run: CalibrationRun | null;
  error?: string;
};

type Score = { sampleCount: number; accuracy: number; f1Score: number | null };

export function classify(metric: number, minimum: number, floor: number): CalibrationStatus {
  if (metric >= minimum) return "HEALTHY";
  if (metric > floor) return "DEGRADED";
  return "FAILED";
}

/** Micro F1 over entities; 1 when there was nothing to find and nothing was found. */
export function f1(tp: number, fp: number, fn: number) {
  const denominator = 2 * tp + fp + fn;
  return denominator === 0 ? 1 : (2 * tp) / denominator;
}

/**
 * Periodically re-measures each registered analyzer against its ground truth and puts the
 * resulting multiplier into the CalibrationTable. A failing analyzer never stops the pass.
 */
export class CalibrationRunner {
  private inFlight: Promise<CalibrationOutcome[]> | null = null;
  private readonly flagged = new Set<string>();
  private readonly missingFixtures = new Set<string>();

  constructor(
    private readonly opts: {
      store: TriageStore;
      audit: AuditTrail;
      table: CalibrationTable;
      policy: CalibrationPolicy;
      scoring: CrossValidationPolicy;
      targets: CalibrationTarget[];
      fixtures: FixtureSource;
      clock: Clock;
    }
  ) {}

  /** Marks an analyzer as unstable; it is calibrated first on the next pass. */
  flagInstability(analyzerId: string) {
    this.flagged.add(analyzerId);
  }

  isFlagged(analyzerId: string) {
    return this.flagged.has(analyzerId);
  }

  /** Calibrates every target. Concurrent callers share the pass already running. */
  runAll(): Promise<CalibrationOutcome[]> {
    if (!this.inFlight) {
      this.inFlight = this.runPass().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  async runAnalyzer(analyzerId: string) {
    const target = this.opts.targets.find((t) => t.analyzerId === analyzerId);
    if (!target) throw notFound("calibration_target", analyzerId);
    return this.runTarget(target);
  }

  async report(analyzerId: string, historyLimit = 20): Promise<AnalyzerReport> {
    const entry = this.opts.table.lookup(analyzerId);
    return {
      analyzerId,
      status: entry.status,
      multiplier: entry.multiplier,
      tableVersion: this.opts.table.version,
      fixtureMissing: this.missingFixtures.has(analyzerId),
      instabilityFlagged: this.flagged.has(analyzerId),
      history: await this.opts.store.listCalibrationRuns({ analyzerId, limit: historyLimit }),
    };
  }

  async reportAll(historyLimit = 20) {
    const ids = new Set([
      ...this.opts.targets.map((t) => t.analyzerId),
      ...this.opts.table.entries().map((e) => e.analyzerId),
    ]);
    return Promise.all([...ids].sort().map((id) => this.report(id, historyLimit)));
  }

  private async runPass() {
    const ordered = [
      ...this.opts.targets.filter((t) => this.flagged.has(t.analyzerId)),
      ...this.opts.targets.filter((t) => !this.flagged.has(t.analyzerId)),
    ];
    const started = Date.now();
    const outcomes: CalibrationOutcome[] = [];
    for (const target of ordered) outcomes.push(await this.runTarget(target));
    log.info({ analyzers: outcomes.length, durationMs: Date.now() - started }, "calibration pass finished");
    return outcomes;
  }

  private async runTarget(target: CalibrationTarget): Promise<CalibrationOutcome> {
    const { table } = this.opts;
    try {
      const fixtures = await this.opts.fixtures.load(target.analyzerId);
      if (!fixtures || fixtures.samples.length === 0) return this.fixturesMissing(target.analyzerId);

      const score = await this.score(target, fixtures);
      const minimum = target.minAccuracy ?? this.opts.policy.minAccuracy;
      const floor = target.hardFloor ?? this.opts.policy.hardFloor;
      const status = classify(score.f1Score ?? score.accuracy, minimum, floor);
      const previous = table.lookup(target.analyzerId).status;

      const run: CalibrationRun = {
        id: randomUUID(),
        analyzerId: target.analyzerId,
        contentType: target.contentType,
        ...score,
        status,
        multiplier: status === "HEALTHY" ? 1 : this.opts.policy.degradedMultiplier,
        ranAt: this.opts.clock(),
      };

      await this.opts.audit.inTransaction(async (tx, emit) => {
        await tx.appendCalibrationRun(run);
        emit({
          entityType: "calibration_run",
          entityId: run.id,
          action: "calibration_run.recorded",
          actorId: "system:calibration",
          details: {
            analyzerId: run.analyzerId,
            previousStatus: previous,
            status,
            accuracy: run.accuracy,
            f1Score: run.f1Score,
            multiplier: run.multiplier,
            sampleCount: run.sampleCount,
          },
        });
      });

      table.replace(entryFromRun(run));
      this.flagged.delete(target.analyzerId);
      this.missingFixtures.delete(target.analyzerId);

      if (status !== previous) {
        const fields = { analyzerId: run.analyzerId, previousStatus: previous, status, multiplier: run.multiplier };
        if (status === "HEALTHY") log.info(fields, "analyzer calibration status changed");
        else log.warn(fields, "analyzer calibration status changed");
      }

      return { analyzerId: run.analyzerId, status, multiplier: run.multiplier, fixtureMissing: false, run };
    } catch (err) {
      log.error({ err, analyzerId: target.analyzerId }, "calibration run failed");
      const entry = table.lookup(target.analyzerId);
      return {
        analyzerId: target.analyzerId,
        status: entry.status,
        multiplier: entry.multiplier,
        fixtureMissing: false,
        run: null,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }

  // Not blocking: the analyzer keeps its current entry, or is recorded as UNKNOWN at full trust.
  private fixturesMissing(analyzerId: string): CalibrationOutcome {
    const { table } = this.opts;
    log.warn({ err: calibrationFixtureMissing(analyzerId), analyzerId }, "calibration fixtures missing");
    if (!table.has(analyzerId)) {
      table.replace({ analyzerId, status: "UNKNOWN", multiplier: 1, runId: null, updatedAt: this.opts.clock() });
    }
    this.missingFixtures.add(analyzerId);
    const entry = table.lookup(analyzerId);
    return { analyzerId, status: entry.status, multiplier: entry.multiplier, fixtureMissing: true, run: null };
  }

  private async score(target: CalibrationTarget, fixtures: CalibrationFixtureFile): Promise<Score> {
    if (target.contentType === "pii") {
      if (fixtures.contentType !== "pii") throw fixtureMismatch(target.analyzerId, target.contentType, fixtures.contentType);
      const piiTarget = target;
      return this.scorePii(target.analyzerId, (input, s) => piiTarget.analyze(input, s), fixtures.samples);
    }
    if (fixtures.contentType === "pii" || fixtures.contentType !== target.contentType) {
      throw fixtureMismatch(target.analyzerId, target.contentType, fixtures.contentType);
    }
    const textTarget = target;

    const { ocrSimilarityThreshold, maxWer } = this.opts.scoring;
    const correct =
      textTarget.contentType === "transcription"
        ? (output: string, expected: string) => wordErrorRate(expected, output) <= maxWer
        : (output: string, expected: string) => textSimilarity(output, expected) >= ocrSimilarityThreshold;

    let hits = 0;
    for (const sample of fixtures.samples) {
      const output = await this.attempt(textTarget.analyzerId, (s) => textTarget.analyze(sample.input, s));
      if (output !== null && correct(output, sample.expected)) hits += 1;
    }
    return { sampleCount: fixtures.samples.length, accuracy: hits / fixtures.samples.length, f1Score: null };
  }

  private async scorePii(
    analyzerId: string,
    analyze: (input: string, signal: AbortSignal) => Promise<PiiEntity[]>,
    samples: Array<{ input: string; expected: PiiEntity[] }>
  ): Promise<Score> {
    let hits = 0;
    let tp = 0;
    let fp = 0;
    let fn = 0;

    for (const sample of samples) {
      const expected = new Set(sample.expected.map(entityKey));
      const output = await this.attempt(analyzerId, (s) => analyze(sample.input, s));
      const found = new Set((output ?? []).map(entityKey));

      const matched = [...found].filter((k) => expected.has(k)).length;
      tp += matched;
      fp += found.size - matched;
      fn += expected.size - matched;
      if (output !== null && matched === expected.size && matched === found.size) hits += 1;
    }

    return { sampleCount: samples.length, accuracy: hits / samples.length, f1Score: f1(tp, fp, fn) };
  }

  /** A sample the analyzer fails on (error or timeout) scores as incorrect. */
  private async attempt<T>(analyzerId: string, task: (signal: AbortSignal) => Promise<T>): Promise<T | null> {
    try {
      return await withTimeout(this.opts.scoring.timeoutMs, task);
    } catch (err) {
      log.warn({ err, analyzerId }, "calibration sample failed");
      return null;
    }
  }
}

function fixtureMismatch(analyzerId: string, expected: string, actual: string) {
  return validationError(`Fixture content type '${actual}' does not match analyzer '${analyzerId}' (${expected})`);
}
