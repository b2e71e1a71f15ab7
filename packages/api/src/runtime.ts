import type { TriageConfig } from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { AnomalyDetector } from "./services/anomaly-detector.js";
import { AuditTrail, StoreAuditSink, type AuditDispatcher, type AuditSink } from "./services/audit.js";
import { FileFixtureSource, type FixtureSource } from "./services/calibration-fixtures.js";
import { CalibrationRunner, type CalibrationTarget } from "./services/calibration-runner.js";
import { CalibrationTable } from "./services/calibration-table.js";
import { ConfidenceRouter } from "./services/confidence-router.js";
import { CrossValidator } from "./services/cross-validation/index.js";
import { loadDictionary } from "./services/dictionary.js";
import type { SecondaryEngines } from "./services/engines.js";
import { TriagePipeline } from "./services/pipeline.js";
import { ReviewQueueManager } from "./services/review-queue.js";
import type { TriageStore } from "./store/types.js";
import type { Clock } from "./types/domain.js";

const log = createLogger("runtime");

export type RuntimeDeps = {
  config: TriageConfig;
  store: TriageStore;
  engines: SecondaryEngines;
  /** Defaults to persisting into the store's audit_events. */
  sink?: AuditSink;
  /** Required for `async` audit mode; without it events are recorded synchronously. */
  dispatchAudit?: AuditDispatcher;
  targets?: CalibrationTarget[];
  fixtures?: FixtureSource;
  dictionary?: ReadonlySet<string>;
  clock?: Clock;
};

export type Runtime = ReturnType<typeof createRuntime>;

/** Wires the decision engine around one store. Everything stateful is owned here, nothing is global. */
export function createRuntime(deps: RuntimeDeps) {
  const { config, store } = deps;
  const clock = deps.clock ?? (() => new Date());

  const calibrationTable = new CalibrationTable();
  const audit = new AuditTrail({
    store,
    sink: deps.sink ?? new StoreAuditSink(store),
    mode: config.audit.mode,
    clock,
    dispatch: deps.dispatchAudit,
  });

  const calibrationRunner = new CalibrationRunner({
    store,
    audit,
    table: calibrationTable,
    policy: config.calibration,
    scoring: config.crossValidation,
    targets: deps.targets ?? [],
    fixtures: deps.fixtures ?? new FileFixtureSource(config.calibration.fixturesDir),
    clock,
  });

  const anomalies = new AnomalyDetector(
    config.anomaly,
    deps.dictionary ?? loadDictionary(config.dictionaryPath),
    ({ analyzerId }) => calibrationRunner.flagInstability(analyzerId)
  );

  const reviewQueue = new ReviewQueueManager({ store, audit, clock, leaseMs: config.review.leaseMs });

  const pipeline = new TriagePipeline({
    calibration: calibrationTable,
    router: new ConfidenceRouter(config.routing, calibrationTable),
    anomalies,
    crossValidator: new CrossValidator(deps.engines, config.crossValidation),
    reviewQueue,
    audit,
    clock,
  });

  /** Pulls the latest stored calibration runs into the table (for processes that do not calibrate). */
  async function refreshCalibration() {
    const before = calibrationTable.version;
    calibrationTable.load(await store.latestCalibrationRuns());
    if (calibrationTable.version !== before) {
      log.info({ version: calibrationTable.version }, "calibration table refreshed");
    }
  }

  return {
    config,
    store,
    audit,
    calibrationTable,
    calibrationRunner,
    anomalies,
    reviewQueue,
    pipeline,
    refreshCalibration,
  };
}
