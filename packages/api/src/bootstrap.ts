import { createDb } from "./db/index.js";
import { createAuditDispatcher } from "./jobs/audit-deliver.js";
import type { TriageConfig } from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { createRuntime } from "./runtime.js";
import { enginesFromConfig, httpCalibrationTarget } from "./services/http-engines.js";
import { createMemoryStore } from "./store/memory.js";
import { createPostgresStore } from "./store/postgres.js";
import type { TriageStore } from "./store/types.js";

const log = createLogger("bootstrap");

/** Production wiring: Postgres when DATABASE_URL is set, HTTP engines, the audit queue in async mode. */
export function bootstrap(config: TriageConfig) {
  let store: TriageStore;
  let closeDb = async () => {};

  if (config.databaseUrl) {
    const { sql, db } = createDb(config.databaseUrl, { poolSize: config.databasePoolSize });
    store = createPostgresStore(db);
    closeDb = async () => {
      await sql.end({ timeout: 5 });
    };
  } else {
    log.warn("DATABASE_URL not set; using the in-memory store (state is lost on restart)");
    store = createMemoryStore();
  }

  const runtime = createRuntime({
    config,
    store,
    engines: enginesFromConfig(config.engines),
    targets: config.calibration.targets.map(httpCalibrationTarget),
    dispatchAudit: config.audit.mode === "async" ? createAuditDispatcher() : undefined,
  });

  return { runtime, close: closeDb };
}
