import type { ContentType } from "@triage/shared";

import type { CrossValidationPolicy } from "../../lib/config.js";
import type { AnalysisDraftOf, Verdict } from "../../types/domain.js";
import type { SecondaryEngines } from "../engines.js";

export type StrategyContext = {
  engines: SecondaryEngines;
  policy: CrossValidationPolicy;
  /** Aborted when the evidence is withdrawn upstream. */
  signal: AbortSignal;
};

/** One cross-validation method, selected by content type. */
export interface CrossValidationStrategy<C extends ContentType> {
  readonly contentType: C;
  validate(result: AnalysisDraftOf<C>, ctx: StrategyContext): Promise<Verdict>;
}
