import type { AnalysisEngine } from "../analysis/engine";
import type { EnvlensConfig } from "../config";
import type { ValueResolver } from "../env/valueSource";
import type { Logger } from "../logger";

/** What every request handler reads. Handlers never mutate it. */
export interface HandlerContext {
  engine: AnalysisEngine;
  values: ValueResolver;
  config: EnvlensConfig;
  logger: Logger;
}
