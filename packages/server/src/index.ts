export {
  AnalysisEngine,
  type EngineOptions,
  type FileChange,
  type ReferenceLocation,
} from "./analysis/engine";
export {
  DocumentStore,
  type AnalysisListener,
  type DocumentSnapshot,
} from "./analysis/documents";
export { BindingResolver, type ImportResolver, type Resolution } from "./analysis/resolver";
export { SymbolTable, type Binding, type BindingKind, type Scope } from "./analysis/symbolTable";
export { CrossModuleResolver } from "./analysis/crossModule";
export { ModuleResolver, isRelativeSpecifier } from "./analysis/moduleResolver";
export {
  WorkspaceIndexer,
  type IndexOptions,
  type IndexProgress,
  type IndexSummary,
} from "./analysis/indexer";
export { WorkspaceIndex, type IndexedFile } from "./analysis/workspaceIndex";
export { analyzeFacts, analyzeText } from "./analysis/analyzer";
export type { Facts } from "./analysis/extract";
export { GrammarLoader, type LoadedGrammar } from "./languages/grammar";
export { LanguageRegistry } from "./languages/registry";
export { PROFILES, type LanguageProfile } from "./languages/profile";
export {
  CancellationSource,
  NEVER_CANCELLED,
  raceCancellation,
  throwIfCancelled,
  type CancellationToken,
} from "./concurrency/cancellation";
export { TaskManager, type TaskHandle } from "./concurrency/taskManager";
export { withTimeout } from "./concurrency/timeout";
export { DotenvValueSource } from "./env/dotenvSource";
export { GuardedValueResolver } from "./env/guarded";
export { StaticValueSource, type ValueResolver } from "./env/valueSource";
export { maskValue, type MaskingPolicy } from "./env/masking";
export { defaultConfig, resolveConfig, type EnvlensConfig } from "./config";
export { createLogger, silentLogger, type Logger } from "./logger";
export * from "./errors";
export * from "./range";
export * from "./types";
export { MAX_CHAIN_DEPTH, CHANGE_DEBOUNCE_MS } from "./constants";
