import * as path from "path";
import { CONFIG_FILE_NAME, DEFAULT_ENV_FILES, DEFAULT_INDEX_CONCURRENCY } from "./constants";
import {
  DEFAULT_MASK_PATTERNS,
  MASKING_MODES,
  type MaskingMode,
} from "./env/masking";
import { readFileSafe } from "./files";
import { describeError, isLogLevel, type Logger, type LogLevel } from "./logger";

export interface FeatureFlags {
  hover: boolean;
  completion: boolean;
  diagnostics: boolean;
  definition: boolean;
  references: boolean;
  rename: boolean;
  inlayHints: boolean;
  workspaceSymbols: boolean;
}

export interface EnvlensConfig {
  features: FeatureFlags;
  strict: { hover: boolean; completion: boolean };
  workspace: {
    include: string[];
    exclude: string[];
    envFiles: string[];
    useProcessEnv: boolean;
  };
  masking: { mode: MaskingMode; patterns: string[] };
  inlayHints: { maxValueLength: number };
  indexing: { concurrency: number };
  grammarDir?: string;
  logLevel: LogLevel;
}

export function defaultConfig(): EnvlensConfig {
  return {
    features: {
      hover: true,
      completion: true,
      diagnostics: true,
      definition: true,
      references: true,
      rename: true,
      inlayHints: true,
      workspaceSymbols: true,
    },
    strict: { hover: true, completion: true },
    workspace: {
      include: [],
      exclude: ["dist", "build"],
      envFiles: [...DEFAULT_ENV_FILES],
      useProcessEnv: false,
    },
    masking: { mode: "partial", patterns: [...DEFAULT_MASK_PATTERNS] },
    inlayHints: { maxValueLength: 30 },
    indexing: { concurrency: DEFAULT_INDEX_CONCURRENCY },
    logLevel: "info",
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isMaskingMode(value: unknown): value is MaskingMode {
  return MASKING_MODES.some((mode) => mode === value);
}

/**
 * Reads typed fields out of one untrusted layer. A present field of the
 * wrong type is reported and ignored.
 */
class LayerReader {
  constructor(
    private readonly origin: string,
    private readonly logger: Logger,
  ) {}

  section(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (isRecord(value)) return value;
    this.invalid(key, value);
    return undefined;
  }

  boolean(raw: Record<string, unknown>, key: string, apply: (value: boolean) => void): void {
    const value = raw[key];
    if (value === undefined) return;
    if (typeof value === "boolean") apply(value);
    else this.invalid(key, value);
  }

  strings(raw: Record<string, unknown>, key: string, apply: (value: string[]) => void): void {
    const value = raw[key];
    if (value === undefined) return;
    if (isStringArray(value)) apply([...value]);
    else this.invalid(key, value);
  }

  positiveInteger(
    raw: Record<string, unknown>,
    key: string,
    apply: (value: number) => void,
  ): void {
    const value = raw[key];
    if (value === undefined) return;
    if (typeof value === "number" && Number.isInteger(value) && value > 0) apply(value);
    else this.invalid(key, value);
  }

  string(raw: Record<string, unknown>, key: string, apply: (value: string) => void): void {
    const value = raw[key];
    if (value === undefined) return;
    if (typeof value === "string" && value !== "") apply(value);
    else this.invalid(key, value);
  }

  invalid(key: string, value: unknown): void {
    this.logger.warn(
      `Ignoring ${this.origin} setting '${key}': unexpected value ${JSON.stringify(value)}.`,
    );
  }
}

const FEATURE_KEYS: readonly (keyof FeatureFlags)[] = [
  "hover",
  "completion",
  "diagnostics",
  "definition",
  "references",
  "rename",
  "inlayHints",
  "workspaceSymbols",
];

/** Apply one layer of settings on top of `config`. */
export function applyLayer(
  config: EnvlensConfig,
  raw: unknown,
  origin: string,
  logger: Logger,
): void {
  if (raw === undefined || raw === null) return;
  const read = new LayerReader(origin, logger);
  if (!isRecord(raw)) {
    read.invalid("(root)", raw);
    return;
  }

  const features = read.section(raw, "features");
  if (features) {
    for (const key of FEATURE_KEYS) {
      read.boolean(features, key, (v) => (config.features[key] = v));
    }
  }

  const strict = read.section(raw, "strict");
  if (strict) {
    read.boolean(strict, "hover", (v) => (config.strict.hover = v));
    read.boolean(strict, "completion", (v) => (config.strict.completion = v));
  }

  const workspace = read.section(raw, "workspace");
  if (workspace) {
    read.strings(workspace, "include", (v) => (config.workspace.include = v));
    read.strings(workspace, "exclude", (v) => (config.workspace.exclude = v));
    read.strings(workspace, "envFiles", (v) => (config.workspace.envFiles = v));
    read.boolean(workspace, "useProcessEnv", (v) => (config.workspace.useProcessEnv = v));
  }

  const masking = read.section(raw, "masking");
  if (masking) {
    const mode = masking.mode;
    if (isMaskingMode(mode)) config.masking.mode = mode;
    else if (mode !== undefined) read.invalid("mode", mode);
    read.strings(masking, "patterns", (v) => (config.masking.patterns = v));
  }

  const inlayHints = read.section(raw, "inlayHints");
  if (inlayHints) {
    read.positiveInteger(
      inlayHints,
      "maxValueLength",
      (v) => (config.inlayHints.maxValueLength = v),
    );
  }

  const indexing = read.section(raw, "indexing");
  if (indexing) {
    read.positiveInteger(indexing, "concurrency", (v) => (config.indexing.concurrency = v));
  }

  read.string(raw, "grammarDir", (v) => (config.grammarDir = v));

  const logLevel = raw.logLevel;
  if (isLogLevel(logLevel)) config.logLevel = logLevel;
  else if (logLevel !== undefined) read.invalid("logLevel", logLevel);
}

/** Settings carried by `ENVLENS_*` variables, shaped like a config layer. */
export function envLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  if (env.ENVLENS_ENV_FILES) {
    layer.workspace = {
      envFiles: env.ENVLENS_ENV_FILES.split(",")
        .map((file) => file.trim())
        .filter((file) => file !== ""),
    };
  }
  if (env.ENVLENS_GRAMMAR_DIR) layer.grammarDir = env.ENVLENS_GRAMMAR_DIR;
  if (env.ENVLENS_LOG_LEVEL) layer.logLevel = env.ENVLENS_LOG_LEVEL;
  return layer;
}

/** Parsed `envlens.json` of the first root that has one. */
export function readConfigFile(roots: readonly string[], logger: Logger): unknown {
  for (const root of roots) {
    const configPath = path.join(root, CONFIG_FILE_NAME);
    const content = readFileSafe(configPath);
    if (content === null) continue;
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      logger.warn(`Failed to parse ${configPath}: ${describeError(err)}`);
      return undefined;
    }
  }
  return undefined;
}

export interface ConfigSources {
  initializationOptions?: unknown;
  fileConfig?: unknown;
  env?: NodeJS.ProcessEnv;
}

/**
 * Defaults, then environment variables, then `envlens.json`, then the
 * client's initialization options; later layers win field by field.
 */
export function resolveConfig(sources: ConfigSources, logger: Logger): EnvlensConfig {
  const config = defaultConfig();
  applyLayer(config, envLayer(sources.env ?? {}), "environment", logger);
  applyLayer(config, sources.fileConfig, CONFIG_FILE_NAME, logger);
  applyLayer(config, sources.initializationOptions, "initializationOptions", logger);
  return config;
}
