/** Hop limit for alias, destructure and import chains. */
export const MAX_CHAIN_DEPTH = 10;

/** Quiet period after the last edit before a document is re-analysed. */
export const CHANGE_DEBOUNCE_MS = 300;

/** Weight of one line when ordering ranges by size. */
export const RANGE_SIZE_LINE_WEIGHT = 10000;

export const LOOKUP_TIMEOUT_MS = 5000;
export const REFRESH_TIMEOUT_MS = 10000;

export const DEFAULT_INDEX_CONCURRENCY = 8;

/** Directories never walked while indexing, whatever the config says. */
export const ALWAYS_EXCLUDE = ["**/node_modules/**", "**/.git/**"];

export const DEFAULT_ENV_FILES = [".env", ".env.local"];

export const CONFIG_FILE_NAME = "envlens.json";

export const DIAGNOSTIC_SOURCE = "envlens";
export const UNDEFINED_VARIABLE_CODE = "undefined-env-var";
