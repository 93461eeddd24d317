import type { Range } from "./range";

/** How an occurrence reached its canonical name. */
export type SourceKind =
  | "DirectReference"
  | "LocalBinding"
  | "LocalUsage"
  | "CrossModuleImport"
  | "EnvObjectAlias";

/** Whether a name denotes one variable or the whole environment object. */
export type ResolvedKind = "variable" | "object";

/**
 * One occurrence in a document that reads an environment variable, or
 * an alias of the environment object.
 */
export interface Reference {
  /** Canonical name, absent until an imported token is resolved. */
  name?: string;
  /** Source text of the occurrence's name part. */
  token: string;
  range: Range;
  nameRange: Range;
  sourceKind: SourceKind;
  kind: ResolvedKind;
  /** Local binding or import the occurrence went through. */
  via?: string;
}

export interface ResolveResult {
  canonicalName: string;
  sourceKind: SourceKind;
  kind: ResolvedKind;
  range: Range;
  via?: string;
}

/** `"default"` for default imports, `"*"` for namespace imports. */
export interface ImportEntry {
  localName: string;
  specifier: string;
  importedName: string;
  range: Range;
}

export type ImportContext = ReadonlyMap<string, ImportEntry>;

export type ExportResolution =
  | { kind: "EnvVar"; name: string }
  | { kind: "EnvObject"; canonicalName: string }
  | { kind: "ReExport"; specifier: string; name: string }
  | { kind: "Namespace"; specifier: string }
  /** `export const x = imported.KEY` where `imported` comes from another module. */
  | { kind: "ImportedProperty"; specifier: string; name: string; key: string }
  | { kind: "Opaque" };

export interface ExportIndexEntry {
  named: ReadonlyMap<string, ExportResolution>;
  defaultExport?: ExportResolution;
  /** Specifiers of `export * from` statements. */
  wildcards: readonly string[];
}

export interface ResolvedVariable {
  name: string;
  value: string;
  /** Human-readable origin, e.g. a file path or "process". */
  source: string;
  location?: { uri: string; range: Range };
}
