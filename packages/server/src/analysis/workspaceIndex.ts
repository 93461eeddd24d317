import type { Range } from "../range";
import type { ExportIndexEntry, Reference } from "../types";
import type { DocumentAnalysis } from "./model";

export interface IndexedFile {
  uri: string;
  profileId?: string;
  contentHash: string;
  analysis: DocumentAnalysis;
  exports: ExportIndexEntry;
  /** Canonical variable name to the name ranges that read it. */
  envVars: ReadonlyMap<string, readonly Range[]>;
}

/** Group the named variable references of a file by canonical name. */
export function envVarsOf(references: readonly Reference[]): Map<string, Range[]> {
  const envVars = new Map<string, Range[]>();
  for (const reference of references) {
    if (reference.name === undefined || reference.kind !== "variable") continue;
    const ranges = envVars.get(reference.name);
    if (ranges) ranges.push(reference.nameRange);
    else envVars.set(reference.name, [reference.nameRange]);
  }
  return envVars;
}

/**
 * Per-file exports and variable usage for the workspace, keyed by
 * normalized URI, plus the reverse map from variable name to files.
 */
export class WorkspaceIndex {
  private readonly files = new Map<string, IndexedFile>();
  private readonly usersByVar = new Map<string, Set<string>>();

  get size(): number {
    return this.files.size;
  }

  get(uri: string): IndexedFile | undefined {
    return this.files.get(uri);
  }

  has(uri: string): boolean {
    return this.files.has(uri);
  }

  uris(): string[] {
    return [...this.files.keys()];
  }

  entries(): IndexedFile[] {
    return [...this.files.values()];
  }

  set(file: IndexedFile): void {
    this.unlink(file.uri);
    this.files.set(file.uri, file);
    this.link(file);
  }

  /** Replace the variable usage of an indexed file. */
  updateEnvVars(uri: string, envVars: ReadonlyMap<string, readonly Range[]>): void {
    const file = this.files.get(uri);
    if (!file) return;
    this.unlink(uri);
    const updated = { ...file, envVars };
    this.files.set(uri, updated);
    this.link(updated);
  }

  delete(uri: string): boolean {
    this.unlink(uri);
    return this.files.delete(uri);
  }

  clear(): void {
    this.files.clear();
    this.usersByVar.clear();
  }

  exportsOf(uri: string): ExportIndexEntry | undefined {
    return this.files.get(uri)?.exports;
  }

  filesUsing(name: string): string[] {
    return [...(this.usersByVar.get(name) ?? [])];
  }

  envVarNames(): string[] {
    return [...this.usersByVar.keys()].sort();
  }

  private link(file: IndexedFile): void {
    for (const name of file.envVars.keys()) {
      let users = this.usersByVar.get(name);
      if (!users) {
        users = new Set();
        this.usersByVar.set(name, users);
      }
      users.add(file.uri);
    }
  }

  private unlink(uri: string): void {
    const existing = this.files.get(uri);
    if (!existing) return;
    for (const name of existing.envVars.keys()) {
      const users = this.usersByVar.get(name);
      if (!users) continue;
      users.delete(uri);
      if (users.size === 0) this.usersByVar.delete(name);
    }
  }
}
