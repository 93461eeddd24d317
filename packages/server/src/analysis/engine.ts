/**
 * Public face of the analysis core. Everything here answers with a value
 * or with nothing; internal failures are logged, never thrown.
 */

import type { TextDocumentContentChangeEvent } from "vscode-languageserver-textdocument";
import {
  NEVER_CANCELLED,
  throwIfCancelled,
  type CancellationToken,
} from "../concurrency/cancellation";
import { TaskManager, type TaskHandle } from "../concurrency/taskManager";
import { normalizeUri, uriToPath } from "../files";
import { GrammarLoader } from "../languages/grammar";
import { isEnvObject, type LanguageProfile } from "../languages/profile";
import { LanguageRegistry } from "../languages/registry";
import { defaultLogger, describeError, type Logger } from "../logger";
import { smallestContaining, type Position, type Range } from "../range";
import type { ExportIndexEntry, Reference, ResolveResult } from "../types";
import { CrossModuleResolver } from "./crossModule";
import { DocumentStore, type DocumentSnapshot } from "./documents";
import {
  WorkspaceIndexer,
  type IndexOptions,
  type IndexProgress,
  type IndexSummary,
} from "./indexer";
import type { DocumentAnalysis } from "./model";
import { ModuleResolver } from "./moduleResolver";
import { BindingResolver } from "./resolver";
import { envVarsOf, WorkspaceIndex } from "./workspaceIndex";

export interface EngineOptions {
  roots?: readonly string[];
  grammarDir?: string;
  queryDir?: string;
  debounceMs?: number;
  logger?: Logger;
  registry?: LanguageRegistry;
}

/** A file watcher notification for a file that is not open. */
export interface FileChange {
  uri: string;
  deleted: boolean;
}

export interface ReferenceLocation {
  uri: string;
  range: Range;
  reference: Reference;
}

export class AnalysisEngine {
  readonly registry: LanguageRegistry;
  readonly grammars: GrammarLoader;
  readonly documents: DocumentStore;
  readonly index = new WorkspaceIndex();
  readonly modules: ModuleResolver;
  readonly crossModule: CrossModuleResolver;
  readonly indexer: WorkspaceIndexer;
  readonly tasks: TaskManager;
  private readonly logger: Logger;

  constructor(options: EngineOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.registry = options.registry ?? new LanguageRegistry();
    this.grammars = new GrammarLoader(
      { grammarDir: options.grammarDir, queryDir: options.queryDir },
      this.logger,
    );
    this.documents = new DocumentStore(this.registry, this.grammars, this.logger, {
      debounceMs: options.debounceMs,
    });
    this.modules = new ModuleResolver(options.roots ?? []);
    this.crossModule = new CrossModuleResolver(
      (uri) => this.exportsOf(uri),
      this.modules,
      this.registry,
    );
    this.indexer = new WorkspaceIndexer(this.registry, this.grammars, this.index, this.logger);
    this.tasks = new TaskManager(this.logger);
  }

  setRoots(roots: readonly string[]): void {
    this.modules.setRoots(roots);
  }

  open(
    uri: string,
    languageId: string,
    version: number,
    text: string,
  ): Promise<DocumentSnapshot | undefined> {
    return this.documents.open(uri, languageId, version, text);
  }

  change(uri: string, version: number, changes: TextDocumentContentChangeEvent[]): void {
    this.documents.change(uri, version, changes);
  }

  close(uri: string): void {
    this.documents.close(uri);
  }

  flush(uri?: string): Promise<void> {
    return this.documents.flush(uri);
  }

  get(uri: string): DocumentSnapshot | undefined {
    return this.documents.get(uri);
  }

  profileOf(uri: string): LanguageProfile | undefined {
    const snapshot = this.documents.get(uri);
    const id = snapshot?.analysis.profileId ?? this.index.get(normalizeUri(uri))?.profileId;
    if (id) return this.registry.get(id);
    return this.registry.forPath(uriToPath(uri) ?? uri);
  }

  /** The reference under the cursor, with imported names resolved. */
  referenceAt(uri: string, pos: Position): Reference | undefined {
    const resolved = this.references(uri).filter((reference) => reference.name !== undefined);
    return smallestContaining(resolved, pos, (reference) => reference.range);
  }

  completionContextAt(uri: string, pos: Position): string | undefined {
    return this.documents.completionContextAt(uri, pos);
  }

  resolve(uri: string, pos: Position): ResolveResult | undefined {
    const snapshot = this.documents.get(uri);
    if (!snapshot) return undefined;
    try {
      return this.resolverFor(snapshot.uri, snapshot.analysis).resolveAt(pos);
    } catch (err) {
      this.logger.error(`Resolution at ${uri} failed: ${describeError(err)}`);
      return undefined;
    }
  }

  /**
   * True when `expression`, as written at `pos`, denotes the environment
   * object: literally, through a local alias or through an import.
   */
  isEnvObjectExpression(uri: string, expression: string, pos: Position): boolean {
    const snapshot = this.documents.get(uri);
    const profile = this.profileOf(uri);
    if (!snapshot || !profile) return false;
    if (isEnvObject(profile, expression)) return true;
    try {
      const resolution = this.resolverFor(snapshot.uri, snapshot.analysis).resolveName(
        expression,
        pos,
      );
      return resolution?.kind === "object";
    } catch (err) {
      this.logger.error(`Resolution of ${expression} failed: ${describeError(err)}`);
      return false;
    }
  }

  /** Every resolved reference of an open document. */
  references(uri: string): Reference[] {
    const snapshot = this.documents.get(uri);
    if (!snapshot) return [];
    return this.resolvedReferences(snapshot.uri, snapshot.analysis);
  }

  /**
   * References to a variable across open documents and the indexed
   * workspace. Open documents shadow their indexed copies.
   */
  referencesTo(name: string): ReferenceLocation[] {
    const locations: ReferenceLocation[] = [];
    const open = new Set<string>();
    for (const snapshot of this.documents.all()) {
      open.add(snapshot.uri);
      this.collect(snapshot.uri, snapshot.analysis, name, locations);
    }
    for (const file of this.index.entries()) {
      if (open.has(file.uri)) continue;
      this.collect(file.uri, file.analysis, name, locations);
    }
    return locations;
  }

  /** Names of every variable referenced in open documents or the index. */
  envVarNames(): string[] {
    const names = new Set(this.index.envVarNames());
    for (const snapshot of this.documents.all()) {
      for (const reference of this.resolvedReferences(snapshot.uri, snapshot.analysis)) {
        if (reference.name !== undefined && reference.kind === "variable") {
          names.add(reference.name);
        }
      }
    }
    return [...names].sort();
  }

  exportsOf(uri: string): ExportIndexEntry | undefined {
    const key = normalizeUri(uri);
    const snapshot = this.documents.get(key);
    if (snapshot?.analysis.profileId !== undefined) return snapshot.analysis.exports;
    return this.index.exportsOf(key);
  }

  resolveModuleSpecifier(
    specifier: string,
    importingUri: string,
    languageId?: string,
  ): string | undefined {
    const profile = this.registry.resolve(languageId, uriToPath(importingUri) ?? importingUri);
    return profile ? this.modules.resolve(specifier, importingUri, profile) : undefined;
  }

  async indexWorkspace(
    options: Omit<IndexOptions, "roots"> & { roots?: readonly string[] } = {},
    token: CancellationToken = NEVER_CANCELLED,
    onProgress?: (progress: IndexProgress) => void,
  ): Promise<IndexSummary> {
    const roots = options.roots ?? this.modules.getRoots();
    const summary = await this.indexer.indexWorkspace({ ...options, roots }, token, onProgress);
    if (!summary.cancelled) this.relink();
    return summary;
  }

  /** Re-index a batch of watched files as one background task. */
  reindexFiles(changes: readonly FileChange[]): TaskHandle<number> {
    return this.tasks.spawn("reindex", (token) => this.applyFileChanges(changes, token));
  }

  /**
   * Update the index entry of each changed or deleted file, then relink
   * imports once for the whole batch. Resolves to the number of files
   * handled; rejects with a CancelledError when stopped part way.
   */
  async applyFileChanges(
    changes: readonly FileChange[],
    token: CancellationToken = NEVER_CANCELLED,
  ): Promise<number> {
    let applied = 0;
    for (const change of changes) {
      if (token.isCancelled) break;
      if (change.deleted) {
        this.indexer.onFileDeleted(change.uri);
      } else {
        await this.indexer.onFileChanged(change.uri);
      }
      applied++;
    }
    if (applied > 0) this.relink();
    throwIfCancelled(token, "reindex");
    return applied;
  }

  async shutdown(): Promise<void> {
    await this.tasks.shutdown();
    this.documents.dispose();
  }

  private resolverFor(uri: string, analysis: DocumentAnalysis): BindingResolver {
    const profile = analysis.profileId ? this.registry.get(analysis.profileId) : undefined;
    return new BindingResolver(
      analysis,
      this.crossModule.importResolverFor(uri),
      profile?.envObjects ?? [],
    );
  }

  private resolvedReferences(uri: string, analysis: DocumentAnalysis): Reference[] {
    try {
      return this.resolverFor(uri, analysis).references();
    } catch (err) {
      this.logger.error(`Collecting references of ${uri} failed: ${describeError(err)}`);
      return [];
    }
  }

  private collect(
    uri: string,
    analysis: DocumentAnalysis,
    name: string,
    into: ReferenceLocation[],
  ): void {
    for (const reference of this.resolvedReferences(uri, analysis)) {
      if (reference.name === name && reference.kind === "variable") {
        into.push({ uri, range: reference.nameRange, reference });
      }
    }
  }

  /** Recompute indexed variable usage now that imports can be followed. */
  private relink(): void {
    for (const file of this.index.entries()) {
      this.index.updateEnvVars(
        file.uri,
        envVarsOf(this.resolvedReferences(file.uri, file.analysis)),
      );
    }
  }
}
