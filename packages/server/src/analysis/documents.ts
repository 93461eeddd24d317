/**
 * Open documents, their text and their latest settled analysis.
 *
 * Edits are applied to the text at once; re-analysis waits for a quiet
 * period. Each edit bumps the document's generation, and an analysis that
 * finishes for an older generation is thrown away.
 */

import type { Node, Tree } from "web-tree-sitter";
import {
  TextDocument,
  type TextDocumentContentChangeEvent,
} from "vscode-languageserver-textdocument";
import { CHANGE_DEBOUNCE_MS } from "../constants";
import { UnsupportedLanguageError } from "../errors";
import { normalizeUri, uriToPath } from "../files";
import type { GrammarLoader, LoadedGrammar } from "../languages/grammar";
import { normalizeExpression, type LanguageProfile } from "../languages/profile";
import type { LanguageRegistry } from "../languages/registry";
import { describeError, type Logger } from "../logger";
import { smallestContaining, touchesPosition, type Position } from "../range";
import type { Reference } from "../types";
import { analyzeText, emptyAnalysis } from "./analyzer";
import { rangeOfNode } from "./extract";
import type { DocumentAnalysis } from "./model";

export interface DocumentSnapshot {
  readonly uri: string;
  readonly languageId: string;
  readonly version: number;
  readonly generation: number;
  readonly text: string;
  readonly analysis: DocumentAnalysis;
}

export type AnalysisListener = (snapshot: DocumentSnapshot) => void;

export interface DocumentStoreOptions {
  debounceMs?: number;
}

interface DocumentRecord {
  document: TextDocument;
  generation: number;
  profile?: LanguageProfile;
  grammar?: LoadedGrammar;
  tree?: Tree;
  snapshot: DocumentSnapshot;
}

// `alias.`, `process.env.`, `System.getenv().`
const MEMBER_BEFORE_CURSOR =
  /([A-Za-z_$][\w$]*(?:\(\))?(?:\s*\.\s*[A-Za-z_$][\w$]*(?:\(\))?)*)\s*\.\s*[\w$]*$/;
// `os.getenv("`, `process.env["`, `ENV['`
const QUOTED_BEFORE_CURSOR =
  /(\$?[A-Za-z_][\w$]*(?:\(\))?(?:\s*\.\s*[A-Za-z_$][\w$]*(?:\(\))?)*)\s*[[(]\s*["'][\w.\-]*$/;

export class DocumentStore {
  private readonly records = new Map<string, DocumentRecord>();
  private readonly pending = new Map<string, NodeJS.Timeout>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly listeners = new Set<AnalysisListener>();
  private readonly debounceMs: number;

  constructor(
    private readonly registry: LanguageRegistry,
    private readonly grammars: GrammarLoader,
    private readonly logger: Logger,
    options: DocumentStoreOptions = {},
  ) {
    this.debounceMs = options.debounceMs ?? CHANGE_DEBOUNCE_MS;
  }

  /**
   * Track a document and analyse it right away. Re-opening a tracked
   * document replaces it.
   */
  async open(
    uri: string,
    languageId: string,
    version: number,
    text: string,
  ): Promise<DocumentSnapshot | undefined> {
    const key = normalizeUri(uri);
    this.cancelPending(key);
    const previous = this.records.get(key);
    const document = TextDocument.create(key, languageId, version, text);
    const record: DocumentRecord = {
      document,
      generation: (previous?.generation ?? 0) + 1,
      profile: this.registry.resolve(languageId, uriToPath(key) ?? key),
      tree: previous?.tree,
      snapshot: previous?.snapshot ?? this.emptySnapshot(document, 0),
    };
    if (!record.profile) {
      this.logger.debug(`${new UnsupportedLanguageError(languageId).message}; ${key} stays unanalysed.`);
    }
    this.records.set(key, record);
    await this.run(key);
    return this.get(key);
  }

  /**
   * Apply content changes and schedule a re-analysis. Unknown documents
   * are ignored.
   */
  change(
    uri: string,
    version: number,
    changes: TextDocumentContentChangeEvent[],
  ): void {
    const key = normalizeUri(uri);
    const record = this.records.get(key);
    if (!record) return;
    record.document = TextDocument.update(record.document, changes, version);
    record.generation++;
    this.schedule(key);
  }

  close(uri: string): void {
    const key = normalizeUri(uri);
    this.cancelPending(key);
    const record = this.records.get(key);
    if (!record) return;
    record.tree?.delete();
    this.records.delete(key);
  }

  has(uri: string): boolean {
    return this.records.has(normalizeUri(uri));
  }

  /** Latest settled analysis. May lag behind the text while edits settle. */
  get(uri: string): DocumentSnapshot | undefined {
    return this.records.get(normalizeUri(uri))?.snapshot;
  }

  /** Current text, including edits not yet analysed. */
  text(uri: string): string | undefined {
    return this.records.get(normalizeUri(uri))?.document.getText();
  }

  all(): DocumentSnapshot[] {
    return [...this.records.values()].map((record) => record.snapshot);
  }

  referenceAt(uri: string, pos: Position): Reference | undefined {
    const snapshot = this.get(uri);
    if (!snapshot) return undefined;
    return smallestContaining(snapshot.analysis.references, pos, (r) => r.range);
  }

  /**
   * Expression whose members are being completed at `pos`: the receiver of
   * a member or subscript read, or a completion callee before a quote.
   */
  completionContextAt(uri: string, pos: Position): string | undefined {
    const record = this.records.get(normalizeUri(uri));
    if (!record?.profile) return undefined;
    return (
      this.completionFromTree(record, pos) ??
      completionFromText(record.document, pos)
    );
  }

  /** Run scheduled analyses now and wait for every analysis in flight. */
  async flush(uri?: string): Promise<void> {
    const keys = uri === undefined ? [...this.pending.keys()] : [normalizeUri(uri)];
    for (const key of keys) {
      if (this.pending.has(key)) {
        this.cancelPending(key);
        void this.run(key);
      }
    }
    const waiting =
      uri === undefined
        ? [...this.inFlight.values()]
        : [this.inFlight.get(normalizeUri(uri))];
    await Promise.all(waiting);
  }

  onDidAnalyze(listener: AnalysisListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    for (const key of [...this.records.keys()]) {
      this.close(key);
    }
    this.listeners.clear();
  }

  private schedule(key: string): void {
    this.cancelPending(key);
    const handle = setTimeout(() => {
      this.pending.delete(key);
      void this.run(key);
    }, this.debounceMs);
    this.pending.set(key, handle);
  }

  private cancelPending(key: string): void {
    const handle = this.pending.get(key);
    if (handle) {
      clearTimeout(handle);
      this.pending.delete(key);
    }
  }

  /** Never rejects; failures are logged and leave the old analysis. */
  private run(key: string): Promise<void> {
    const previous = this.inFlight.get(key) ?? Promise.resolve();
    const next = previous
      .then(() => this.analyze(key))
      .catch((err: unknown) => {
        this.logger.error(`Analysis of ${key} failed: ${describeError(err)}`);
      });
    this.inFlight.set(key, next);
    void next.finally(() => {
      if (this.inFlight.get(key) === next) this.inFlight.delete(key);
    });
    return next;
  }

  private async analyze(key: string): Promise<void> {
    const record = this.records.get(key);
    if (!record) return;
    const generation = record.generation;
    const document = record.document;

    const grammar = record.profile
      ? await this.grammars.load(record.profile)
      : undefined;
    const parsed = analyzeText(grammar, key, document.getText(), this.logger);

    if (this.records.get(key) !== record || record.generation !== generation) {
      parsed.tree?.delete();
      this.logger.debug(`Discarded stale analysis of ${key} (generation ${generation}).`);
      return;
    }

    if (record.tree !== parsed.tree) record.tree?.delete();
    record.tree = parsed.tree;
    record.grammar = grammar;
    record.snapshot = {
      uri: key,
      languageId: document.languageId,
      version: document.version,
      generation,
      text: document.getText(),
      analysis: parsed.analysis,
    };

    for (const listener of this.listeners) {
      try {
        listener(record.snapshot);
      } catch (err) {
        this.logger.error(`Analysis listener failed for ${key}: ${describeError(err)}`);
      }
    }
  }

  private emptySnapshot(document: TextDocument, generation: number): DocumentSnapshot {
    return {
      uri: document.uri,
      languageId: document.languageId,
      version: document.version,
      generation,
      text: document.getText(),
      analysis: emptyAnalysis(),
    };
  }

  private completionFromTree(record: DocumentRecord, pos: Position): string | undefined {
    const query = record.grammar?.queries.completion;
    if (!query || !record.tree || record.snapshot.generation !== record.generation) {
      return undefined;
    }
    for (const match of query.matches(record.tree.rootNode)) {
      let target: Node | undefined;
      let object: Node | undefined;
      for (const capture of match.captures) {
        if (capture.name === "completion_target") target = capture.node;
        else if (capture.name === "object") object = capture.node;
      }
      if (!target || !object) continue;
      const r = rangeOfNode(target);
      if (r.start.line !== r.end.line || !touchesPosition(r, pos)) continue;
      return normalizeExpression(object.text);
    }
    return undefined;
  }
}

function completionFromText(document: TextDocument, pos: Position): string | undefined {
  const line = document.getText({
    start: { line: pos.line, character: 0 },
    end: pos,
  });
  const member = MEMBER_BEFORE_CURSOR.exec(line);
  if (member) return normalizeExpression(member[1]);
  const quoted = QUOTED_BEFORE_CURSOR.exec(line);
  if (quoted) return normalizeExpression(quoted[1]);
  return undefined;
}
