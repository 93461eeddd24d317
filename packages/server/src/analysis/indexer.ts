import * as fs from "fs";
import * as path from "path";
import { glob } from "glob";
import {
  NEVER_CANCELLED,
  type CancellationToken,
} from "../concurrency/cancellation";
import { ALWAYS_EXCLUDE, DEFAULT_INDEX_CONCURRENCY } from "../constants";
import { hashContent, normalizeUri, pathToUri, uriToPath } from "../files";
import type { GrammarLoader } from "../languages/grammar";
import type { LanguageRegistry } from "../languages/registry";
import { describeError, type Logger } from "../logger";
import { analyzeText } from "./analyzer";
import { envVarsOf, type WorkspaceIndex } from "./workspaceIndex";

export interface IndexOptions {
  roots: readonly string[];
  /** Glob patterns relative to each root; every supported file when empty. */
  include?: readonly string[];
  /** Directory names or glob patterns to skip, on top of node_modules and .git. */
  exclude?: readonly string[];
  concurrency?: number;
}

export interface IndexProgress {
  total: number;
  done: number;
  failed: number;
}

export interface IndexSummary extends IndexProgress {
  /** Files whose content hash had not changed. */
  unchanged: number;
  /** Index entries dropped because their file was no longer found. */
  removed: number;
  cancelled: boolean;
}

export type IndexFileResult = "indexed" | "unchanged" | "skipped";

function ignorePatterns(exclude: readonly string[]): string[] {
  const patterns = exclude.map((p) => (p.includes("*") ? p : `**/${p}/**`));
  return [...new Set([...ALWAYS_EXCLUDE, ...patterns])];
}

/**
 * Fills the workspace index from disk. Files are read and analysed with
 * bounded parallelism; one file failing never stops the others.
 */
export class WorkspaceIndexer {
  constructor(
    private readonly registry: LanguageRegistry,
    private readonly grammars: GrammarLoader,
    private readonly index: WorkspaceIndex,
    private readonly logger: Logger,
  ) {}

  async discover(options: IndexOptions): Promise<string[]> {
    const extensions = this.registry.extensions();
    if (extensions.length === 0) return [];
    const include =
      options.include && options.include.length > 0
        ? [...options.include]
        : [`**/*.{${extensions.join(",")}}`];
    const ignore = ignorePatterns(options.exclude ?? []);

    const found = new Set<string>();
    for (const root of options.roots) {
      const files = await glob(include, {
        cwd: root,
        ignore,
        absolute: true,
        nodir: true,
      });
      for (const file of files) {
        if (this.registry.forPath(file)) found.add(path.resolve(file));
      }
    }
    return [...found].sort();
  }

  async indexWorkspace(
    options: IndexOptions,
    token: CancellationToken = NEVER_CANCELLED,
    onProgress?: (progress: IndexProgress) => void,
  ): Promise<IndexSummary> {
    const files = await this.discover(options);
    const summary: IndexSummary = {
      total: files.length,
      done: 0,
      failed: 0,
      unchanged: 0,
      removed: this.prune(files),
      cancelled: false,
    };
    this.logger.info(`Indexing ${files.length} file(s).`);

    let next = 0;
    const worker = async () => {
      while (next < files.length) {
        if (token.isCancelled) {
          summary.cancelled = true;
          return;
        }
        const file = files[next++];
        try {
          const result = await this.indexFile(file);
          if (result === "unchanged") summary.unchanged++;
        } catch (err) {
          summary.failed++;
          this.logger.debug(`Failed to index ${file}: ${describeError(err)}`);
        }
        summary.done++;
        onProgress?.({ total: summary.total, done: summary.done, failed: summary.failed });
      }
    };

    const width = Math.max(1, options.concurrency ?? DEFAULT_INDEX_CONCURRENCY);
    await Promise.all(Array.from({ length: Math.min(width, files.length) }, worker));

    this.logger.info(
      `Workspace indexing ${summary.cancelled ? "cancelled" : "complete"}: ` +
        `${summary.done - summary.failed} succeeded, ${summary.failed} failed.`,
    );
    return summary;
  }

  /** Drop entries for files that discovery no longer finds. */
  private prune(files: readonly string[]): number {
    const found = new Set(files.map(pathToUri));
    let removed = 0;
    for (const entry of this.index.entries()) {
      if (found.has(entry.uri)) continue;
      this.logger.debug(`Removing ${entry.uri} from index`);
      this.index.delete(entry.uri);
      removed++;
    }
    return removed;
  }

  /**
   * Read, analyse and store one file. Rejects when the file cannot be read.
   */
  async indexFile(filePath: string): Promise<IndexFileResult> {
    const profile = this.registry.forPath(filePath);
    if (!profile) return "skipped";

    const content = await fs.promises.readFile(filePath, "utf8");
    const uri = pathToUri(filePath);
    const contentHash = hashContent(content);
    if (this.index.get(uri)?.contentHash === contentHash) return "unchanged";

    const grammar = await this.grammars.load(profile);
    if (!grammar) return "skipped";

    const { analysis, tree } = analyzeText(grammar, uri, content, this.logger);
    tree?.delete();
    this.index.set({
      uri,
      profileId: profile.id,
      contentHash,
      analysis,
      exports: analysis.exports,
      envVars: envVarsOf(analysis.references),
    });
    return "indexed";
  }

  async onFileChanged(uri: string): Promise<void> {
    const filePath = uriToPath(uri);
    if (!filePath) return;
    try {
      await this.indexFile(filePath);
    } catch (err) {
      this.logger.debug(`Failed to re-index ${uri}: ${describeError(err)}`);
      this.index.delete(normalizeUri(uri));
    }
  }

  onFileDeleted(uri: string): void {
    this.logger.debug(`Removing ${uri} from index`);
    this.index.delete(normalizeUri(uri));
  }
}
