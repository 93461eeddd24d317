/**
 * Grammar loading for the language profiles.
 *
 * Uses tree-sitter (via WASM). Each grammar is loaded once, on first use,
 * together with its `.scm` queries; documents in that language then parse
 * synchronously.
 */

import * as path from "path";
import { Language, Parser, Query } from "web-tree-sitter";
import { findFile, readFileSafe } from "../files";
import { describeError, type Logger } from "../logger";
import {
  QUERY_CATEGORIES,
  type LanguageProfile,
  type QueryCategory,
} from "./profile";

export interface LoadedGrammar {
  profile: LanguageProfile;
  language: Language;
  parser: Parser;
  queries: Partial<Record<QueryCategory, Query>>;
}

export interface GrammarLoaderOptions {
  /** Directory holding grammar `.wasm` files, searched before node_modules. */
  grammarDir?: string;
  /** Directory holding `<queryDir>/<category>.scm`. */
  queryDir?: string;
}

/** Every `node_modules/<pkg>` directory above `from`. */
function packageDirCandidates(pkg: string, from: string): string[] {
  const dirs: string[] = [];
  let current = path.resolve(from);
  for (;;) {
    dirs.push(path.join(current, "node_modules", pkg));
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return dirs;
}

function resolvePackageDir(pkg: string): string | undefined {
  try {
    return path.dirname(require.resolve(`${pkg}/package.json`));
  } catch {
    return findFile(packageDirCandidates(pkg, __dirname));
  }
}

export function defaultQueryDir(): string | undefined {
  return findFile([
    path.join(__dirname, "..", "..", "queries"), // running from sources
    path.join(__dirname, "..", "..", "..", "..", "..", "packages", "server", "queries"), // dist/packages/server/src/languages
  ]);
}

let parserInit: Promise<void> | undefined;

function initParser(): Promise<void> {
  parserInit ??= Parser.init();
  return parserInit;
}

export class GrammarLoader {
  private readonly loaded = new Map<string, Promise<LoadedGrammar | undefined>>();
  private readonly queryDir: string | undefined;

  constructor(
    private readonly options: GrammarLoaderOptions,
    private readonly logger: Logger,
  ) {
    this.queryDir = options.queryDir ?? defaultQueryDir();
  }

  /**
   * Load (once) the grammar and queries of a profile. Resolves to undefined
   * when the grammar wasm cannot be found or loaded.
   */
  load(profile: LanguageProfile): Promise<LoadedGrammar | undefined> {
    let pending = this.loaded.get(profile.id);
    if (!pending) {
      pending = this.loadUncached(profile).catch((err: unknown) => {
        this.logger.error(
          `Failed to load grammar for ${profile.id}: ${describeError(err)}`,
        );
        return undefined;
      });
      this.loaded.set(profile.id, pending);
    }
    return pending;
  }

  locateWasm(profile: LanguageProfile): string | undefined {
    const candidates: string[] = [];
    if (this.options.grammarDir) {
      candidates.push(path.join(this.options.grammarDir, profile.grammar.wasm));
    }
    const pkgDir = resolvePackageDir(profile.grammar.package);
    if (pkgDir) {
      candidates.push(path.join(pkgDir, profile.grammar.wasm));
    }
    return findFile(candidates);
  }

  private async loadUncached(
    profile: LanguageProfile,
  ): Promise<LoadedGrammar | undefined> {
    const wasmPath = this.locateWasm(profile);
    if (!wasmPath) {
      this.logger.warn(
        `Grammar ${profile.grammar.wasm} not found for ${profile.id}; analysis disabled for this language.`,
      );
      return undefined;
    }

    await initParser();
    const language = await Language.load(wasmPath);
    const parser = new Parser();
    parser.setLanguage(language);

    const queries: Partial<Record<QueryCategory, Query>> = {};
    for (const category of QUERY_CATEGORIES) {
      const query = this.compileQuery(profile, language, category);
      if (query) {
        queries[category] = query;
      }
    }

    this.logger.info(
      `Loaded ${profile.id} grammar with ${Object.keys(queries).length} queries.`,
    );
    return { profile, language, parser, queries };
  }

  /**
   * Compile one category. A missing file or a query the grammar rejects
   * leaves the category empty.
   */
  private compileQuery(
    profile: LanguageProfile,
    language: Language,
    category: QueryCategory,
  ): Query | undefined {
    if (!this.queryDir) return undefined;
    const scmPath = path.join(this.queryDir, profile.queryDir, `${category}.scm`);
    const source = readFileSafe(scmPath);
    if (source === null) return undefined;
    try {
      return new Query(language, source);
    } catch (err) {
      this.logger.warn(
        `Query ${profile.queryDir}/${category}.scm failed to compile for ${profile.id}: ${describeError(err)}`,
      );
      return undefined;
    }
  }
}
