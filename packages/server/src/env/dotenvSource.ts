import * as fs from "fs";
import * as path from "path";
import { parse } from "dotenv";
import { DEFAULT_ENV_FILES } from "../constants";
import { pathToUri } from "../files";
import { describeError, type Logger } from "../logger";
import type { Range } from "../range";
import type { ResolvedVariable } from "../types";
import type { RefreshOptions, ValueResolver } from "./valueSource";

export interface DotenvSourceOptions {
  roots: readonly string[];
  /** Paths relative to each root; later files override earlier ones. */
  envFiles?: readonly string[];
  /** Use the server's own environment as the lowest-precedence source. */
  useProcessEnv?: boolean;
  /** Defaults to the server's environment. */
  processEnv?: NodeJS.ProcessEnv;
}

const DEFINITION = /^\s*(?:export\s+)?([\w.\-]+)\s*[=:]/;

/** Range of the name of each variable defined on its own line. */
export function definitionRanges(content: string): Map<string, Range> {
  const ranges = new Map<string, Range>();
  const lines = content.split(/\r?\n/);
  lines.forEach((line, index) => {
    const match = DEFINITION.exec(line);
    if (!match) return;
    const start = line.indexOf(match[1]);
    ranges.set(match[1], {
      start: { line: index, character: start },
      end: { line: index, character: start + match[1].length },
    });
  });
  return ranges;
}

/**
 * Values from `.env` style files under the workspace roots, read with
 * dotenv's parser.
 */
export class DotenvValueSource implements ValueResolver {
  private roots: readonly string[];
  private envFiles: readonly string[];
  private readonly useProcessEnv: boolean;
  private readonly processEnv: NodeJS.ProcessEnv;
  private variables = new Map<string, ResolvedVariable>();
  private loaded: Promise<void> | undefined;

  constructor(
    options: DotenvSourceOptions,
    private readonly logger: Logger,
  ) {
    this.roots = options.roots;
    this.envFiles = options.envFiles ?? DEFAULT_ENV_FILES;
    this.useProcessEnv = options.useProcessEnv ?? false;
    this.processEnv = options.processEnv ?? process.env;
  }

  async lookup(name: string): Promise<ResolvedVariable | undefined> {
    await this.ensureLoaded();
    return this.variables.get(name);
  }

  async lookupAll(): Promise<ResolvedVariable[]> {
    await this.ensureLoaded();
    return [...this.variables.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  refresh(options: RefreshOptions = {}): Promise<void> {
    if (options.roots) this.roots = options.roots;
    if (options.envFiles) this.envFiles = options.envFiles;
    this.loaded = this.load();
    return this.loaded;
  }

  private ensureLoaded(): Promise<void> {
    this.loaded ??= this.load();
    return this.loaded;
  }

  private async load(): Promise<void> {
    const variables = new Map<string, ResolvedVariable>();

    if (this.useProcessEnv) {
      for (const [name, value] of Object.entries(this.processEnv)) {
        if (value !== undefined) {
          variables.set(name, { name, value, source: "process.env" });
        }
      }
    }

    for (const root of this.roots) {
      for (const envFile of this.envFiles) {
        const filePath = path.resolve(root, envFile);
        let content: string;
        try {
          content = await fs.promises.readFile(filePath, "utf8");
        } catch (err) {
          this.logger.debug(`Skipping ${filePath}: ${describeError(err)}`);
          continue;
        }
        const uri = pathToUri(filePath);
        const ranges = definitionRanges(content);
        for (const [name, value] of Object.entries(parse(content))) {
          const range = ranges.get(name);
          variables.set(name, {
            name,
            value,
            source: path.relative(root, filePath) || envFile,
            location: range ? { uri, range } : undefined,
          });
        }
      }
    }

    this.variables = variables;
    this.logger.info(`Loaded ${variables.size} environment variable(s).`);
  }
}
