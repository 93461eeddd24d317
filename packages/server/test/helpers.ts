import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { vi } from "vitest";
import { AnalysisEngine } from "../src/analysis/engine";
import { defaultConfig, type EnvlensConfig } from "../src/config";
import { StaticValueSource, type ValueResolver } from "../src/env/valueSource";
import { pathToUri } from "../src/files";
import type { HandlerContext } from "../src/handlers/context";
import type { LanguageProfile } from "../src/languages/profile";
import { LanguageRegistry } from "../src/languages/registry";
import { silentLogger, type Logger } from "../src/logger";
import type { Position } from "../src/range";

export const FIXTURE_VALUES: Record<string, string> = {
  DB_URL: "postgres://localhost",
  API_KEY: "secret_key",
  PORT: "8080",
  DEBUG: "true",
};

export function fixtureValues(): StaticValueSource {
  return new StaticValueSource(FIXTURE_VALUES, ".env");
}

/** A fresh directory holding the given files, keyed by relative path. */
export function makeWorkspace(files: Record<string, string> = {}): string {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "envlens-")));
  for (const [relative, content] of Object.entries(files)) {
    writeFile(root, relative, content);
  }
  return root;
}

export function writeFile(root: string, relative: string, content: string): string {
  const filePath = path.join(root, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return pathToUri(filePath);
}

export function removeWorkspace(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export function createEngine(roots: string[] = []): AnalysisEngine {
  return new AnalysisEngine({ roots, logger: silentLogger, debounceMs: 20 });
}

export function createContext(
  engine: AnalysisEngine,
  values: ValueResolver = fixtureValues(),
  config: EnvlensConfig = defaultConfig(),
): HandlerContext {
  return { engine, values, config, logger: silentLogger };
}

export function profile(id: string): LanguageProfile {
  const found = new LanguageRegistry().get(id);
  if (!found) throw new Error(`No profile ${id}`);
  return found;
}

/** Position of the nth occurrence of `needle` in `text`, plus `offset` characters. */
export function at(text: string, needle: string, occurrence = 0, offset = 0): Position {
  let index = -1;
  for (let i = 0; i <= occurrence; i++) {
    index = text.indexOf(needle, index + 1);
    if (index === -1) throw new Error(`'${needle}' occurs fewer than ${occurrence + 1} times`);
  }
  const before = text.slice(0, index + offset);
  const lines = before.split("\n");
  return { line: lines.length - 1, character: lines[lines.length - 1].length };
}

export function spyLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
