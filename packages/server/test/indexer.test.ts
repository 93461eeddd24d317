import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AnalysisEngine } from "../src/analysis/engine";
import { WorkspaceIndex, envVarsOf } from "../src/analysis/workspaceIndex";
import { emptyAnalysis } from "../src/analysis/analyzer";
import { CancellationSource } from "../src/concurrency/cancellation";
import { CancelledError } from "../src/errors";
import { pathToUri } from "../src/files";
import { range } from "../src/range";
import type { Reference } from "../src/types";
import { createEngine, makeWorkspace, removeWorkspace, writeFile } from "./helpers";

describe("WorkspaceIndexer", () => {
  let root: string;
  let engine: AnalysisEngine;

  beforeEach(() => {
    root = makeWorkspace({
      "src/db.ts": "export const url = process.env.DB_URL;",
      "src/server.js": "const { PORT } = process.env;",
      "src/notes.md": "process.env.IGNORED",
      "node_modules/pkg/index.js": "process.env.FROM_DEPS;",
      "dist/out.js": "process.env.FROM_BUILD;",
    });
    engine = createEngine([root]);
  });

  afterEach(async () => {
    await engine.shutdown();
    removeWorkspace(root);
  });

  it("finds supported files outside excluded directories", async () => {
    const files = await engine.indexer.discover({ roots: [root], exclude: ["dist"] });
    expect(files).toEqual([
      path.join(root, "src", "db.ts"),
      path.join(root, "src", "server.js"),
    ]);
  });

  it("indexes every discovered file", async () => {
    const progress: number[] = [];
    const summary = await engine.indexWorkspace(
      { exclude: ["dist"], concurrency: 2 },
      undefined,
      (p) => progress.push(p.done),
    );

    expect(summary).toEqual({
      total: 2,
      done: 2,
      failed: 0,
      unchanged: 0,
      removed: 0,
      cancelled: false,
    });
    expect(progress).toEqual([1, 2]);
    expect(engine.index.envVarNames()).toEqual(["DB_URL", "PORT"]);
    expect(engine.index.filesUsing("PORT")).toEqual([
      pathToUri(path.join(root, "src", "server.js")),
    ]);
  });

  it("skips files whose content has not changed", async () => {
    await engine.indexWorkspace({ exclude: ["dist"] });
    const again = await engine.indexWorkspace({ exclude: ["dist"] });
    expect(again.unchanged).toBe(2);
  });

  it("stops when cancelled", async () => {
    const source = new CancellationSource();
    source.cancel();
    const summary = await engine.indexWorkspace({}, source.token);
    expect(summary.cancelled).toBe(true);
    expect(summary.done).toBe(0);
    expect(engine.index.size).toBe(0);
  });

  it("drops entries for files that disappeared between runs", async () => {
    await engine.indexWorkspace({ exclude: ["dist"] });
    fs.rmSync(path.join(root, "src", "server.js"));

    const again = await engine.indexWorkspace({ exclude: ["dist"] });
    expect(again).toMatchObject({ total: 1, removed: 1, unchanged: 1 });
    expect(engine.index.has(pathToUri(path.join(root, "src", "server.js")))).toBe(false);
    expect(engine.index.envVarNames()).toEqual(["DB_URL"]);
  });

  it("follows changes and deletions on disk", async () => {
    await engine.indexWorkspace({ exclude: ["dist"] });
    const uri = writeFile(root, "src/db.ts", "export const url = process.env.DATABASE_URL;");
    await expect(engine.reindexFiles([{ uri, deleted: false }]).promise).resolves.toBe(1);
    expect(engine.index.envVarNames()).toEqual(["DATABASE_URL", "PORT"]);

    fs.rmSync(path.join(root, "src", "db.ts"));
    await engine.reindexFiles([{ uri, deleted: true }]).promise;
    expect(engine.index.has(uri)).toBe(false);
    expect(engine.index.envVarNames()).toEqual(["PORT"]);
  });

  it("re-indexes a batch under the task manager and relinks once", async () => {
    await engine.indexWorkspace({ exclude: ["dist"] });
    const db = writeFile(root, "src/db.ts", "export const url = process.env.DATABASE_URL;");
    const server = writeFile(root, "src/server.js", "const { HOST } = process.env;");
    const relinked = vi.spyOn(engine.index, "updateEnvVars");

    const handle = engine.reindexFiles([
      { uri: db, deleted: false },
      { uri: server, deleted: false },
    ]);
    expect(handle.name).toBe("reindex");
    expect(engine.tasks.size).toBe(1);

    await expect(handle.promise).resolves.toBe(2);
    expect(relinked).toHaveBeenCalledTimes(2);
    expect(engine.index.envVarNames()).toEqual(["DATABASE_URL", "HOST"]);
  });

  it("leaves the index alone when re-indexing is cancelled", async () => {
    await engine.indexWorkspace({ exclude: ["dist"] });
    const uri = writeFile(root, "src/db.ts", "export const url = process.env.DATABASE_URL;");
    const source = new CancellationSource();
    source.cancel();

    await expect(
      engine.applyFileChanges([{ uri, deleted: false }], source.token),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(engine.index.envVarNames()).toEqual(["DB_URL", "PORT"]);
  });

  it("cancels pending re-indexing on shutdown", async () => {
    const uri = writeFile(root, "src/db.ts", "export const url = process.env.DATABASE_URL;");
    const handle = engine.reindexFiles([{ uri, deleted: false }]);
    const outcome = handle.promise.catch((err: unknown) => err);

    await engine.shutdown();
    expect(await outcome).toBeInstanceOf(CancelledError);
    expect(engine.index.size).toBe(0);
  });

  it("counts variables read through imports of indexed files", async () => {
    writeFile(root, "src/env.ts", "export const env = process.env;");
    writeFile(root, "src/use.ts", "import { env } from './env';\nenv.API_KEY;");
    await engine.indexWorkspace({ exclude: ["dist"] });
    expect(engine.index.filesUsing("API_KEY")).toEqual([
      pathToUri(path.join(root, "src", "use.ts")),
    ]);
  });
});

describe("WorkspaceIndex", () => {
  function reference(name: string, line: number): Reference {
    return {
      name,
      token: name,
      range: range(line, 0, line, name.length),
      nameRange: range(line, 0, line, name.length),
      sourceKind: "DirectReference",
      kind: "variable",
    };
  }

  it("groups references by variable", () => {
    const grouped = envVarsOf([reference("A", 0), reference("B", 1), reference("A", 2)]);
    expect([...grouped.keys()]).toEqual(["A", "B"]);
    expect(grouped.get("A")).toEqual([range(0, 0, 0, 1), range(2, 0, 2, 1)]);
  });

  it("keeps the reverse map in step with updates", () => {
    const index = new WorkspaceIndex();
    const analysis = emptyAnalysis("typescript");
    index.set({
      uri: "file:///a.ts",
      contentHash: "1",
      analysis,
      exports: analysis.exports,
      envVars: envVarsOf([reference("A", 0)]),
    });
    index.updateEnvVars("file:///a.ts", envVarsOf([reference("B", 0)]));
    expect(index.envVarNames()).toEqual(["B"]);
    expect(index.filesUsing("A")).toEqual([]);

    expect(index.delete("file:///a.ts")).toBe(true);
    expect(index.envVarNames()).toEqual([]);
  });
});
