import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AnalysisEngine } from "../src/analysis/engine";
import type { DocumentSnapshot } from "../src/analysis/documents";
import { at, createEngine } from "./helpers";

const URI = "file:///workspace/src/app.ts";

describe("DocumentStore", () => {
  let engine: AnalysisEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  afterEach(async () => {
    await engine.shutdown();
  });

  it("analyses a document when it is opened", async () => {
    const snapshot = await engine.open(URI, "typescript", 1, "process.env.PORT;");
    expect(snapshot).toMatchObject({ uri: URI, version: 1, generation: 1 });
    expect(snapshot?.analysis.references.map((r) => r.name)).toEqual(["PORT"]);
  });

  it("gives the same analysis when identical content is opened again", async () => {
    const text = "const env = process.env;\nconst { DB_URL: url } = env;\nurl;";
    const first = await engine.open(URI, "typescript", 1, text);
    const second = await engine.open(URI, "typescript", 1, text);

    expect(second?.text).toBe(first?.text);
    expect(second?.analysis.references).toEqual(first?.analysis.references);
    expect(second?.analysis.exports).toEqual(first?.analysis.exports);
    expect(engine.documents.all()).toHaveLength(1);
  });

  it("keeps the settled analysis until the quiet period ends", async () => {
    await engine.open(URI, "typescript", 1, "process.env.PORT;");
    engine.change(URI, 2, [{ text: "process.env.DEBUG;" }]);

    expect(engine.documents.text(URI)).toBe("process.env.DEBUG;");
    expect(engine.get(URI)?.version).toBe(1);

    await vi.waitFor(() => expect(engine.get(URI)?.version).toBe(2));
    expect(engine.get(URI)?.analysis.references.map((r) => r.name)).toEqual(["DEBUG"]);
  });

  it("analyses only the latest generation of a burst of edits", async () => {
    const seen: DocumentSnapshot[] = [];
    engine.documents.onDidAnalyze((snapshot) => seen.push(snapshot));

    await engine.open(URI, "typescript", 1, "process.env.A;");
    engine.change(URI, 2, [{ text: "process.env.B;" }]);
    engine.change(URI, 3, [{ text: "process.env.C;" }]);
    await engine.flush(URI);

    expect(seen.map((s) => [s.generation, s.version])).toEqual([
      [1, 1],
      [3, 3],
    ]);
    expect(engine.get(URI)?.analysis.references.map((r) => r.name)).toEqual(["C"]);
  });

  it("applies incremental edits", async () => {
    await engine.open(URI, "typescript", 1, "process.env.PORT;");
    engine.change(URI, 2, [
      {
        range: { start: { line: 0, character: 12 }, end: { line: 0, character: 16 } },
        text: "HOST",
      },
    ]);
    await engine.flush();
    expect(engine.get(URI)?.text).toBe("process.env.HOST;");
  });

  it("forgets a closed document", async () => {
    await engine.open(URI, "typescript", 1, "process.env.PORT;");
    engine.close(URI);
    expect(engine.documents.has(URI)).toBe(false);
    engine.change(URI, 2, [{ text: "process.env.DEBUG;" }]);
    expect(engine.get(URI)).toBeUndefined();
  });

  it("tracks documents in unsupported languages without references", async () => {
    const snapshot = await engine.open("file:///workspace/notes.txt", "plaintext", 1, "PORT");
    expect(snapshot?.analysis.references).toEqual([]);
    expect(snapshot?.analysis.profileId).toBeUndefined();
  });

  it("treats differently encoded URIs as one document", async () => {
    await engine.open("file:///workspace/my%20app.ts", "typescript", 1, "process.env.PORT;");
    expect(engine.documents.has("file:///workspace/my app.ts")).toBe(true);
  });

  it("returns the reference under the cursor", async () => {
    const text = "const { PORT: port } = process.env;";
    await engine.open(URI, "typescript", 1, text);
    expect(engine.referenceAt(URI, at(text, "port"))).toMatchObject({
      name: "PORT",
      token: "port",
      sourceKind: "LocalBinding",
    });
  });

  describe("completionContextAt", () => {
    it("names the receiver of a member being typed", async () => {
      const text = "const x = process.env.DB";
      await engine.open(URI, "typescript", 1, text);
      expect(engine.completionContextAt(URI, { line: 0, character: text.length })).toBe(
        "process.env",
      );
    });

    it("falls back to the line text right after a dot", async () => {
      const text = "const x = process.env.";
      await engine.open(URI, "typescript", 1, text);
      expect(engine.completionContextAt(URI, { line: 0, character: text.length })).toBe(
        "process.env",
      );
    });

    it("reads the text of edits not analysed yet", async () => {
      await engine.open(URI, "typescript", 1, "const env = process.env;\n");
      engine.change(URI, 2, [{ text: "const env = process.env;\nenv[\"" }]);
      expect(engine.completionContextAt(URI, { line: 1, character: 5 })).toBe("env");
    });

    it("gives nothing outside a member expression", async () => {
      const text = "const x = 1";
      await engine.open(URI, "typescript", 1, text);
      expect(engine.completionContextAt(URI, { line: 0, character: text.length })).toBeUndefined();
    });
  });
});
