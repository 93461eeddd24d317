import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { AnalysisEngine } from "../src/analysis/engine";
import type { SourceKind } from "../src/types";
import { at, createEngine } from "./helpers";

interface Check {
  /** Text at the cursor, and which occurrence of it. */
  needle: string;
  occurrence?: number;
  canonicalName: string;
  sourceKind: SourceKind;
}

interface LanguageCase {
  language: string;
  file: string;
  text: string;
  checks: Check[];
}

const CASES: LanguageCase[] = [
  {
    language: "python",
    file: "settings.py",
    text: [
      "import os",
      'url = os.getenv("DB_URL")',
      "env = os.environ",
      'key = env["API_KEY"]',
      "print(url)",
    ].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "API_KEY", canonicalName: "API_KEY", sourceKind: "EnvObjectAlias" },
      { needle: "url)", canonicalName: "DB_URL", sourceKind: "LocalUsage" },
    ],
  },
  {
    language: "go",
    file: "main.go",
    text: [
      "package main",
      "",
      'import "os"',
      "",
      "func main() {",
      '    url := os.Getenv("DB_URL")',
      "    dsn := url",
      "    println(dsn)",
      "}",
    ].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "dsn)", canonicalName: "DB_URL", sourceKind: "LocalUsage" },
    ],
  },
  {
    language: "rust",
    file: "main.rs",
    text: [
      "fn main() {",
      '    let url = std::env::var("DB_URL");',
      "    let dsn = url;",
      "    drop(dsn);",
      "}",
    ].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "dsn)", canonicalName: "DB_URL", sourceKind: "LocalUsage" },
    ],
  },
  {
    language: "ruby",
    file: "config.rb",
    text: [
      'url = ENV["DB_URL"]',
      "env = ENV",
      'key = env.fetch("API_KEY")',
      "puts url",
    ].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "API_KEY", canonicalName: "API_KEY", sourceKind: "EnvObjectAlias" },
      { needle: "url", occurrence: 1, canonicalName: "DB_URL", sourceKind: "LocalUsage" },
    ],
  },
  {
    language: "php",
    file: "config.php",
    text: [
      "<?php",
      '$url = getenv("DB_URL");',
      "$env = $_ENV;",
      'echo $env["API_KEY"];',
      "echo $url;",
    ].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "API_KEY", canonicalName: "API_KEY", sourceKind: "EnvObjectAlias" },
      { needle: "$url", occurrence: 1, canonicalName: "DB_URL", sourceKind: "LocalUsage" },
    ],
  },
  {
    language: "java",
    file: "App.java",
    text: [
      "class App {",
      "  void run() {",
      '    String url = System.getenv("DB_URL");',
      "    Map<String, String> env = System.getenv();",
      '    String key = env.get("API_KEY");',
      "    String dsn = url;",
      "    use(dsn);",
      "  }",
      "}",
    ].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "API_KEY", canonicalName: "API_KEY", sourceKind: "EnvObjectAlias" },
      { needle: "dsn)", canonicalName: "DB_URL", sourceKind: "LocalUsage" },
    ],
  },
  {
    language: "csharp",
    file: "App.cs",
    text: [
      "class App {",
      "  void Run() {",
      '    var url = Environment.GetEnvironmentVariable("DB_URL");',
      "    var dsn = url;",
      "    Use(dsn);",
      "  }",
      "}",
    ].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "dsn)", canonicalName: "DB_URL", sourceKind: "LocalUsage" },
    ],
  },
  {
    language: "c",
    file: "main.c",
    text: [
      "#include <stdlib.h>",
      "",
      "int main(void) {",
      '  const char *url = getenv("DB_URL");',
      "  const char *dsn = url;",
      "  puts(dsn);",
      "  return 0;",
      "}",
    ].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "dsn)", canonicalName: "DB_URL", sourceKind: "LocalUsage" },
    ],
  },
  {
    language: "cpp",
    file: "main.cpp",
    text: [
      "#include <cstdlib>",
      "",
      "int main() {",
      '  const char *url = std::getenv("DB_URL");',
      "  const char *dsn = url;",
      "  puts(dsn);",
      "  return 0;",
      "}",
    ].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "dsn)", canonicalName: "DB_URL", sourceKind: "LocalUsage" },
    ],
  },
  {
    language: "bash",
    file: "start.sh",
    text: ['echo "$DB_URL"', 'echo "${API_KEY:-none}"'].join("\n"),
    checks: [
      { needle: "DB_URL", canonicalName: "DB_URL", sourceKind: "DirectReference" },
      { needle: "API_KEY", canonicalName: "API_KEY", sourceKind: "DirectReference" },
    ],
  },
];

describe.each(CASES)("$language queries", ({ language, file, text, checks }) => {
  const uri = `file:///workspace/${file}`;
  let engine: AnalysisEngine;

  beforeAll(async () => {
    engine = createEngine();
    await engine.open(uri, language, 1, text);
  });

  afterAll(async () => {
    await engine.shutdown();
  });

  it("analyses the document with its own grammar", () => {
    expect(engine.get(uri)?.analysis.profileId).toBe(language);
  });

  it.each(checks)(
    "resolves $needle as $sourceKind",
    ({ needle, occurrence, canonicalName, sourceKind }) => {
      expect(engine.resolve(uri, at(text, needle, occurrence ?? 0))).toMatchObject({
        canonicalName,
        sourceKind,
      });
    },
  );
});
