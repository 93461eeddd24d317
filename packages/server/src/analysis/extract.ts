/**
 * Syntax-to-facts extraction.
 *
 * Runs the declarative query categories of a language over a parsed tree
 * and returns what they matched as plain data. No resolution happens here.
 */

import type { Node, Query, QueryMatch, Tree } from "web-tree-sitter";
import type { LoadedGrammar } from "../languages/grammar";
import { stripQuotes, type LanguageProfile, type QueryCategory } from "../languages/profile";
import type { Range } from "../range";

export interface TextSpan {
  text: string;
  range: Range;
  type: string;
}

/** A member, subscript or call read, with or without a receiver. */
export interface AccessFact {
  range: Range;
  key: string;
  keyRange: Range;
  /** Receiver expression; absent when the query itself recognised the read. */
  object?: TextSpan;
}

export interface BindingFact {
  name: string;
  nameRange: Range;
  value: TextSpan;
  /** Function parameters carry no value and shadow outer names. */
  parameter?: boolean;
}

export interface DestructureFact {
  key: string;
  keyRange: Range;
  /** Local name; equals key for shorthand patterns. */
  name: string;
  nameRange: Range;
  value: TextSpan;
}

export interface IdentifierFact {
  name: string;
  range: Range;
}

export interface ImportFact {
  localName: string;
  localRange: Range;
  /** `"default"`, `"*"` or the exported name. */
  importedName: string;
  specifier: string;
  range: Range;
}

export type ExportFact =
  | { kind: "declaration"; name: string; nameRange: Range; value: TextSpan }
  | { kind: "local"; local: string; exported: string; range: Range }
  | { kind: "reexport"; name: string; exported: string; specifier: string; range: Range }
  | { kind: "namespace"; exported: string; specifier: string; range: Range }
  | { kind: "wildcard"; specifier: string; range: Range }
  | { kind: "default"; value: TextSpan };

export interface ScopeFact {
  type: string;
  range: Range;
}

export interface Facts {
  scopes: ScopeFact[];
  accesses: AccessFact[];
  bindings: BindingFact[];
  destructures: DestructureFact[];
  identifiers: IdentifierFact[];
  imports: ImportFact[];
  exports: ExportFact[];
}

export function rangeOfNode(node: Node): Range {
  return {
    start: { line: node.startPosition.row, character: node.startPosition.column },
    end: { line: node.endPosition.row, character: node.endPosition.column },
  };
}

export function spanOf(node: Node): TextSpan {
  return { text: node.text, range: rangeOfNode(node), type: node.type };
}

/** First node captured under each name. */
function capturesOf(match: QueryMatch): Map<string, Node> {
  const byName = new Map<string, Node>();
  for (const capture of match.captures) {
    if (!byName.has(capture.name)) {
      byName.set(capture.name, capture.node);
    }
  }
  return byName;
}

function runQuery(
  grammar: LoadedGrammar,
  category: QueryCategory,
  tree: Tree,
): Map<string, Node>[] {
  const query: Query | undefined = grammar.queries[category];
  if (!query) return [];
  return query.matches(tree.rootNode).map(capturesOf);
}

/**
 * A string or identifier node with its quotes removed, and the range of
 * the unquoted text when the node sits on one line.
 */
export function unquote(
  profile: LanguageProfile,
  node: Node,
): { text: string; range: Range } {
  const raw = node.text;
  const text = stripQuotes(profile, raw);
  const full = rangeOfNode(node);
  if (text === raw || full.start.line !== full.end.line) {
    return { text, range: full };
  }
  const lead = raw.indexOf(text);
  return {
    text,
    range: {
      start: { line: full.start.line, character: full.start.character + lead },
      end: {
        line: full.end.line,
        character: full.start.character + lead + text.length,
      },
    },
  };
}

const VARIABLE_NAME = /^[A-Za-z_$][\w$.\-]*$/;

export function isVariableName(name: string): boolean {
  return VARIABLE_NAME.test(name);
}

function collectScopes(profile: LanguageProfile, tree: Tree): ScopeFact[] {
  const kinds = new Set(profile.scopeNodes);
  const root = tree.rootNode;
  const scopes: ScopeFact[] = [{ type: root.type, range: rangeOfNode(root) }];
  const stack: Node[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (!child) continue;
      if (kinds.has(child.type)) {
        scopes.push({ type: child.type, range: rangeOfNode(child) });
      }
      if (child.childCount > 0) stack.push(child);
    }
  }
  return scopes;
}

function extractAccesses(
  profile: LanguageProfile,
  matches: Map<string, Node>[],
): AccessFact[] {
  const accesses: AccessFact[] = [];
  for (const captures of matches) {
    const access = captures.get("access");
    const keyNode = captures.get("key");
    if (!access || !keyNode) continue;
    const key = unquote(profile, keyNode);
    if (!isVariableName(key.text)) continue;
    const objectNode = captures.get("object");
    accesses.push({
      range: rangeOfNode(access),
      key: key.text,
      keyRange: key.range,
      object: objectNode ? spanOf(objectNode) : undefined,
    });
  }
  return accesses;
}

function extractBindings(matches: Map<string, Node>[]): BindingFact[] {
  const bindings: BindingFact[] = [];
  for (const captures of matches) {
    const parameter = captures.get("parameter");
    if (parameter) {
      bindings.push({
        name: parameter.text,
        nameRange: rangeOfNode(parameter),
        value: spanOf(parameter),
        parameter: true,
      });
      continue;
    }
    const name = captures.get("name");
    const value = captures.get("value");
    if (!name || !value) continue;
    bindings.push({
      name: name.text,
      nameRange: rangeOfNode(name),
      value: spanOf(value),
    });
  }
  return bindings;
}

function extractDestructures(
  profile: LanguageProfile,
  matches: Map<string, Node>[],
): DestructureFact[] {
  const destructures: DestructureFact[] = [];
  for (const captures of matches) {
    const keyNode = captures.get("key");
    const value = captures.get("value");
    if (!keyNode || !value) continue;
    const key = unquote(profile, keyNode);
    const nameNode = captures.get("name");
    destructures.push({
      key: key.text,
      keyRange: key.range,
      name: nameNode ? nameNode.text : key.text,
      nameRange: nameNode ? rangeOfNode(nameNode) : key.range,
      value: spanOf(value),
    });
  }
  return destructures;
}

function extractImports(
  profile: LanguageProfile,
  matches: Map<string, Node>[],
): ImportFact[] {
  const imports: ImportFact[] = [];
  for (const captures of matches) {
    const source = captures.get("source");
    if (!source) continue;
    const specifier = stripQuotes(profile, source.text);
    const statement = source.parent ?? source;

    const local =
      captures.get("alias") ??
      captures.get("name") ??
      captures.get("default") ??
      captures.get("namespace");
    if (!local) continue;

    let importedName: string;
    const named = captures.get("name");
    if (named) {
      importedName = stripQuotes(profile, named.text);
    } else if (captures.has("default")) {
      importedName = "default";
    } else {
      importedName = "*";
    }

    imports.push({
      localName: local.text,
      localRange: rangeOfNode(local),
      importedName,
      specifier,
      range: rangeOfNode(statement),
    });
  }
  return imports;
}

function extractExports(
  profile: LanguageProfile,
  matches: Map<string, Node>[],
): ExportFact[] {
  const exports: ExportFact[] = [];
  for (const captures of matches) {
    const name = captures.get("name");
    const value = captures.get("value");
    if (name && value) {
      exports.push({
        kind: "declaration",
        name: name.text,
        nameRange: rangeOfNode(name),
        value: spanOf(value),
      });
      continue;
    }

    const alias = captures.get("alias");
    const local = captures.get("local");
    if (local) {
      exports.push({
        kind: "local",
        local: local.text,
        exported: alias ? alias.text : local.text,
        range: rangeOfNode(local),
      });
      continue;
    }

    const source = captures.get("source");
    const reexported = captures.get("reexport_name");
    if (reexported && source) {
      exports.push({
        kind: "reexport",
        name: stripQuotes(profile, reexported.text),
        exported: stripQuotes(profile, alias ? alias.text : reexported.text),
        specifier: stripQuotes(profile, source.text),
        range: rangeOfNode(reexported),
      });
      continue;
    }

    const namespace = captures.get("namespace_export");
    if (namespace && source) {
      exports.push({
        kind: "namespace",
        exported: namespace.text,
        specifier: stripQuotes(profile, source.text),
        range: rangeOfNode(namespace),
      });
      continue;
    }

    const wildcard = captures.get("wildcard_source");
    if (wildcard) {
      exports.push({
        kind: "wildcard",
        specifier: stripQuotes(profile, wildcard.text),
        range: rangeOfNode(wildcard),
      });
      continue;
    }

    const defaultValue = captures.get("default_value");
    if (defaultValue) {
      exports.push({ kind: "default", value: spanOf(defaultValue) });
    }
  }
  return exports;
}

/**
 * Run every query category of the grammar over the tree.
 */
export function extractFacts(grammar: LoadedGrammar, tree: Tree): Facts {
  const { profile } = grammar;
  return {
    scopes: collectScopes(profile, tree),
    accesses: extractAccesses(profile, runQuery(grammar, "references", tree)),
    bindings: [
      ...extractBindings(runQuery(grammar, "bindings", tree)),
      ...extractBindings(runQuery(grammar, "assignments", tree)),
    ],
    destructures: extractDestructures(
      profile,
      runQuery(grammar, "destructures", tree),
    ),
    identifiers: runQuery(grammar, "identifiers", tree).flatMap((captures) => {
      const node = captures.get("identifier");
      return node ? [{ name: node.text, range: rangeOfNode(node) }] : [];
    }),
    imports: extractImports(profile, runQuery(grammar, "imports", tree)),
    exports: extractExports(profile, runQuery(grammar, "exports", tree)),
  };
}
