/**
 * Builds a document's symbol table, references and exports from the facts
 * its grammar's queries extracted.
 */

import type { Tree } from "web-tree-sitter";
import { ParseError } from "../errors";
import type { LoadedGrammar } from "../languages/grammar";
import {
  isEnvObject,
  normalizeExpression,
  type LanguageProfile,
} from "../languages/profile";
import { describeError, type Logger } from "../logger";
import {
  comparePositions,
  rangeContains,
  rangeKey,
  RangeSet,
  rangesEqual,
  rangeSize,
  type Range,
} from "../range";
import type { ImportEntry } from "../types";
import { extractFacts, type Facts, type TextSpan } from "./extract";
import type {
  DirectReference,
  DocumentAnalysis,
  PropertyAccess,
  Usage,
} from "./model";
import { BindingResolver } from "./resolver";
import { SymbolTable, type BindingKind } from "./symbolTable";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

interface Declaration {
  name: string;
  nameRange: Range;
  keyRange?: Range;
  kind: BindingKind;
}

/**
 * The candidate whose range equals the value, or else the largest one that
 * starts where the value starts and lies within it (`process.env.X || "d"`).
 */
function leadingMatch<T>(
  candidates: readonly T[],
  value: Range,
  rangeOf: (item: T) => Range,
): T | undefined {
  let best: T | undefined;
  for (const candidate of candidates) {
    const r = rangeOf(candidate);
    if (rangesEqual(r, value)) return candidate;
    if (
      comparePositions(r.start, value.start) === 0 &&
      rangeContains(value, r) &&
      (best === undefined || rangeSize(r) > rangeSize(rangeOf(best)))
    ) {
      best = candidate;
    }
  }
  return best;
}

class Classifier {
  constructor(
    private readonly profile: LanguageProfile,
    private readonly directReferences: readonly DirectReference[],
    private readonly propertyAccesses: readonly PropertyAccess[],
  ) {}

  value(value: TextSpan): BindingKind {
    const text = normalizeExpression(value.text);
    if (this.profile.envObjects.includes(text)) {
      return { type: "ObjectAlias", object: text };
    }
    const direct = leadingMatch(this.directReferences, value.range, (r) => r.range);
    if (direct) {
      return { type: "DirectEnvAccess", name: direct.name };
    }
    if (IDENTIFIER.test(text)) {
      return { type: "Reassignment", target: text };
    }
    const access = leadingMatch(this.propertyAccesses, value.range, (a) => a.range);
    if (access) {
      return {
        type: "Destructured",
        key: access.key,
        source: { type: "Binding", name: access.object },
      };
    }
    return { type: "Opaque" };
  }

  destructure(key: string, value: TextSpan): BindingKind {
    const text = normalizeExpression(value.text);
    if (this.profile.envObjects.includes(text)) {
      return { type: "Destructured", key, source: { type: "EnvObject", object: text } };
    }
    if (IDENTIFIER.test(text)) {
      return { type: "Destructured", key, source: { type: "Binding", name: text } };
    }
    return { type: "Opaque" };
  }
}

function splitAccesses(profile: LanguageProfile, facts: Facts) {
  const directReferences: DirectReference[] = [];
  const propertyAccesses: PropertyAccess[] = [];
  const seen = new RangeSet();

  for (const access of facts.accesses) {
    if (!seen.add(access.range)) continue;
    const object = access.object;
    if (!object || isEnvObject(profile, object.text)) {
      directReferences.push({
        name: access.key,
        range: access.range,
        nameRange: access.keyRange,
        object: object ? normalizeExpression(object.text) : undefined,
      });
    } else if (IDENTIFIER.test(object.text)) {
      propertyAccesses.push({
        object: object.text,
        objectRange: object.range,
        key: access.key,
        keyRange: access.keyRange,
        range: access.range,
      });
    }
  }
  return { directReferences, propertyAccesses };
}

/**
 * Several patterns may match one declaration; the first that says
 * something about the environment wins.
 */
function collectDeclarations(classifier: Classifier, facts: Facts): Declaration[] {
  const byName = new Map<string, Declaration>();
  const add = (declaration: Declaration) => {
    const key = rangeKey(declaration.nameRange);
    const existing = byName.get(key);
    if (!existing || (existing.kind.type === "Opaque" && declaration.kind.type !== "Opaque")) {
      byName.set(key, declaration);
    }
  };

  for (const binding of facts.bindings) {
    add({
      name: binding.name,
      nameRange: binding.nameRange,
      kind: binding.parameter ? { type: "Opaque" } : classifier.value(binding.value),
    });
  }
  for (const destructure of facts.destructures) {
    add({
      name: destructure.name,
      nameRange: destructure.nameRange,
      keyRange: rangesEqual(destructure.keyRange, destructure.nameRange)
        ? undefined
        : destructure.keyRange,
      kind: classifier.destructure(destructure.key, destructure.value),
    });
  }

  return [...byName.values()].sort((a, b) =>
    comparePositions(a.nameRange.start, b.nameRange.start),
  );
}

/**
 * Turn extracted facts into a document analysis. Imported names stay
 * unresolved here; the engine resolves them against the workspace index.
 */
export function analyzeFacts(profile: LanguageProfile, facts: Facts): DocumentAnalysis {
  const [root, ...nested] = facts.scopes;
  const table = new SymbolTable(
    root?.type ?? "root",
    root?.range ?? { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } },
  );
  for (const scope of nested) {
    table.addScope(scope.type, scope.range);
  }

  const { directReferences, propertyAccesses } = splitAccesses(profile, facts);
  const classifier = new Classifier(profile, directReferences, propertyAccesses);

  const declared = new RangeSet();
  for (const declaration of collectDeclarations(classifier, facts)) {
    table.declare(declaration.name, declaration.nameRange, declaration.kind, declaration.keyRange);
    declared.add(declaration.nameRange);
  }

  const imports = new Map<string, ImportEntry>();
  for (const fact of facts.imports) {
    imports.set(fact.localName, {
      localName: fact.localName,
      specifier: fact.specifier,
      importedName: fact.importedName,
      range: fact.range,
    });
  }

  const usages: Usage[] = [];
  const seenUsages = new RangeSet();
  for (const identifier of facts.identifiers) {
    if (declared.has(identifier.range) || !seenUsages.add(identifier.range)) continue;
    usages.push({ name: identifier.name, range: identifier.range });
  }

  const core = { table, directReferences, propertyAccesses, usages, imports };
  const resolver = new BindingResolver(core, undefined, profile.envObjects);

  return {
    ...core,
    profileId: profile.id,
    exportFacts: facts.exports,
    references: resolver.references(),
    exports: resolver.exportsOf(facts.exports),
  };
}

export function emptyAnalysis(profileId?: string): DocumentAnalysis {
  return {
    profileId,
    table: new SymbolTable("root", {
      start: { line: 0, character: 0 },
      end: { line: 0, character: 0 },
    }),
    directReferences: [],
    propertyAccesses: [],
    usages: [],
    imports: new Map(),
    exportFacts: [],
    references: [],
    exports: { named: new Map(), wildcards: [] },
  };
}

export interface ParsedDocument {
  analysis: DocumentAnalysis;
  tree?: Tree;
}

/**
 * Parse and analyse a text. A grammar failure is logged and yields an
 * empty analysis.
 */
export function analyzeText(
  grammar: LoadedGrammar | undefined,
  uri: string,
  text: string,
  logger: Logger,
): ParsedDocument {
  if (!grammar) {
    return { analysis: emptyAnalysis() };
  }
  let tree: Tree | null = null;
  try {
    tree = grammar.parser.parse(text);
    if (!tree) throw new ParseError(uri);
    return {
      analysis: analyzeFacts(grammar.profile, extractFacts(grammar, tree)),
      tree,
    };
  } catch (err) {
    tree?.delete();
    logger.warn(`Analysis of ${uri} failed: ${describeError(err)}`);
    return { analysis: emptyAnalysis(grammar.profile.id) };
  }
}
