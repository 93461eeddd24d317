/**
 * Binding and alias resolution over a document's symbol table.
 *
 * Chains are followed iteratively, one hop per step, with a depth counter
 * shared across module boundaries. Past MAX_CHAIN_DEPTH hops a chain
 * resolves to nothing.
 */

import { MAX_CHAIN_DEPTH } from "../constants";
import { normalizeExpression } from "../languages/profile";
import {
  comparePositions,
  compareRanges,
  containsPosition,
  RangeSet,
  rangesEqual,
  smallestContaining,
  type Position,
  type Range,
} from "../range";
import type {
  ExportIndexEntry,
  ExportResolution,
  ImportEntry,
  Reference,
  ResolveResult,
  ResolvedKind,
} from "../types";
import type { ExportFact, TextSpan } from "./extract";
import type { AnalysisCore, PropertyAccess } from "./model";
import type { Binding } from "./symbolTable";

export interface Resolution {
  kind: ResolvedKind;
  name: string;
  hops: number;
  /** True when the chain crossed into another module. */
  crossModule: boolean;
}

/**
 * Resolves an import of the current document within the given hop budget.
 */
export type ImportResolver = (
  entry: ImportEntry,
  budget: number,
) => Resolution | undefined;

type Walk =
  | { type: "resolved"; resolution: Resolution }
  | { type: "import"; entry: ImportEntry; key?: string; hops: number }
  | { type: "failed" };

const FAILED: Walk = { type: "failed" };

/** A position after every top-level declaration. */
const END_OF_FILE: Position = { line: Number.MAX_SAFE_INTEGER, character: 0 };

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function resolved(kind: ResolvedKind, name: string, hops: number): Walk {
  return { type: "resolved", resolution: { kind, name, hops, crossModule: false } };
}

export class BindingResolver {
  constructor(
    private readonly analysis: AnalysisCore,
    private readonly resolveImport?: ImportResolver,
    private readonly envObjects: readonly string[] = [],
  ) {}

  /**
   * Follow a binding's chain until it reaches the environment, an import,
   * or a dead end.
   */
  private walk(start: Binding, budget: number): Walk {
    const { table, imports } = this.analysis;
    let current = start;
    let key: string | undefined;
    let hops = 0;

    for (;;) {
      if (hops > budget) return FAILED;
      const kind = current.kind;
      if (kind.type === "DirectEnvAccess") {
        return key === undefined ? resolved("variable", kind.name, hops) : FAILED;
      }
      if (kind.type === "ObjectAlias") {
        return key === undefined
          ? resolved("object", kind.object, hops)
          : resolved("variable", key, hops);
      }
      if (kind.type === "Opaque") return FAILED;

      let nextName: string;
      if (kind.type === "Reassignment") {
        nextName = kind.target;
      } else {
        if (key !== undefined) return FAILED;
        if (kind.source.type === "EnvObject") {
          return resolved("variable", kind.key, hops);
        }
        key = kind.key;
        nextName = kind.source.name;
      }

      hops++;
      const next = table.lookup(nextName, current.nameRange.start);
      if (next) {
        current = next;
        continue;
      }
      const entry = imports.get(nextName);
      return entry ? { type: "import", entry, key, hops } : FAILED;
    }
  }

  private throughImport(
    entry: ImportEntry,
    key: string | undefined,
    hops: number,
    budget: number,
  ): Resolution | undefined {
    if (!this.resolveImport || hops > budget) return undefined;

    if (key !== undefined && entry.importedName === "*") {
      const member = this.resolveImport({ ...entry, importedName: key }, budget - hops);
      return member && { ...member, hops: member.hops + hops, crossModule: true };
    }

    const target = this.resolveImport(entry, budget - hops);
    if (!target) return undefined;
    if (key === undefined) {
      return { ...target, hops: target.hops + hops, crossModule: true };
    }
    return target.kind === "object"
      ? { kind: "variable", name: key, hops: target.hops + hops, crossModule: true }
      : undefined;
  }

  resolveBinding(binding: Binding, budget = MAX_CHAIN_DEPTH): Resolution | undefined {
    const walk = this.walk(binding, budget);
    switch (walk.type) {
      case "resolved":
        return walk.resolution;
      case "failed":
        return undefined;
      case "import":
        return this.throughImport(walk.entry, walk.key, walk.hops, budget);
    }
  }

  /** Resolve a bare name as seen from a position. */
  resolveName(
    name: string,
    pos: Position,
    budget = MAX_CHAIN_DEPTH,
  ): Resolution | undefined {
    const binding = this.analysis.table.lookup(name, pos);
    if (binding) return this.resolveBinding(binding, budget);
    const entry = this.analysis.imports.get(name);
    return entry ? this.throughImport(entry, undefined, 0, budget) : undefined;
  }

  /**
   * `alias.KEY` is one hop on top of resolving `alias` to the environment
   * object.
   */
  resolvePropertyAccess(
    access: PropertyAccess,
    budget = MAX_CHAIN_DEPTH,
  ): Resolution | undefined {
    const { table, imports } = this.analysis;
    const binding = table.lookup(access.object, access.objectRange.start);
    let target: Resolution | undefined;
    if (binding) {
      target = this.resolveBinding(binding, budget - 1);
    } else {
      const entry = imports.get(access.object);
      if (!entry) return undefined;
      if (entry.importedName === "*") {
        return this.throughImport(entry, access.key, 1, budget);
      }
      target = this.throughImport(entry, undefined, 1, budget);
    }
    if (!target || target.kind !== "object") return undefined;
    return {
      kind: "variable",
      name: access.key,
      hops: target.hops + 1,
      crossModule: target.crossModule,
    };
  }

  /**
   * What the token at a position denotes. Direct reads win, then property
   * accesses on aliases, then declarations, then plain usages.
   */
  resolveAt(pos: Position): ResolveResult | undefined {
    const { table, directReferences, propertyAccesses, usages } = this.analysis;

    const direct = smallestContaining(directReferences, pos, (r) => r.range);
    if (direct) {
      return {
        canonicalName: direct.name,
        sourceKind: "DirectReference",
        kind: "variable",
        range: direct.nameRange,
      };
    }

    const access = smallestContaining(propertyAccesses, pos, (a) => a.keyRange);
    if (access) {
      const resolution = this.resolvePropertyAccess(access);
      if (resolution) {
        return {
          canonicalName: resolution.name,
          sourceKind: resolution.crossModule ? "CrossModuleImport" : "EnvObjectAlias",
          kind: resolution.kind,
          range: access.keyRange,
          via: access.object,
        };
      }
    }

    const binding = table.bindingAt(pos);
    if (binding) {
      const resolution = this.resolveBinding(binding);
      if (!resolution) return undefined;
      const onKey = binding.keyRange && containsPosition(binding.keyRange, pos);
      return {
        canonicalName: resolution.name,
        sourceKind: "LocalBinding",
        kind: resolution.kind,
        range: onKey && binding.keyRange ? binding.keyRange : binding.nameRange,
        via: binding.name,
      };
    }

    const usage = smallestContaining(usages, pos, (u) => u.range);
    if (usage) {
      const local = table.lookup(usage.name, usage.range.start);
      const resolution = this.resolveName(usage.name, usage.range.start);
      if (!resolution) return undefined;
      return {
        canonicalName: resolution.name,
        sourceKind: local ? "LocalUsage" : "CrossModuleImport",
        kind: resolution.kind,
        range: usage.range,
        via: usage.name,
      };
    }

    return undefined;
  }

  /**
   * Every occurrence in the document that reads a variable or aliases the
   * environment object, in document order.
   */
  references(): Reference[] {
    const { table, directReferences, propertyAccesses, usages, imports } = this.analysis;
    const seen = new RangeSet();
    const references: Reference[] = [];
    const push = (reference: Reference) => {
      if (seen.add(reference.nameRange)) references.push(reference);
    };

    for (const direct of directReferences) {
      push({
        name: direct.name,
        token: direct.name,
        range: direct.range,
        nameRange: direct.nameRange,
        sourceKind: "DirectReference",
        kind: "variable",
      });
    }

    for (const access of propertyAccesses) {
      const resolution = this.resolvePropertyAccess(access);
      const imported = !table.lookup(access.object, access.objectRange.start) &&
        imports.has(access.object);
      if (!resolution && !imported) continue;
      push({
        name: resolution?.name,
        token: access.key,
        range: access.range,
        nameRange: access.keyRange,
        sourceKind: imported || resolution?.crossModule ? "CrossModuleImport" : "EnvObjectAlias",
        kind: resolution?.kind ?? "variable",
        via: access.object,
      });
    }

    for (const binding of table.bindings) {
      const resolution = this.resolveBinding(binding);
      if (!resolution) continue;
      const occurrences: [Range, string][] = [[binding.nameRange, binding.name]];
      if (binding.keyRange && binding.kind.type === "Destructured") {
        occurrences.unshift([binding.keyRange, binding.kind.key]);
      }
      for (const [r, token] of occurrences) {
        push({
          name: resolution.name,
          token,
          range: r,
          nameRange: r,
          sourceKind: "LocalBinding",
          kind: resolution.kind,
          via: binding.name,
        });
      }
    }

    for (const usage of usages) {
      const local = table.lookup(usage.name, usage.range.start);
      if (!local && !imports.has(usage.name)) continue;
      const resolution = this.resolveName(usage.name, usage.range.start);
      if (local && !resolution) continue;
      push({
        name: resolution?.name,
        token: usage.name,
        range: usage.range,
        nameRange: usage.range,
        sourceKind: local ? "LocalUsage" : "CrossModuleImport",
        kind: resolution?.kind ?? "variable",
        via: usage.name,
      });
    }

    return references.sort(
      (a, b) =>
        comparePositions(a.range.start, b.range.start) ||
        compareRanges(a.range, b.range),
    );
  }

  private importExport(entry: ImportEntry, key: string | undefined): ExportResolution {
    if (key === undefined) {
      return entry.importedName === "*"
        ? { kind: "Namespace", specifier: entry.specifier }
        : { kind: "ReExport", specifier: entry.specifier, name: entry.importedName };
    }
    return entry.importedName === "*"
      ? { kind: "ReExport", specifier: entry.specifier, name: key }
      : {
          kind: "ImportedProperty",
          specifier: entry.specifier,
          name: entry.importedName,
          key,
        };
  }

  /** Classify a top-level name the way a reference to it would resolve. */
  private classifyName(name: string, pos: Position): ExportResolution {
    const binding = this.analysis.table.lookup(name, pos);
    if (!binding) {
      const entry = this.analysis.imports.get(name);
      return entry ? this.importExport(entry, undefined) : { kind: "Opaque" };
    }
    const walk = this.walk(binding, MAX_CHAIN_DEPTH);
    switch (walk.type) {
      case "resolved":
        return walk.resolution.kind === "variable"
          ? { kind: "EnvVar", name: walk.resolution.name }
          : { kind: "EnvObject", canonicalName: walk.resolution.name };
      case "import":
        return this.importExport(walk.entry, walk.key);
      case "failed":
        return { kind: "Opaque" };
    }
  }

  private classifyValue(value: TextSpan): ExportResolution {
    const text = normalizeExpression(value.text);
    if (this.envObjects.includes(text)) {
      return { kind: "EnvObject", canonicalName: text };
    }
    const direct = this.analysis.directReferences.find((r) =>
      rangesEqual(r.range, value.range),
    );
    if (direct) return { kind: "EnvVar", name: direct.name };
    if (IDENTIFIER.test(text)) return this.classifyName(text, END_OF_FILE);
    return { kind: "Opaque" };
  }

  /** Build the export index entry of this document. */
  exportsOf(facts: readonly ExportFact[]): ExportIndexEntry {
    const named = new Map<string, ExportResolution>();
    const wildcards: string[] = [];
    let defaultExport: ExportResolution | undefined;

    for (const fact of facts) {
      switch (fact.kind) {
        case "declaration":
          named.set(fact.name, this.classifyName(fact.name, fact.nameRange.end));
          break;
        case "local": {
          const resolution = this.classifyName(fact.local, END_OF_FILE);
          if (fact.exported === "default") defaultExport = resolution;
          else named.set(fact.exported, resolution);
          break;
        }
        case "reexport":
          named.set(fact.exported, {
            kind: "ReExport",
            specifier: fact.specifier,
            name: fact.name,
          });
          break;
        case "namespace":
          named.set(fact.exported, { kind: "Namespace", specifier: fact.specifier });
          break;
        case "wildcard":
          wildcards.push(fact.specifier);
          break;
        case "default":
          defaultExport = this.classifyValue(fact.value);
          break;
      }
    }

    return { named, defaultExport, wildcards };
  }
}
