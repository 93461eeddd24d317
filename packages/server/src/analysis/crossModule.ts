/**
 * Follows imports into the exports of other workspace modules.
 *
 * Each module boundary crossed costs one hop from the caller's budget, so
 * a chain that mixes local aliases and re-exports is bounded as a whole.
 */

import { uriToPath } from "../files";
import type { LanguageRegistry } from "../languages/registry";
import type { ExportIndexEntry, ExportResolution } from "../types";
import type { ModuleResolver } from "./moduleResolver";
import type { ImportResolver, Resolution } from "./resolver";

/** Exports of a module by URI: the open document's, else the indexed file's. */
export type ExportLookup = (uri: string) => ExportIndexEntry | undefined;

export class CrossModuleResolver {
  constructor(
    private readonly exportsOf: ExportLookup,
    private readonly modules: ModuleResolver,
    private readonly registry: LanguageRegistry,
  ) {}

  /** Target URI of a specifier written in `fromUri`. */
  resolveSpecifier(specifier: string, fromUri: string): string | undefined {
    const profile = this.registry.forPath(uriToPath(fromUri) ?? fromUri);
    return profile ? this.modules.resolve(specifier, fromUri, profile) : undefined;
  }

  importResolverFor(importingUri: string): ImportResolver {
    return (entry, budget) =>
      this.resolveImport(importingUri, entry.specifier, entry.importedName, budget);
  }

  /**
   * Resolve `importedName` (`"default"` for default imports) of the module
   * `specifier` points at from `fromUri`.
   */
  resolveImport(
    fromUri: string,
    specifier: string,
    importedName: string,
    budget: number,
    visited: Set<string> = new Set(),
  ): Resolution | undefined {
    let uri = fromUri;
    let current = specifier;
    let name = importedName;
    let key: string | undefined;
    let hops = 0;

    for (;;) {
      hops++;
      if (hops > budget || name === "*") return undefined;

      const target = this.resolveSpecifier(current, uri);
      if (!target) return undefined;
      const visitKey = `${target}#${name}`;
      if (visited.has(visitKey)) return undefined;
      visited.add(visitKey);

      const exports = this.exportsOf(target);
      if (!exports) return undefined;

      const exported: ExportResolution | undefined =
        name === "default" ? exports.defaultExport : exports.named.get(name);

      if (!exported) {
        for (const wildcard of exports.wildcards) {
          const found = this.resolveImport(target, wildcard, name, budget - hops, visited);
          if (found) return applyKey(found, key, hops);
        }
        return undefined;
      }

      switch (exported.kind) {
        case "EnvVar":
          return applyKey(
            { kind: "variable", name: exported.name, hops: 0, crossModule: true },
            key,
            hops,
          );
        case "EnvObject":
          return applyKey(
            { kind: "object", name: exported.canonicalName, hops: 0, crossModule: true },
            key,
            hops,
          );
        case "ReExport":
          uri = target;
          current = exported.specifier;
          name = exported.name;
          continue;
        case "ImportedProperty":
          if (key !== undefined) return undefined;
          uri = target;
          current = exported.specifier;
          name = exported.name;
          key = exported.key;
          continue;
        case "Namespace":
        case "Opaque":
          return undefined;
      }
    }
  }
}

/** A pending property key turns an env object into one of its variables. */
function applyKey(
  found: Resolution,
  key: string | undefined,
  hops: number,
): Resolution | undefined {
  if (key === undefined) {
    return { ...found, hops: found.hops + hops, crossModule: true };
  }
  return found.kind === "object"
    ? { kind: "variable", name: key, hops: found.hops + hops, crossModule: true }
    : undefined;
}
