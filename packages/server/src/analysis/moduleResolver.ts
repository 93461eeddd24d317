import * as path from "path";
import { isFile, pathToUri, uriToPath } from "../files";
import type { LanguageProfile } from "../languages/profile";

export function isRelativeSpecifier(specifier: string): boolean {
  return specifier.startsWith("./") || specifier.startsWith("../");
}

/**
 * Maps relative import specifiers onto workspace files. Package imports,
 * absolute paths and anything resolving outside every workspace root give
 * no result.
 */
export class ModuleResolver {
  private roots: string[];

  constructor(roots: readonly string[] = []) {
    this.roots = roots.map((root) => path.resolve(root));
  }

  setRoots(roots: readonly string[]): void {
    this.roots = roots.map((root) => path.resolve(root));
  }

  getRoots(): readonly string[] {
    return this.roots;
  }

  /** With no roots configured every path counts as inside. */
  isInsideWorkspace(filePath: string): boolean {
    if (this.roots.length === 0) return true;
    const resolved = path.resolve(filePath);
    return this.roots.some((root) => {
      const rel = path.relative(root, resolved);
      return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
    });
  }

  resolve(
    specifier: string,
    importingUri: string,
    profile: LanguageProfile,
  ): string | undefined {
    if (!isRelativeSpecifier(specifier)) return undefined;
    const importingPath = uriToPath(importingUri);
    if (!importingPath) return undefined;

    const base = path.resolve(path.dirname(importingPath), specifier);
    if (!this.isInsideWorkspace(base)) return undefined;

    const found = this.withExtensions(base, profile);
    return found ? pathToUri(found) : undefined;
  }

  /**
   * The path as written, then with each module extension appended (so
   * `./a.config` finds `a.config.ts`), then `<path>/index.<ext>`.
   */
  private withExtensions(base: string, profile: LanguageProfile): string | undefined {
    if (isFile(base)) return base;
    for (const ext of profile.moduleExtensions) {
      const candidate = `${base}.${ext}`;
      if (isFile(candidate)) return candidate;
    }
    for (const indexName of profile.indexFiles) {
      for (const ext of profile.moduleExtensions) {
        const candidate = path.join(base, `${indexName}.${ext}`);
        if (isFile(candidate)) return candidate;
      }
    }
    return undefined;
  }
}
