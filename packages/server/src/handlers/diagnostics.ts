import { DiagnosticSeverity, type Diagnostic } from "vscode-languageserver";
import { DIAGNOSTIC_SOURCE, UNDEFINED_VARIABLE_CODE } from "../constants";
import type { ValueResolver } from "../env/valueSource";
import type { Reference } from "../types";

/**
 * One warning per read of a variable the resolver does not define. Plain
 * usages of a local alias are not reported again.
 */
export async function computeDiagnostics(
  uri: string,
  references: readonly Reference[],
  values: ValueResolver,
): Promise<Diagnostic[]> {
  const defined = new Map<string, boolean>();
  const diagnostics: Diagnostic[] = [];

  for (const reference of references) {
    const name = reference.name;
    if (name === undefined || reference.kind !== "variable") continue;
    if (reference.sourceKind === "LocalUsage") continue;

    let isDefined = defined.get(name);
    if (isDefined === undefined) {
      isDefined = (await values.lookup(name, { uri })) !== undefined;
      defined.set(name, isDefined);
    }
    if (isDefined) continue;

    diagnostics.push({
      range: reference.nameRange,
      severity: DiagnosticSeverity.Warning,
      code: UNDEFINED_VARIABLE_CODE,
      source: DIAGNOSTIC_SOURCE,
      message: `Environment variable '${name}' is not defined.`,
    });
  }
  return diagnostics;
}
