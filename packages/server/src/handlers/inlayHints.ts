import { InlayHintKind, type InlayHint } from "vscode-languageserver";
import type { HandlerContext } from "./context";
import { maskValue } from "../env/masking";
import { rangesOverlap, touchesPosition, type Range } from "../range";
import type { SourceKind } from "../types";

const HINTED: ReadonlySet<SourceKind> = new Set<SourceKind>([
  "DirectReference",
  "EnvObjectAlias",
  "CrossModuleImport",
]);

/** First line only, then cut to `max` characters. */
export function truncateValue(value: string, max: number): string {
  const newline = value.indexOf("\n");
  const firstLine = newline === -1 ? value : `${value.slice(0, newline)}...`;
  return firstLine.length > max ? `${firstLine.slice(0, max)}...` : firstLine;
}

export async function provideInlayHints(
  ctx: HandlerContext,
  uri: string,
  range: Range,
): Promise<InlayHint[]> {
  if (!ctx.config.features.inlayHints) return [];
  const hints: InlayHint[] = [];

  for (const reference of ctx.engine.references(uri)) {
    if (reference.name === undefined || reference.kind !== "variable") continue;
    if (!HINTED.has(reference.sourceKind)) continue;
    const end = reference.nameRange.end;
    if (!rangesOverlap(reference.nameRange, range) && !touchesPosition(range, end)) continue;

    const variable = await ctx.values.lookup(reference.name, { uri });
    if (!variable) continue;
    const display = truncateValue(
      maskValue(variable, ctx.config.masking),
      ctx.config.inlayHints.maxValueLength,
    );
    hints.push({
      position: end,
      label: `: "${display}"`,
      kind: InlayHintKind.Type,
      tooltip: `Source: ${variable.source}`,
      paddingLeft: false,
      paddingRight: true,
    });
  }
  return hints;
}
