import { MarkupKind, type Hover } from "vscode-languageserver";
import type { HandlerContext } from "./context";
import { maskValue } from "../env/masking";
import { containsPosition, type Position } from "../range";
import type { ResolvedVariable, ResolveResult } from "../types";

function header(result: ResolveResult): string {
  return result.via && result.via !== result.canonicalName
    ? `**\`${result.via}\`** → **\`${result.canonicalName}\`**`
    : `**\`${result.canonicalName}\`**`;
}

export function formatHover(
  result: ResolveResult,
  variable: ResolvedVariable,
  displayValue: string,
): string {
  const value = displayValue.includes("\n")
    ? `\`${displayValue.replace(/\n/g, "`\n`")}\``
    : `\`${displayValue}\``;
  return `${header(result)}\n\n**Value**: ${value}\n\n**Source**: \`${variable.source}\``;
}

export async function provideHover(
  ctx: HandlerContext,
  uri: string,
  pos: Position,
): Promise<Hover | null> {
  if (!ctx.config.features.hover) return null;

  const result = ctx.engine.resolve(uri, pos);
  if (!result) return null;
  if (ctx.config.strict.hover && !containsPosition(result.range, pos)) return null;

  if (result.kind === "object") {
    return {
      contents: {
        kind: MarkupKind.Markdown,
        value: `${header(result)}\n\n*Environment Object*`,
      },
      range: result.range,
    };
  }

  const variable = await ctx.values.lookup(result.canonicalName, { uri });
  if (!variable) return null;
  return {
    contents: {
      kind: MarkupKind.Markdown,
      value: formatHover(result, variable, maskValue(variable, ctx.config.masking)),
    },
    range: result.range,
  };
}
