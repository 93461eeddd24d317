import {
  CompletionItemKind,
  MarkupKind,
  type CompletionItem,
} from "vscode-languageserver";
import type { HandlerContext } from "./context";
import { maskValue } from "../env/masking";
import { isEnvCompletionBase } from "../languages/profile";
import type { Position } from "../range";

/**
 * Variable names from the value resolver. In strict mode the cursor must
 * sit on a member or argument of something that denotes the environment.
 */
export async function provideCompletion(
  ctx: HandlerContext,
  uri: string,
  pos: Position,
): Promise<CompletionItem[]> {
  if (!ctx.config.features.completion) return [];

  if (ctx.config.strict.completion) {
    await ctx.engine.flush(uri);
    const profile = ctx.engine.profileOf(uri);
    const base = ctx.engine.completionContextAt(uri, pos);
    if (!profile || base === undefined) return [];
    if (
      !isEnvCompletionBase(profile, base) &&
      !ctx.engine.isEnvObjectExpression(uri, base, pos)
    ) {
      return [];
    }
  }

  const variables = await ctx.values.lookupAll({ uri });
  return variables.map((variable) => {
    const value = maskValue(variable, ctx.config.masking);
    return {
      label: variable.name,
      kind: CompletionItemKind.Variable,
      documentation: {
        kind: MarkupKind.Markdown,
        value: `**Value**: ${value === "" ? "*(empty)*" : `\`${value}\``}\n\n**Source**: \`${variable.source}\``,
      },
    };
  });
}
