import type { Location } from "vscode-languageserver";
import type { HandlerContext } from "./context";
import type { Position } from "../range";

/** The `.env` line defining the variable under the cursor. */
export async function provideDefinition(
  ctx: HandlerContext,
  uri: string,
  pos: Position,
): Promise<Location[]> {
  if (!ctx.config.features.definition) return [];
  const result = ctx.engine.resolve(uri, pos);
  if (!result || result.kind !== "variable") return [];
  const variable = await ctx.values.lookup(result.canonicalName, { uri });
  return variable?.location ? [variable.location] : [];
}
