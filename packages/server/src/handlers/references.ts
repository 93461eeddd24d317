import type { Location } from "vscode-languageserver";
import type { HandlerContext } from "./context";
import type { Position } from "../range";

/**
 * Every read of the variable under the cursor in open documents and the
 * indexed workspace, plus its `.env` definition when asked for.
 */
export async function provideReferences(
  ctx: HandlerContext,
  uri: string,
  pos: Position,
  includeDeclaration: boolean,
): Promise<Location[]> {
  if (!ctx.config.features.references) return [];
  const result = ctx.engine.resolve(uri, pos);
  if (!result || result.kind !== "variable") return [];

  const locations: Location[] = ctx.engine
    .referencesTo(result.canonicalName)
    .map(({ uri: target, range }) => ({ uri: target, range }));

  if (includeDeclaration) {
    const variable = await ctx.values.lookup(result.canonicalName, { uri });
    if (variable?.location) locations.unshift(variable.location);
  }
  return locations;
}
