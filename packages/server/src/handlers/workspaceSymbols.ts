import { SymbolKind, type SymbolInformation } from "vscode-languageserver";
import type { HandlerContext } from "./context";

/**
 * Variables referenced anywhere in the workspace, located at their `.env`
 * definition when there is one and at their first read otherwise.
 */
export async function provideWorkspaceSymbols(
  ctx: HandlerContext,
  query: string,
): Promise<SymbolInformation[]> {
  if (!ctx.config.features.workspaceSymbols) return [];
  const needle = query.toLowerCase();
  const symbols: SymbolInformation[] = [];

  for (const name of ctx.engine.envVarNames()) {
    if (needle && !name.toLowerCase().includes(needle)) continue;
    const variable = await ctx.values.lookup(name);
    const location = variable?.location ?? ctx.engine.referencesTo(name)[0];
    if (!location) continue;
    symbols.push({
      name,
      kind: SymbolKind.Variable,
      location: { uri: location.uri, range: location.range },
      containerName: variable?.source,
    });
  }
  return symbols;
}
