import type { Range, TextEdit, WorkspaceEdit } from "vscode-languageserver";
import type { HandlerContext } from "./context";
import type { Position } from "../range";

const RENAMEABLE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidVariableName(name: string): boolean {
  return RENAMEABLE.test(name);
}

export function prepareRename(
  ctx: HandlerContext,
  uri: string,
  pos: Position,
): { range: Range; placeholder: string } | null {
  if (!ctx.config.features.rename) return null;
  const result = ctx.engine.resolve(uri, pos);
  if (!result || result.kind !== "variable") return null;
  return { range: result.range, placeholder: result.canonicalName };
}

/**
 * Rename a variable across the workspace and in its `.env` definition.
 * Local aliases keep their names.
 */
export async function provideRename(
  ctx: HandlerContext,
  uri: string,
  pos: Position,
  newName: string,
): Promise<WorkspaceEdit | null> {
  if (!ctx.config.features.rename || !isValidVariableName(newName)) return null;
  const result = ctx.engine.resolve(uri, pos);
  if (!result || result.kind !== "variable") return null;
  const oldName = result.canonicalName;

  const changes: Record<string, TextEdit[]> = {};
  const push = (target: string, range: Range) => {
    (changes[target] ??= []).push({ range, newText: newName });
  };

  // Only occurrences spelled as the variable itself; local aliases keep their names.
  for (const { uri: target, range, reference } of ctx.engine.referencesTo(oldName)) {
    if (reference.token === oldName && reference.token !== reference.via) {
      push(target, range);
    }
  }

  const variable = await ctx.values.lookup(oldName, { uri });
  if (variable?.location) push(variable.location.uri, variable.location.range);

  return Object.keys(changes).length > 0 ? { changes } : null;
}
