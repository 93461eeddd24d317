import type { HandlerContext } from "./context";
import { maskValue } from "../env/masking";

export const LIST_VARIABLES_COMMAND = "envlens.listVariables";
export const GET_VARIABLE_COMMAND = "envlens.getVariable";
export const GENERATE_ENV_EXAMPLE_COMMAND = "envlens.generateEnvExample";

export const COMMANDS = [
  LIST_VARIABLES_COMMAND,
  GET_VARIABLE_COMMAND,
  GENERATE_ENV_EXAMPLE_COMMAND,
];

export interface ListedVariable {
  name: string;
  value: string;
  source: string;
}

export type CommandResult =
  | { variables: ListedVariable[]; count: number }
  | ListedVariable
  | { content: string; count: number }
  | { error: string };

/** `.env.example` text: every defined or referenced name, sorted, unset. */
export function envExampleContent(names: Iterable<string>): string {
  const sorted = [...new Set(names)].sort();
  if (sorted.length === 0) return "# No environment variables found in workspace\n";
  return `${sorted.map((name) => `${name}=`).join("\n")}\n`;
}

export async function executeCommand(
  ctx: HandlerContext,
  command: string,
  args: readonly unknown[],
): Promise<CommandResult | null> {
  switch (command) {
    case LIST_VARIABLES_COMMAND: {
      const variables = (await ctx.values.lookupAll()).map((variable) => ({
        name: variable.name,
        value: maskValue(variable, ctx.config.masking),
        source: variable.source,
      }));
      return { variables, count: variables.length };
    }
    case GET_VARIABLE_COMMAND: {
      const name = args[0];
      if (typeof name !== "string" || name === "") {
        return { error: "Variable name required" };
      }
      const variable = await ctx.values.lookup(name);
      if (!variable) return { error: `Variable '${name}' not found` };
      return {
        name,
        value: maskValue(variable, ctx.config.masking),
        source: variable.source,
      };
    }
    case GENERATE_ENV_EXAMPLE_COMMAND: {
      const names = new Set(ctx.engine.envVarNames());
      for (const variable of await ctx.values.lookupAll()) names.add(variable.name);
      return { content: envExampleContent(names), count: names.size };
    }
    default:
      ctx.logger.warn(`Unknown command ${command}`);
      return null;
  }
}
