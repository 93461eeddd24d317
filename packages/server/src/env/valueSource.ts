import type { ResolvedVariable } from "../types";

export interface LookupContext {
  /** Document the lookup is made for. */
  uri?: string;
}

export interface RefreshOptions {
  roots?: readonly string[];
  envFiles?: readonly string[];
}

/**
 * Source of variable values. The analysis engine never calls it; request
 * handlers do.
 */
export interface ValueResolver {
  lookup(name: string, context?: LookupContext): Promise<ResolvedVariable | undefined>;
  lookupAll(context?: LookupContext): Promise<ResolvedVariable[]>;
  refresh(options?: RefreshOptions): Promise<void>;
}

/** Fixed in-memory values. */
export class StaticValueSource implements ValueResolver {
  private values: Map<string, string>;

  constructor(
    values: Record<string, string> = {},
    private readonly source = "static",
  ) {
    this.values = new Map(Object.entries(values));
  }

  set(name: string, value: string): void {
    this.values.set(name, value);
  }

  delete(name: string): void {
    this.values.delete(name);
  }

  async lookup(name: string): Promise<ResolvedVariable | undefined> {
    const value = this.values.get(name);
    return value === undefined ? undefined : { name, value, source: this.source };
  }

  async lookupAll(): Promise<ResolvedVariable[]> {
    return [...this.values.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([name, value]) => ({ name, value, source: this.source }));
  }

  async refresh(): Promise<void> {
    return undefined;
  }
}
