import { LOOKUP_TIMEOUT_MS, REFRESH_TIMEOUT_MS } from "../constants";
import { withTimeout } from "../concurrency/timeout";
import { describeError, type Logger } from "../logger";
import type { ResolvedVariable } from "../types";
import type { LookupContext, RefreshOptions, ValueResolver } from "./valueSource";

export interface GuardOptions {
  lookupTimeoutMs?: number;
  refreshTimeoutMs?: number;
}

/**
 * Bounds every call into a value resolver. A lookup that fails or runs
 * out of time counts as "no value" and is logged.
 */
export class GuardedValueResolver implements ValueResolver {
  private readonly lookupTimeoutMs: number;
  private readonly refreshTimeoutMs: number;

  constructor(
    private readonly inner: ValueResolver,
    private readonly logger: Logger,
    options: GuardOptions = {},
  ) {
    this.lookupTimeoutMs = options.lookupTimeoutMs ?? LOOKUP_TIMEOUT_MS;
    this.refreshTimeoutMs = options.refreshTimeoutMs ?? REFRESH_TIMEOUT_MS;
  }

  async lookup(name: string, context?: LookupContext): Promise<ResolvedVariable | undefined> {
    try {
      return await withTimeout(
        this.inner.lookup(name, context),
        this.lookupTimeoutMs,
        `Lookup of ${name}`,
      );
    } catch (err) {
      this.logger.warn(describeError(err));
      return undefined;
    }
  }

  async lookupAll(context?: LookupContext): Promise<ResolvedVariable[]> {
    try {
      return await withTimeout(
        this.inner.lookupAll(context),
        this.lookupTimeoutMs,
        "Variable listing",
      );
    } catch (err) {
      this.logger.warn(describeError(err));
      return [];
    }
  }

  async refresh(options?: RefreshOptions): Promise<void> {
    try {
      await withTimeout(this.inner.refresh(options), this.refreshTimeoutMs, "Value refresh");
    } catch (err) {
      this.logger.error(describeError(err));
    }
  }
}
