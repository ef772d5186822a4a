import type { ProviderId } from "../config/types.js";

export class ProviderError extends Error {
  override readonly name = "ProviderError";

  constructor(
    readonly provider: ProviderId,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /** Rate limits, server errors and transport failures (no status) are worth another attempt. */
  get retriable(): boolean {
    if (this.status === undefined) return true;
    return this.status === 429 || this.status >= 500;
  }
}

export function isRetriable(err: unknown): boolean {
  return err instanceof ProviderError ? err.retriable : true;
}
