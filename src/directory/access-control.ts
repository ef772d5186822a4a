import type { Logger } from "../logging/logger.js";
import type { SheetSource } from "./types.js";

export const DEFAULT_ACCESS_CACHE_MS = 300_000;

/** Strips spaces, dashes and a leading plus so sheet entries and chat ids compare equal. */
export function normalizeNumber(value: string): string {
  return value.trim().replace(/[\s\-+]/g, "");
}

/**
 * Allowlist of participant numbers kept in the first column of a sheet tab.
 * The list is cached; when a refresh fails the previous list stays in use.
 */
export class AccessControl {
  private allowed = new Set<string>();
  private fetchedAt = 0;
  private refreshing: Promise<ReadonlySet<string>> | null = null;

  constructor(
    private readonly source: SheetSource,
    private readonly tab: string,
    private readonly logger: Logger,
    private readonly cacheTtlMs = DEFAULT_ACCESS_CACHE_MS,
  ) {}

  async isAllowed(number: string): Promise<boolean> {
    const allowed = await this.allowedNumbers();
    const normalized = normalizeNumber(number);
    const ok = allowed.has(normalized);
    if (!ok) {
      this.logger.warn({ number: normalized }, "Access denied");
    }
    return ok;
  }

  async allowedNumbers(): Promise<ReadonlySet<string>> {
    if (this.allowed.size > 0 && Date.now() - this.fetchedAt < this.cacheTtlMs) {
      return this.allowed;
    }
    // Concurrent callers share one sheet read.
    this.refreshing ??= this.refresh().finally(() => {
      this.refreshing = null;
    });
    return this.refreshing;
  }

  private async refresh(): Promise<ReadonlySet<string>> {
    const startedAt = Date.now();
    try {
      const column = await this.source.readFirstColumn(this.tab);
      this.allowed = new Set(column.map(normalizeNumber).filter((n) => n.length > 0));
      this.fetchedAt = startedAt;
      this.logger.info({ count: this.allowed.size, tab: this.tab }, "Allowed users refreshed");
    } catch (err) {
      this.logger.error({ err, tab: this.tab }, "Failed to refresh allowed users, keeping cached list");
    }
    return this.allowed;
  }
}
