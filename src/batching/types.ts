/** Stable per-participant identifier scoping one accumulation stream. */
export type ConversationKey = string;

/** Receives the combined text of a finished turn. Failures are the handler's own concern. */
export type TurnHandler = (text: string) => Promise<void>;

export type FlushReason = "idle" | "overflow" | "forced";

export interface TurnStatus {
  readonly key: ConversationKey;
  readonly pendingCount: number;
  readonly fragments: readonly string[];
  /** Epoch millis of the most recent fragment. */
  readonly lastUpdate: number;
  readonly secondsSinceLastFragment: number;
}

export interface TurnSchedulerOptions {
  readonly idleWindowMs: number;
  readonly maxBatch: number;
}

export interface TurnSchedulerEvents {
  flush: (key: ConversationKey, fragmentCount: number, reason: FlushReason) => void;
}
