import type { Logger } from "../logging/logger.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { combineFragments } from "./combiner.js";
import type {
  ConversationKey,
  FlushReason,
  TurnHandler,
  TurnSchedulerEvents,
  TurnSchedulerOptions,
  TurnStatus,
} from "./types.js";

export const DEFAULT_IDLE_WINDOW_MS = 20_000;
export const DEFAULT_MAX_BATCH = 10;

interface PendingTurn {
  readonly fragments: string[];
  readonly handler: TurnHandler;
  lastUpdate: number;
  timer: ReturnType<typeof setTimeout> | null;
  /** Bumped whenever the timer is armed or cancelled; a fired timer with a stale value does nothing. */
  generation: number;
}

/**
 * Coalesces bursts of fragments per conversation into single turns.
 *
 * A turn flushes when its idle window elapses without a new fragment, when it
 * reaches `maxBatch` fragments, or on `forceFlush`. Flushing removes the key
 * before the handler runs, so the next fragment for the same key starts a new
 * turn even while the previous handler is still working.
 */
export class TurnScheduler {
  readonly events: TypedEventEmitter<TurnSchedulerEvents>;

  private readonly pending = new Map<ConversationKey, PendingTurn>();
  private readonly idleWindowMs: number;
  private readonly maxBatch: number;

  constructor(
    private readonly logger: Logger,
    options?: Partial<TurnSchedulerOptions>,
  ) {
    this.events = new TypedEventEmitter<TurnSchedulerEvents>((err, event) => {
      this.logger.warn({ err, event }, "Scheduler listener threw");
    });
    this.idleWindowMs = options?.idleWindowMs ?? DEFAULT_IDLE_WINDOW_MS;
    this.maxBatch = options?.maxBatch ?? DEFAULT_MAX_BATCH;
  }

  /**
   * Add a fragment to the key's turn.
   *
   * @returns `true` when the fragment was absorbed and the turn is still
   * accumulating, `false` when it pushed the turn over `maxBatch` and the turn
   * was flushed on the spot.
   */
  submit(key: ConversationKey, fragment: string, handler: TurnHandler): boolean {
    const now = Date.now();
    const existing = this.pending.get(key);

    if (!existing) {
      const turn: PendingTurn = {
        fragments: [fragment],
        handler,
        lastUpdate: now,
        timer: null,
        generation: 0,
      };
      this.pending.set(key, turn);
      this.arm(key, turn);
      this.logger.debug({ key }, "Turn started");
      return true;
    }

    existing.fragments.push(fragment);
    existing.lastUpdate = now;
    this.cancel(existing);

    if (existing.fragments.length >= this.maxBatch) {
      this.logger.info(
        { key, fragments: existing.fragments.length },
        "Turn reached batch limit, flushing",
      );
      this.flush(key, existing, "overflow");
      return false;
    }

    this.arm(key, existing);
    this.logger.debug({ key, fragments: existing.fragments.length }, "Fragment absorbed");
    return true;
  }

  /** Flush the key's turn now. Returns false, touching nothing, when no turn is pending. */
  forceFlush(key: ConversationKey): boolean {
    const turn = this.pending.get(key);
    if (!turn) return false;

    this.cancel(turn);
    this.flush(key, turn, "forced");
    return true;
  }

  status(key: ConversationKey): TurnStatus | null {
    const turn = this.pending.get(key);
    return turn ? snapshot(key, turn, Date.now()) : null;
  }

  isPending(key: ConversationKey): boolean {
    return this.pending.has(key);
  }

  list(): TurnStatus[] {
    const now = Date.now();
    return [...this.pending].map(([key, turn]) => snapshot(key, turn, now));
  }

  get size(): number {
    return this.pending.size;
  }

  /** Cancel every timer and drop all pending turns without running their handlers. */
  dispose(): number {
    const dropped = this.pending.size;
    for (const turn of this.pending.values()) {
      this.cancel(turn);
    }
    this.pending.clear();
    this.events.removeAllListeners();
    if (dropped > 0) {
      this.logger.warn({ dropped }, "Dropped pending turns on dispose");
    }
    return dropped;
  }

  private arm(key: ConversationKey, turn: PendingTurn): void {
    const generation = ++turn.generation;
    turn.timer = setTimeout(() => {
      if (this.pending.get(key) !== turn || turn.generation !== generation) return;
      turn.timer = null;
      this.flush(key, turn, "idle");
    }, this.idleWindowMs);
  }

  private cancel(turn: PendingTurn): void {
    turn.generation++;
    if (turn.timer) {
      clearTimeout(turn.timer);
      turn.timer = null;
    }
  }

  private flush(key: ConversationKey, turn: PendingTurn, reason: FlushReason): void {
    if (this.pending.get(key) !== turn) return;
    this.pending.delete(key);

    const text = combineFragments(turn.fragments);
    this.logger.info(
      { key, fragments: turn.fragments.length, reason },
      "Turn flushed",
    );
    this.events.emit("flush", key, turn.fragments.length, reason);
    this.dispatch(key, turn.handler, text);
  }

  /** Starts the handler on a later microtask, so submit and forceFlush return before any of it runs. */
  private dispatch(key: ConversationKey, handler: TurnHandler, text: string): void {
    Promise.resolve()
      .then(() => handler(text))
      .catch((err: unknown) => {
        this.logger.error({ err, key }, "Turn handler failed");
      });
  }
}

function snapshot(key: ConversationKey, turn: PendingTurn, now: number): TurnStatus {
  return {
    key,
    pendingCount: turn.fragments.length,
    fragments: [...turn.fragments],
    lastUpdate: turn.lastUpdate,
    secondsSinceLastFragment: Math.max(0, (now - turn.lastUpdate) / 1000),
  };
}
