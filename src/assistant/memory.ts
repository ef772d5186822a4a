import { Redis } from "ioredis";
import { z } from "zod";
import type { MemoryConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";

export interface HistoryEntry {
  readonly role: "user" | "assistant";
  readonly content: string;
}

export type MemoryHealth = "ok" | "degraded" | "memory";

/** The slice of an ioredis client the memory uses. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export interface ConversationMemory {
  load(chatId: string): Promise<HistoryEntry[]>;
  save(chatId: string, history: readonly HistoryEntry[]): Promise<void>;
  ping(): Promise<MemoryHealth>;
  close(): Promise<void>;
}

const historySchema = z.array(
  z.object({
    role: z.enum(["user", "assistant"]),
    content: z.string(),
  }),
);

export function memoryKey(chatId: string): string {
  return `mem:${chatId}`;
}

/**
 * Chat history in Redis with a bounded in-process fallback. Any Redis error
 * is logged and the call is served from the fallback map instead.
 */
export class ChatMemory implements ConversationMemory {
  private readonly fallback = new Map<string, HistoryEntry[]>();
  private readonly ttlSeconds: number;
  private readonly fallbackMaxChats: number;

  constructor(
    private readonly redis: RedisLike | null,
    private readonly logger: Logger,
    options?: Partial<Pick<MemoryConfig, "ttlSeconds" | "fallbackMaxChats">>,
  ) {
    this.ttlSeconds = options?.ttlSeconds ?? 14 * 24 * 3600;
    this.fallbackMaxChats = options?.fallbackMaxChats ?? 100;
  }

  async load(chatId: string): Promise<HistoryEntry[]> {
    const key = memoryKey(chatId);
    if (this.redis) {
      try {
        const data = await this.redis.get(key);
        if (data === null) return [];
        const parsed = historySchema.safeParse(JSON.parse(data));
        if (parsed.success) return parsed.data;
        this.logger.warn({ key }, "Discarding malformed stored history");
        return [];
      } catch (err) {
        this.logger.warn({ err, key }, "Redis read failed, using in-memory history");
      }
    }
    return [...(this.fallback.get(key) ?? [])];
  }

  async save(chatId: string, history: readonly HistoryEntry[]): Promise<void> {
    const key = memoryKey(chatId);
    if (this.redis) {
      try {
        await this.redis.setex(key, this.ttlSeconds, JSON.stringify(history));
        return;
      } catch (err) {
        this.logger.warn({ err, key }, "Redis write failed, keeping history in memory");
      }
    }

    this.fallback.set(key, [...history]);
    if (this.fallback.size > this.fallbackMaxChats) {
      const oldest = this.fallback.keys().next();
      if (!oldest.done) this.fallback.delete(oldest.value);
    }
    this.logger.debug({ key, chats: this.fallback.size }, "History kept in memory");
  }

  async ping(): Promise<MemoryHealth> {
    if (!this.redis) return "memory";
    try {
      await this.redis.ping();
      return "ok";
    } catch {
      return "degraded";
    }
  }

  /** Number of chats held by the in-process fallback. */
  get fallbackSize(): number {
    return this.fallback.size;
  }

  async close(): Promise<void> {
    if (!this.redis) return;
    try {
      await this.redis.quit();
    } catch (err) {
      this.logger.warn({ err }, "Error closing Redis connection");
    }
  }
}

export function createRedisClient(url: string, logger: Logger): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: false,
  });
  client.on("error", (err: Error) => {
    logger.warn({ err }, "Redis connection error");
  });
  return client;
}
