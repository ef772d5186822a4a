import type { ProviderId } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { retry, type RetryOptions } from "../utils/retry.js";
import { chunkText } from "../utils/text-chunker.js";
import type { ChannelAdapter } from "./adapter.js";
import { isRetriable } from "./errors.js";
import type { ChannelRegistry } from "./registry.js";

export interface DeliveryReceipt {
  readonly provider: ProviderId;
  readonly messageIds: string[];
}

/**
 * Sends replies through the provider a turn arrived on, falling back to the
 * configured active provider and then to any other registered one. Long
 * texts are split to each provider's limit; if a provider fails part-way, the
 * next one picks up the undelivered remainder.
 */
export class OutboundSender {
  constructor(
    private readonly registry: ChannelRegistry,
    private readonly active: ProviderId,
    private readonly logger: Logger,
    private readonly retryOpts: RetryOptions = { maxAttempts: 2, baseDelayMs: 350 },
  ) {}

  /** Providers in the order they are tried for a reply. */
  route(preferred?: ProviderId): ChannelAdapter[] {
    const order: ProviderId[] = [];
    for (const id of [preferred, this.active, ...this.registry.ids()]) {
      if (id && !order.includes(id)) order.push(id);
    }
    return order.flatMap((id) => {
      const adapter = this.registry.get(id);
      return adapter ? [adapter] : [];
    });
  }

  async sendText(to: string, text: string, preferred?: ProviderId): Promise<DeliveryReceipt[]> {
    const route = this.route(preferred);
    if (route.length === 0) {
      throw new Error("No outbound provider configured");
    }

    const receipts: DeliveryReceipt[] = [];
    let remaining = text;
    let lastError: unknown;

    for (const adapter of route) {
      const chunks = chunkText(remaining, adapter.maxTextLength);
      const messageIds: string[] = [];
      try {
        for (const chunk of chunks) {
          const { messageId } = await this.deliver(adapter, to, chunk);
          messageIds.push(messageId);
          remaining = remaining.slice(chunk.length);
        }
        receipts.push({ provider: adapter.id, messageIds });
        return receipts;
      } catch (err) {
        lastError = err;
        if (messageIds.length > 0) receipts.push({ provider: adapter.id, messageIds });
        this.logger.error(
          { err, provider: adapter.id, to, delivered: messageIds.length, total: chunks.length },
          "Provider failed to deliver reply",
        );
      }
    }

    throw lastError;
  }

  /** Typing presence on the provider that will carry the reply. Resolves false when it has none. */
  async sendTyping(to: string, preferred?: ProviderId): Promise<boolean> {
    const adapter = this.route(preferred)[0];
    if (!adapter?.sendTyping) return false;
    await adapter.sendTyping({ to });
    return true;
  }

  private deliver(adapter: ChannelAdapter, to: string, text: string): Promise<{ messageId: string }> {
    return retry(() => adapter.sendText({ to, text }), {
      ...this.retryOpts,
      shouldRetry: (err) => isRetriable(err),
      onRetry: (err, attempt, delayMs) => {
        this.logger.warn(
          { err, provider: adapter.id, attempt: attempt + 1, delayMs: Math.round(delayMs) },
          "Retrying send",
        );
      },
    });
  }
}
