import type { TurnScheduler } from "../batching/scheduler.js";
import type { InboundMessage } from "../channels/adapter.js";
import type { OutboundSender } from "../channels/outbound.js";
import type { ProviderId } from "../config/types.js";
import type { Logger } from "../logging/logger.js";

/**
 * - `ignored`: no usable text
 * - `denied`: sender not on the allowlist
 * - `absorbed`: fragment queued in a pending turn
 * - `processed`: fragment completed a full batch and the turn was handed off
 */
export type InboundOutcome = "ignored" | "denied" | "absorbed" | "processed";

export interface ReplyGenerator {
  reply(text: string, chatId: string): Promise<string>;
}

export interface AccessPolicy {
  isAllowed(number: string): Promise<boolean>;
}

export interface InboundRouterOptions {
  /** Sent when the assistant cannot produce a reply. */
  readonly fallbackText: string;
  /** Sent to senders rejected by the allowlist; nothing is sent when unset. */
  readonly deniedText?: string;
}

export class InboundRouter {
  /** Tail of each sender's admission chain; a sender's fragments reach the scheduler in arrival order. */
  private readonly admissions = new Map<string, Promise<void>>();

  constructor(
    private readonly scheduler: TurnScheduler,
    private readonly assistant: ReplyGenerator,
    private readonly outbound: OutboundSender,
    private readonly logger: Logger,
    private readonly options: InboundRouterOptions,
    private readonly access: AccessPolicy | null = null,
  ) {}

  async handleInbound(msg: InboundMessage): Promise<InboundOutcome> {
    const text = msg.text?.trim() ?? "";
    const log = this.logger.child({
      channel: msg.channelId,
      sender: msg.senderId,
      chat: msg.chatId,
    });

    if (!text) {
      log.debug("Inbound message without text ignored");
      return "ignored";
    }

    return this.inSenderOrder(msg.senderId, () => this.admit(msg, text, log));
  }

  private async admit(msg: InboundMessage, text: string, log: Logger): Promise<InboundOutcome> {
    if (this.access && !(await this.access.isAllowed(msg.senderId))) {
      log.info("Message rejected by allowlist");
      if (this.options.deniedText) {
        await this.send(msg.chatId, this.options.deniedText, msg.channelId, log);
      }
      return "denied";
    }

    const key = msg.senderId;
    const isFirst = !this.scheduler.isPending(key);
    const absorbed = this.scheduler.submit(key, text, (combined) =>
      this.processTurn(msg.chatId, msg.channelId, combined),
    );

    if (isFirst) {
      this.signalTyping(msg.chatId, msg.channelId, log);
    }

    return absorbed ? "absorbed" : "processed";
  }

  /** Runs `step` once every earlier step for the same sender has settled. */
  private inSenderOrder<T>(sender: string, step: () => Promise<T>): Promise<T> {
    const previous = this.admissions.get(sender) ?? Promise.resolve();
    const run = previous.then(step);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.admissions.set(sender, tail);
    return run.finally(() => {
      if (this.admissions.get(sender) === tail) this.admissions.delete(sender);
    });
  }

  private signalTyping(chatId: string, provider: ProviderId, log: Logger): void {
    this.outbound.sendTyping(chatId, provider).catch((err: unknown) => {
      log.warn({ err }, "Typing indicator failed");
    });
  }

  private async processTurn(chatId: string, provider: ProviderId, text: string): Promise<void> {
    const log = this.logger.child({ channel: provider, chat: chatId });
    let reply: string;
    try {
      reply = await this.assistant.reply(text, chatId);
    } catch (err) {
      log.error({ err }, "Assistant failed, sending fallback reply");
      reply = this.options.fallbackText;
    }
    await this.send(chatId, reply, provider, log);
  }

  private async send(chatId: string, text: string, provider: ProviderId, log: Logger): Promise<void> {
    try {
      const receipts = await this.outbound.sendText(chatId, text, provider);
      log.info({ providers: receipts.map((r) => r.provider) }, "Reply delivered");
    } catch (err) {
      log.error({ err }, "Failed to deliver reply");
    }
  }
}
