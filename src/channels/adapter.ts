import type { ProviderId } from "../config/types.js";

export interface InboundMessage {
  readonly id: string;
  readonly channelId: ProviderId;
  /** Bare participant number, also used as the conversation key. */
  readonly senderId: string;
  readonly senderName: string;
  /** Address replies go to, in the bare form every provider accepts. */
  readonly chatId: string;
  readonly text?: string;
  readonly timestamp: number;
  readonly raw: unknown;
}

export interface SendTextParams {
  readonly to: string;
  readonly text: string;
}

export interface ChannelAdapter {
  readonly id: ProviderId;
  readonly label: string;
  readonly maxTextLength: number;

  sendText(params: SendTextParams): Promise<{ messageId: string }>;
  /** Best-effort "composing" presence. Providers without one leave it out. */
  sendTyping?(params: { to: string }): Promise<void>;
}
