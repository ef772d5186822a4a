import { z } from "zod";
import type { InboundMessage } from "../adapter.js";

const MESSAGES_UPSERT = "MESSAGES_UPSERT";

const eventSchema = z.object({
  event: z.string().default(""),
  data: z
    .object({
      key: z
        .object({
          id: z.string().nullish(),
          remoteJid: z.string().nullish(),
          fromMe: z.boolean().nullish(),
        })
        .default({}),
      pushName: z.string().nullish(),
      message: z
        .object({
          conversation: z.string().nullish(),
          extendedTextMessage: z.object({ text: z.string().nullish() }).nullish(),
        })
        .nullish(),
      messageTimestamp: z.union([z.number(), z.string()]).nullish(),
    })
    .default({}),
});

export type EvolutionEvent =
  | { readonly kind: "ignored"; readonly reason: string }
  | { readonly kind: "no_text"; readonly chatId: string }
  | { readonly kind: "message"; readonly message: InboundMessage };

/** `messages.upsert`, `MESSAGES_UPSERT` and friends all compare equal. */
export function normalizeEventName(event: string): string {
  return event.toUpperCase().replace(/\./g, "_");
}

/** Participant number from a JID such as `56912345678@s.whatsapp.net`. */
export function chatIdFromJid(remoteJid: string): string {
  return remoteJid.split("@")[0] ?? "";
}

export function normalizeEvolutionEvent(raw: unknown): EvolutionEvent {
  const parsed = eventSchema.safeParse(raw);
  if (!parsed.success) return { kind: "ignored", reason: "malformed payload" };

  const { event, data } = parsed.data;
  if (normalizeEventName(event) !== MESSAGES_UPSERT) {
    return { kind: "ignored", reason: `event ${event || "(none)"}` };
  }

  const remoteJid = data.key.remoteJid ?? "";
  if (data.key.fromMe) return { kind: "ignored", reason: "own message" };
  if (remoteJid.endsWith("@g.us")) return { kind: "ignored", reason: "group chat" };

  const chatId = chatIdFromJid(remoteJid);
  if (!chatId) return { kind: "ignored", reason: "missing remoteJid" };

  const text = data.message?.conversation ?? data.message?.extendedTextMessage?.text ?? undefined;
  if (!text) return { kind: "no_text", chatId };

  return {
    kind: "message",
    message: {
      id: data.key.id ?? "",
      channelId: "evolution",
      senderId: chatId,
      senderName: data.pushName ?? chatId,
      chatId,
      text,
      timestamp: Number(data.messageTimestamp ?? 0) * 1000,
      raw,
    },
  };
}
