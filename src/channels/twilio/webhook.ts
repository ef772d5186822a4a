import twilio from "twilio";
import { z } from "zod";
import type { InboundMessage } from "../adapter.js";

export const twilioFormSchema = z.object({
  Body: z.string(),
  From: z.string().min(1),
  To: z.string().min(1),
  MessageSid: z.string().min(1),
  ProfileName: z.string().optional(),
});

export type TwilioForm = z.infer<typeof twilioFormSchema>;

/** `whatsapp:+56912345678` → `56912345678`. */
export function chatIdFromAddress(from: string): string {
  return from.replace("whatsapp:", "").replace("+", "");
}

export function normalizeTwilioForm(form: TwilioForm): InboundMessage {
  const chatId = chatIdFromAddress(form.From);
  return {
    id: form.MessageSid,
    channelId: "twilio",
    senderId: chatId,
    senderName: form.ProfileName ?? chatId,
    chatId,
    text: form.Body,
    timestamp: Date.now(),
    raw: form,
  };
}

export function validateTwilioSignature(
  authToken: string,
  signature: string,
  url: string,
  params: Record<string, string>,
): boolean {
  return twilio.validateRequest(authToken, signature, url, params);
}

/** Replies leave through the REST API once the turn flushes, so the webhook answer stays empty. */
export function emptyTwiml(): string {
  return new twilio.twiml.MessagingResponse().toString();
}
