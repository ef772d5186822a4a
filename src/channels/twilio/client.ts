import twilio from "twilio";
import type { TwilioConfig } from "../../config/types.js";
import { PROVIDER_LIMITS } from "../../utils/text-chunker.js";
import type { ChannelAdapter, SendTextParams } from "../adapter.js";
import { ProviderError } from "../errors.js";

/** The slice of the Twilio REST client this adapter calls. */
export interface TwilioMessagesApi {
  create(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
}

export class TwilioAdapter implements ChannelAdapter {
  readonly id = "twilio" as const;
  readonly label = "Twilio WhatsApp";
  readonly maxTextLength = PROVIDER_LIMITS.twilio;

  private readonly messages: TwilioMessagesApi;

  constructor(
    private readonly config: TwilioConfig & { readonly whatsappNumber: string },
    messages?: TwilioMessagesApi,
  ) {
    this.messages = messages ?? twilio(config.accountSid, config.authToken).messages;
  }

  async sendText(params: SendTextParams): Promise<{ messageId: string }> {
    try {
      const message = await this.messages.create({
        body: params.text,
        from: this.config.whatsappNumber,
        to: toWhatsAppAddress(params.to),
      });
      return { messageId: message.sid };
    } catch (err) {
      const status = statusOf(err);
      throw new ProviderError(
        "twilio",
        `Twilio send failed${status ? ` (${status})` : ""}: ${err instanceof Error ? err.message : String(err)}`,
        status,
        { cause: err },
      );
    }
  }
}

export function toWhatsAppAddress(number: string): string {
  const bare = number.replace(/^whatsapp:/, "");
  return `whatsapp:${bare.startsWith("+") ? bare : `+${bare}`}`;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}
