import { z } from "zod";
import type { EvolutionConfig } from "../../config/types.js";
import { PROVIDER_LIMITS } from "../../utils/text-chunker.js";
import type { ChannelAdapter, SendTextParams } from "../adapter.js";
import { ProviderError } from "../errors.js";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

const sendTextResponseSchema = z.object({
  key: z.object({ id: z.string().optional() }).optional(),
});

export class EvolutionAdapter implements ChannelAdapter {
  readonly id = "evolution" as const;
  readonly label = "Evolution API";
  readonly maxTextLength = PROVIDER_LIMITS.evolution;

  constructor(
    private readonly config: EvolutionConfig,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async sendText(params: SendTextParams): Promise<{ messageId: string }> {
    const data = await this.post(
      `/message/sendText/${encodeURIComponent(this.config.instanceId)}`,
      {
        number: params.to,
        text: params.text,
        options: { delay: this.config.sendDelayMs, presence: "composing" },
      },
    );
    const parsed = sendTextResponseSchema.safeParse(data);
    return { messageId: parsed.success ? (parsed.data.key?.id ?? "") : "" };
  }

  async sendTyping(params: { to: string }): Promise<void> {
    await this.post(`/chat/sendPresence/${encodeURIComponent(this.config.instanceId)}`, {
      number: params.to,
      presence: "composing",
      delay: this.config.sendDelayMs,
    });
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.config.baseUrl}${path}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          apikey: this.config.apiKey,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      throw new ProviderError("evolution", `Evolution request to ${path} failed`, undefined, {
        cause: err,
      });
    }

    const text = await res.text();
    if (!res.ok) {
      throw new ProviderError(
        "evolution",
        `Evolution ${path} answered ${res.status}: ${text.slice(0, 200)}`,
        res.status,
      );
    }
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch {
      return null;
    }
  }
}
