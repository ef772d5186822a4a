import OpenAI from "openai";

export interface ToolCall {
  readonly id: string;
  readonly type: "function";
  readonly function: { readonly name: string; readonly arguments: string };
}

export interface ToolDefinition {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description: string;
    readonly parameters: Record<string, unknown>;
  };
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: ToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

export interface CompletionRequest {
  readonly messages: readonly ChatMessage[];
  /** Omitted or empty means the model is called without tools. */
  readonly tools?: readonly ToolDefinition[];
  readonly temperature: number;
}

export interface Completion {
  readonly finishReason: string | null;
  readonly content: string | null;
  readonly toolCalls: readonly ToolCall[];
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<Completion>;
}

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [...request.messages],
      temperature: request.temperature,
    };
    if (request.tools && request.tools.length > 0) {
      params.tools = [...request.tools];
      params.tool_choice = "auto";
    }

    const response = await this.client.chat.completions.create(params);
    const choice = response.choices[0];
    if (!choice) {
      throw new Error("Model returned no choices");
    }
    return {
      finishReason: choice.finish_reason,
      content: choice.message.content,
      toolCalls: (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        type: "function",
        function: { name: call.function.name, arguments: call.function.arguments },
      })),
    };
  }
}

/** Stands in when no API key is configured; every turn falls back to the configured fallback text. */
export class UnconfiguredCompletionClient implements CompletionClient {
  async complete(): Promise<Completion> {
    throw new Error("assistant.apiKey is not configured");
  }
}
