import { readFile } from "node:fs/promises";
import { packagePath } from "../config/paths.js";
import type { Logger } from "../logging/logger.js";
import type { ConversationMemory, HistoryEntry } from "./memory.js";
import type { ChatMessage, CompletionClient } from "./openai-client.js";
import { DIRECTORY_TOOLS, type ToolExecutor } from "./tools.js";

export interface AssistantOptions {
  readonly systemPrompt: string;
  readonly temperature: number;
  /** Prior history entries kept before the new exchange is appended. */
  readonly historyKeep: number;
  /** Hard cap on stored history entries. */
  readonly historyMax: number;
}

export async function loadSystemPrompt(path?: string): Promise<string> {
  const text = await readFile(path ?? packagePath("prompts/system-prompt.txt"), "utf-8");
  return text.trim();
}

/** Trim history and append one user/assistant exchange. */
export function nextHistory(
  history: readonly HistoryEntry[],
  userText: string,
  replyText: string,
  keep: number,
  max: number,
): HistoryEntry[] {
  const kept = keep > 0 ? history.slice(-keep) : [];
  const next: HistoryEntry[] = [
    ...kept,
    { role: "user", content: userText },
    { role: "assistant", content: replyText },
  ];
  return next.slice(-max);
}

/**
 * Answers one turn: history plus the user text go to the model with the
 * directory tools; a tool-call round is resolved and the model is asked again
 * without tools.
 */
export class Assistant {
  constructor(
    private readonly client: CompletionClient,
    private readonly tools: ToolExecutor,
    private readonly memory: ConversationMemory,
    private readonly options: AssistantOptions,
    private readonly logger: Logger,
  ) {}

  async reply(text: string, chatId: string): Promise<string> {
    const log = this.logger.child({ chat: chatId });
    const history = await this.memory.load(chatId);
    log.debug({ historyEntries: history.length }, "Loaded history");

    const messages: ChatMessage[] = [
      { role: "system", content: this.options.systemPrompt },
      ...history,
      { role: "user", content: text },
    ];

    let completion = await this.client.complete({
      messages,
      tools: DIRECTORY_TOOLS,
      temperature: this.options.temperature,
    });
    log.debug({ finishReason: completion.finishReason }, "Model answered");

    if (completion.finishReason === "tool_calls" && completion.toolCalls.length > 0) {
      messages.push({
        role: "assistant",
        content: null,
        tool_calls: [...completion.toolCalls],
      });
      for (const call of completion.toolCalls) {
        log.info({ tool: call.function.name }, "Running tool");
        messages.push({
          role: "tool",
          tool_call_id: call.id,
          content: await this.tools.execute(call),
        });
      }
      completion = await this.client.complete({
        messages,
        temperature: this.options.temperature,
      });
    }

    const reply = completion.content?.trim();
    if (!reply) {
      throw new Error("Model returned an empty reply");
    }

    const saved = nextHistory(
      history,
      text,
      reply,
      this.options.historyKeep,
      this.options.historyMax,
    );
    await this.memory.save(chatId, saved);
    log.info({ replyLength: reply.length, historyEntries: saved.length }, "Reply ready");
    return reply;
  }
}
