import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Completion } from "../../src/assistant/openai-client.js";
import { createGateway, type GatewayContext } from "../../src/gateway/lifecycle.js";
import { FakeCompletionClient, textCompletion } from "../helpers/fakes.js";
import { DIRECTORY_ROWS, FakeSheetSource, makeConfig, silentLogger } from "../helpers/fixtures.js";

interface EvolutionRequest {
  url: string;
  body: unknown;
}

function upsert(id: string, text: string) {
  return {
    event: "messages.upsert",
    data: {
      key: { id, remoteJid: "56911112222@s.whatsapp.net", fromMe: false },
      pushName: "María",
      message: { conversation: text },
      messageTimestamp: 1_700_000_000,
    },
  };
}

const TOOL_CALL: Completion = {
  finishReason: "tool_calls",
  content: null,
  toolCalls: [
    {
      id: "call_1",
      type: "function",
      function: {
        name: "find_professionals",
        arguments: JSON.stringify({ specialty: "kinesiología", city: "Providencia" }),
      },
    },
  ],
};

describe("relay flow", () => {
  let requests: EvolutionRequest[];
  let client: FakeCompletionClient;
  let gateway: GatewayContext;

  beforeEach(async () => {
    vi.useFakeTimers();
    requests = [];
    vi.stubGlobal("fetch", async (url: string, init: RequestInit) => {
      requests.push({ url, body: JSON.parse(String(init.body)) });
      return new Response(JSON.stringify({ key: { id: `out-${requests.length}` } }), { status: 201 });
    });

    client = new FakeCompletionClient([
      TOOL_CALL,
      textCompletion("Te recomiendo a Ana Rojas, kinesióloga en Providencia."),
    ]);
    const config = makeConfig({
      batching: { idleWindowSeconds: 5, maxBatch: 10 },
      evolution: {
        baseUrl: "http://evolution.test",
        apiKey: "test-secret",
        instanceId: "relay",
        sendDelayMs: 0,
      },
      directory: { sheetId: "sheet-1" },
    });
    gateway = await createGateway(config, silentLogger(), {
      completionClient: client,
      sheetSource: new FakeSheetSource({ directory: DIRECTORY_ROWS }),
    });
  });

  afterEach(async () => {
    gateway.scheduler.dispose();
    await gateway.memory.close();
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  async function post(id: string, text: string): Promise<unknown> {
    const res = await gateway.server.app.request("/webhook", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(upsert(id, text)),
    });
    return res.json();
  }

  it("coalesces a burst into one assistant turn and one reply", async () => {
    expect(await post("m1", "hola")).toEqual({ status: "queued" });
    vi.advanceTimersByTime(2_000);
    expect(await post("m2", "necesito kinesiólogo")).toEqual({ status: "queued" });
    vi.advanceTimersByTime(2_000);
    expect(await post("m3", "en Providencia")).toEqual({ status: "queued" });

    expect(gateway.scheduler.status("56911112222")?.pendingCount).toBe(3);
    expect(client.requests).toHaveLength(0);

    vi.advanceTimersByTime(5_000);

    await vi.waitFor(() => {
      expect(requests.some((r) => r.url.includes("/message/sendText/"))).toBe(true);
    });

    expect(gateway.scheduler.size).toBe(0);
    expect(client.requests).toHaveLength(2);
    expect(client.requests[0]?.messages.at(-1)).toEqual({
      role: "user",
      content: "hola necesito kinesiólogo en Providencia",
    });

    const toolMessage = client.requests[1]?.messages.at(-1);
    expect(toolMessage?.role).toBe("tool");
    expect(toolMessage?.content).toContain("Ana Rojas");

    expect(requests.map((r) => r.url)).toEqual([
      "http://evolution.test/chat/sendPresence/relay",
      "http://evolution.test/message/sendText/relay",
    ]);
    expect(requests[1]?.body).toEqual({
      number: "56911112222",
      text: "Te recomiendo a Ana Rojas, kinesióloga en Providencia.",
      options: { delay: 0, presence: "composing" },
    });
  });

  it("remembers the exchange for the next turn", async () => {
    await post("m1", "necesito kinesiólogo en Providencia");
    vi.advanceTimersByTime(5_000);

    await vi.waitFor(async () => {
      expect(await gateway.memory.load("56911112222")).toHaveLength(2);
    });
    expect(await gateway.memory.load("56911112222")).toEqual([
      { role: "user", content: "necesito kinesiólogo en Providencia" },
      { role: "assistant", content: "Te recomiendo a Ana Rojas, kinesióloga en Providencia." },
    ]);
  });

  it("sends the fallback text when the assistant has nothing left to say", async () => {
    const exhausted = new FakeCompletionClient([]);
    const context = await createGateway(
      makeConfig({
        batching: { idleWindowSeconds: 5 },
        evolution: { baseUrl: "http://evolution.test", apiKey: "test-secret", instanceId: "relay" },
        provider: { fallbackText: "Intenta más tarde." },
      }),
      silentLogger(),
      { completionClient: exhausted },
    );

    await context.server.app.request("/webhook", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(upsert("m1", "hola")),
    });
    context.scheduler.forceFlush("56911112222");

    await vi.waitFor(() => {
      expect(requests.at(-1)?.body).toMatchObject({ text: "Intenta más tarde." });
    });
    context.scheduler.dispose();
  });
});
