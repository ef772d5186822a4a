import { timingSafeEqual } from "node:crypto";
import { serve } from "@hono/node-server";
import { Hono } from "hono";
import type { TurnScheduler } from "../batching/scheduler.js";
import type { FlushReason } from "../batching/types.js";
import type { InboundMessage } from "../channels/adapter.js";
import { normalizeEvolutionEvent } from "../channels/evolution/normalize.js";
import type { ChannelRegistry } from "../channels/registry.js";
import {
  emptyTwiml,
  normalizeTwilioForm,
  twilioFormSchema,
  validateTwilioSignature,
} from "../channels/twilio/webhook.js";
import type { ProviderId, RelayConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { MemoryHealth } from "../assistant/memory.js";
import type { InboundOutcome } from "../relay/inbound-router.js";

export const SERVICE_NAME = "turnrelay";
export const VERSION = "0.1.0";

type CheckStatus = "ok" | "error" | MemoryHealth;

export type WebhookStatus = "ignored" | "no_text" | "denied" | "queued" | "processing" | "error";

const OUTCOME_STATUS: Record<InboundOutcome, WebhookStatus> = {
  ignored: "ignored",
  denied: "denied",
  absorbed: "queued",
  processed: "processing",
};

export interface GatewayServerDeps {
  readonly config: RelayConfig;
  readonly router: { handleInbound(msg: InboundMessage): Promise<InboundOutcome> };
  readonly scheduler: TurnScheduler;
  readonly registry: ChannelRegistry;
  readonly memory: { ping(): Promise<MemoryHealth> };
  readonly logger: Logger;
}

function tokensMatch(expected: string, given: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(given);
  return a.length === b.length && timingSafeEqual(a, b);
}

export class GatewayServer {
  readonly app = new Hono();
  private server: ReturnType<typeof serve> | null = null;
  private readonly flushed: Record<FlushReason, number> = { idle: 0, overflow: 0, forced: 0 };
  private fragmentsFlushed = 0;

  constructor(private readonly deps: GatewayServerDeps) {
    deps.scheduler.events.on("flush", (_key, fragmentCount, reason) => {
      this.flushed[reason]++;
      this.fragmentsFlushed += fragmentCount;
    });
    this.setupRoutes();
  }

  private setupRoutes(): void {
    const { config, registry, scheduler, logger } = this.deps;

    this.app.get("/ping", (c) => c.json({ message: "pong", timestamp: new Date().toISOString() }));

    this.app.get("/status", (c) =>
      c.json({ service: SERVICE_NAME, status: "online", port: config.gateway.port }),
    );

    this.app.get("/", (c) => {
      const provider = (id: ProviderId) => ({
        configured: registry.has(id),
        active: config.provider.active === id,
      });
      return c.json({
        service: SERVICE_NAME,
        version: VERSION,
        status: "active",
        environment: config.gateway.environment,
        port: config.gateway.port,
        providers: {
          evolution: provider("evolution"),
          twilio: provider("twilio"),
        },
      });
    });

    this.app.get("/health", async (c) => {
      const checks: Record<string, CheckStatus> = {
        memory: await this.deps.memory.ping(),
        assistant: config.assistant.apiKey ? "ok" : "error",
        directory: config.directory.sheetId ? "ok" : "error",
        whatsapp: registry.size > 0 ? "ok" : "error",
      };
      const degraded = Object.values(checks).some((status) => status === "error");
      return c.json({
        status: degraded ? "degraded" : "healthy",
        timestamp: new Date().toISOString(),
        checks,
      });
    });

    this.app.post("/webhook", async (c) => {
      try {
        const event = normalizeEvolutionEvent(await c.req.json());
        if (event.kind === "ignored") {
          logger.debug({ reason: event.reason }, "Evolution event ignored");
          return c.json({ status: "ignored" satisfies WebhookStatus });
        }
        if (event.kind === "no_text") {
          logger.debug({ chat: event.chatId }, "Evolution message without text");
          return c.json({ status: "no_text" satisfies WebhookStatus });
        }
        const outcome = await this.deps.router.handleInbound(event.message);
        return c.json({ status: OUTCOME_STATUS[outcome] });
      } catch (err) {
        logger.error({ err }, "Evolution webhook failed");
        return c.json({
          status: "error" satisfies WebhookStatus,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    });

    this.app.post("/webhook/twilio", async (c) => {
      const form: Record<string, string> = {};
      try {
        for (const [name, value] of Object.entries(await c.req.parseBody())) {
          if (typeof value === "string") form[name] = value;
        }
      } catch (err) {
        logger.warn({ err }, "Unreadable Twilio webhook body");
        return c.text("Bad Request", 400);
      }

      const twilioConfig = config.twilio;
      if (twilioConfig?.validateSignature) {
        const signature = c.req.header("X-Twilio-Signature") ?? "";
        const url = twilioConfig.webhookUrl ?? c.req.url;
        if (!signature || !validateTwilioSignature(twilioConfig.authToken, signature, url, form)) {
          logger.warn({ url }, "Rejected Twilio webhook with invalid signature");
          return c.text("Unauthorized", 401);
        }
      }

      const parsed = twilioFormSchema.safeParse(form);
      if (!parsed.success) {
        return c.text("Bad Request", 400);
      }

      try {
        const outcome = await this.deps.router.handleInbound(normalizeTwilioForm(parsed.data));
        logger.debug({ outcome, sid: parsed.data.MessageSid }, "Twilio message handled");
      } catch (err) {
        logger.error({ err }, "Twilio webhook failed");
        return c.text("Error", 500);
      }
      return c.body(emptyTwiml(), 200, { "Content-Type": "application/xml" });
    });

    this.app.use("/admin/*", async (c, next) => {
      const token = config.gateway.adminToken;
      if (!token) {
        return c.json({ error: "Admin API disabled" }, 503);
      }
      const header = c.req.header("Authorization") ?? "";
      const given = header.startsWith("Bearer ") ? header.slice("Bearer ".length) : "";
      if (!tokensMatch(token, given)) {
        return c.json({ error: "Unauthorized" }, 401);
      }
      await next();
    });

    this.app.get("/admin/turns", (c) =>
      c.json({
        turns: scheduler.list().map((turn) => ({
          key: turn.key,
          pendingCount: turn.pendingCount,
          secondsSinceLastFragment: turn.secondsSinceLastFragment,
        })),
      }),
    );

    this.app.get("/admin/stats", (c) =>
      c.json({
        pendingTurns: scheduler.size,
        flushedTurns: { ...this.flushed },
        flushedFragments: this.fragmentsFlushed,
      }),
    );

    this.app.get("/admin/turns/:key", (c) => {
      const status = scheduler.status(c.req.param("key"));
      if (!status) {
        return c.json({ error: "No pending turn" }, 404);
      }
      return c.json(status);
    });

    this.app.post("/admin/turns/:key/flush", (c) => {
      const key = c.req.param("key");
      const flushed = scheduler.forceFlush(key);
      logger.info({ key, flushed }, "Admin flush requested");
      return c.json({ flushed });
    });
  }

  async start(): Promise<void> {
    const { port, hostname } = this.deps.config.gateway;
    this.server = serve({ fetch: this.app.fetch, port, hostname });
    this.deps.logger.info({ port, hostname }, "Gateway listening");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
      this.deps.logger.info("Gateway stopped");
    }
  }
}
