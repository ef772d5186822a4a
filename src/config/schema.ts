import { z } from "zod";
import type { RelayConfig } from "./types.js";

const providerIdSchema = z.enum(["evolution", "twilio"]);

const gatewaySchema = z.object({
  port: z.number().int().positive().default(8000),
  hostname: z.string().default("0.0.0.0"),
  adminToken: z.string().min(8).optional(),
  environment: z.string().default("development"),
});

/** Largest delay setTimeout honours, in whole seconds. */
export const MAX_IDLE_WINDOW_SECONDS = 2_147_483;

const batchingSchema = z.object({
  idleWindowSeconds: z.number().positive().max(MAX_IDLE_WINDOW_SECONDS).default(20),
  maxBatch: z.number().int().min(1).default(10),
});

const providerSchema = z.object({
  active: providerIdSchema.default("evolution"),
  fallbackText: z
    .string()
    .min(1)
    .default("Lo siento, tuve un problema procesando tu mensaje. Intenta nuevamente en unos minutos."),
  deniedText: z.string().min(1).optional(),
  sendRetries: z.number().int().min(1).max(10).default(2),
});

const evolutionSchema = z.object({
  baseUrl: z.string().url().transform((url) => url.replace(/\/+$/, "")),
  apiKey: z.string().min(1),
  instanceId: z.string().min(1),
  sendDelayMs: z.number().int().min(0).default(1200),
  timeoutMs: z.number().int().positive().default(10_000),
});

const twilioSchema = z.object({
  accountSid: z.string().min(1),
  authToken: z.string().min(1),
  whatsappNumber: z.string().startsWith("whatsapp:").optional(),
  validateSignature: z.boolean().default(false),
  webhookUrl: z.string().url().optional(),
});

const assistantSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default("gpt-4o-mini"),
  temperature: z.number().min(0).max(2).default(0.2),
  systemPromptPath: z.string().optional(),
  historyKeep: z.number().int().min(0).default(8),
  historyMax: z.number().int().min(2).default(20),
});

const directorySchema = z.object({
  sheetId: z.string().min(1).optional(),
  tab: z.string().min(1).default("directory"),
  credentialsPath: z.string().optional(),
});

const accessSchema = z.object({
  enabled: z.boolean().default(false),
  tab: z.string().min(1).default("AllowedUsers"),
  cacheTtlMs: z.number().int().positive().default(300_000),
});

const memorySchema = z.object({
  redisUrl: z.string().min(1).optional(),
  ttlSeconds: z.number().int().positive().default(14 * 24 * 3600),
  fallbackMaxChats: z.number().int().positive().default(100),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const relayConfigSchema = z.object({
  gateway: gatewaySchema.default({}),
  batching: batchingSchema.default({}),
  provider: providerSchema.default({}),
  evolution: evolutionSchema.optional(),
  twilio: twilioSchema.optional(),
  assistant: assistantSchema.default({}),
  directory: directorySchema.default({}),
  access: accessSchema.default({}),
  memory: memorySchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): RelayConfig {
  return relayConfigSchema.parse(raw);
}
