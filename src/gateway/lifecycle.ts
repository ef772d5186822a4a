import { Assistant, loadSystemPrompt } from "../assistant/assistant.js";
import { ChatMemory, createRedisClient } from "../assistant/memory.js";
import {
  OpenAICompletionClient,
  UnconfiguredCompletionClient,
  type CompletionClient,
} from "../assistant/openai-client.js";
import { ToolExecutor } from "../assistant/tools.js";
import { TurnScheduler } from "../batching/scheduler.js";
import { EvolutionAdapter } from "../channels/evolution/client.js";
import { OutboundSender } from "../channels/outbound.js";
import { ChannelRegistry } from "../channels/registry.js";
import { TwilioAdapter } from "../channels/twilio/client.js";
import { loadConfig } from "../config/loader.js";
import type { RelayConfig } from "../config/types.js";
import { AccessControl } from "../directory/access-control.js";
import { ProfessionalDirectory } from "../directory/directory.js";
import { GoogleSheetSource, UnconfiguredSheetSource } from "../directory/sheets.js";
import type { SheetSource } from "../directory/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { InboundRouter } from "../relay/inbound-router.js";
import { GatewayServer } from "./server.js";

export interface GatewayContext {
  config: RelayConfig;
  logger: Logger;
  registry: ChannelRegistry;
  scheduler: TurnScheduler;
  memory: ChatMemory;
  router: InboundRouter;
  server: GatewayServer;
}

/** Overrides for the collaborators that talk to the outside world. */
export interface GatewayOverrides {
  completionClient?: CompletionClient;
  sheetSource?: SheetSource;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

function createRegistry(config: RelayConfig, logger: Logger): ChannelRegistry {
  const registry = new ChannelRegistry();

  if (config.evolution) {
    registry.register(new EvolutionAdapter(config.evolution));
  }

  if (config.twilio) {
    const { whatsappNumber } = config.twilio;
    if (whatsappNumber) {
      registry.register(new TwilioAdapter({ ...config.twilio, whatsappNumber }));
    } else {
      logger.warn("twilio.whatsappNumber not set, Twilio provider disabled");
    }
  }

  for (const adapter of registry.list()) {
    logger.info({ channel: adapter.id, label: adapter.label }, "Provider registered");
  }
  if (!registry.has(config.provider.active)) {
    logger.warn(
      { active: config.provider.active },
      "Active provider is not configured, replies use whichever provider is available",
    );
  }
  return registry;
}

/** Wire every component from config without binding a port. */
export async function createGateway(
  config: RelayConfig,
  logger: Logger,
  overrides: GatewayOverrides = {},
): Promise<GatewayContext> {
  const registry = createRegistry(config, logger);

  const memory = new ChatMemory(
    config.memory.redisUrl ? createRedisClient(config.memory.redisUrl, logger) : null,
    logger,
    config.memory,
  );
  logger.info({ backend: config.memory.redisUrl ? "redis" : "memory" }, "Conversation memory ready");

  const sheetSource =
    overrides.sheetSource ??
    (config.directory.sheetId
      ? new GoogleSheetSource(config.directory.sheetId, config.directory.credentialsPath)
      : new UnconfiguredSheetSource());
  const directory = new ProfessionalDirectory(sheetSource, config.directory.tab, logger);

  const completionClient =
    overrides.completionClient ??
    (config.assistant.apiKey
      ? new OpenAICompletionClient(config.assistant.apiKey, config.assistant.model)
      : new UnconfiguredCompletionClient());
  if (!config.assistant.apiKey && !overrides.completionClient) {
    logger.warn("assistant.apiKey not set, every turn will get the fallback reply");
  }

  const assistant = new Assistant(
    completionClient,
    new ToolExecutor(directory, logger),
    memory,
    {
      systemPrompt: await loadSystemPrompt(config.assistant.systemPromptPath),
      temperature: config.assistant.temperature,
      historyKeep: config.assistant.historyKeep,
      historyMax: config.assistant.historyMax,
    },
    logger,
  );

  const scheduler = new TurnScheduler(logger, {
    idleWindowMs: config.batching.idleWindowSeconds * 1000,
    maxBatch: config.batching.maxBatch,
  });

  const outbound = new OutboundSender(registry, config.provider.active, logger, {
    maxAttempts: config.provider.sendRetries,
    baseDelayMs: 350,
  });

  const access = config.access.enabled
    ? new AccessControl(sheetSource, config.access.tab, logger, config.access.cacheTtlMs)
    : null;

  const router = new InboundRouter(
    scheduler,
    assistant,
    outbound,
    logger,
    {
      fallbackText: config.provider.fallbackText,
      deniedText: config.provider.deniedText,
    },
    access,
  );

  const server = new GatewayServer({ config, router, scheduler, registry, memory, logger });

  return { config, logger, registry, scheduler, memory, router, server };
}

export async function startGateway(configPath?: string): Promise<GatewayContext> {
  const config = loadConfig(configPath);
  const logger = createLogger(config.logging);
  logger.info("Starting turnrelay gateway...");

  const context = await createGateway(config, logger);
  await context.server.start();

  let shutdownInProgress = false;
  const shutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await context.server.stop();
    context.scheduler.dispose();
    await context.memory.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info(
    { port: config.gateway.port, idleWindowSeconds: config.batching.idleWindowSeconds },
    "turnrelay gateway started",
  );
  return context;
}
