export type ProviderId = "evolution" | "twilio";

export interface RelayConfig {
  readonly gateway: GatewayConfig;
  readonly batching: BatchingConfig;
  readonly provider: ProviderConfig;
  readonly evolution?: EvolutionConfig;
  readonly twilio?: TwilioConfig;
  readonly assistant: AssistantConfig;
  readonly directory: DirectoryConfig;
  readonly access: AccessConfig;
  readonly memory: MemoryConfig;
  readonly logging?: LoggingConfig;
}

export interface GatewayConfig {
  readonly port: number;
  readonly hostname: string;
  /** Bearer token for the /admin routes. Admin routes answer 503 when unset. */
  readonly adminToken?: string;
  readonly environment: string;
}

export interface BatchingConfig {
  /** Quiet period after the last fragment before a turn flushes. */
  readonly idleWindowSeconds: number;
  /** Fragment count that flushes a turn without waiting for the idle window. */
  readonly maxBatch: number;
}

export interface ProviderConfig {
  readonly active: ProviderId;
  /** Sent when the assistant fails to produce a reply. */
  readonly fallbackText: string;
  /** Sent to senders rejected by access control. Nothing is sent when unset. */
  readonly deniedText?: string;
  readonly sendRetries: number;
}

export interface EvolutionConfig {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly instanceId: string;
  readonly sendDelayMs: number;
  readonly timeoutMs: number;
}

export interface TwilioConfig {
  readonly accountSid: string;
  readonly authToken: string;
  /** Sender in `whatsapp:+<number>` form. */
  readonly whatsappNumber?: string;
  readonly validateSignature: boolean;
  /** Public webhook URL Twilio signs against. Defaults to the request URL. */
  readonly webhookUrl?: string;
}

export interface AssistantConfig {
  readonly apiKey?: string;
  readonly model: string;
  readonly temperature: number;
  readonly systemPromptPath?: string;
  /** Past messages carried into the saved history. */
  readonly historyKeep: number;
  /** Upper bound on the saved history after appending the new exchange. */
  readonly historyMax: number;
}

export interface DirectoryConfig {
  readonly sheetId?: string;
  readonly tab: string;
  readonly credentialsPath?: string;
}

export interface AccessConfig {
  readonly enabled: boolean;
  readonly tab: string;
  readonly cacheTtlMs: number;
}

export interface MemoryConfig {
  readonly redisUrl?: string;
  readonly ttlSeconds: number;
  readonly fallbackMaxChats: number;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error" | "silent";
  readonly file?: string;
  readonly json?: boolean;
}
