import pino from "pino";
import type { InboundMessage } from "../../src/channels/adapter.js";
import { parseConfig } from "../../src/config/schema.js";
import type { RelayConfig } from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import type { DirectoryRow, SheetSource } from "../../src/directory/types.js";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeInboundMessage(overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    id: "msg-1",
    channelId: "evolution",
    senderId: "56911112222",
    senderName: "Test User",
    chatId: "56911112222",
    text: "hola",
    timestamp: 1_700_000_000_000,
    raw: {},
    ...overrides,
  };
}

export function makeConfig(raw: Record<string, unknown> = {}): RelayConfig {
  return parseConfig(raw);
}

export const DIRECTORY_ROWS: DirectoryRow[] = [
  {
    name: "Ana Rojas",
    title: "Kinesióloga",
    specialty: "Kinesiología",
    coverage_area: "Providencia, Ñuñoa",
    phone: "+56 9 1111 0001",
    availability: "Lunes a viernes",
  },
  {
    name: "Bruno Díaz",
    title: "Médico",
    specialty: "Cardiología",
    coverage_area: "Los Ángeles",
    phone: "+56 9 1111 0002",
    availability: "",
  },
  {
    name: "Carla Soto",
    title: "Enfermera",
    specialty: "Cuidados Intensivos",
    coverage_area: "Las Condes, Vitacura",
    phone: "+56 9 1111 0003",
    availability: "Fines de semana",
  },
  {
    name: "",
    title: "TENS",
    specialty: "Geriatría",
    coverage_area: "Providencia",
    phone: "+56 9 1111 0004",
    availability: "Noches",
  },
];

/** In-memory sheet source; set `error` to make every read fail. */
export class FakeSheetSource implements SheetSource {
  error: Error | null = null;
  readonly reads: string[] = [];

  constructor(
    private readonly records: Record<string, DirectoryRow[]> = {},
    private readonly columns: Record<string, string[]> = {},
  ) {}

  async readRecords(tab: string): Promise<DirectoryRow[]> {
    this.reads.push(tab);
    if (this.error) throw this.error;
    return this.records[tab] ?? [];
  }

  async readFirstColumn(tab: string): Promise<string[]> {
    this.reads.push(tab);
    if (this.error) throw this.error;
    return this.columns[tab] ?? [];
  }
}

/** Sheet source whose first-column reads stay pending until the test resolves them. */
export class DeferredSheetSource implements SheetSource {
  readonly pending: Array<(column: string[]) => void> = [];

  async readRecords(): Promise<DirectoryRow[]> {
    return [];
  }

  readFirstColumn(): Promise<string[]> {
    return new Promise<string[]>((resolve) => {
      this.pending.push(resolve);
    });
  }
}
