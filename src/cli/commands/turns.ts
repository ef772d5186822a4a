import { Command, Option } from "clipanion";
import { z } from "zod";
import { loadConfig } from "../../config/loader.js";

const turnListSchema = z.object({
  turns: z.array(
    z.object({
      key: z.string(),
      pendingCount: z.number(),
      secondsSinceLastFragment: z.number(),
    }),
  ),
});

const flushResultSchema = z.object({ flushed: z.boolean() });

/** Shared plumbing for commands that talk to a running gateway's /admin routes. */
abstract class AdminCommand extends Command {
  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  url = Option.String("--url", {
    description: "Gateway base URL (default http://127.0.0.1:<gateway.port>)",
    required: false,
  });

  token = Option.String("--token", {
    description: "Admin token (default gateway.adminToken from config)",
    required: false,
  });

  protected async callAdmin(method: "GET" | "POST", path: string): Promise<unknown> {
    const config = loadConfig(this.config);
    const base = (this.url ?? `http://127.0.0.1:${config.gateway.port}`).replace(/\/+$/, "");
    const token = this.token ?? config.gateway.adminToken;
    if (!token) {
      throw new Error("No admin token: pass --token or set gateway.adminToken");
    }

    const res = await fetch(`${base}${path}`, {
      method,
      headers: { Authorization: `Bearer ${token}` },
    });
    if (!res.ok) {
      throw new Error(`Gateway answered ${res.status} for ${method} ${path}`);
    }
    return res.json();
  }

  protected fail(err: unknown): void {
    this.context.stdout.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  }
}

export class TurnsListCommand extends AdminCommand {
  static override paths = [["turns", "list"]];

  static override usage = Command.Usage({
    description: "List conversations with a pending turn",
    examples: [["List pending turns", "turnrelay turns list"]],
  });

  async execute(): Promise<void> {
    let turns;
    try {
      turns = turnListSchema.parse(await this.callAdmin("GET", "/admin/turns")).turns;
    } catch (err) {
      this.fail(err);
      return;
    }

    if (turns.length === 0) {
      this.context.stdout.write("No pending turns\n");
      return;
    }
    for (const turn of turns) {
      this.context.stdout.write(
        `${turn.key}  ${turn.pendingCount} fragment(s)  idle ${turn.secondsSinceLastFragment.toFixed(1)}s\n`,
      );
    }
  }
}

export class TurnsFlushCommand extends AdminCommand {
  static override paths = [["turns", "flush"]];

  static override usage = Command.Usage({
    description: "Flush a conversation's pending turn now",
    examples: [["Flush one conversation", "turnrelay turns flush 56912345678"]],
  });

  key = Option.String({ name: "key", required: true });

  async execute(): Promise<void> {
    let result;
    try {
      result = flushResultSchema.parse(
        await this.callAdmin("POST", `/admin/turns/${encodeURIComponent(this.key)}/flush`),
      );
    } catch (err) {
      this.fail(err);
      return;
    }

    if (result.flushed) {
      this.context.stdout.write(`Flushed turn for ${this.key}\n`);
    } else {
      this.context.stdout.write(`No pending turn for ${this.key}\n`);
      process.exitCode = 1;
    }
  }
}
