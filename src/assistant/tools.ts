import { z } from "zod";
import type { ProfessionalDirectory } from "../directory/directory.js";
import type { Logger } from "../logging/logger.js";
import type { ToolCall, ToolDefinition } from "./openai-client.js";

export const FIND_PROFESSIONALS = "find_professionals";
export const FIND_PROFESSIONAL_BY_NAME = "find_professional_by_name";

export const DIRECTORY_TOOLS: readonly ToolDefinition[] = [
  {
    type: "function",
    function: {
      name: FIND_PROFESSIONALS,
      description:
        "Devuelve lista de profesionales sanitarios que cubren la ciudad y la especialidad",
      parameters: {
        type: "object",
        properties: {
          specialty: { type: "string" },
          city: { type: "string" },
        },
        required: ["specialty", "city"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: FIND_PROFESSIONAL_BY_NAME,
      description:
        "Busca un profesional específico por nombre para obtener sus datos de contacto completos",
      parameters: {
        type: "object",
        properties: {
          name: { type: "string" },
        },
        required: ["name"],
      },
    },
  },
];

const findProfessionalsArgs = z.object({
  specialty: z.string().min(1),
  city: z.string().min(1),
});

const findByNameArgs = z.object({
  name: z.string().min(1),
});

function parseArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
    .join("; ");
}

/**
 * Runs a model tool call against the directory. Always resolves to a JSON
 * string; bad arguments and unknown tools come back as `{ "error": ... }`.
 */
export class ToolExecutor {
  constructor(
    private readonly directory: ProfessionalDirectory,
    private readonly logger: Logger,
  ) {}

  async execute(call: ToolCall): Promise<string> {
    const { name } = call.function;
    const args = parseArguments(call.function.arguments);

    switch (name) {
      case FIND_PROFESSIONALS: {
        const parsed = findProfessionalsArgs.safeParse(args);
        if (!parsed.success) return this.invalid(name, parsed.error);
        const professionals = await this.directory.findProfessionals(
          parsed.data.specialty,
          parsed.data.city,
        );
        return JSON.stringify(professionals);
      }
      case FIND_PROFESSIONAL_BY_NAME: {
        const parsed = findByNameArgs.safeParse(args);
        if (!parsed.success) return this.invalid(name, parsed.error);
        const professional = await this.directory.findByName(parsed.data.name);
        return JSON.stringify(professional);
      }
      default:
        this.logger.warn({ tool: name }, "Model requested unknown tool");
        return JSON.stringify({ error: `Unknown tool: ${name}` });
    }
  }

  private invalid(tool: string, error: z.ZodError): string {
    const message = describeIssues(error);
    this.logger.warn({ tool, issues: message }, "Invalid tool arguments");
    return JSON.stringify({ error: `Invalid arguments for ${tool}: ${message}` });
  }
}
