import { FastMCP } from "fastmcp";
import { pathToFileURL } from "url";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { getErrorMessage } from "./errors.js";
import { createLogger, setLogLevel } from "./logger.js";
import { QueryRequestSchema, ReconService } from "./recon-service.js";
import { openStore } from "./store-factory.js";

const logger = createLogger("Server");

const ReconcileParameters = QueryRequestSchema.extend({
  query: z.string().min(1).describe("Text to reconcile, or an exact entity key"),
  type: z.string().optional().describe("Type id the candidates must carry; matching candidates score +10"),
  limit: z.number().int().optional().describe("Maximum candidates (default 25)"),
});

const SuggestParameters = z.object({
  kind: z.enum(["entity", "type", "property"]).default("entity"),
  prefix: z.string().describe("Prefix typed so far"),
  limit: z.number().int().positive().optional(),
});

const EntityDetailsParameters = z.object({
  entity_id: z.string().min(1).describe("Composite entity id, e.g. 'person:q42'"),
});

const ListPropertiesParameters = z.object({
  type: z.string().min(1).describe("Type id"),
  limit: z.number().int().positive().optional(),
});

/** Runs a tool body and turns failures into a JSON `{ error }` payload. */
async function toolResult(fn: () => unknown | Promise<unknown>): Promise<string> {
  try {
    return JSON.stringify(await fn());
  } catch (error) {
    logger.warn("Tool call failed", { error: getErrorMessage(error) });
    return JSON.stringify({ error: getErrorMessage(error) });
  }
}

/** Exposes the reconciliation service as MCP tools over stdio. */
export class ReconMcpServer {
  public mcp: FastMCP;

  constructor(public readonly service: ReconService) {
    this.mcp = new FastMCP({
      name: "entity-recon",
      version: "1.0.0",
    });
    this.registerTools();
  }

  private registerTools() {
    this.mcp.addTool({
      name: "reconcile",
      description: `Finds the entities that best match a piece of text.
Returns candidates ranked by score (0-100, higher is better); 'match' is true above 80.
An exact entity key short-circuits to a single score-100 candidate.
Optional 'properties' [{ pid, v }] keep only candidates holding all given values; v may be a string, number, boolean or { id } reference.`,
      parameters: ReconcileParameters,
      execute: async (args) =>
        toolResult(async () => {
          const batch = await this.service.queryBatch({ q0: args });
          return batch["q0"] ?? { result: [] };
        }),
    });

    this.mcp.addTool({
      name: "suggest",
      description: "Autocomplete for entities, types or properties by prefix. Types and properties fall back to substring matches.",
      parameters: SuggestParameters,
      execute: async (args) =>
        toolResult(() => {
          switch (args.kind) {
            case "type":
              return this.service.suggestTypes(args.prefix, args.limit);
            case "property":
              return this.service.suggestProperties(args.prefix, args.limit);
            default:
              return this.service.suggestEntities(args.prefix, args.limit);
          }
        }),
    });

    this.mcp.addTool({
      name: "entity_details",
      description: "Full record of one entity: name, description, types and property values.",
      parameters: EntityDetailsParameters,
      execute: async (args) => toolResult(() => this.service.entity(args.entity_id)),
    });

    this.mcp.addTool({
      name: "list_properties",
      description: "Properties declared for a type, in declaration order.",
      parameters: ListPropertiesParameters,
      execute: async (args) => toolResult(() => this.service.listProperties(args.type, args.limit)),
    });
  }

  public async start() {
    await this.mcp.start({ transportType: "stdio" });
    logger.info("Reconciliation MCP server running on stdio");
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  if (!config.dataLocation) {
    throw new Error("RECON_DATA must name a flat file or SQLite database");
  }
  const store = await openStore(config.dataLocation);
  const server = new ReconMcpServer(new ReconService(store, config.publicUrl, config.apiPrefix));
  await server.start();
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    logger.error("Server could not be started", { error: getErrorMessage(err) });
    process.exit(1);
  });
}
