/**
 * Command logic behind the CLI. Opens the configured data source once and
 * answers through the same ReconService the HTTP API and MCP server use.
 */

import type { Server } from "http";
import { createApiApp, startHttpServer } from "./api_bridge.js";
import { ReconConfig, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { ReconMcpServer } from "./index.js";
import { setLogLevel } from "./logger.js";
import { applyUrlTemplate } from "./manifest.js";
import { ReconService } from "./recon-service.js";
import { openStore } from "./store-factory.js";
import { Entity, QueryProperty } from "./types.js";

export interface GlobalOptions {
  data?: string;
  logLevel?: string;
}

export interface ServeOptions {
  port?: number;
  host?: string;
  publicUrl?: string;
  prefix?: string;
}

export type SuggestKind = "entity" | "type" | "property";

export class CLICommands {
  private service?: ReconService;
  private config?: ReconConfig;

  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  /** Applies command-line overrides on top of the environment configuration. */
  configure(options: GlobalOptions & ServeOptions): ReconConfig {
    const overrides: Record<string, string | undefined> = {
      RECON_DATA: options.data,
      PORT: options.port === undefined ? undefined : String(options.port),
      HOST: options.host,
      PUBLIC_URL: options.publicUrl,
      API_PREFIX: options.prefix,
      LOG_LEVEL: options.logLevel,
    };
    const env: Record<string, string | undefined> = { ...this.env };
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) env[key] = value;
    }
    this.config = loadConfig(env);
    setLogLevel(this.config.logLevel);
    return this.config;
  }

  async init(): Promise<ReconService> {
    if (this.service) return this.service;
    const config = this.config ?? this.configure({});
    const location = config.dataLocation;
    if (!location) {
      throw new ConfigError("No data source: pass --data or set RECON_DATA");
    }
    const store = await openStore(location);
    this.service = new ReconService(store, config.publicUrl, config.apiPrefix);
    return this.service;
  }

  async close(): Promise<void> {
    if (this.service) {
      await this.service.store.close();
      this.service = undefined;
    }
  }

  async query(text: string, options: { type?: string; limit?: number; properties?: QueryProperty[] }) {
    const service = await this.init();
    const batch = await service.queryBatch({ q0: { query: text, type: options.type, limit: options.limit, properties: options.properties } });
    return batch["q0"] ?? { result: [] };
  }

  async suggest(kind: SuggestKind, prefix: string, limit?: number) {
    const service = await this.init();
    switch (kind) {
      case "type":
        return service.suggestTypes(prefix, limit);
      case "property":
        return service.suggestProperties(prefix, limit);
      default:
        return service.suggestEntities(prefix, limit);
    }
  }

  async entity(id: string): Promise<Entity & { view?: string }> {
    const service = await this.init();
    const entity = await service.entity(id);
    const template = service.store.viewURLTemplate();
    return template === "" ? entity : { ...entity, view: applyUrlTemplate(template, id) };
  }

  async serve(): Promise<Server> {
    const service = await this.init();
    const config = this.config ?? this.configure({});
    const app = createApiApp(service, config.apiPrefix);
    return startHttpServer(app, config.port, config.host);
  }

  async mcp(): Promise<void> {
    const service = await this.init();
    await new ReconMcpServer(service).start();
  }
}
