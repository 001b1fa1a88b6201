import { z } from "zod";
import { ConfigError } from "./errors.js";

const ConfigSchema = z
  .object({
    RECON_DATA: z.string().min(1).optional(),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    HOST: z.string().min(1).default("0.0.0.0"),
    PUBLIC_URL: z.string().url().optional(),
    API_PREFIX: z
      .string()
      .regex(/^\/[^\s]*$/, "must start with '/'")
      .default("/api"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  })
  .transform((env) => ({
    dataLocation: env.RECON_DATA,
    port: env.PORT,
    host: env.HOST,
    publicUrl: env.PUBLIC_URL ?? `http://127.0.0.1:${env.PORT}`,
    apiPrefix: env.API_PREFIX.length > 1 ? env.API_PREFIX.replace(/\/+$/, "") : env.API_PREFIX,
    logLevel: env.LOG_LEVEL,
  }));

export type ReconConfig = z.output<typeof ConfigSchema>;

/** Reads the service configuration from environment variables. */
export function loadConfig(env: Record<string, string | undefined> = process.env): ReconConfig {
  // unset and empty variables both mean "use the default"
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
