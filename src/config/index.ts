import { z } from "zod";
import { ConfigurationError } from "../middleware/errorHandler";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().transform(Number).pipe(z.number().int().min(1).max(65535)).default("3000"),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  // "false" leaves only explicitly registered sinks
  DEFAULT_SINK: z
    .string()
    .transform((val) => val !== "false")
    .default("true"),
  SERVER_MODE: z.enum(["hono", "node"]).default("hono"),
  // Upper bound on waiting for pending log deliveries at shutdown
  SHUTDOWN_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().min(0)).default("5000"),
});

export type ServerMode = z.infer<typeof envSchema>["SERVER_MODE"];

export interface ServerConfig {
  env: z.infer<typeof envSchema>["NODE_ENV"];
  isProduction: boolean;
  isTest: boolean;
  server: {
    port: number;
    host: string;
    mode: ServerMode;
    shutdownTimeoutMs: number;
  };
  logging: {
    level: z.infer<typeof envSchema>["LOG_LEVEL"];
    defaultSink: boolean;
  };
}

/**
 * Parse and validate environment configuration
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigurationError(`Invalid environment variables: ${keys}`, parsed.error.format());
  }

  const env = parsed.data;

  return {
    env: env.NODE_ENV,
    isProduction: env.NODE_ENV === "production",
    isTest: env.NODE_ENV === "test",
    server: {
      port: env.PORT,
      host: env.HOST,
      mode: env.SERVER_MODE,
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      defaultSink: env.DEFAULT_SINK,
    },
  };
}
