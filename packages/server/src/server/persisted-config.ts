import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import type pino from "pino";
import { z } from "zod";

const LogConfigSchema = z
  .object({
    level: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .optional(),
    format: z.enum(["pretty", "json"]).optional(),
  })
  .strict();

export const PersistedConfigSchema = z
  .object({
    // v1 schema marker
    version: z.literal(1).optional(),

    daemon: z
      .object({
        listen: z.string().optional(),
        inspectionPath: z.string().startsWith("/").optional(),
      })
      .strict()
      .optional(),

    events: z
      .object({
        enabled: z.boolean().optional(),
      })
      .strict()
      .optional(),

    inspection: z
      .object({
        pollIntervalMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    log: LogConfigSchema.optional(),
  })
  .strict();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

const CONFIG_FILENAME = "config.json";
const DEFAULT_PERSISTED_CONFIG: PersistedConfig = PersistedConfigSchema.parse({
  version: 1,
  daemon: {
    listen: "127.0.0.1:8899",
    inspectionPath: "/dashboard",
  },
  events: {
    enabled: false,
  },
});

type LoggerLike = Pick<pino.Logger, "info">;

function getConfigPath(home: string): string {
  return path.join(home, CONFIG_FILENAME);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
    .join("\n");
}

export function loadPersistedConfig(
  home: string,
  logger?: pino.Logger
): PersistedConfig {
  const log: LoggerLike | undefined = logger?.child({ module: "config" });
  const configPath = getConfigPath(home);

  if (!existsSync(configPath)) {
    try {
      mkdirSync(path.dirname(configPath), { recursive: true });
      writeFileSync(configPath, JSON.stringify(DEFAULT_PERSISTED_CONFIG, null, 2) + "\n");
      log?.info(`Initialized config file at ${configPath}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`[Config] Failed to initialize ${configPath}: ${message}`);
    }
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Failed to read ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Invalid JSON in ${configPath}: ${message}`);
  }

  const result = PersistedConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`[Config] Invalid config in ${configPath}:\n${formatIssues(result.error)}`);
  }

  log?.info(`Loaded from ${configPath}`);
  return result.data;
}

export function savePersistedConfig(
  home: string,
  config: PersistedConfig,
  logger?: pino.Logger
): void {
  const log: LoggerLike | undefined = logger?.child({ module: "config" });
  const configPath = getConfigPath(home);

  const result = PersistedConfigSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`[Config] Invalid config to save:\n${formatIssues(result.error)}`);
  }

  try {
    mkdirSync(path.dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(result.data, null, 2) + "\n");
    log?.info(`Saved to ${configPath}`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`[Config] Failed to write ${configPath}: ${message}`);
  }
}
