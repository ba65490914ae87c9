import pino from "pino";
import type { PersistedConfig } from "./persisted-config.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type LogFormat = "pretty" | "json";

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];
const LOG_FORMATS: readonly LogFormat[] = ["pretty", "json"];

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
}

function parseLogFormat(value: string | undefined): LogFormat | undefined {
  return LOG_FORMATS.find((format) => format === value?.trim().toLowerCase());
}

/**
 * Env (`TRAFFICSCOPE_LOG`, `TRAFFICSCOPE_LOG_FORMAT`) wins over config.json,
 * which wins over the defaults. Unrecognised env values are ignored.
 */
export function resolveLogConfig(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const level: LogLevel =
    parseLogLevel(env.TRAFFICSCOPE_LOG) ?? persistedConfig?.log?.level ?? "info";
  const format: LogFormat =
    parseLogFormat(env.TRAFFICSCOPE_LOG_FORMAT) ?? persistedConfig?.log?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): pino.Logger {
  const config = resolveLogConfig(persistedConfig, env);

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
          },
        }
      : undefined;

  return pino({
    name: "trafficscope",
    level: config.level,
    transport,
  });
}
