import os from "node:os";
import path from "node:path";
import { mkdirSync } from "node:fs";
import type { PersistedConfig } from "./persisted-config.js";
import { DEFAULT_RELAY_POLL_INTERVAL_MS } from "./inspection/relay-worker.js";

const DEFAULT_HOME = "~/.trafficscope";
const DEFAULT_LISTEN = "127.0.0.1:8899";
const DEFAULT_INSPECTION_PATH = "/dashboard";

export type ListenAddress = {
  host: string;
  port: number;
};

export type InspectionDaemonConfig = {
  listen: ListenAddress;
  inspectionPath: string;
  eventsEnabled: boolean;
  pollIntervalMs: number;
};

function expandHomeDir(input: string): string {
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  if (input === "~") {
    return os.homedir();
  }
  return input;
}

export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const raw = env.TRAFFICSCOPE_HOME ?? DEFAULT_HOME;
  const expanded = path.resolve(expandHomeDir(raw));
  mkdirSync(expanded, { recursive: true });
  return expanded;
}

export function parseBooleanFlag(value: string | undefined): boolean | null {
  if (value === undefined) return null;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
    return false;
  }
  return null;
}

/**
 * Parse `host:port`, `:port` or a bare port. Bracketed IPv6 hosts are
 * accepted (`[::1]:8899`).
 */
export function parseListenAddress(value: string): ListenAddress {
  const trimmed = value.trim();
  let host = "127.0.0.1";
  let portRaw = trimmed;

  const separator = trimmed.lastIndexOf(":");
  if (separator !== -1) {
    const hostPart = trimmed.slice(0, separator);
    portRaw = trimmed.slice(separator + 1);
    if (hostPart.startsWith("[") && hostPart.endsWith("]")) {
      host = hostPart.slice(1, -1);
    } else if (hostPart.length > 0) {
      host = hostPart;
    }
  }

  const port = Number.parseInt(portRaw, 10);
  if (!/^\d+$/.test(portRaw) || port < 0 || port > 65535) {
    throw new Error(`[Config] Invalid listen address "${value}"`);
  }
  return { host, port };
}

export function resolveDaemonConfig(
  persisted: PersistedConfig,
  env: NodeJS.ProcessEnv = process.env
): InspectionDaemonConfig {
  const listen = parseListenAddress(
    env.TRAFFICSCOPE_LISTEN ?? persisted.daemon?.listen ?? DEFAULT_LISTEN
  );
  const eventsEnabled =
    parseBooleanFlag(env.TRAFFICSCOPE_ENABLE_EVENTS) ?? persisted.events?.enabled ?? false;

  return {
    listen,
    inspectionPath: persisted.daemon?.inspectionPath ?? DEFAULT_INSPECTION_PATH,
    eventsEnabled,
    pollIntervalMs: persisted.inspection?.pollIntervalMs ?? DEFAULT_RELAY_POLL_INTERVAL_MS,
  };
}
