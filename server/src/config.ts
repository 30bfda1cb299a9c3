import { ConfigurationError } from "../../src/shared/errors.ts";
import { DEFAULT_MAX_DEPTH, DEFAULT_SEARCH_DEPTH } from "./app.ts";

export type ServerConfig = {
  port: number;
  defaultDepth: number;
  maxDepth: number;
};

export const DEFAULT_PORT = 8788;

function intFromEnv(env: NodeJS.ProcessEnv, name: string, def: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return def;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return n;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: intFromEnv(env, "PORT", DEFAULT_PORT, 0, 65535),
    defaultDepth: intFromEnv(env, "TAK_DEPTH", DEFAULT_SEARCH_DEPTH, 1, DEFAULT_MAX_DEPTH),
    maxDepth: DEFAULT_MAX_DEPTH,
  };
}
