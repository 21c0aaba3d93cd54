import os from "node:os";
import path from "node:path";

export type ParleyConfig = {
  dataDir: string;
  defaultUseStreaming: boolean;
  scrollSettleMs: number;
  requestTimeoutMs: number;
  systemInstruction: string;
  debug: boolean;
  seedProfile: {
    serviceName: string;
    baseUrl: string;
    models: string;
    apiKey: string;
  };
};

const DEFAULT_SCROLL_SETTLE_MS = 100;
const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

export const parleyConfig: ParleyConfig = loadParleyConfig(process.env);

export function loadParleyConfig(env: NodeJS.ProcessEnv): ParleyConfig {
  return {
    dataDir: readString(env, "PARLEY_HOME") || path.join(os.homedir(), ".parley"),
    defaultUseStreaming: readBoolean(env, "PARLEY_STREAM", true),
    scrollSettleMs: readNonNegativeInt(env, "PARLEY_SCROLL_SETTLE_MS", DEFAULT_SCROLL_SETTLE_MS),
    requestTimeoutMs: readNonNegativeInt(env, "PARLEY_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS),
    systemInstruction: readString(env, "PARLEY_SYSTEM_PROMPT"),
    debug: readBoolean(env, "PARLEY_DEBUG", false),
    seedProfile: {
      serviceName: readString(env, "PARLEY_SERVICE_NAME") || "default",
      baseUrl: readString(env, "PARLEY_BASE_URL"),
      models: readString(env, "PARLEY_MODELS"),
      apiKey: readString(env, "PARLEY_API_KEY"),
    },
  };
}

function readString(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  return typeof value === "string" ? value.trim() : "";
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const value = readString(env, key).toLowerCase();
  if (value === "1" || value === "true" || value === "yes" || value === "on") {
    return true;
  }
  if (value === "0" || value === "false" || value === "no" || value === "off") {
    return false;
  }
  return fallback;
}

function readNonNegativeInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const value = readString(env, key);
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}
