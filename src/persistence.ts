import fs from "node:fs";
import path from "node:path";
import { parleyConfig } from "./config.js";

export type ParleyPersistedState = {
  version: 1;
  selectedProfileId?: string;
  selectedModel?: string;
  useStreaming?: boolean;
  updatedAt?: string;
};

const STATE_FILE_NAME = "state.json";

export function getParleyDataDir(): string {
  return parleyConfig.dataDir;
}

export function loadPersistedState(dataDir: string = getParleyDataDir()): ParleyPersistedState | null {
  return readStateFromPath(path.join(dataDir, STATE_FILE_NAME));
}

export function savePersistedState(
  next: {
    selectedProfileId: string | null;
    selectedModel: string;
    useStreaming: boolean;
  },
  dataDir: string = getParleyDataDir(),
): void {
  const payload: ParleyPersistedState = {
    version: 1,
    selectedProfileId: next.selectedProfileId?.trim() || undefined,
    selectedModel: next.selectedModel.trim() || undefined,
    useStreaming: next.useStreaming,
    updatedAt: new Date().toISOString(),
  };

  writeStateToPath(path.join(dataDir, STATE_FILE_NAME), payload);
}

function readStateFromPath(stateFilePath: string): ParleyPersistedState | null {
  try {
    if (!fs.existsSync(stateFilePath)) {
      return null;
    }

    const raw = fs.readFileSync(stateFilePath, "utf8");
    const parsed = JSON.parse(raw) as Partial<Record<keyof ParleyPersistedState, unknown>> | null;
    if (!parsed || typeof parsed !== "object") {
      return null;
    }

    return {
      version: 1,
      selectedProfileId:
        typeof parsed.selectedProfileId === "string" && parsed.selectedProfileId.trim()
          ? parsed.selectedProfileId.trim()
          : undefined,
      selectedModel:
        typeof parsed.selectedModel === "string" && parsed.selectedModel.trim()
          ? parsed.selectedModel.trim()
          : undefined,
      useStreaming: typeof parsed.useStreaming === "boolean" ? parsed.useStreaming : undefined,
      updatedAt: typeof parsed.updatedAt === "string" ? parsed.updatedAt : undefined,
    };
  } catch {
    return null;
  }
}

function writeStateToPath(stateFilePath: string, payload: ParleyPersistedState): void {
  const tmpPath = `${stateFilePath}.tmp`;
  try {
    fs.mkdirSync(path.dirname(stateFilePath), { recursive: true });
    fs.writeFileSync(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    fs.renameSync(tmpPath, stateFilePath);
  } catch {
    try {
      if (fs.existsSync(tmpPath)) {
        fs.unlinkSync(tmpPath);
      }
    } catch {
      // ignore cleanup failures
    }
  }
}
