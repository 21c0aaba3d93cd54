import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { parseModelList } from "./core/selection.js";
import { ProfileNotFoundError, ProfileValidationError } from "./errors.js";
import { createFileSecretStore, type SecretStore } from "./secure-store.js";

export type ApiProfile = {
  id: string;
  serviceName: string;
  baseUrl: string;
  /** Comma-separated model identifiers, first one is the default. */
  models: string;
  apiKey: string;
  createdAt: string;
  updatedAt: string;
};

export type ProfileDraft = {
  serviceName: string;
  baseUrl: string;
  models: string;
  apiKey?: string;
};

export interface ProfileStore {
  listProfiles(): Promise<ApiProfile[]>;
  getProfileById(id: string): Promise<ApiProfile | null>;
  createProfile(draft: ProfileDraft): Promise<ApiProfile>;
  updateProfile(id: string, draft: Partial<ProfileDraft>): Promise<ApiProfile>;
  deleteProfile(id: string): Promise<boolean>;
}

type StoredProfile = Omit<ApiProfile, "apiKey">;

type ProfilesFile = {
  version: 1;
  profiles: StoredProfile[];
};

const PROFILES_FILE_NAME = "profiles.json";
const SECRETS_FILE_NAME = "secrets.json";

export class FileProfileStore implements ProfileStore {
  private readonly filePath: string;
  private readonly secrets: SecretStore;

  constructor(options: { dataDir: string; secrets?: SecretStore }) {
    this.filePath = path.join(options.dataDir, PROFILES_FILE_NAME);
    this.secrets = options.secrets ?? createFileSecretStore(path.join(options.dataDir, SECRETS_FILE_NAME));
  }

  async listProfiles(): Promise<ApiProfile[]> {
    const stored = readProfilesFile(this.filePath);
    return Promise.all(stored.map((profile) => this.withApiKey(profile)));
  }

  async getProfileById(id: string): Promise<ApiProfile | null> {
    const stored = readProfilesFile(this.filePath).find((profile) => profile.id === id);
    return stored ? this.withApiKey(stored) : null;
  }

  async createProfile(draft: ProfileDraft): Promise<ApiProfile> {
    const normalized = normalizeProfileDraft(draft);
    const now = new Date().toISOString();
    const stored: StoredProfile = {
      id: randomUUID(),
      serviceName: normalized.serviceName,
      baseUrl: normalized.baseUrl,
      models: normalized.models,
      createdAt: now,
      updatedAt: now,
    };

    const previous = readProfilesFile(this.filePath);
    writeProfilesFile(this.filePath, [...previous, stored]);
    if (!(await this.secrets.set(apiKeyAccount(stored.id), normalized.apiKey))) {
      writeProfilesFile(this.filePath, previous);
      throw new ProfileValidationError("apiKey", "api key could not be stored");
    }
    return { ...stored, apiKey: normalized.apiKey };
  }

  async updateProfile(id: string, draft: Partial<ProfileDraft>): Promise<ApiProfile> {
    const profiles = readProfilesFile(this.filePath);
    const index = profiles.findIndex((profile) => profile.id === id);
    const current = index === -1 ? undefined : profiles[index];
    if (!current) {
      throw new ProfileNotFoundError(id);
    }

    const currentApiKey = await this.secrets.get(apiKeyAccount(id));
    const normalized = normalizeProfileDraft({
      serviceName: draft.serviceName ?? current.serviceName,
      baseUrl: draft.baseUrl ?? current.baseUrl,
      models: draft.models ?? current.models,
      apiKey: draft.apiKey ?? currentApiKey,
    });

    const replaced: StoredProfile = {
      ...current,
      serviceName: normalized.serviceName,
      baseUrl: normalized.baseUrl,
      models: normalized.models,
      updatedAt: new Date().toISOString(),
    };
    const next = [...profiles];
    next[index] = replaced;
    writeProfilesFile(this.filePath, next);

    if (normalized.apiKey !== currentApiKey && !(await this.secrets.set(apiKeyAccount(id), normalized.apiKey))) {
      writeProfilesFile(this.filePath, profiles);
      throw new ProfileValidationError("apiKey", "api key could not be stored");
    }
    return { ...replaced, apiKey: normalized.apiKey };
  }

  async deleteProfile(id: string): Promise<boolean> {
    const profiles = readProfilesFile(this.filePath);
    const next = profiles.filter((profile) => profile.id !== id);
    if (next.length === profiles.length) {
      return false;
    }
    writeProfilesFile(this.filePath, next);
    await this.secrets.delete(apiKeyAccount(id));
    return true;
  }

  private async withApiKey(profile: StoredProfile): Promise<ApiProfile> {
    return {
      ...profile,
      apiKey: await this.secrets.get(apiKeyAccount(profile.id)),
    };
  }
}

/**
 * Seeds one profile from the environment when the store is empty. Returns the profiles the
 * store holds afterwards.
 */
export async function initDefaultProfiles(
  store: ProfileStore,
  seed: { serviceName: string; baseUrl: string; models: string; apiKey: string },
): Promise<ApiProfile[]> {
  const existing = await store.listProfiles();
  if (existing.length > 0 || !seed.baseUrl || parseModelList(seed.models).length === 0) {
    return existing;
  }
  await store.createProfile(seed);
  return store.listProfiles();
}

export function normalizeProfileDraft(draft: ProfileDraft): Required<ProfileDraft> {
  const serviceName = draft.serviceName.trim();
  if (!serviceName) {
    throw new ProfileValidationError("serviceName", "service name is required");
  }

  const baseUrl = draft.baseUrl.trim().replace(/\/+$/, "");
  if (!isHttpUrl(baseUrl)) {
    throw new ProfileValidationError("baseUrl", `base url must be an http(s) url: ${draft.baseUrl.trim() || "(empty)"}`);
  }

  const models = parseModelList(draft.models);
  if (models.length === 0) {
    throw new ProfileValidationError("models", "at least one model is required");
  }

  return {
    serviceName,
    baseUrl,
    models: models.join(","),
    apiKey: draft.apiKey?.trim() ?? "",
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function apiKeyAccount(profileId: string): string {
  return `profile-api-key:${profileId}`;
}

function readProfilesFile(filePath: string): StoredProfile[] {
  try {
    if (!fs.existsSync(filePath)) {
      return [];
    }

    const raw = fs.readFileSync(filePath, "utf8");
    const parsed = JSON.parse(raw) as { profiles?: unknown } | null;
    if (!parsed || typeof parsed !== "object" || !Array.isArray(parsed.profiles)) {
      return [];
    }

    return parsed.profiles
      .map((item) => parseStoredProfile(item))
      .filter((profile): profile is StoredProfile => profile !== null);
  } catch {
    return [];
  }
}

function parseStoredProfile(value: unknown): StoredProfile | null {
  if (!value || typeof value !== "object") {
    return null;
  }
  const row = value as Record<string, unknown>;
  const id = typeof row.id === "string" ? row.id.trim() : "";
  const serviceName = typeof row.serviceName === "string" ? row.serviceName.trim() : "";
  const baseUrl = typeof row.baseUrl === "string" ? row.baseUrl.trim() : "";
  if (!id || !serviceName || !baseUrl) {
    return null;
  }
  return {
    id,
    serviceName,
    baseUrl,
    models: typeof row.models === "string" ? row.models : "",
    createdAt: typeof row.createdAt === "string" ? row.createdAt : "",
    updatedAt: typeof row.updatedAt === "string" ? row.updatedAt : "",
  };
}

function writeProfilesFile(filePath: string, profiles: StoredProfile[]): void {
  const payload: ProfilesFile = {
    version: 1,
    profiles,
  };
  const tmpPath = `${filePath}.tmp`;
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
  fs.renameSync(tmpPath, filePath);
}
