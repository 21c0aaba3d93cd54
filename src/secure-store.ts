import fs from "node:fs";
import path from "node:path";

export type SecretStore = {
  get: (account: string) => Promise<string>;
  set: (account: string, value: string) => Promise<boolean>;
  delete: (account: string) => Promise<boolean>;
};

const SECRETS_FILE_MODE = 0o600;

export function createFileSecretStore(filePath: string): SecretStore {
  return {
    async get(account) {
      const value = readSecrets(filePath)[account];
      return typeof value === "string" ? value.trim() : "";
    },

    async set(account, value) {
      const normalized = value.trim();
      if (!normalized) {
        return this.delete(account);
      }
      try {
        const next = readSecrets(filePath);
        next[account] = normalized;
        writeSecrets(filePath, next);
        return true;
      } catch {
        return false;
      }
    },

    async delete(account) {
      try {
        const next = readSecrets(filePath);
        if (!(account in next)) {
          return true;
        }
        delete next[account];
        writeSecrets(filePath, next);
        return true;
      } catch {
        return false;
      }
    },
  };
}

export function createMemorySecretStore(initial: Record<string, string> = {}): SecretStore {
  const values = new Map(Object.entries(initial));
  return {
    async get(account) {
      return values.get(account) ?? "";
    },
    async set(account, value) {
      const normalized = value.trim();
      if (normalized) {
        values.set(account, normalized);
      } else {
        values.delete(account);
      }
      return true;
    },
    async delete(account) {
      values.delete(account);
      return true;
    },
  };
}

function readSecrets(filePath: string): Record<string, string> {
  try {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    const raw = fs.readFileSync(filePath, "utf8");
    const parsed = JSON.parse(raw) as unknown;
    if (!parsed || typeof parsed !== "object") {
      return {};
    }

    const next: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== "string") {
        continue;
      }
      const normalizedKey = key.trim();
      const normalizedValue = value.trim();
      if (!normalizedKey || !normalizedValue) {
        continue;
      }
      next[normalizedKey] = normalizedValue;
    }
    return next;
  } catch {
    return {};
  }
}

function writeSecrets(filePath: string, payload: Record<string, string>): void {
  const entries = Object.entries(payload).filter(([key, value]) => key.trim() && value.trim());
  const normalized = Object.fromEntries(entries);
  const tmpPath = `${filePath}.tmp`;

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(tmpPath, `${JSON.stringify(normalized, null, 2)}\n`, { encoding: "utf8", mode: SECRETS_FILE_MODE });
  fs.renameSync(tmpPath, filePath);
}
