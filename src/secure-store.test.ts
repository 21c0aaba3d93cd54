import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { createFileSecretStore, createMemorySecretStore } from "./secure-store.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeSecretsPath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "parley-secrets-"));
  tempDirs.push(dir);
  return path.join(dir, "secrets.json");
}

describe("createFileSecretStore", () => {
  it("stores trimmed values readable by a second store", async () => {
    const filePath = makeSecretsPath();
    const store = createFileSecretStore(filePath);

    expect(await store.set("profile-api-key:p1", "  test-secret  ")).toBe(true);

    expect(await createFileSecretStore(filePath).get("profile-api-key:p1")).toBe("test-secret");
    expect(await store.get("profile-api-key:missing")).toBe("");
  });

  it.skipIf(process.platform === "win32")("writes the file readable by the owner only", async () => {
    const filePath = makeSecretsPath();
    await createFileSecretStore(filePath).set("account", "test-secret");

    expect(fs.statSync(filePath).mode & 0o777).toBe(0o600);
  });

  it("deletes an entry when set to an empty value", async () => {
    const filePath = makeSecretsPath();
    const store = createFileSecretStore(filePath);
    await store.set("account", "test-secret");

    await store.set("account", "   ");

    expect(await store.get("account")).toBe("");
    expect(JSON.parse(fs.readFileSync(filePath, "utf8"))).toEqual({});
  });

  it("treats a corrupt file as empty", async () => {
    const filePath = makeSecretsPath();
    fs.writeFileSync(filePath, "not json", "utf8");

    expect(await createFileSecretStore(filePath).get("account")).toBe("");
  });
});

describe("createMemorySecretStore", () => {
  it("keeps values in memory", async () => {
    const store = createMemorySecretStore({ seeded: "test-secret" });

    expect(await store.get("seeded")).toBe("test-secret");
    await store.delete("seeded");
    expect(await store.get("seeded")).toBe("");
  });
});
