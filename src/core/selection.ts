import type { ApiProfile } from "../profiles.js";

export type ResolvedSelection = {
  profile: ApiProfile | null;
  model: string;
};

export function parseModelList(modelsCsv: string): string[] {
  const seen = new Set<string>();
  const models: string[] = [];
  for (const raw of modelsCsv.split(",")) {
    const model = raw.trim();
    if (!model || seen.has(model)) {
      continue;
    }
    seen.add(model);
    models.push(model);
  }
  return models;
}

export function reconcileProfile(profiles: readonly ApiProfile[], currentId: string | null): ApiProfile | null {
  if (currentId) {
    const current = profiles.find((profile) => profile.id === currentId);
    if (current) {
      return current;
    }
  }
  return profiles[0] ?? null;
}

export function reconcileModel(profile: ApiProfile | null, currentModel: string): string {
  if (!profile) {
    return "";
  }
  const models = parseModelList(profile.models);
  const trimmed = currentModel.trim();
  if (trimmed && models.includes(trimmed)) {
    return trimmed;
  }
  return models[0] ?? "";
}

export function resolveSelection(
  profiles: readonly ApiProfile[],
  currentId: string | null,
  currentModel: string,
): ResolvedSelection {
  const profile = reconcileProfile(profiles, currentId);
  return {
    profile,
    model: reconcileModel(profile, currentModel),
  };
}
