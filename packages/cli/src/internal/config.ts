import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { APIS, type Api, type CompilationContextOptions } from "@gridweave/compiler";

export const CONFIG_FILE = "gridweave.json";

export type ProjectConfig = {
  readonly schema: 1;
  readonly api: Api;
  /** Absolute, resolved against the directory holding the config file. */
  readonly includePaths: readonly string[];
  readonly profile: readonly string[];
  readonly loopTypes?: Readonly<Record<string, string>>;
  readonly gridProperties?: readonly string[];
  readonly openmp?: {
    readonly loopType: string;
  };
};

export type ProjectContext = {
  /** Null when no config file was found and the defaults apply. */
  readonly projectRoot: string | null;
  readonly config: ProjectConfig;
};

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return value as Record<string, unknown>;
}

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string" && entry.length > 0)) {
    throw new Error(`${label} must be an array of non-empty strings.`);
  }
  return value;
}

function asStringMap(value: unknown, label: string): Readonly<Record<string, string>> {
  const record = asRecord(value, label);
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(record)) {
    out[key] = asString(entry, `${label.slice(0, -1)}.${key}'`);
  }
  return out;
}

function asApi(value: unknown, label: string): Api {
  const api = APIS.find((a) => a === value);
  if (api === undefined) {
    throw new Error(`${label} must be one of ${APIS.map((a) => `'${a}'`).join(", ")}.`);
  }
  return api;
}

export function defaultProjectConfig(): ProjectConfig {
  return { schema: 1, api: "generic", includePaths: [], profile: [] };
}

/** Parses a config value. Relative include paths are resolved against `baseDir`. */
export function parseProjectConfig(value: unknown, baseDir: string): ProjectConfig {
  const root = asRecord(value, CONFIG_FILE);
  assertKnownKeys(
    root,
    ["schema", "api", "includePaths", "profile", "loopTypes", "gridProperties", "openmp"],
    CONFIG_FILE
  );

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${CONFIG_FILE} schema.`);
  }

  const api = root.api === undefined ? "generic" : asApi(root.api, `${CONFIG_FILE}: 'api'`);
  const includePaths =
    root.includePaths === undefined
      ? []
      : asStringArray(root.includePaths, `${CONFIG_FILE}: 'includePaths'`).map((p) => resolve(baseDir, p));
  const profile = root.profile === undefined ? [] : asStringArray(root.profile, `${CONFIG_FILE}: 'profile'`);
  const loopTypes = root.loopTypes === undefined ? undefined : asStringMap(root.loopTypes, `${CONFIG_FILE}: 'loopTypes'`);
  const gridProperties =
    root.gridProperties === undefined
      ? undefined
      : asStringArray(root.gridProperties, `${CONFIG_FILE}: 'gridProperties'`);

  let openmp: { readonly loopType: string } | undefined;
  if (root.openmp !== undefined) {
    const raw = asRecord(root.openmp, `${CONFIG_FILE}: 'openmp'`);
    assertKnownKeys(raw, ["loopType"], `${CONFIG_FILE}: 'openmp'`);
    openmp = { loopType: asString(raw.loopType, `${CONFIG_FILE}: 'openmp.loopType'`) };
  }

  return {
    schema: 1,
    api,
    includePaths,
    profile,
    ...(loopTypes ? { loopTypes } : {}),
    ...(gridProperties ? { gridProperties } : {}),
    ...(openmp ? { openmp } : {}),
  };
}

export function loadProjectConfig(path: string): ProjectConfig {
  const raw = readFileSync(path, "utf-8");
  let value: unknown;
  try {
    value = JSON.parse(raw) as unknown;
  } catch (err: unknown) {
    throw new Error(`${CONFIG_FILE}: invalid JSON (${err instanceof Error ? err.message : String(err)}).`);
  }
  return parseProjectConfig(value, dirname(path));
}

/** The nearest directory at or above `fromDir` holding a config file, or null. */
export function findProjectRoot(fromDir: string): string | null {
  let cur = resolve(fromDir);
  while (true) {
    if (existsSync(join(cur, CONFIG_FILE))) return cur;
    const parent = dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
}

export function loadProjectContext(fromDir: string): ProjectContext {
  const projectRoot = findProjectRoot(fromDir);
  if (projectRoot === null) return { projectRoot, config: defaultProjectConfig() };
  return { projectRoot, config: loadProjectConfig(join(projectRoot, CONFIG_FILE)) };
}

export function contextOptions(config: ProjectConfig): CompilationContextOptions {
  return {
    profile: config.profile,
    ...(config.loopTypes ? { loopTypes: config.loopTypes } : {}),
    ...(config.gridProperties ? { gridProperties: config.gridProperties } : {}),
  };
}
