import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigError } from "../errors.js";
import { isRecord } from "../util.js";
import type { ReleasectlConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));
export const PROJECT_CONFIG_FILE = "releasectl.yaml";
export const ENV_PREFIX = "RELEASECTL_";

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const prev = result[key];
      result[key] = deepMerge(isRecord(prev) ? prev : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or {} if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`${filePath}: ${e instanceof Error ? e.message : String(e)}`, e);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError(`${filePath}: expected a mapping at the top level`);
  return parsed;
}

/**
 * RELEASECTL_PUBLISH__MAX_CONCURRENCY=2 → { publish: { max_concurrency: 2 } }.
 * Values are read as YAML scalars so numbers and booleans keep their type.
 * RELEASECTL_HOME is a plain path, not a config key.
 */
export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  let overrides: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || raw === undefined || key === `${ENV_PREFIX}HOME`) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let layer: Record<string, unknown> = { [segments[segments.length - 1]]: parseScalar(raw) };
    for (const segment of segments.slice(0, -1).reverse()) layer = { [segment]: layer };
    overrides = deepMerge(overrides, layer);
  }
  return overrides;
}

function parseScalar(raw: string): unknown {
  try {
    return YAML.parse(raw);
  } catch {
    return raw;
  }
}

export type LoadConfigOptions = {
  /** Workspace root; `releasectl.yaml` there is the project layer. */
  root: string;
  /** Explicit project config file, replacing `<root>/releasectl.yaml`. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  configDir?: string;
};

/**
 * Load layered config: base.yaml ← project releasectl.yaml ← environment.
 * The merged result is schema-checked before it is returned.
 */
export async function loadConfig(opts: LoadConfigOptions): Promise<ReleasectlConfig> {
  const dir = opts.configDir ?? CONFIG_DIR;

  const base = loadYaml(path.join(dir, "base.yaml"));

  const projectFile = opts.configFile
    ? path.resolve(opts.root, opts.configFile)
    : path.join(opts.root, PROJECT_CONFIG_FILE);
  if (opts.configFile && !fs.existsSync(projectFile)) {
    throw new ConfigError(`config file not found: ${projectFile}`);
  }
  let merged = deepMerge(base, loadYaml(projectFile));

  merged = deepMerge(merged, envOverrides(opts.env ?? process.env));

  const res = await validateConfig(merged);
  if (!res.ok) throw new ConfigError(`invalid configuration: ${res.errors}`);
  return res.config;
}
