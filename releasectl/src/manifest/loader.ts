import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";
import semver from "semver";
import { ManifestParseError, UnknownDependencyError } from "../errors.js";
import { isRecord, isStringRecord } from "../util.js";
import {
  DEPENDENCY_FIELDS,
  RUNTIME_DEPENDENCY_FIELDS,
  type InternalRef,
  type PackageDescriptor,
  type RegistryTarget,
} from "../types/package.js";

const SKIP_DIRS = new Set(["node_modules", ".git", ".releasectl", "dist"]);
const GITHUB_REGISTRY = "npm.pkg.github.com";

type RawManifest = {
  manifestPath: string;
  name: string;
  version: string;
  private: boolean;
  deps: Array<{ field: (typeof DEPENDENCY_FIELDS)[number]; name: string; range: string }>;
  publishRegistry: string | null;
};

export async function readJsonManifest(manifestPath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(manifestPath, "utf8");
  } catch (e) {
    throw new ManifestParseError(manifestPath, "cannot read manifest", e);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new ManifestParseError(manifestPath, `invalid JSON: ${e instanceof Error ? e.message : String(e)}`, e);
  }
  if (!isRecord(parsed)) throw new ManifestParseError(manifestPath, "expected a JSON object");
  return parsed;
}

function parseManifest(manifestPath: string, json: Record<string, unknown>): RawManifest {
  const { name, version } = json;
  if (typeof name !== "string" || name.length === 0) {
    throw new ManifestParseError(manifestPath, "missing \"name\"");
  }
  if (typeof version !== "string" || semver.valid(version) === null) {
    throw new ManifestParseError(manifestPath, `"version" is not a valid semantic version: ${String(version)}`);
  }

  const deps: RawManifest["deps"] = [];
  for (const field of DEPENDENCY_FIELDS) {
    const block = json[field];
    if (block === undefined) continue;
    if (!isStringRecord(block)) throw new ManifestParseError(manifestPath, `"${field}" must map names to ranges`);
    for (const [dep, range] of Object.entries(block)) deps.push({ field, name: dep, range });
  }

  const publishConfig = json.publishConfig;
  const registry = isRecord(publishConfig) && typeof publishConfig.registry === "string" ? publishConfig.registry : null;

  return { manifestPath, name, version, private: json.private === true, deps, publishRegistry: registry };
}

function registryTargetOf(raw: RawManifest): RegistryTarget {
  if (raw.private) return "none";
  if (raw.publishRegistry !== null && raw.publishRegistry.includes(GITHUB_REGISTRY)) return "github";
  return "npm";
}

/** Root `workspaces` in either array or `{ packages: [...] }` form. */
function workspacePatterns(root: Record<string, unknown>): string[] {
  const ws = root.workspaces;
  const list = isRecord(ws) ? ws.packages : ws;
  if (!Array.isArray(list)) return [];
  return list.filter((p): p is string => typeof p === "string");
}

async function findPackageDirs(root: string, patterns: readonly string[]): Promise<string[]> {
  const include = patterns.filter((p) => !p.startsWith("!")).map(normalizePattern);
  const exclude = patterns.filter((p) => p.startsWith("!")).map((p) => normalizePattern(p.slice(1)));
  const found: string[] = [];

  const walk = async (rel: string): Promise<void> => {
    const entries = await readdir(path.join(root, rel), { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isDirectory() || SKIP_DIRS.has(entry.name)) continue;
      const childRel = rel ? `${rel}/${entry.name}` : entry.name;
      const matched = include.some((p) => minimatch(childRel, p)) && !exclude.some((p) => minimatch(childRel, p));
      if (matched) {
        const hasManifest = (await readdir(path.join(root, childRel))).includes("package.json");
        if (hasManifest) found.push(childRel);
      }
      await walk(childRel);
    }
  };
  await walk("");

  return found.sort();
}

function normalizePattern(p: string): string {
  return p.replace(/^\.\//, "").replace(/\/+$/, "");
}

export type LoadManifestsOptions = {
  root: string;
  /** Overrides the root package.json `workspaces` globs. */
  patterns?: readonly string[];
};

/**
 * Read every workspace package's descriptor. A repository without workspace
 * globs is treated as a single package at the root. Reads files only.
 */
export async function loadManifests(opts: LoadManifestsOptions): Promise<PackageDescriptor[]> {
  const root = path.resolve(opts.root);
  const rootManifestPath = path.join(root, "package.json");
  const rootJson = await readJsonManifest(rootManifestPath);

  const patterns = opts.patterns && opts.patterns.length > 0 ? opts.patterns : workspacePatterns(rootJson);

  const raws: RawManifest[] = [];
  if (patterns.length === 0) {
    raws.push(parseManifest(rootManifestPath, rootJson));
  } else {
    for (const rel of await findPackageDirs(root, patterns)) {
      const manifestPath = path.join(root, rel, "package.json");
      raws.push(parseManifest(manifestPath, await readJsonManifest(manifestPath)));
    }
  }

  const byName = new Map<string, RawManifest>();
  for (const raw of raws) {
    const prev = byName.get(raw.name);
    if (prev) throw new ManifestParseError(raw.manifestPath, `duplicate package name ${raw.name} (also ${prev.manifestPath})`);
    byName.set(raw.name, raw);
  }

  return raws.map((raw) => {
    const internalRefs: InternalRef[] = [];
    const internalDeps = new Set<string>();
    for (const dep of raw.deps) {
      if (!byName.has(dep.name)) {
        // workspace: ranges can only point inside the workspace
        if (dep.range.startsWith("workspace:")) throw new UnknownDependencyError(raw.name, dep.name);
        continue;
      }
      internalRefs.push({ field: dep.field, name: dep.name, range: dep.range });
      if (RUNTIME_DEPENDENCY_FIELDS.includes(dep.field)) internalDeps.add(dep.name);
    }

    const descriptor: PackageDescriptor = {
      name: raw.name,
      version: raw.version,
      path: path.dirname(raw.manifestPath),
      manifestPath: raw.manifestPath,
      internalDeps,
      internalRefs: Object.freeze(internalRefs),
      registryTarget: registryTargetOf(raw),
      private: raw.private,
    };
    return Object.freeze(descriptor);
  });
}
