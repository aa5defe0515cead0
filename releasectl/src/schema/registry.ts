import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvInstance } from "./ajv.js";
import type { ReleasectlConfig } from "../types/config.js";
import type { LockRecord, ReleaseStateDoc, WorkspacePointer } from "../types/state.js";

/** Document type each bundled schema describes. */
export type SchemaTypes = {
  config: ReleasectlConfig;
  "release-state": ReleaseStateDoc;
  "workspace-pointer": WorkspacePointer;
  "release-lock": LockRecord;
};

export type SchemaName = keyof SchemaTypes;

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type CheckResult<T> = { ok: true; value: T } | { ok: false; errors: string };

/**
 * Schema registry: discovers the bundled JSON Schemas and checks documents
 * against them.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "release-state.schema.json" → "release-state"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version, e.g. { "release-state": "1.0.0" }. */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) result[name] = entry.version;
    return result;
  }

  /** Validate `data`; on success the value comes back typed. */
  async check<K extends SchemaName>(name: K, data: unknown): Promise<CheckResult<SchemaTypes[K]>> {
    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    if (!this.ajv) this.ajv = await loadAjv();

    // ajv caches compiled schemas by identity
    const validate = this.ajv.compile<SchemaTypes[K]>(entry.schema);
    if (validate(data)) return { ok: true, value: data };
    return { ok: false, errors: this.ajv.errorsText(validate.errors) };
  }
}

function extractVersion(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null || !("$id" in schema)) return null;
  if (typeof schema.$id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
  return m ? m[1] : null;
}

export const SCHEMA_DIR = fileURLToPath(new URL("../../schemas", import.meta.url));

/** Create and load a registry from the bundled schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? SCHEMA_DIR);
  await registry.load();
  return registry;
}

let shared: Promise<SchemaRegistry> | null = null;

/** Process-wide registry over the bundled schemas. */
export function defaultRegistry(): Promise<SchemaRegistry> {
  shared ??= createRegistry();
  return shared;
}
