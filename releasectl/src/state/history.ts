import { readFile, readdir, rm } from "node:fs/promises";
import path from "node:path";
import { errnoCode } from "../errors.js";
import { ignoreWarnings, type WarningSink } from "../output/reporter.js";
import { defaultRegistry } from "../schema/registry.js";
import type { ReleaseStateDoc } from "../types/state.js";
import { atomicWriteJson } from "./atomic.js";

export type HistoryEntry = {
  release_id: string;
  current_phase: ReleaseStateDoc["current_phase"];
  release_version: string | null;
  tag: string | null;
  updated_at: string;
};

/**
 * Final state documents of finished releases, kept under the home directory
 * once the isolated clone (and the state file in it) is gone.
 */
export class ReleaseHistory {
  constructor(
    readonly dir: string,
    private readonly warn: WarningSink = ignoreWarnings,
  ) {}

  async record(state: ReleaseStateDoc): Promise<string> {
    const file = path.join(this.dir, `${state.release_id}.json`);
    await atomicWriteJson(file, state);
    return file;
  }

  async get(releaseId: string): Promise<ReleaseStateDoc | null> {
    let raw: string;
    try {
      raw = await readFile(path.join(this.dir, `${releaseId}.json`), "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return null;
      throw e;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.warn("HISTORY_UNREADABLE", `ignoring history record ${releaseId}: not valid JSON`, { release_id: releaseId });
      return null;
    }
    const res = await (await defaultRegistry()).check("release-state", json);
    if (!res.ok) {
      this.warn("HISTORY_UNREADABLE", `ignoring unreadable history record ${releaseId}: ${res.errors}`, {
        release_id: releaseId,
      });
      return null;
    }
    return res.value;
  }

  /** Newest first. */
  async list(): Promise<ReleaseStateDoc[]> {
    let files: string[];
    try {
      files = (await readdir(this.dir)).filter((f) => f.endsWith(".json"));
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw e;
    }
    const docs: ReleaseStateDoc[] = [];
    for (const file of files) {
      const doc = await this.get(file.replace(/\.json$/, ""));
      if (doc) docs.push(doc);
    }
    return docs.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
  }

  async latest(): Promise<ReleaseStateDoc | null> {
    const [first] = await this.list();
    return first ?? null;
  }

  async clear(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true });
  }
}

export function summarizeHistory(doc: ReleaseStateDoc): HistoryEntry {
  return {
    release_id: doc.release_id,
    current_phase: doc.current_phase,
    release_version: doc.versions?.release_version ?? null,
    tag: doc.git.tag,
    updated_at: doc.updated_at,
  };
}
