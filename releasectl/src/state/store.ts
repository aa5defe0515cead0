import { readFile, rm } from "node:fs/promises";
import path from "node:path";
import {
  StateCommitError,
  StateCorruptionError,
  StateNotFoundError,
  errnoCode,
} from "../errors.js";
import { defaultRegistry } from "../schema/registry.js";
import { nowIso } from "../util.js";
import type { BumpKind, PackageStatus, Phase, ReleaseOptions, ReleaseStateDoc } from "../types/state.js";
import { atomicWriteJson, type JsonWriter } from "./atomic.js";
import type { ReleaseLock } from "./lock.js";
import { assertTransition, isActivePhase } from "./phases.js";

export const STATE_DIR = ".releasectl";
export const STATE_FILE = "state.json";

export function statePathFor(workspacePath: string): string {
  return path.join(workspacePath, STATE_DIR, STATE_FILE);
}

export type InitializeInput = {
  release_id: string;
  bump_kind: BumpKind;
  explicit_version: string | null;
  dry_run: boolean;
  options: ReleaseOptions;
  workspace_path: string;
  source_path: string;
  source_commit: string;
  packages: readonly string[];
};

export type StoreOptions = {
  /** Replaces the temp-file + rename writer; tests use it to inject failures. */
  writer?: JsonWriter;
  /**
   * Second copy written before the primary on every commit, kept outside
   * the clone so a release survives losing it.
   */
  mirror?: string;
};

export type StateMutator = (draft: ReleaseStateDoc) => void;

export function initialState(input: InitializeInput, now = nowIso()): ReleaseStateDoc {
  return {
    schema_version: 1,
    save_version: 0,
    release_id: input.release_id,
    created_at: now,
    updated_at: now,
    bump_kind: input.bump_kind,
    explicit_version: input.explicit_version,
    dry_run: input.dry_run,
    options: { ...input.options },
    current_phase: "validation",
    failed_phase: null,
    packages: Object.fromEntries(input.packages.map((name): [string, PackageStatus] => [name, { status: "pending" }])),
    retry_counts: Object.fromEntries(input.packages.map((name): [string, number] => [name, 0])),
    workspace_path: input.workspace_path,
    source_path: input.source_path,
    source_commit: input.source_commit,
    plan: null,
    versions: null,
    manifest_backups: {},
    git: { commit: null, tag: null, pushed: false },
    github: { release_id: null, html_url: null, uploaded_artifacts: [] },
    errors: [],
    rollback: null,
  };
}

/**
 * Durable release state. Every commit rewrites the whole document atomically
 * and only then becomes visible in memory; commits are applied one at a time
 * in call order.
 */
export class ReleaseStateStore {
  private current: ReleaseStateDoc;
  private tail: Promise<unknown> = Promise.resolve();

  private constructor(
    readonly path: string,
    state: ReleaseStateDoc,
    private readonly opts: StoreOptions,
  ) {
    this.current = state;
  }

  private static async persist(statePath: string, doc: ReleaseStateDoc, opts: StoreOptions): Promise<void> {
    const writer = opts.writer ?? atomicWriteJson;
    try {
      if (opts.mirror !== undefined) await writer(opts.mirror, doc);
      await writer(statePath, doc);
    } catch (e) {
      throw new StateCommitError(statePath, e);
    }
  }

  /** Take the lock and write the first document. */
  static async initialize(
    statePath: string,
    input: InitializeInput,
    lock: ReleaseLock,
    opts: StoreOptions = {},
  ): Promise<ReleaseStateStore> {
    return ReleaseStateStore.adopt(statePath, initialState(input), lock, opts);
  }

  /** Take the lock and persist an existing document (e.g. from history) as the active state. */
  static async adopt(
    statePath: string,
    doc: ReleaseStateDoc,
    lock: ReleaseLock,
    opts: StoreOptions = {},
  ): Promise<ReleaseStateStore> {
    await lock.acquire(doc.release_id);
    try {
      await ReleaseStateStore.persist(statePath, doc, opts);
    } catch (e) {
      await lock.release(doc.release_id);
      throw e;
    }
    return new ReleaseStateStore(statePath, structuredClone(doc), opts);
  }

  static async load(statePath: string, opts: StoreOptions = {}): Promise<ReleaseStateStore> {
    return new ReleaseStateStore(statePath, await readStateFile(statePath), opts);
  }

  /** A copy of the last committed document. */
  get state(): ReleaseStateDoc {
    return structuredClone(this.current);
  }

  /**
   * Apply `mutate` to a copy and persist it. A throwing mutator or a failed
   * write leaves both memory and disk at the previous version.
   */
  commit(mutate: StateMutator): Promise<ReleaseStateDoc> {
    const apply = async (): Promise<ReleaseStateDoc> => {
      const draft = structuredClone(this.current);
      mutate(draft);
      draft.save_version = this.current.save_version + 1;
      draft.updated_at = nowIso();
      await ReleaseStateStore.persist(this.path, draft, this.opts);
      this.current = draft;
      return structuredClone(draft);
    };

    const result = this.tail.then(apply, apply);
    // keep the chain alive past a failed commit; callers see the rejection via `result`
    this.tail = result.catch(() => undefined);
    return result;
  }

  /** Commit a phase change, optionally with more edits in the same document write. */
  transition(to: Phase, mutate?: StateMutator): Promise<ReleaseStateDoc> {
    return this.commit((draft) => {
      assertTransition(draft, to);
      if (to === "failed") {
        draft.failed_phase = isActivePhase(draft.current_phase) ? draft.current_phase : null;
      } else if (to !== "rolled_back") {
        draft.failed_phase = null;
      }
      draft.current_phase = to;
      mutate?.(draft);
    });
  }

  /** Delete the state directory after the release is completed or rolled back. */
  async destroy(): Promise<void> {
    await this.tail;
    await rm(path.dirname(this.path), { recursive: true, force: true });
  }
}

export async function readStateFile(statePath: string): Promise<ReleaseStateDoc> {
  let raw: string;
  try {
    raw = await readFile(statePath, "utf8");
  } catch (e) {
    if (errnoCode(e) === "ENOENT") throw new StateNotFoundError(statePath);
    throw new StateCorruptionError(statePath, "cannot be read", e);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new StateCorruptionError(statePath, "not valid JSON", e);
  }

  const res = await (await defaultRegistry()).check("release-state", json);
  if (!res.ok) throw new StateCorruptionError(statePath, res.errors);
  return res.value;
}
