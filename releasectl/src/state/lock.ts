import { mkdir, open, readFile, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { AlreadyInProgressError, StateCorruptionError, errnoCode } from "../errors.js";
import { defaultRegistry } from "../schema/registry.js";
import { ignoreWarnings, type WarningSink } from "../output/reporter.js";
import { nowIso } from "../util.js";
import type { LockRecord } from "../types/state.js";
import { atomicWriteJson } from "./atomic.js";

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // signal 0 checks existence
    return true;
  } catch (e) {
    return errnoCode(e) === "EPERM";
  }
}

/**
 * Exclusive "one active release per source workspace" lock.
 *
 * Acquisition is a single create-if-absent (`wx`); nothing is ever queued.
 * A lock left behind by a crashed or interrupted process stays in place
 * until `resume` or `rollback` reclaims it for the same release, or
 * `cleanup` removes it.
 */
export class ReleaseLock {
  constructor(
    readonly path: string,
    private readonly pid: number = process.pid,
    private readonly warn: WarningSink = ignoreWarnings,
  ) {}

  async read(): Promise<LockRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return null;
      throw e;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new StateCorruptionError(this.path, "lock file is not JSON", e);
    }
    const res = await (await defaultRegistry()).check("release-lock", json);
    if (!res.ok) throw new StateCorruptionError(this.path, res.errors);
    return res.value;
  }

  /** Create the lock for `releaseId`; holding it already is not an error. */
  async acquire(releaseId: string): Promise<LockRecord> {
    await mkdir(dirname(this.path), { recursive: true });
    const record: LockRecord = { pid: this.pid, release_id: releaseId, acquired_at: nowIso() };

    try {
      const fh = await open(this.path, "wx");
      try {
        await fh.writeFile(JSON.stringify(record, null, 2) + "\n", "utf8");
        await fh.sync();
      } finally {
        await fh.close();
      }
      return record;
    } catch (e) {
      if (errnoCode(e) !== "EEXIST") throw e;
    }

    const holder = await this.read();
    if (holder && holder.release_id === releaseId && holder.pid === this.pid) return holder;
    throw new AlreadyInProgressError(holder);
  }

  /**
   * Take over the lock of an interrupted run of `releaseId`. Refused while
   * another live process holds it, or when it belongs to another release.
   */
  async reclaim(releaseId: string): Promise<LockRecord> {
    const holder = await this.read();
    if (!holder) return this.acquire(releaseId);
    if (holder.release_id !== releaseId) throw new AlreadyInProgressError(holder);
    if (holder.pid !== this.pid && isProcessAlive(holder.pid)) throw new AlreadyInProgressError(holder);

    const record: LockRecord = { pid: this.pid, release_id: releaseId, acquired_at: nowIso() };
    await atomicWriteJson(this.path, record);
    return record;
  }

  /** Remove the lock if it belongs to `releaseId`. */
  async release(releaseId: string): Promise<void> {
    const holder = await this.read();
    if (!holder) return;
    if (holder.release_id !== releaseId) {
      this.warn("LOCK_FOREIGN", `lock now belongs to release ${holder.release_id}; leaving it: ${this.path}`, {
        lock: this.path,
        holder: holder.release_id,
      });
      return;
    }
    await this.remove();
  }

  /** Remove whatever lock is present. Returns whether one existed. */
  async forceRelease(): Promise<boolean> {
    return this.remove();
  }

  private async remove(): Promise<boolean> {
    try {
      await unlink(this.path);
      return true;
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return false;
      throw e;
    }
  }
}
