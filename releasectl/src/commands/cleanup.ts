import { AlreadyInProgressError, StateCorruptionError, WorkspaceLostError } from "../errors.js";
import { isProcessAlive } from "../state/lock.js";
import type { LockRecord, WorkspacePointer } from "../types/state.js";
import { failure, openRuntime, type CommandContext, type CommandFailure } from "./context.js";

export type CleanupOpts = {
  /** Also clear a lock held by a running process, or an unreadable lock or pointer. */
  force?: boolean;
  /** Also delete the release history. */
  all?: boolean;
};

export type CleanupResult = { ok: true; removed: string[] } | CommandFailure;

/**
 * Abandon the active release: remove its clone, pointer and lock. Nothing in
 * the source checkout is touched, and nothing already pushed or published is
 * undone.
 */
export async function cleanup(ctx: CommandContext, opts: CleanupOpts = {}): Promise<CleanupResult> {
  try {
    const rt = await openRuntime(ctx);
    const removed: string[] = [];

    let lock: LockRecord | null;
    try {
      lock = await rt.lock.read();
    } catch (e) {
      if (!(opts.force && e instanceof StateCorruptionError)) throw e;
      lock = null;
    }
    if (lock && !opts.force && lock.pid !== process.pid && isProcessAlive(lock.pid)) {
      throw new AlreadyInProgressError(lock);
    }

    let pointer: WorkspacePointer | null;
    try {
      pointer = await rt.workspaces.peek();
    } catch (e) {
      if (!(opts.force && e instanceof WorkspaceLostError)) throw e;
      await rt.workspaces.clearPointer();
      pointer = null;
      removed.push("unreadable workspace pointer");
    }
    if (pointer) {
      await rt.workspaces.release(pointer, { keep: false });
      removed.push(pointer.path);
    }

    if (await rt.lock.forceRelease()) removed.push(rt.lock.path);

    if (opts.all) {
      await rt.history.clear();
      removed.push(rt.history.dir);
    }

    const lines = removed.length === 0 ? ["Nothing to clean up."] : removed.map((r) => `removed ${r}`);
    ctx.reporter.block("CLEANUP", lines, { removed });
    return { ok: true, removed };
  } catch (e) {
    return failure(ctx, e);
  }
}
