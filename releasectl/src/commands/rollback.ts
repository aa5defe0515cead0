import { rm } from "node:fs/promises";
import { RollbackEngine, type RollbackReport } from "../core/rollback.js";
import { StateCorruptionError, StateNotFoundError, WorkspaceAbsentError, WorkspaceLostError } from "../errors.js";
import { ReleaseStateStore, readStateFile, statePathFor } from "../state/store.js";
import type { ReleaseStateDoc, WorkspacePointer } from "../types/state.js";
import {
  collaboratorsFor,
  failure,
  openActiveRelease,
  openRuntime,
  storeOptions,
  type ActiveRelease,
  type CommandContext,
  type CommandFailure,
  type Runtime,
} from "./context.js";

export type RollbackCommandResult = { ok: true; report: RollbackReport } | CommandFailure;

/**
 * Put `doc` into a fresh clone and make it the active state. A commit and
 * tag that never left the old clone are forgotten along with its loose
 * manifest edits.
 */
async function replayIntoClone(rt: Runtime, source: ReleaseStateDoc, keepPointerOnFailure: boolean): Promise<ActiveRelease> {
  let workspace: WorkspacePointer | null = null;
  try {
    workspace = await rt.workspaces.acquire(source.release_id);
    const doc = structuredClone(source);
    doc.workspace_path = workspace.path;
    doc.manifest_backups = {};
    if (!doc.git.pushed) doc.git = { commit: null, tag: null, pushed: false };
    const store = await ReleaseStateStore.adopt(statePathFor(workspace.path), doc, rt.lock, storeOptions(rt));
    return { workspace, store };
  } catch (e) {
    if (workspace !== null) {
      // the mirror must outlive a failed attempt so rollback can run again
      if (keepPointerOnFailure) await rm(workspace.path, { recursive: true, force: true });
      else await rt.workspaces.release(workspace, { keep: false });
    }
    await rt.lock.release(source.release_id);
    throw e;
  }
}

/**
 * A completed release leaves no clone behind. With --force the last history
 * record is replayed into a fresh clone so its commit and tag can be undone.
 */
async function reopenCompleted(rt: Runtime, absent: WorkspaceAbsentError): Promise<ActiveRelease> {
  const last = await rt.history.latest();
  if (last === null || last.current_phase !== "completed") throw absent;

  await rt.lock.acquire(last.release_id);
  return replayIntoClone(rt, last, false);
}

/** The clone of an active release vanished; its mirrored state says what to undo. */
async function reopenLost(rt: Runtime, lost: WorkspaceLostError): Promise<ActiveRelease> {
  let doc: ReleaseStateDoc;
  try {
    doc = await readStateFile(rt.workspaces.mirrorPath);
  } catch (e) {
    if (e instanceof StateNotFoundError) throw lost;
    throw e;
  }
  const pointer = await rt.workspaces.peek();
  if (pointer !== null && pointer.release_id !== doc.release_id) {
    throw new StateCorruptionError(
      rt.workspaces.mirrorPath,
      `mirror belongs to release ${doc.release_id}, pointer names ${pointer.release_id}`,
    );
  }

  await rt.lock.reclaim(doc.release_id);
  return replayIntoClone(rt, doc, true);
}

export function rollbackLines(report: RollbackReport): string[] {
  const lines = [`release ${report.releaseId} rolled back`];
  if (report.performed.length > 0) lines.push(`undone: ${report.performed.join(", ")}`);
  if (report.alreadyDone.length > 0) lines.push(`already undone earlier: ${report.alreadyDone.join(", ")}`);
  if (report.abandoned.length > 0) lines.push(`abandoned: ${report.abandoned.join(", ")}`);
  for (const p of report.notUnpublished) lines.push(`not unpublished: ${p.name}@${p.version}`);
  return lines;
}

export async function rollback(ctx: CommandContext, opts: { force?: boolean } = {}): Promise<RollbackCommandResult> {
  try {
    const rt = await openRuntime(ctx);

    let active: ActiveRelease;
    try {
      active = await openActiveRelease(rt);
    } catch (e) {
      if (e instanceof WorkspaceLostError) active = await reopenLost(rt, e);
      else if (opts.force && e instanceof WorkspaceAbsentError) active = await reopenCompleted(rt, e);
      else throw e;
      ctx.reporter.info("ROLLBACK_REOPENED", `re-cloned ${active.workspace.path} to roll back ${active.workspace.release_id}`);
    }

    const engine = new RollbackEngine({
      store: active.store,
      workspace: active.workspace,
      workspaces: rt.workspaces,
      lock: rt.lock,
      history: rt.history,
      collaborators: await collaboratorsFor(ctx, rt, active.workspace.path),
      reporter: ctx.reporter,
    });
    const report = await engine.rollback({ force: opts.force });
    ctx.reporter.block("ROLLBACK_DONE", rollbackLines(report), { report });
    return { ok: true, report };
  } catch (e) {
    return failure(ctx, e);
  }
}
