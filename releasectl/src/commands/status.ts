import { summarizeHistory, type HistoryEntry } from "../state/history.js";
import { isProcessAlive } from "../state/lock.js";
import { readStateFile, statePathFor } from "../state/store.js";
import { formatPackageTable } from "../output/summary.js";
import type { LockRecord, ReleaseStateDoc, WorkspacePointer } from "../types/state.js";
import { failure, openRuntime, type CommandContext, type CommandFailure } from "./context.js";

export type StatusResult =
  | { ok: true; kind: "active"; workspace: WorkspacePointer; state: ReleaseStateDoc; lock: LockRecord | null }
  | { ok: true; kind: "history"; entries: HistoryEntry[] }
  | CommandFailure;

export function statusLines(state: ReleaseStateDoc, workspace: WorkspacePointer, lock: LockRecord | null): string[] {
  const phase =
    state.current_phase === "failed" ? `failed (during ${state.failed_phase ?? "unknown"})` : state.current_phase;
  const lines = [
    `release ${state.release_id} (${state.bump_kind}${state.explicit_version ? ` ${state.explicit_version}` : ""}${state.dry_run ? ", dry run" : ""})`,
    `phase: ${phase}`,
  ];
  if (state.versions) lines.push(`version: ${state.versions.release_version} (tag ${state.versions.tag})`);
  lines.push(`workspace: ${workspace.path}`);
  lines.push(lock ? `lock: pid ${lock.pid}${isProcessAlive(lock.pid) ? "" : " (not running)"}` : "lock: none");
  if (state.github.html_url) lines.push(`release entry: ${state.github.html_url}`);
  lines.push("packages:", ...formatPackageTable(state));
  const last = state.errors[state.errors.length - 1];
  if (last) lines.push(`last error: [${last.code}] ${last.message}`);
  return lines;
}

/** Show the active release, or with `history` the finished ones. Read-only. */
export async function status(ctx: CommandContext, opts: { history?: boolean } = {}): Promise<StatusResult> {
  try {
    const rt = await openRuntime(ctx);

    if (opts.history) {
      const entries = (await rt.history.list()).map(summarizeHistory);
      const lines =
        entries.length === 0
          ? ["No finished releases."]
          : entries.map((e) => `${e.release_id}  ${e.current_phase}  ${e.tag ?? "-"}  ${e.updated_at}`);
      ctx.reporter.block("HISTORY", lines, { releases: entries });
      return { ok: true, kind: "history", entries };
    }

    const workspace = await rt.workspaces.locate();
    const state = await readStateFile(statePathFor(workspace.path));
    const lock = await rt.lock.read();
    ctx.reporter.block("STATUS", statusLines(state, workspace, lock), { state, lock });
    return { ok: true, kind: "active", workspace, state, lock };
  } catch (e) {
    return failure(ctx, e);
  }
}
