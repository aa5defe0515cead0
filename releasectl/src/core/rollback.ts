import path from "node:path";
import { RollbackRefusedError, RollbackStepError } from "../errors.js";
import type { Reporter } from "../output/reporter.js";
import type { ReleaseHistory } from "../state/history.js";
import type { ReleaseLock } from "../state/lock.js";
import type { ReleaseStateStore } from "../state/store.js";
import type { Collaborators } from "../types/collaborators.js";
import type { ReleaseStateDoc, WorkspacePointer } from "../types/state.js";
import { nowIso } from "../util.js";
import type { WorkspaceManager } from "../workspace/isolated.js";

/** Undo steps, latest phase first. */
export const ROLLBACK_STEPS = ["publishing", "github_release", "git_tag", "git_commit", "manifests"] as const;
export type RollbackStep = (typeof ROLLBACK_STEPS)[number];

export type RollbackReport = {
  releaseId: string;
  /** Steps run by this invocation. */
  performed: RollbackStep[];
  /** Steps a previous, interrupted rollback already finished. */
  alreadyDone: RollbackStep[];
  /** Registry releases stay; they are listed, never unpublished. */
  notUnpublished: Array<{ name: string; version: string }>;
  abandoned: string[];
};

export type RollbackEngineOptions = {
  store: ReleaseStateStore;
  workspace: WorkspacePointer;
  workspaces: WorkspaceManager;
  lock: ReleaseLock;
  history: ReleaseHistory;
  collaborators: Pick<Collaborators, "git" | "host" | "manifests">;
  reporter: Reporter;
};

/**
 * Undoes whatever a release got done, in reverse phase order. Each finished
 * step is recorded in `state.rollback.steps`, so a rollback that fails part
 * way can be run again and picks up where it stopped.
 */
export class RollbackEngine {
  constructor(private readonly opts: RollbackEngineOptions) {}

  async rollback({ force = false }: { force?: boolean } = {}): Promise<RollbackReport> {
    const { store, reporter } = this.opts;
    let state = store.state;

    if (state.current_phase === "rolled_back") {
      throw new RollbackRefusedError(`release ${state.release_id} is already rolled back`);
    }
    if (state.current_phase === "completed" && !force) {
      throw new RollbackRefusedError(`release ${state.release_id} completed; refusing to roll it back without --force`);
    }

    if (state.rollback === null) {
      state = await store.commit((d) => {
        d.rollback = { started_at: nowIso(), steps: [] };
      });
    }

    const report: RollbackReport = {
      releaseId: state.release_id,
      performed: [],
      alreadyDone: [],
      notUnpublished: [],
      abandoned: [],
    };

    for (const step of ROLLBACK_STEPS) {
      const current = store.state;
      if (current.rollback?.steps.includes(step)) {
        report.alreadyDone.push(step);
        continue;
      }
      try {
        await this.undo(step, current, report);
        await store.commit((d) => {
          d.rollback?.steps.push(step);
        });
      } catch (e) {
        throw new RollbackStepError(step, e);
      }
      report.performed.push(step);
    }

    const final = await store.transition("rolled_back");
    await this.opts.history.record(final);
    await store.destroy();
    await this.opts.workspaces.release(this.opts.workspace, { keep: false });
    await this.opts.lock.release(final.release_id);
    reporter.info("ROLLED_BACK", `release ${final.release_id} rolled back`, { steps: report.performed });
    return report;
  }

  private async undo(step: RollbackStep, state: ReleaseStateDoc, report: RollbackReport): Promise<void> {
    const { store, collaborators, reporter, workspace } = this.opts;

    switch (step) {
      case "publishing": {
        const at = nowIso();
        for (const [name, s] of Object.entries(state.packages)) {
          if (s.status === "published") report.notUnpublished.push({ name, version: s.version });
          else if (s.status === "pending" || s.status === "in_progress") report.abandoned.push(name);
        }
        report.notUnpublished.sort((a, b) => a.name.localeCompare(b.name));
        report.abandoned.sort();
        await store.commit((d) => {
          for (const name of report.abandoned) {
            d.packages[name] = { status: "skipped", reason: "release rolled back", cause: "rollback", at };
          }
        });
        for (const p of report.notUnpublished) {
          reporter.warn("NOT_UNPUBLISHED", `${p.name}@${p.version} stays on the registry`, { package: p.name });
        }
        return;
      }

      case "github_release": {
        let releaseId = state.github.release_id;
        // created but not recorded before the crash; an unpushed tag never got one
        if (releaseId === null && state.git.pushed && state.git.tag !== null && state.options.github_release && !state.dry_run) {
          const found = await collaborators.host.findReleaseByTag(state.git.tag);
          releaseId = found?.id ?? null;
        }
        if (releaseId === null) return;
        await collaborators.host.deleteRelease(releaseId);
        await store.commit((d) => {
          d.github = { release_id: null, html_url: null, uploaded_artifacts: [] };
        });
        reporter.info("ROLLBACK_STEP", `deleted release entry ${releaseId}`, { step });
        return;
      }

      case "git_tag": {
        const tag = state.git.tag;
        if (tag === null) return;
        await collaborators.git.deleteTag(tag, { remote: state.git.pushed });
        reporter.info("ROLLBACK_STEP", `deleted tag ${tag}${state.git.pushed ? " (local and remote)" : ""}`, { step });
        return;
      }

      case "git_commit": {
        const commit = state.git.commit;
        if (commit === null) return;
        const revert = await collaborators.git.revert(commit);
        if (state.git.pushed) await collaborators.git.push({ tag: null });
        reporter.info("ROLLBACK_STEP", `reverted ${commit.slice(0, 12)} as ${revert.slice(0, 12)}`, { step });
        return;
      }

      case "manifests": {
        // a recorded commit was reverted above; otherwise the edits are still loose in the clone
        if (state.git.commit !== null) return;
        const entries = Object.entries(state.manifest_backups);
        for (const [rel, text] of entries) {
          await collaborators.manifests.restore(path.join(workspace.path, rel), text);
        }
        if (entries.length > 0) reporter.info("ROLLBACK_STEP", `restored ${entries.length} manifest(s)`, { step });
        return;
      }
    }
  }
}
