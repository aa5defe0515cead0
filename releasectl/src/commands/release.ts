import { AlreadyInProgressError, UsageError } from "../errors.js";
import { PublishOrchestrator, type RunResult } from "../core/orchestrator.js";
import { generateReleaseId } from "../core/release-id.js";
import { parseBumpArgument } from "../core/versioning.js";
import { loadManifests } from "../manifest/loader.js";
import { failureSummary, formatPackageTable } from "../output/summary.js";
import { ReleaseStateStore, statePathFor } from "../state/store.js";
import type { ReleasectlConfig } from "../types/config.js";
import type { ReleaseOptions, ReleaseStateDoc, WorkspacePointer } from "../types/state.js";
import { collaboratorsFor, failure, openRuntime, storeOptions, type CommandContext, type CommandFailure, type Runtime } from "./context.js";
import { EXIT } from "./exit-codes.js";

export type ReleaseCommandOpts = {
  /** patch | minor | major | an exact version */
  bump: string;
  dryRun?: boolean;
  push?: boolean;
  githubRelease?: boolean;
  bundles?: boolean;
  keepTemp?: boolean;
  concurrency?: number;
  sequential?: boolean;
  continueOnFailure?: boolean;
  maxAttempts?: number;
  /** false skips deleting a stale remote tag for the new version */
  clearRunway?: boolean;
};

export type RunCommandResult =
  | { ok: true; releaseId: string; state: ReleaseStateDoc }
  | CommandFailure;

function positiveInt(name: string, value: number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < 1) throw new UsageError(`${name} must be a positive integer, got ${value}`);
  return value;
}

export function releaseOptions(opts: ReleaseCommandOpts, config: ReleasectlConfig): ReleaseOptions {
  const concurrency = positiveInt("--concurrency", opts.concurrency);
  const maxAttempts = positiveInt("--max-attempts", opts.maxAttempts);
  if (opts.sequential && concurrency !== undefined && concurrency !== 1) {
    throw new UsageError("--sequential and --concurrency conflict");
  }
  return {
    push: opts.push ?? true,
    github_release: (opts.githubRelease ?? true) && config.github.enabled,
    bundles: (opts.bundles ?? true) && config.bundles.enabled,
    keep_temp: opts.keepTemp ?? false,
    failure_policy: opts.continueOnFailure ? "continue" : config.publish.failure_policy,
    max_concurrency: opts.sequential ? 1 : (concurrency ?? config.publish.max_concurrency),
    max_attempts: maxAttempts ?? config.publish.max_attempts,
    clear_runway: opts.clearRunway === false ? false : config.git.clear_runway,
  };
}

/**
 * Start a release: take the lock, clone the source into an isolated
 * workspace, write the first state document and run every phase.
 */
export async function release(ctx: CommandContext, opts: ReleaseCommandOpts): Promise<RunCommandResult> {
  let rt: Runtime;
  let options: ReleaseOptions;
  let request: ReturnType<typeof parseBumpArgument>;
  try {
    request = parseBumpArgument(opts.bump);
    rt = await openRuntime(ctx);
    options = releaseOptions(opts, rt.config);
  } catch (e) {
    return failure(ctx, e);
  }

  const releaseId = generateReleaseId();
  try {
    await rt.lock.acquire(releaseId);
  } catch (e) {
    return failure(ctx, e);
  }

  let workspace: WorkspacePointer | null = null;
  let store: ReleaseStateStore;
  try {
    // a pointer without a lock is a release someone half cleaned up
    if ((await rt.workspaces.peek()) !== null) throw new AlreadyInProgressError(null);
    workspace = await rt.workspaces.acquire(releaseId);
    ctx.reporter.debug("WORKSPACE", `cloned into ${workspace.path}`, { path: workspace.path });

    const descriptors = await loadManifests({ root: workspace.path, patterns: rt.config.packages });
    store = await ReleaseStateStore.initialize(
      statePathFor(workspace.path),
      {
        release_id: releaseId,
        bump_kind: request.kind,
        explicit_version: request.kind === "explicit" ? request.version : null,
        dry_run: opts.dryRun ?? false,
        options,
        workspace_path: workspace.path,
        source_path: rt.sourcePath,
        source_commit: workspace.source_commit,
        packages: descriptors.map((d) => d.name),
      },
      rt.lock,
      storeOptions(rt),
    );
  } catch (e) {
    // nothing durable exists yet; leave no trace
    if (workspace !== null) await rt.workspaces.release(workspace, { keep: false });
    await rt.lock.release(releaseId);
    return failure(ctx, e);
  }

  ctx.reporter.info("RELEASE_START", `release ${releaseId} (${opts.bump}${store.state.dry_run ? ", dry run" : ""})`, {
    release_id: releaseId,
    workspace: workspace.path,
  });
  return runToEnd(ctx, rt, workspace, store);
}

/** Run the orchestrator over an opened release and turn its outcome into a command result. */
export async function runToEnd(
  ctx: CommandContext,
  rt: Runtime,
  workspace: WorkspacePointer,
  store: ReleaseStateStore,
): Promise<RunCommandResult> {
  let result: RunResult;
  try {
    const orchestrator = new PublishOrchestrator({
      store,
      workspace,
      workspaces: rt.workspaces,
      lock: rt.lock,
      history: rt.history,
      collaborators: await collaboratorsFor(ctx, rt, workspace.path),
      config: rt.config,
      credentials: rt.credentials,
      reporter: ctx.reporter,
      signal: ctx.signal,
      sleep: ctx.sleep,
      random: ctx.random,
    });
    result = await orchestrator.run();
  } catch (e) {
    return failure(ctx, e);
  }
  return reportRun(ctx, result);
}

export function reportRun(ctx: CommandContext, result: RunResult): RunCommandResult {
  const { state } = result;
  switch (result.status) {
    case "completed": {
      const tag = state.versions?.tag ?? "(untagged)";
      const lines = [
        `release ${state.release_id} completed: ${tag}${state.dry_run ? " (dry run: nothing pushed or published)" : ""}`,
        "packages:",
        ...formatPackageTable(state),
      ];
      if (state.github.html_url) lines.push(`release entry: ${state.github.html_url}`);
      ctx.reporter.block("RELEASE_COMPLETED", lines, {
        release_id: state.release_id,
        tag,
        dry_run: state.dry_run,
        packages: state.packages,
      });
      return { ok: true, releaseId: state.release_id, state };
    }
    case "failed":
      ctx.reporter.block("RELEASE_FAILED", failureSummary(state, result.error), {
        release_id: state.release_id,
        phase: result.phase,
        packages: state.packages,
        workspace: state.workspace_path,
      });
      return {
        ok: false,
        error: result.error,
        exitCode: result.phase === "validation" ? EXIT.VALIDATION_FAILED : EXIT.RELEASE_FAILED,
      };
    case "interrupted":
      return { ok: false, error: null, exitCode: EXIT.INTERRUPTED };
  }
}
