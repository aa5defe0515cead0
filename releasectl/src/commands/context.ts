import path from "node:path";
import { createCollaborators, type CollaboratorFactory } from "../collaborators/index.js";
import { readCredentials, type Credentials } from "../config/credentials.js";
import { loadConfig } from "../config/loader.js";
import type { Sleep } from "../core/retry.js";
import { ReleaseError, StateCorruptionError, errorCode, errorMessage } from "../errors.js";
import type { Reporter, WarningSink } from "../output/reporter.js";
import { ReleaseHistory } from "../state/history.js";
import { ReleaseLock } from "../state/lock.js";
import { ReleaseStateStore, statePathFor, type StoreOptions } from "../state/store.js";
import type { Collaborators } from "../types/collaborators.js";
import type { ReleasectlConfig } from "../types/config.js";
import type { WorkspacePointer } from "../types/state.js";
import { ReleaseHome } from "../workspace/home.js";
import { WorkspaceManager, gitOriginResolver, type Cloner, type OriginResolver } from "../workspace/isolated.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

/** What every command receives from the CLI (or from a test). */
export type CommandContext = {
  /** The source checkout. Only read, never written. */
  sourcePath: string;
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  reporter: Reporter;
  signal?: AbortSignal;
  homeDir?: string;
  tmpRoot?: string;
  cloner?: Cloner;
  resolveOrigin?: OriginResolver;
  collaborators?: CollaboratorFactory;
  sleep?: Sleep;
  random?: () => number;
};

export type CommandFailure = { ok: false; error: unknown; exitCode: ExitCode };

/** Everything derived from the source path and configuration. */
export type Runtime = {
  sourcePath: string;
  config: ReleasectlConfig;
  credentials: Credentials;
  home: ReleaseHome;
  workspaces: WorkspaceManager;
  lock: ReleaseLock;
  history: ReleaseHistory;
};

export async function openRuntime(ctx: CommandContext): Promise<Runtime> {
  const sourcePath = path.resolve(ctx.sourcePath);
  const env = ctx.env ?? process.env;
  const config = await loadConfig({ root: sourcePath, configFile: ctx.configFile, env });
  const home = new ReleaseHome(ctx.homeDir ?? config.home, env);
  const warn: WarningSink = (code, message, fields) => ctx.reporter.warn(code, message, fields);

  return {
    sourcePath,
    config,
    credentials: readCredentials(env),
    home,
    workspaces: new WorkspaceManager({
      sourcePath,
      home,
      remote: config.git.remote,
      branch: config.git.branch,
      cloner: ctx.cloner,
      resolveOrigin: ctx.resolveOrigin,
      tmpRoot: ctx.tmpRoot,
    }),
    lock: new ReleaseLock(home.lockPath(sourcePath), process.pid, warn),
    history: new ReleaseHistory(home.historyDir(sourcePath), warn),
  };
}

/** Collaborators bound to the isolated clone. */
export async function collaboratorsFor(ctx: CommandContext, rt: Runtime, workspacePath: string): Promise<Collaborators> {
  const originUrl = await (ctx.resolveOrigin ?? gitOriginResolver)(rt.sourcePath, rt.config.git.remote);
  return (ctx.collaborators ?? createCollaborators)({
    workspacePath,
    originUrl,
    config: rt.config,
    credentials: rt.credentials,
  });
}

/** Every state write of an active release is mirrored under the home directory. */
export function storeOptions(rt: Runtime): StoreOptions {
  return { mirror: rt.workspaces.mirrorPath };
}

export type ActiveRelease = { workspace: WorkspacePointer; store: ReleaseStateStore };

/**
 * Locate the active release, take over its lock and load its state. Used by
 * resume and rollback.
 */
export async function openActiveRelease(rt: Runtime): Promise<ActiveRelease> {
  const workspace = await rt.workspaces.locate();
  await rt.lock.reclaim(workspace.release_id);
  const store = await ReleaseStateStore.load(statePathFor(workspace.path), storeOptions(rt));
  if (store.state.release_id !== workspace.release_id) {
    throw new StateCorruptionError(
      store.path,
      `state belongs to release ${store.state.release_id}, pointer names ${workspace.release_id}`,
    );
  }
  return { workspace, store };
}

/** Report `error` with its remediation and map it to an exit code. */
export function failure(ctx: CommandContext, error: unknown, exitCode: ExitCode = exitCodeFor(error)): CommandFailure {
  const fields: Record<string, unknown> = {};
  if (error instanceof ReleaseError && error.remediation !== null) fields.remediation = error.remediation;
  ctx.reporter.error(errorCode(error), errorMessage(error), fields);
  return { ok: false, error, exitCode };
}
