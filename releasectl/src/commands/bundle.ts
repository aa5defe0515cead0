import { isBundlePlatform, defaultPlatforms, SIGNED_PLATFORMS } from "../collaborators/bundler.js";
import { checkCredentials } from "../config/credentials.js";
import { generateReleaseId } from "../core/release-id.js";
import { releaseVersion } from "../core/versioning.js";
import { AlreadyInProgressError, CollaboratorError, UsageError } from "../errors.js";
import { loadManifests } from "../manifest/loader.js";
import type { BundlePlatform } from "../types/collaborators.js";
import type { WorkspacePointer } from "../types/state.js";
import { formatTemplate } from "../util.js";
import { collaboratorsFor, failure, openRuntime, type CommandContext, type CommandFailure, type Runtime } from "./context.js";

export type BundleCommandOpts = {
  platform?: string;
  /** Run the prebuild command first (default true). */
  build?: boolean;
  /** Attach the artifacts to the release entry for the current version's tag. */
  upload?: boolean;
  target?: string;
};

export type BundleCommandResult =
  | { ok: true; artifacts: Array<{ platform: BundlePlatform; path: string }>; uploadedTo: number | null }
  | CommandFailure;

function selectPlatforms(rt: Runtime, requested: string | undefined): BundlePlatform[] {
  if (requested !== undefined) {
    if (!isBundlePlatform(requested)) throw new UsageError(`unknown bundle platform "${requested}"`);
    return [requested];
  }
  const configured = rt.config.bundles.platforms;
  return configured.length > 0 ? configured : defaultPlatforms();
}

/**
 * Build bundles outside a release, in a fresh isolated clone. Without
 * --upload the clone is kept so the artifacts can be collected from it.
 */
export async function bundle(ctx: CommandContext, opts: BundleCommandOpts = {}): Promise<BundleCommandResult> {
  let rt: Runtime;
  let platforms: BundlePlatform[];
  try {
    rt = await openRuntime(ctx);
    platforms = selectPlatforms(rt, opts.platform);
    checkCredentials(rt.credentials, {
      registry: false,
      host: opts.upload ?? false,
      signing: rt.config.bundles.require_signing && platforms.some((p) => SIGNED_PLATFORMS.includes(p)),
    });
  } catch (e) {
    return failure(ctx, e);
  }

  const runId = generateReleaseId();
  try {
    await rt.lock.acquire(runId);
  } catch (e) {
    return failure(ctx, e);
  }

  let workspace: WorkspacePointer | null = null;
  try {
    if ((await rt.workspaces.peek()) !== null) throw new AlreadyInProgressError(null);
    workspace = await rt.workspaces.acquire(runId);
    const descriptors = await loadManifests({ root: workspace.path, patterns: rt.config.packages });
    const current = Object.fromEntries(descriptors.map((d): [string, { from: string; to: string }] => [d.name, { from: d.version, to: d.version }]));
    const tag = formatTemplate(rt.config.git.tag_format, { version: releaseVersion(current, rt.config.primary_package) });
    const collaborators = await collaboratorsFor(ctx, rt, workspace.path);

    let uploadedTo: number | null = null;
    if (opts.upload) {
      const entry = await collaborators.host.findReleaseByTag(tag);
      if (entry === null) throw new CollaboratorError("bundle upload", `no release entry for tag ${tag}`);
      uploadedTo = entry.id;
    }

    const artifacts: Array<{ platform: BundlePlatform; path: string }> = [];
    for (const platform of platforms) {
      const artifact = await collaborators.bundler.build(platform, { target: opts.target ?? null, prebuild: opts.build ?? true });
      artifacts.push({ platform, path: artifact });
      if (uploadedTo !== null) await collaborators.host.uploadArtifact(uploadedTo, artifact);
      ctx.reporter.info("BUNDLE_BUILT", `${platform}: ${artifact}${uploadedTo !== null ? " (uploaded)" : ""}`, { platform, path: artifact });
    }

    await rt.workspaces.release(workspace, { keep: !opts.upload });
    await rt.lock.release(runId);
    return { ok: true, artifacts, uploadedTo };
  } catch (e) {
    if (workspace !== null) await rt.workspaces.release(workspace, { keep: false });
    await rt.lock.release(runId);
    return failure(ctx, e);
  }
}
