import path from "node:path";
import { checkCredentials, type CredentialNeeds, type Credentials } from "../config/credentials.js";
import { defaultPlatforms, SIGNED_PLATFORMS } from "../collaborators/bundler.js";
import {
  InvalidTransitionError,
  ManifestParseError,
  PublishFailedError,
  TagTakenError,
  errorCode,
  errorMessage,
} from "../errors.js";
import { DependencyGraph } from "../graph/dependency-graph.js";
import { loadManifests } from "../manifest/loader.js";
import type { Reporter } from "../output/reporter.js";
import type { ReleaseHistory } from "../state/history.js";
import type { ReleaseLock } from "../state/lock.js";
import { isActivePhase, nextPhase } from "../state/phases.js";
import type { ReleaseStateStore } from "../state/store.js";
import type { BundlePlatform, Collaborators } from "../types/collaborators.js";
import type { ReleasectlConfig } from "../types/config.js";
import type { ActivePhase, ReleaseStateDoc, VersionPlan, WorkspacePointer } from "../types/state.js";
import { formatTemplate, nowIso } from "../util.js";
import type { WorkspaceManager } from "../workspace/isolated.js";
import { publishTiers, type PublishEvent } from "./publisher.js";
import { policyFromConfig, retryWithBackoff, withTimeout, type Sleep } from "./retry.js";
import { planVersions, releaseVersion, requestFromState, rewriteRange } from "./versioning.js";

export type OrchestratorOptions = {
  store: ReleaseStateStore;
  workspace: WorkspacePointer;
  workspaces: WorkspaceManager;
  lock: ReleaseLock;
  history: ReleaseHistory;
  collaborators: Collaborators;
  config: ReleasectlConfig;
  credentials: Credentials;
  reporter: Reporter;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
};

export type RunResult =
  | { status: "completed"; state: ReleaseStateDoc }
  | { status: "failed"; phase: ActivePhase; error: unknown; state: ReleaseStateDoc }
  | { status: "interrupted"; phase: ActivePhase; state: ReleaseStateDoc };

type StepOutcome = "done" | "interrupted";
type RunnablePhase = Exclude<ActivePhase, "completed">;

/**
 * Drives a release through its phases against the isolated
 * workspace.
 *
 * Main loop: load state → run phase → commit transition → advance. Resume is
 * the same loop started from the persisted phase; every phase skips the
 * sub-steps the state already records as done.
 */
export class PublishOrchestrator {
  private readonly signal: AbortSignal;
  private readonly handlers: Record<RunnablePhase, () => Promise<StepOutcome>>;

  constructor(private readonly opts: OrchestratorOptions) {
    this.signal = opts.signal ?? new AbortController().signal;
    this.handlers = {
      validation: () => this.validation(),
      version_update: () => this.versionUpdate(),
      git_operations: () => this.gitOperations(),
      github_release: () => this.githubRelease(),
      publishing: () => this.publishing(),
    };
  }

  async run(): Promise<RunResult> {
    const { store, reporter } = this.opts;
    let state = store.state;

    if (state.current_phase === "failed") {
      const resumeAt = state.failed_phase;
      if (resumeAt === null) throw new InvalidTransitionError("failed", "resume");
      reporter.info("RESUME", `resuming ${state.release_id} at ${resumeAt}`, { phase: resumeAt });
      state = await store.transition(resumeAt);
    }
    if (!isActivePhase(state.current_phase)) {
      throw new InvalidTransitionError(state.current_phase, "resume");
    }
    let phase: ActivePhase = state.current_phase;

    try {
      // re-derive the plan up front so a changed workspace fails before any step
      await this.loadGraph();
    } catch (e) {
      return this.fail(phase, e);
    }

    while (phase !== "completed") {
      if (this.signal.aborted) return this.interrupted(phase);

      reporter.info("PHASE_START", `phase ${phase}`, { phase });
      let outcome: StepOutcome;
      try {
        outcome = await this.handlers[phase]();
      } catch (e) {
        return this.fail(phase, e);
      }
      if (outcome === "interrupted") return this.interrupted(phase);

      const next = nextPhase(phase);
      if (next === null) break;
      try {
        await store.transition(next);
      } catch (e) {
        return this.fail(phase, e);
      }
      phase = next;
    }

    await this.complete();
    return { status: "completed", state: store.state };
  }

  // --- phases ---

  private async validation(): Promise<StepOutcome> {
    const graph = await this.loadGraph();
    graph.validate();
    const state = this.opts.store.state;
    // an explicit version behind some package fails here, before anything is edited
    releaseVersion(
      planVersions(graph.descriptors(), requestFromState(state.bump_kind, state.explicit_version)),
      this.opts.config.primary_package,
    );
    checkCredentials(this.opts.credentials, this.credentialNeeds(graph));
    await this.opts.store.commit((d) => {
      d.plan = { tiers: graph.tiers() };
    });
    return "done";
  }

  private async versionUpdate(): Promise<StepOutcome> {
    const { store, collaborators, config, workspace } = this.opts;
    const state = store.state;
    const editor = collaborators.manifests;

    // re-entry: start again from the original manifests
    for (const [rel, text] of Object.entries(state.manifest_backups)) {
      await editor.restore(path.join(workspace.path, rel), text);
    }

    const descriptors = await loadManifests({ root: workspace.path, patterns: config.packages });
    const planned = planVersions(descriptors, requestFromState(state.bump_kind, state.explicit_version));
    const version = releaseVersion(planned, config.primary_package);

    if (Object.keys(state.manifest_backups).length === 0) {
      const backups: Record<string, string> = {};
      for (const d of descriptors) backups[path.relative(workspace.path, d.manifestPath)] = await editor.snapshot(d.manifestPath);
      await store.commit((d) => {
        d.manifest_backups = backups;
      });
    }

    for (const d of descriptors) {
      await editor.bump(d.manifestPath, planned[d.name].to);
      for (const ref of d.internalRefs) {
        const range = rewriteRange(ref.range, planned[ref.name].to);
        if (range !== null) await editor.setDependencyRange(d.manifestPath, ref.field, ref.name, range);
      }
    }

    await store.commit((d) => {
      d.versions = {
        release_version: version,
        tag: formatTemplate(config.git.tag_format, { version }),
        packages: planned,
      };
    });
    this.opts.reporter.info("VERSIONS", `release version ${version}`, { packages: planned });
    return "done";
  }

  private async gitOperations(): Promise<StepOutcome> {
    const { store, collaborators, config } = this.opts;
    const git = collaborators.git;
    let state = store.state;
    const versions = requireVersions(state);

    if (state.git.commit === null) {
      // a crash after committing but before recording leaves HEAD ahead of the clone point
      const head = await git.headCommit();
      const commit =
        head !== state.source_commit
          ? head
          : await git.commit(
              formatTemplate(config.git.commit_message, { version: versions.release_version }),
              Object.keys(state.manifest_backups).sort(),
            );
      state = await store.commit((d) => {
        d.git.commit = commit;
      });
    }

    if (state.git.tag === null) {
      if (state.options.push && !state.dry_run && state.options.clear_runway !== false) {
        await this.clearRunway(versions.tag);
      }
      await git.deleteTag(versions.tag, { remote: false });
      await git.tag(versions.tag, `Release ${versions.tag}`);
      state = await store.commit((d) => {
        d.git.tag = versions.tag;
      });
    }

    if (state.options.push && !state.dry_run && !state.git.pushed) {
      await git.push({ tag: versions.tag });
      await store.commit((d) => {
        d.git.pushed = true;
      });
    }
    return "done";
  }

  /**
   * A tag for this version already on the remote, recorded by no completed
   * release, is debris from an attempt that died after pushing. Remove it
   * so the push below can land. Lookup and delete failures only warn.
   */
  private async clearRunway(tag: string): Promise<void> {
    const { collaborators, history, reporter } = this.opts;
    let exists: boolean;
    try {
      exists = await collaborators.git.remoteTagExists(tag);
    } catch (e) {
      reporter.warn("RUNWAY_CHECK_FAILED", `could not check the remote for ${tag}: ${errorMessage(e)}`, { tag });
      return;
    }
    if (!exists) {
      reporter.debug("RUNWAY_CLEAR", `no remote tag ${tag}`, { tag });
      return;
    }

    const owner = (await history.list()).find((h) => h.current_phase === "completed" && !h.dry_run && h.git.tag === tag);
    if (owner !== undefined) throw new TagTakenError(tag, owner.release_id);

    try {
      await collaborators.git.deleteTag(tag, { remote: true });
    } catch (e) {
      reporter.warn("RUNWAY_CHECK_FAILED", `could not delete the remote tag ${tag}: ${errorMessage(e)}`, { tag });
      return;
    }
    reporter.warn("RUNWAY_CLEARED", `deleted remote tag ${tag} left by an earlier failed release`, { tag });
  }

  private async githubRelease(): Promise<StepOutcome> {
    const { store, collaborators, config, reporter } = this.opts;
    let state = store.state;
    if (!state.options.github_release || state.dry_run) {
      reporter.info("GITHUB_RELEASE_SKIPPED", state.dry_run ? "dry run: no release entry" : "release entry disabled");
      return "done";
    }
    const versions = requireVersions(state);
    const host = collaborators.host;

    let releaseId = state.github.release_id;
    if (releaseId === null) {
      const existing = await this.retry("find release", () => host.findReleaseByTag(versions.tag));
      const created =
        existing ??
        (await this.retry("create release", () =>
          host.createRelease({
            tag: versions.tag,
            name: versions.tag,
            notes: releaseNotes(state, versions),
            draft: config.github.draft,
            prerelease: config.github.prerelease,
          }),
        ));
      releaseId = created.id;
      state = await store.commit((d) => {
        d.github.release_id = created.id;
        d.github.html_url = created.htmlUrl;
      });
      reporter.info("GITHUB_RELEASE", `release entry ${created.htmlUrl}`, { id: created.id });
    }

    if (state.options.bundles) {
      const id = releaseId;
      for (const platform of this.platforms()) {
        if (this.signal.aborted) return "interrupted";
        if (store.state.github.uploaded_artifacts.includes(platform)) continue;
        const artifact = await collaborators.bundler.build(platform, { target: null, prebuild: true });
        await this.retry(`upload ${platform}`, () => host.uploadArtifact(id, artifact));
        await store.commit((d) => {
          d.github.uploaded_artifacts.push(platform);
        });
        reporter.info("ARTIFACT_UPLOADED", `${platform}: ${path.basename(artifact)}`, { platform });
      }
    }
    return "done";
  }

  private async publishing(): Promise<StepOutcome> {
    const { store, collaborators, config } = this.opts;
    const state = store.state;
    const versions = requireVersions(state);
    const graph = await this.loadGraph();

    const outcome = await publishTiers({
      store,
      graph,
      registry: collaborators.registry,
      policy: policyFromConfig(config.publish, state.options.max_attempts),
      timeoutMs: config.publish.timeout_ms,
      concurrency: state.options.max_concurrency,
      failurePolicy: state.options.failure_policy,
      dryRun: state.dry_run,
      versions: Object.fromEntries(Object.entries(versions.packages).map(([name, v]): [string, string] => [name, v.to])),
      signal: this.signal,
      sleep: this.opts.sleep,
      random: this.opts.random,
      onEvent: (e) => this.report(e),
    });

    if (outcome.status === "interrupted") return "interrupted";
    if (outcome.status === "failed") throw new PublishFailedError(outcome.failed, outcome.blocked);
    return "done";
  }

  // --- helpers ---

  private async loadGraph(): Promise<DependencyGraph> {
    const { workspace, config, store } = this.opts;
    const graph = DependencyGraph.build(await loadManifests({ root: workspace.path, patterns: config.packages }));

    const expected = Object.keys(store.state.packages).sort();
    const found = graph.names();
    if (expected.join("\n") !== found.join("\n")) {
      throw new ManifestParseError(
        workspace.path,
        `workspace packages changed since the release started (expected ${expected.join(", ")}; found ${found.join(", ")})`,
      );
    }
    return graph;
  }

  private credentialNeeds(graph: DependencyGraph): CredentialNeeds {
    const state = this.opts.store.state;
    const targets = graph.descriptors().map((d) => d.registryTarget);
    const live = !state.dry_run;
    return {
      registry: live && targets.includes("npm"),
      host: live && (state.options.github_release || targets.includes("github")),
      signing:
        live &&
        state.options.bundles &&
        this.opts.config.bundles.require_signing &&
        this.platforms().some((p) => SIGNED_PLATFORMS.includes(p)),
    };
  }

  private platforms(): BundlePlatform[] {
    const configured = this.opts.config.bundles.platforms;
    return configured.length > 0 ? configured : defaultPlatforms();
  }

  private retry<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const { config, reporter } = this.opts;
    return retryWithBackoff(
      () => withTimeout(operation, config.publish.timeout_ms, () => run()),
      policyFromConfig(config.publish),
      {
        signal: this.signal,
        sleep: this.opts.sleep,
        random: this.opts.random,
        onRetry: ({ attempt, delayMs, error }) =>
          reporter.warn("RETRY", `${operation} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${errorMessage(error)}`),
      },
    );
  }

  private report(e: PublishEvent): void {
    const { reporter } = this.opts;
    switch (e.type) {
      case "tier_start":
        reporter.info("TIER_START", `tier ${e.tier}: ${e.packages.join(", ")}`, { tier: e.tier, packages: e.packages });
        break;
      case "package_start":
        reporter.debug("PACKAGE_START", `publishing ${e.name} (attempt ${e.attempt})`, { package: e.name, attempt: e.attempt });
        break;
      case "package_retry":
        reporter.warn("PACKAGE_RETRY", `${e.name}: ${e.error}; retrying in ${e.delayMs}ms`, {
          package: e.name,
          attempt: e.attempt,
          delay_ms: e.delayMs,
        });
        break;
      case "package_done":
        reporter.info("PACKAGE_DONE", `${e.name}: ${e.status}${e.detail ? ` (${e.detail})` : ""}`, {
          package: e.name,
          status: e.status,
        });
        break;
      case "tier_done":
        reporter.debug("TIER_DONE", `tier ${e.tier} done`, { tier: e.tier });
        break;
    }
  }

  private async fail(phase: ActivePhase, error: unknown): Promise<RunResult> {
    const { store, reporter } = this.opts;
    reporter.error(errorCode(error), errorMessage(error), { phase });
    try {
      const state = await store.transition("failed", (d) => {
        d.errors.push({ at: nowIso(), phase, code: errorCode(error), message: errorMessage(error), package: null });
      });
      return { status: "failed", phase, error, state };
    } catch (commitError) {
      reporter.error(errorCode(commitError), `could not record the failure: ${errorMessage(commitError)}`);
      return { status: "failed", phase, error, state: store.state };
    }
  }

  private interrupted(phase: ActivePhase): RunResult {
    this.opts.reporter.warn("INTERRUPTED", `interrupted during ${phase}; run \`releasectl resume\` to continue`, { phase });
    return { status: "interrupted", phase, state: this.opts.store.state };
  }

  private async complete(): Promise<void> {
    const { store, history, workspaces, workspace, lock, reporter } = this.opts;
    const state = store.state;
    const file = await history.record(state);
    reporter.debug("HISTORY", `recorded ${file}`);
    await store.destroy();
    await workspaces.release(workspace, { keep: state.options.keep_temp });
    await lock.release(state.release_id);
    if (state.options.keep_temp) reporter.info("KEEP_TEMP", `isolated workspace kept at ${workspace.path}`);
  }
}

function requireVersions(state: ReleaseStateDoc): VersionPlan {
  if (state.versions === null) throw new InvalidTransitionError(state.current_phase, "a phase that needs planned versions");
  return state.versions;
}

export function releaseNotes(state: ReleaseStateDoc, versions: VersionPlan): string {
  const lines = [`Release ${versions.tag}`, ""];
  for (const name of Object.keys(versions.packages).sort()) {
    const v = versions.packages[name];
    lines.push(`- ${name}: ${v.from} → ${v.to}`);
  }
  if (state.dry_run) lines.push("", "(dry run)");
  return lines.join("\n");
}
