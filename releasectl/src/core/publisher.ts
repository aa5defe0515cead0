import PQueue from "p-queue";
import {
  AlreadyPublishedError,
  InterruptedError,
  StateCommitError,
  errorCode,
  errorMessage,
} from "../errors.js";
import type { DependencyGraph } from "../graph/dependency-graph.js";
import type { ReleaseStateStore } from "../state/store.js";
import type { FailurePolicy } from "../types/config.js";
import type { Registry } from "../types/collaborators.js";
import type { PackageStatus } from "../types/state.js";
import { nowIso } from "../util.js";
import { retryWithBackoff, withTimeout, type RetryPolicy, type Sleep } from "./retry.js";

export type PublishEvent =
  | { type: "tier_start"; tier: number; packages: string[] }
  | { type: "package_start"; name: string; attempt: number }
  | { type: "package_retry"; name: string; attempt: number; delayMs: number; error: string }
  | { type: "package_done"; name: string; status: PackageStatus["status"]; detail: string | null }
  | { type: "tier_done"; tier: number };

export type PublishContext = {
  store: ReleaseStateStore;
  graph: DependencyGraph;
  registry: Registry;
  policy: RetryPolicy;
  timeoutMs: number;
  concurrency: number;
  failurePolicy: FailurePolicy;
  dryRun: boolean;
  /** Planned new version per package. */
  versions: Record<string, string>;
  signal: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
  onEvent?: (event: PublishEvent) => void;
};

export type PublishOutcome =
  | { status: "completed" }
  | { status: "failed"; failed: string[]; blocked: string[] }
  | { status: "interrupted" };

/**
 * Packages that still need work. Published and skipped packages are done, as
 * is a failure that cannot be retried or has used up its attempts.
 */
export function needsWork(status: PackageStatus, retryCount: number, maxAttempts: number): boolean {
  switch (status.status) {
    case "pending":
    case "in_progress":
      return true;
    case "failed":
      return status.retryable && retryCount < maxAttempts;
    case "published":
    case "skipped":
      return false;
  }
}

function isBlocking(status: PackageStatus | undefined): boolean {
  if (!status) return false;
  return status.status === "failed" || (status.status === "skipped" && status.cause === "dependency");
}

/**
 * Walk the tiers in ascending order. Each tier runs on a bounded pool and must
 * reach a terminal status for every member before the next tier starts.
 */
export async function publishTiers(ctx: PublishContext): Promise<PublishOutcome> {
  const tiers = ctx.graph.tiers();

  for (const [index, tier] of tiers.entries()) {
    if (ctx.signal.aborted) return { status: "interrupted" };

    const snapshot = ctx.store.state;
    const work = tier.filter((name) =>
      needsWork(snapshot.packages[name] ?? { status: "pending" }, snapshot.retry_counts[name] ?? 0, ctx.policy.maxAttempts),
    );

    if (work.length > 0) {
      ctx.onEvent?.({ type: "tier_start", tier: index, packages: work });
      const queue = new PQueue({ concurrency: ctx.concurrency });
      const settled = await Promise.allSettled(work.map((name) => queue.add(() => publishOne(ctx, name))));
      ctx.onEvent?.({ type: "tier_done", tier: index });

      // a failed commit is fatal for the whole phase, but only after the tier has drained
      const rejected = settled.find((r): r is PromiseRejectedResult => r.status === "rejected");
      if (rejected) throw rejected.reason;
    }

    if (ctx.signal.aborted && tiers.slice(index).some((t) => t.some((n) => pendingIn(ctx, n)))) {
      return { status: "interrupted" };
    }

    const after = ctx.store.state;
    const failedHere = tier.filter((name) => after.packages[name]?.status === "failed");
    if (failedHere.length > 0 && ctx.failurePolicy === "abort") {
      return { status: "failed", failed: failedHere, blocked: [] };
    }
  }

  const final = ctx.store.state;
  const names = ctx.graph.names();
  const failed = names.filter((n) => final.packages[n]?.status === "failed");
  const blocked = names.filter((n) => {
    const s = final.packages[n];
    return s?.status === "skipped" && s.cause === "dependency";
  });
  if (failed.length > 0 || blocked.length > 0) return { status: "failed", failed, blocked };
  return { status: "completed" };
}

function pendingIn(ctx: PublishContext, name: string): boolean {
  const s = ctx.store.state;
  const status = s.packages[name];
  return status !== undefined && needsWork(status, s.retry_counts[name] ?? 0, ctx.policy.maxAttempts);
}

async function publishOne(ctx: PublishContext, name: string): Promise<void> {
  // tasks queued before an abort never start
  if (ctx.signal.aborted) return;

  const pkg = ctx.graph.get(name);
  const version = ctx.versions[name] ?? pkg.version;
  const done = (status: PackageStatus, detail: string | null = null): Promise<unknown> =>
    ctx.store
      .commit((d) => {
        d.packages[name] = status;
      })
      .then(() => ctx.onEvent?.({ type: "package_done", name, status: status.status, detail }));

  if (pkg.registryTarget === "none") {
    await done({ status: "skipped", reason: "private package", cause: "private", at: nowIso() });
    return;
  }

  if (ctx.failurePolicy === "continue") {
    const state = ctx.store.state;
    const blocker = ctx.graph.dependenciesOf(name).find((dep) => isBlocking(state.packages[dep]));
    if (blocker) {
      const reason = `dependency ${blocker} did not publish`;
      await done({ status: "skipped", reason, cause: "dependency", at: nowIso() }, reason);
      return;
    }
  }

  const before = ctx.store.state;
  // an attempt cut short by a crash does not count against the budget
  const recovering = before.packages[name]?.status === "in_progress";
  const used = Math.max(0, (before.retry_counts[name] ?? 0) - (recovering ? 1 : 0));

  try {
    await retryWithBackoff(
      async (attempt) => {
        await ctx.store.commit((d) => {
          d.packages[name] = { status: "in_progress", started_at: nowIso() };
          d.retry_counts[name] = attempt;
        });
        ctx.onEvent?.({ type: "package_start", name, attempt });
        try {
          await withTimeout(`publish ${name}@${version}`, ctx.timeoutMs, (signal) =>
            ctx.registry.publish(pkg, { dryRun: ctx.dryRun, signal }),
          );
        } catch (e) {
          // an earlier attempt, in this run or a previous one, may have landed
          if (e instanceof AlreadyPublishedError && (recovering || attempt > 1)) return;
          throw e;
        }
      },
      ctx.policy,
      {
        firstAttempt: used + 1,
        signal: ctx.signal,
        sleep: ctx.sleep,
        random: ctx.random,
        onRetry: ({ attempt, delayMs, error }) =>
          ctx.onEvent?.({ type: "package_retry", name, attempt, delayMs, error: errorMessage(error) }),
      },
    );
  } catch (e) {
    if (e instanceof StateCommitError) throw e;
    if (e instanceof InterruptedError) {
      await done({ status: "pending" }, "interrupted before retry");
      return;
    }
    const retryable = ctx.policy.classify(e) === "retryable";
    await ctx.store.commit((d) => {
      d.packages[name] = { status: "failed", reason: errorMessage(e), code: errorCode(e), retryable, at: nowIso() };
      d.errors.push({ at: nowIso(), phase: "publishing", code: errorCode(e), message: errorMessage(e), package: name });
    });
    ctx.onEvent?.({ type: "package_done", name, status: "failed", detail: errorMessage(e) });
    return;
  }

  if (ctx.dryRun) {
    await done({ status: "skipped", reason: `dry run of ${version}`, cause: "dry_run", at: nowIso() });
  } else {
    await done({ status: "published", version, at: nowIso() });
  }
}
