export type ErrorClass = "retryable" | "fatal";

type ReleaseErrorOptions = {
  remediation?: string;
  retryable?: boolean;
  cause?: unknown;
};

/**
 * Base class for every failure the engine reports. `code` is stable and
 * shows up in JSONL output and persisted error records.
 */
export class ReleaseError extends Error {
  readonly code: string;
  readonly remediation: string | null;
  readonly retryable: boolean;

  constructor(code: string, message: string, options: ReleaseErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.remediation = options.remediation ?? null;
    this.retryable = options.retryable ?? false;
  }
}

export class UsageError extends ReleaseError {
  constructor(message: string) {
    super("INVALID_ARGS", message, { remediation: "Run `releasectl --help` for usage." });
  }
}

export class ConfigError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super("CONFIG_INVALID", message, {
      cause,
      remediation: "Fix releasectl.yaml or the RELEASECTL_* environment overrides, then run `releasectl validate`.",
    });
  }
}

export class ManifestParseError extends ReleaseError {
  constructor(
    readonly manifestPath: string,
    detail: string,
    cause?: unknown,
  ) {
    super("MANIFEST_PARSE", `${manifestPath}: ${detail}`, {
      cause,
      remediation: "Fix the package manifest and run `releasectl validate`.",
    });
  }
}

export class GraphCycleError extends ReleaseError {
  constructor(readonly cycle: readonly string[]) {
    super("GRAPH_CYCLE", `dependency cycle: ${[...cycle, cycle[0]].join(" -> ")}`, {
      remediation: "Break the cycle by removing one of the listed internal dependencies.",
    });
  }
}

export class UnknownDependencyError extends ReleaseError {
  constructor(
    readonly packageName: string,
    readonly dependency: string,
  ) {
    super("UNKNOWN_DEPENDENCY", `${packageName} depends on unknown internal package ${dependency}`, {
      remediation: "Add the package to the workspace or change the dependency to a registry version.",
    });
  }
}

export type LockHolder = {
  pid: number;
  release_id: string;
  acquired_at: string;
};

export class AlreadyInProgressError extends ReleaseError {
  constructor(readonly holder: LockHolder | null) {
    const who = holder ? ` (release ${holder.release_id}, pid ${holder.pid}, since ${holder.acquired_at})` : "";
    super("ALREADY_IN_PROGRESS", `another release is already in progress for this workspace${who}`, {
      remediation: "Run `releasectl resume` to continue it, `releasectl rollback` to undo it, or `releasectl cleanup` to abandon it.",
    });
  }
}

export class WorkspaceAbsentError extends ReleaseError {
  constructor(readonly sourcePath: string) {
    super("NO_ACTIVE_RELEASE", `no active release for ${sourcePath}`, {
      remediation: "Start one with `releasectl release <patch|minor|major>`.",
    });
  }
}

export class WorkspaceLostError extends ReleaseError {
  constructor(
    readonly workspacePath: string | null,
    detail: string,
  ) {
    super("WORKSPACE_LOST", `isolated workspace is gone: ${detail}`, {
      remediation: "Run `releasectl rollback` to undo what reached the remote, or `releasectl cleanup` to abandon the release.",
    });
  }
}

export class CredentialMissingError extends ReleaseError {
  constructor(
    readonly variables: readonly string[],
    purpose: string,
  ) {
    super("CREDENTIAL_MISSING", `missing credentials for ${purpose}: ${variables.join(", ")}`, {
      remediation: `Export ${variables.join(" / ")} and run \`releasectl resume\`.`,
    });
  }
}

export class TransientNetworkError extends ReleaseError {
  constructor(message: string, options: { cause?: unknown; code?: string } = {}) {
    super(options.code ?? "TRANSIENT_NETWORK", message, {
      cause: options.cause,
      retryable: true,
      remediation: "Check connectivity and run `releasectl resume`.",
    });
  }
}

export class RateLimitError extends TransientNetworkError {
  constructor(
    message: string,
    readonly retryAfterMs: number | null = null,
    cause?: unknown,
  ) {
    super(message, { cause, code: "RATE_LIMITED" });
  }
}

/** A rate limit whose reset lies further out than a run is willing to wait. */
export class RateLimitWaitError extends ReleaseError {
  constructor(
    readonly waitMs: number,
    readonly limitMs: number,
    cause: RateLimitError,
  ) {
    super(
      "RATE_LIMITED",
      `${cause.message}: rate limit resets in ${Math.ceil(waitMs / 1000)}s, longer than the ${Math.round(limitMs / 1000)}s wait limit`,
      {
        cause,
        retryable: true,
        remediation: "Wait for the rate limit to reset, then run `releasectl resume`.",
      },
    );
  }
}

export class OperationTimeoutError extends TransientNetworkError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, { code: "TIMEOUT" });
  }
}

export class RegistryRejectionError extends ReleaseError {
  constructor(
    readonly packageName: string,
    message: string,
    options: { code?: string; cause?: unknown } = {},
  ) {
    super(options.code ?? "REGISTRY_REJECTED", `${packageName}: ${message}`, {
      cause: options.cause,
      remediation: "Fix the rejection reason, then run `releasectl resume` or `releasectl rollback`.",
    });
  }
}

export class AlreadyPublishedError extends RegistryRejectionError {
  constructor(
    packageName: string,
    readonly version: string,
    cause?: unknown,
  ) {
    super(packageName, `version ${version} is already published`, { code: "ALREADY_PUBLISHED", cause });
  }
}

export class CollaboratorError extends ReleaseError {
  constructor(
    readonly operation: string,
    message: string,
    cause?: unknown,
  ) {
    super("COLLABORATOR_FAILED", `${operation}: ${message}`, {
      cause,
      remediation: "Inspect the isolated workspace, then run `releasectl resume` or `releasectl rollback`.",
    });
  }
}

export class TagTakenError extends ReleaseError {
  constructor(
    readonly tag: string,
    readonly owner: string,
  ) {
    super("TAG_TAKEN", `tag ${tag} on the remote belongs to completed release ${owner}`, {
      remediation: "Release a different version, or `releasectl rollback` that release and then `releasectl resume`.",
    });
  }
}

export class PublishFailedError extends ReleaseError {
  constructor(
    readonly failed: readonly string[],
    readonly blocked: readonly string[],
  ) {
    const parts = [`${failed.length} package(s) failed to publish: ${failed.join(", ")}`];
    if (blocked.length > 0) parts.push(`${blocked.length} skipped behind them: ${blocked.join(", ")}`);
    super("PUBLISH_FAILED", parts.join("; "), {
      remediation: "Published packages stay published. Fix the cause and run `releasectl resume`, or `releasectl rollback`.",
    });
  }
}

export class StateNotFoundError extends ReleaseError {
  constructor(readonly statePath: string) {
    super("STATE_NOT_FOUND", `no release state at ${statePath}`, {
      remediation: "Run `releasectl cleanup` to clear the stale pointer.",
    });
  }
}

export class StateCorruptionError extends ReleaseError {
  constructor(
    readonly statePath: string,
    detail: string,
    cause?: unknown,
  ) {
    super("STATE_CORRUPT", `release state ${statePath} is unusable: ${detail}`, {
      cause,
      remediation: "Automated resume and rollback are disabled. Inspect the file by hand, then `releasectl cleanup --force`.",
    });
  }
}

export class StateCommitError extends ReleaseError {
  constructor(
    readonly statePath: string,
    cause: unknown,
  ) {
    super("STATE_COMMIT_FAILED", `failed to persist ${statePath}: ${errorMessage(cause)}`, {
      cause,
      remediation: "Free disk space or fix permissions, then run `releasectl resume`.",
    });
  }
}

export class InvalidTransitionError extends ReleaseError {
  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super("INVALID_TRANSITION", `cannot move release from ${from} to ${to}`);
  }
}

export class RollbackRefusedError extends ReleaseError {
  constructor(reason: string) {
    super("ROLLBACK_REFUSED", reason, {
      remediation: "Pass --force to roll back a completed release. Published packages are never unpublished.",
    });
  }
}

export class RollbackStepError extends ReleaseError {
  constructor(
    readonly step: string,
    cause: unknown,
  ) {
    super("ROLLBACK_FAILED", `rollback step ${step} failed: ${errorMessage(cause)}`, {
      cause,
      remediation: "Fix the cause and run `releasectl rollback` again; finished steps are not repeated.",
    });
  }
}

export class InterruptedError extends ReleaseError {
  constructor() {
    super("INTERRUPTED", "interrupted", { remediation: "Run `releasectl resume` to continue." });
  }
}

export function classifyError(e: unknown): ErrorClass {
  return e instanceof ReleaseError && e.retryable ? "retryable" : "fatal";
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function errorCode(e: unknown): string {
  return e instanceof ReleaseError ? e.code : "INTERNAL";
}

/** errno-style `code` of a Node system error, if any. */
export function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}
