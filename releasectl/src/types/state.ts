import type { FailurePolicy } from "./config.js";

export const PHASES = [
  "validation",
  "version_update",
  "git_operations",
  "github_release",
  "publishing",
  "completed",
] as const;

export type ActivePhase = (typeof PHASES)[number];
export type Phase = ActivePhase | "failed" | "rolled_back";

export type BumpKind = "patch" | "minor" | "major" | "explicit";

export type SkipCause = "private" | "dependency" | "rollback" | "dry_run";

export type PackageStatus =
  | { status: "pending" }
  | { status: "in_progress"; started_at: string }
  | { status: "published"; version: string; at: string }
  | { status: "failed"; reason: string; code: string; retryable: boolean; at: string }
  | { status: "skipped"; reason: string; cause: SkipCause; at: string };

export type ReleaseOptions = {
  push: boolean;
  github_release: boolean;
  bundles: boolean;
  keep_temp: boolean;
  failure_policy: FailurePolicy;
  max_concurrency: number;
  max_attempts: number;
  /** Absent in documents written before the option existed; treated as true. */
  clear_runway?: boolean;
};

export type VersionPlan = {
  release_version: string;
  tag: string;
  packages: Record<string, { from: string; to: string }>;
};

export type ErrorRecord = {
  at: string;
  phase: Phase;
  code: string;
  message: string;
  package: string | null;
};

/** Persisted at `<isolated workspace>/.releasectl/state.json`. */
export type ReleaseStateDoc = {
  schema_version: 1;
  save_version: number;
  release_id: string;
  created_at: string;
  updated_at: string;
  bump_kind: BumpKind;
  explicit_version: string | null;
  dry_run: boolean;
  options: ReleaseOptions;
  current_phase: Phase;
  /** Set while current_phase is "failed"; resume re-enters this phase. */
  failed_phase: ActivePhase | null;
  packages: Record<string, PackageStatus>;
  retry_counts: Record<string, number>;
  workspace_path: string;
  source_path: string;
  source_commit: string;
  plan: { tiers: string[][] } | null;
  versions: VersionPlan | null;
  /** Manifest path relative to the workspace → original text. */
  manifest_backups: Record<string, string>;
  git: { commit: string | null; tag: string | null; pushed: boolean };
  github: { release_id: number | null; html_url: string | null; uploaded_artifacts: string[] };
  errors: ErrorRecord[];
  rollback: { started_at: string; steps: string[] } | null;
};

/** Pointer file kept under the releasectl home, outside the state file. */
export type WorkspacePointer = {
  path: string;
  source_path: string;
  created_at: string;
  source_commit: string;
  release_id: string;
};

export type LockRecord = {
  pid: number;
  release_id: string;
  acquired_at: string;
};
