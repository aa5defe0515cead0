import { ReleaseError, errorMessage } from "../errors.js";
import { reachedPhase } from "../state/phases.js";
import type { PackageStatus, ReleaseStateDoc } from "../types/state.js";

export type PackageRow = {
  name: string;
  status: PackageStatus["status"];
  detail: string | null;
  attempts: number;
};

export function packageRows(state: ReleaseStateDoc): PackageRow[] {
  return Object.keys(state.packages)
    .sort()
    .map((name) => {
      const s = state.packages[name];
      let detail: string | null = null;
      if (s.status === "failed") detail = s.reason;
      else if (s.status === "skipped") detail = s.reason;
      else if (s.status === "published") detail = s.version;
      return { name, status: s.status, detail, attempts: state.retry_counts[name] ?? 0 };
    });
}

export function formatPackageTable(state: ReleaseStateDoc): string[] {
  const rows = packageRows(state);
  const width = Math.max(0, ...rows.map((r) => r.name.length));
  return rows.map((r) => {
    const detail = r.detail ? `  ${r.detail}` : "";
    const attempts = r.attempts > 0 ? ` (attempts: ${r.attempts})` : "";
    return `  ${r.name.padEnd(width)}  ${r.status}${attempts}${detail}`;
  });
}

const DEFAULT_REMEDIATION =
  "Run `releasectl resume` once the cause is fixed, `releasectl rollback` to undo, or `releasectl cleanup` to abandon.";

export function remediationFor(error: unknown): string {
  return error instanceof ReleaseError && error.remediation !== null ? error.remediation : DEFAULT_REMEDIATION;
}

/**
 * What a fatal error shows: the phase it hit, every package's status and a
 * concrete next step. The source checkout is never modified, so it is not
 * part of the story.
 */
export function failureSummary(state: ReleaseStateDoc, error: unknown): string[] {
  const phase = reachedPhase(state) ?? state.current_phase;
  return [
    `release ${state.release_id} failed during ${phase}: ${errorMessage(error)}`,
    "packages:",
    ...formatPackageTable(state),
    `isolated workspace kept at ${state.workspace_path}`,
    `next: ${remediationFor(error)}`,
  ];
}
