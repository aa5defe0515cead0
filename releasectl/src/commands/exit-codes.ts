import { ReleaseError } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RELEASE_FAILED: 1,
  VALIDATION_FAILED: 2,
  INVALID_ARGS: 3,
  LOCK_CONFLICT: 4,
  WORKSPACE_LOST: 5,
  STATE_CORRUPT: 6,
  ROLLBACK_FAILED: 7,
  NO_ACTIVE_RELEASE: 8,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const BY_ERROR_CODE: Record<string, ExitCode> = {
  INVALID_ARGS: EXIT.INVALID_ARGS,
  CONFIG_INVALID: EXIT.VALIDATION_FAILED,
  MANIFEST_PARSE: EXIT.VALIDATION_FAILED,
  GRAPH_CYCLE: EXIT.VALIDATION_FAILED,
  UNKNOWN_DEPENDENCY: EXIT.VALIDATION_FAILED,
  CREDENTIAL_MISSING: EXIT.VALIDATION_FAILED,
  ALREADY_IN_PROGRESS: EXIT.LOCK_CONFLICT,
  WORKSPACE_LOST: EXIT.WORKSPACE_LOST,
  STATE_NOT_FOUND: EXIT.WORKSPACE_LOST,
  STATE_CORRUPT: EXIT.STATE_CORRUPT,
  ROLLBACK_REFUSED: EXIT.ROLLBACK_FAILED,
  ROLLBACK_FAILED: EXIT.ROLLBACK_FAILED,
  NO_ACTIVE_RELEASE: EXIT.NO_ACTIVE_RELEASE,
  INTERRUPTED: EXIT.INTERRUPTED,
};

/** Exit code for an error that ended a command. Anything unclassified is a failed release. */
export function exitCodeFor(error: unknown): ExitCode {
  if (!(error instanceof ReleaseError)) return EXIT.RELEASE_FAILED;
  return BY_ERROR_CODE[error.code] ?? EXIT.RELEASE_FAILED;
}
