import { InvalidTransitionError } from "../errors.js";
import { PHASES, type ActivePhase, type Phase, type ReleaseStateDoc } from "../types/state.js";

export function phaseIndex(phase: ActivePhase): number {
  return PHASES.indexOf(phase);
}

export function isActivePhase(phase: Phase): phase is ActivePhase {
  return phase !== "failed" && phase !== "rolled_back";
}

/** Next phase in the fixed order; null after `completed`. */
export function nextPhase(phase: ActivePhase): ActivePhase | null {
  const i = phaseIndex(phase);
  return i + 1 < PHASES.length ? PHASES[i + 1] : null;
}

/**
 * The furthest phase the release entered: `failed_phase` while failed,
 * otherwise the current one. Null once rolled back.
 */
export function reachedPhase(state: Pick<ReleaseStateDoc, "current_phase" | "failed_phase">): ActivePhase | null {
  if (state.current_phase === "failed") return state.failed_phase;
  return isActivePhase(state.current_phase) ? state.current_phase : null;
}

/**
 * Phases only move forward one step at a time. `failed` is reachable from
 * any unfinished phase, `rolled_back` from anything but itself, and a failed
 * release may re-enter the phase it failed in (resume).
 */
export function canTransition(
  state: Pick<ReleaseStateDoc, "current_phase" | "failed_phase">,
  to: Phase,
): boolean {
  const from = state.current_phase;
  if (from === "rolled_back") return false;
  if (to === "rolled_back") return true;
  if (to === "failed") return from !== "completed" && from !== "failed";
  if (from === "failed") return state.failed_phase === to;
  if (from === "completed") return false;
  return phaseIndex(to) === phaseIndex(from) + 1;
}

export function assertTransition(state: Pick<ReleaseStateDoc, "current_phase" | "failed_phase">, to: Phase): void {
  if (!canTransition(state, to)) throw new InvalidTransitionError(state.current_phase, to);
}
