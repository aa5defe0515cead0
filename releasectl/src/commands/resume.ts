import { reachedPhase } from "../state/phases.js";
import { failure, openActiveRelease, openRuntime, type ActiveRelease, type CommandContext, type Runtime } from "./context.js";
import { runToEnd, type RunCommandResult } from "./release.js";

/** Continue the active release from its persisted phase. */
export async function resume(ctx: CommandContext): Promise<RunCommandResult> {
  let rt: Runtime;
  let active: ActiveRelease;
  try {
    rt = await openRuntime(ctx);
    active = await openActiveRelease(rt);
  } catch (e) {
    return failure(ctx, e);
  }

  const state = active.store.state;
  ctx.reporter.info("RESUME_START", `resuming release ${state.release_id} at ${reachedPhase(state) ?? state.current_phase}`, {
    release_id: state.release_id,
    workspace: active.workspace.path,
  });
  return runToEnd(ctx, rt, active.workspace, active.store);
}
