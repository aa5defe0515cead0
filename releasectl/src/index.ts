export * from "./errors.js";
export type * from "./types/package.js";
export type * from "./types/config.js";
export type * from "./types/state.js";
export { BUNDLE_PLATFORMS } from "./types/collaborators.js";
export type * from "./types/collaborators.js";
export { PHASES } from "./types/state.js";
export { DEPENDENCY_FIELDS, RUNTIME_DEPENDENCY_FIELDS } from "./types/package.js";

export { loadConfig } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { readCredentials, checkCredentials } from "./config/credentials.js";
export { loadManifests } from "./manifest/loader.js";
export { DependencyGraph } from "./graph/dependency-graph.js";
export { ReleaseHome } from "./workspace/home.js";
export { WorkspaceManager, gitCloner, gitOriginResolver } from "./workspace/isolated.js";
export { ReleaseStateStore, statePathFor } from "./state/store.js";
export { ReleaseLock } from "./state/lock.js";
export { ReleaseHistory } from "./state/history.js";
export { PublishOrchestrator, type RunResult } from "./core/orchestrator.js";
export { RollbackEngine, type RollbackReport } from "./core/rollback.js";
export { publishTiers, type PublishEvent } from "./core/publisher.js";
export { retryWithBackoff, backoffDelay, withTimeout, type RetryPolicy } from "./core/retry.js";
export { parseBumpArgument, planVersions, rewriteRange } from "./core/versioning.js";
export { createCollaborators } from "./collaborators/index.js";
export { Reporter } from "./output/reporter.js";
