import { createHash } from "node:crypto";
import os from "node:os";
import path from "node:path";

/**
 * Per-user directory holding everything that must survive outside the
 * isolated clone: active-workspace pointers with a mirror of the active
 * state, release locks and history.
 *
 *   <home>/active/<key>.json
 *   <home>/active/<key>.state.json
 *   <home>/locks/<key>.lock
 *   <home>/history/<key>/<release_id>.json
 *
 * `key` is derived from the absolute source path.
 */
export class ReleaseHome {
  readonly root: string;

  constructor(root?: string | null, env: NodeJS.ProcessEnv = process.env) {
    this.root = path.resolve(root ?? env.RELEASECTL_HOME ?? path.join(os.homedir(), ".releasectl"));
  }

  static keyFor(sourcePath: string): string {
    return createHash("sha256").update(path.resolve(sourcePath)).digest("hex").slice(0, 16);
  }

  pointerPath(sourcePath: string): string {
    return path.join(this.root, "active", `${ReleaseHome.keyFor(sourcePath)}.json`);
  }

  statePath(sourcePath: string): string {
    return path.join(this.root, "active", `${ReleaseHome.keyFor(sourcePath)}.state.json`);
  }

  lockPath(sourcePath: string): string {
    return path.join(this.root, "locks", `${ReleaseHome.keyFor(sourcePath)}.lock`);
  }

  historyDir(sourcePath: string): string {
    return path.join(this.root, "history", ReleaseHome.keyFor(sourcePath));
  }
}
