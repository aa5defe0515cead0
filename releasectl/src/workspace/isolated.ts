import { mkdtemp, readFile, rm, stat, unlink } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { simpleGit } from "simple-git";
import { ConfigError, WorkspaceAbsentError, WorkspaceLostError, errnoCode } from "../errors.js";
import { defaultRegistry } from "../schema/registry.js";
import { atomicWriteJson } from "../state/atomic.js";
import { nowIso } from "../util.js";
import type { WorkspacePointer } from "../types/state.js";
import type { ReleaseHome } from "./home.js";

export type CloneRequest = {
  /** Where to clone from (the source's remote URL). */
  url: string;
  branch: string;
  dest: string;
};

/** Populates `dest` and returns its HEAD commit. */
export type Cloner = (req: CloneRequest) => Promise<string>;

/** Resolves the URL the isolated copy is cloned from. */
export type OriginResolver = (sourcePath: string, remote: string) => Promise<string>;

export const gitCloner: Cloner = async ({ url, branch, dest }) => {
  await simpleGit().clone(url, dest, ["--branch", branch, "--single-branch"]);
  return (await simpleGit(dest).revparse(["HEAD"])).trim();
};

export const gitOriginResolver: OriginResolver = async (sourcePath, remote) => {
  const url = await simpleGit(sourcePath).remote(["get-url", remote]);
  if (typeof url !== "string" || url.trim().length === 0) {
    throw new ConfigError(`${sourcePath} has no "${remote}" remote to clone from`);
  }
  return url.trim();
};

export type WorkspaceManagerOptions = {
  sourcePath: string;
  home: ReleaseHome;
  remote: string;
  branch: string;
  cloner?: Cloner;
  resolveOrigin?: OriginResolver;
  /** Parent directory for clones; defaults to the OS temp dir. */
  tmpRoot?: string;
};

/**
 * Lifecycle of the disposable clone a release runs in. The source path is
 * only ever read (to find its remote); every mutation happens in the clone.
 */
export class WorkspaceManager {
  readonly sourcePath: string;
  /** Copy of the active release's state, kept beside the pointer. */
  readonly mirrorPath: string;
  private readonly pointerPath: string;

  constructor(private readonly opts: WorkspaceManagerOptions) {
    this.sourcePath = path.resolve(opts.sourcePath);
    this.pointerPath = opts.home.pointerPath(this.sourcePath);
    this.mirrorPath = opts.home.statePath(this.sourcePath);
  }

  async acquire(releaseId: string): Promise<WorkspacePointer> {
    const resolveOrigin = this.opts.resolveOrigin ?? gitOriginResolver;
    const cloner = this.opts.cloner ?? gitCloner;

    const url = await resolveOrigin(this.sourcePath, this.opts.remote);
    const dest = await mkdtemp(path.join(this.opts.tmpRoot ?? os.tmpdir(), "releasectl-"));

    let sourceCommit: string;
    try {
      sourceCommit = await cloner({ url, branch: this.opts.branch, dest });
    } catch (e) {
      await rm(dest, { recursive: true, force: true });
      throw e;
    }

    const pointer: WorkspacePointer = {
      path: dest,
      source_path: this.sourcePath,
      created_at: nowIso(),
      source_commit: sourceCommit,
      release_id: releaseId,
    };
    await atomicWriteJson(this.pointerPath, pointer);
    return pointer;
  }

  /** The pointer as recorded, without checking the clone still exists. */
  async peek(): Promise<WorkspacePointer | null> {
    let raw: string;
    try {
      raw = await readFile(this.pointerPath, "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return null;
      throw e;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new WorkspaceLostError(null, `pointer ${this.pointerPath} is not valid JSON`);
    }
    const res = await (await defaultRegistry()).check("workspace-pointer", json);
    if (!res.ok) throw new WorkspaceLostError(null, `pointer ${this.pointerPath} is invalid: ${res.errors}`);
    return res.value;
  }

  async locate(): Promise<WorkspacePointer> {
    const pointer = await this.peek();
    if (!pointer) throw new WorkspaceAbsentError(this.sourcePath);

    const exists = await stat(pointer.path).then(
      (s) => s.isDirectory(),
      () => false,
    );
    if (!exists) throw new WorkspaceLostError(pointer.path, `${pointer.path} no longer exists`);
    return pointer;
  }

  /** Remove the clone unless `keep`, then clear the pointer. */
  async release(workspace: WorkspacePointer, opts: { keep: boolean }): Promise<void> {
    if (!opts.keep) await rm(workspace.path, { recursive: true, force: true });
    await this.clearPointer();
  }

  /** Forget the active release: the pointer and the state mirror go together. */
  async clearPointer(): Promise<void> {
    for (const file of [this.mirrorPath, this.pointerPath]) {
      try {
        await unlink(file);
      } catch (e) {
        if (errnoCode(e) !== "ENOENT") throw e;
      }
    }
  }
}
