import { simpleGit, type SimpleGit } from "simple-git";
import { CollaboratorError, errorMessage } from "../errors.js";
import type { SourceControl } from "../types/collaborators.js";
import type { GitConfig } from "../types/config.js";

/**
 * Git operations over the isolated clone. Wraps simple-git so tests can
 * hand in their own instance.
 */
export class GitOperations implements SourceControl {
  private git: SimpleGit;

  constructor(
    repoPath: string,
    private readonly config: Pick<GitConfig, "remote" | "branch" | "author_name" | "author_email">,
    git?: SimpleGit,
  ) {
    this.git = git ?? simpleGit(repoPath);
  }

  async headCommit(): Promise<string> {
    return this.run("rev-parse HEAD", async () => (await this.git.revparse(["HEAD"])).trim());
  }

  async commit(message: string, files: readonly string[]): Promise<string> {
    return this.run("commit", async () => {
      await this.ensureIdentity();
      await this.git.add([...files]);
      await this.git.commit(message);
      return (await this.git.revparse(["HEAD"])).trim();
    });
  }

  /** Create an annotated tag and return the tag object id. */
  async tag(name: string, message: string): Promise<string> {
    return this.run(`tag ${name}`, async () => {
      await this.ensureIdentity();
      await this.git.tag(["-a", name, "-m", message]);
      return (await this.git.revparse([name])).trim();
    });
  }

  async push(opts: { tag: string | null }): Promise<void> {
    await this.run("push", async () => {
      await this.git.push(this.config.remote, this.config.branch);
      if (opts.tag) await this.git.push(this.config.remote, `refs/tags/${opts.tag}`);
    });
  }

  async revert(commit: string): Promise<string> {
    return this.run(`revert ${commit}`, async () => {
      await this.ensureIdentity();
      await this.git.revert(commit, ["--no-edit"]);
      return (await this.git.revparse(["HEAD"])).trim();
    });
  }

  async remoteTagExists(name: string): Promise<boolean> {
    return this.run(`ls-remote ${name}`, async () => {
      const out = await this.git.listRemote(["--tags", this.config.remote, `refs/tags/${name}`]);
      return out.trim().length > 0;
    });
  }

  async deleteTag(name: string, opts: { remote: boolean }): Promise<void> {
    await this.run(`delete tag ${name}`, async () => {
      const local = await this.git.tags(["--list", name]);
      if (local.all.includes(name)) await this.git.tag(["-d", name]);
      if (opts.remote) await this.git.push(this.config.remote, `:refs/tags/${name}`);
    });
  }

  /** Fresh CI clones often have no committer identity. */
  private async ensureIdentity(): Promise<void> {
    const email = await this.git.getConfig("user.email");
    if (email.value) return;
    await this.git.addConfig("user.name", this.config.author_name);
    await this.git.addConfig("user.email", this.config.author_email);
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new CollaboratorError(`git ${operation}`, errorMessage(e), e);
    }
  }
}
