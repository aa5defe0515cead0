import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import { simpleGit } from "simple-git";
import { GitOperations } from "../src/collaborators/git.js";
import { CollaboratorError } from "../src/errors.js";
import { tmpDir } from "./helpers.js";

const CONFIG = { remote: "origin", branch: "main", author_name: "releasectl", author_email: "releasectl@users.noreply.local" };

describe("git operations", () => {
  let dir: string;

  beforeEach(() => {
    dir = tmpDir("git");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("GitOperations class is importable", async () => {
    const mod = await import("../src/collaborators/git.js");
    expect(mod.GitOperations).toBeDefined();
  });

  it("wraps failures with the operation name", async () => {
    const git = new GitOperations(dir, CONFIG, simpleGit({ baseDir: dir, binary: "releasectl-no-such-git" }));
    const err = await git.headCommit().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CollaboratorError);
    expect(err instanceof Error ? err.message : "").toMatch(/^git rev-parse HEAD: /);
  });

  it("wraps a failed remote tag lookup with the tag name", async () => {
    const git = new GitOperations(dir, CONFIG, simpleGit({ baseDir: dir, binary: "releasectl-no-such-git" }));
    await expect(git.remoteTagExists("v1.1.0")).rejects.toThrow(/^git ls-remote v1\.1\.0: /);
  });
});
