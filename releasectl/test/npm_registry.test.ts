import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { GITHUB_PACKAGES_REGISTRY, NpmRegistry, classifyPublishFailure } from "../src/collaborators/npm-registry.js";
import { execOutput, type ExecFn, type ExecOptions } from "../src/collaborators/exec.js";
import { AlreadyPublishedError, RateLimitError, RegistryRejectionError, TransientNetworkError } from "../src/errors.js";
import { descriptor, tmpDir } from "./helpers.js";

const pkg = descriptor("a");

describe("classifyPublishFailure", () => {
  it("recognises a version that is already out", () => {
    const err = classifyPublishFailure(pkg, "npm ERR! code EPUBLISHCONFLICT\nnpm ERR! cannot publish over the previously published versions");
    expect(err).toBeInstanceOf(AlreadyPublishedError);
    expect(err.message).toBe("a: version 1.0.0 is already published");
    expect(err.retryable).toBe(false);
  });

  it("treats rate limits and network trouble as retryable", () => {
    const limited = classifyPublishFailure(pkg, "npm ERR! 429 Too Many Requests");
    expect(limited).toBeInstanceOf(RateLimitError);
    expect(limited.code).toBe("RATE_LIMITED");

    const reset = classifyPublishFailure(pkg, "npm error code ECONNRESET");
    expect(reset).toBeInstanceOf(TransientNetworkError);
    expect(reset.message).toBe("a: network error talking to the registry");

    const server = classifyPublishFailure(pkg, "npm ERR! code E503");
    expect(server.message).toBe("a: registry server error");
    expect(server.retryable).toBe(true);
  });

  it("reports auth failures with their own code", () => {
    const err = classifyPublishFailure(pkg, "npm ERR! code E403\nnpm ERR! 403 Forbidden");
    expect(err).toBeInstanceOf(RegistryRejectionError);
    expect(err.code).toBe("REGISTRY_AUTH");
    expect(err.message).toBe("a: authentication or permission failure");
  });

  it("falls back to the first npm error line", () => {
    expect(classifyPublishFailure(pkg, "Command failed\nnpm ERR! code E400\nnpm ERR! 400 Bad Request").message).toBe(
      "a: npm ERR! code E400",
    );
    expect(classifyPublishFailure(pkg, "something odd\nmore").message).toBe("a: something odd");
    expect(classifyPublishFailure(pkg, "").message).toBe("a: publish failed");
  });
});

describe("execOutput", () => {
  it("joins stderr, stdout and the message", () => {
    const err = Object.assign(new Error("Command failed"), { stderr: "err text", stdout: "" });
    expect(execOutput(err)).toBe("err text\nCommand failed");
    expect(execOutput("boom")).toBe("boom");
  });
});

describe("NpmRegistry", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
  });

  function recordingExec(fail: unknown = null): { exec: ExecFn; calls: Array<{ file: string; args: string[]; opts: ExecOptions }> } {
    const calls: Array<{ file: string; args: string[]; opts: ExecOptions }> = [];
    const exec: ExecFn = async (file, args, opts) => {
      calls.push({ file, args: [...args], opts });
      if (fail !== null) throw fail;
      return { stdout: "", stderr: "" };
    };
    return { exec, calls };
  }

  function registry(exec: ExecFn): { registry: NpmRegistry; configDir: string } {
    const dir = tmpDir("npm");
    dirs.push(dir);
    const configDir = path.join(dir, ".releasectl");
    return {
      configDir,
      registry: new NpmRegistry({
        configDir,
        access: "public",
        distTag: "latest",
        registryToken: "test-token",
        githubToken: null,
        exec,
      }),
    };
  }

  it("runs npm publish in the package directory with tokens in the environment only", async () => {
    const { exec, calls } = recordingExec();
    const { registry: npm, configDir } = registry(exec);

    await npm.publish(pkg, { dryRun: false, signal: new AbortController().signal });

    expect(calls).toHaveLength(1);
    const [call] = calls;
    expect(call.file).toBe("npm");
    expect(call.args).toEqual(["publish", "--access", "public", "--tag", "latest", "--userconfig", path.join(configDir, "npmrc")]);
    expect(call.opts.cwd).toBe("/fixture/packages/a");
    expect(call.opts.env?.RELEASECTL_NPM_TOKEN).toBe("test-token");
    expect(call.opts.env?.RELEASECTL_GITHUB_TOKEN).toBe("");

    const npmrc = path.join(configDir, "npmrc");
    expect(fs.readFileSync(npmrc, "utf8")).toBe(
      "//registry.npmjs.org/:_authToken=${RELEASECTL_NPM_TOKEN}\n//npm.pkg.github.com/:_authToken=${RELEASECTL_GITHUB_TOKEN}\n",
    );
    expect(fs.statSync(npmrc).mode & 0o777).toBe(0o600);
  });

  it("targets GitHub Packages and passes --dry-run", async () => {
    const { exec, calls } = recordingExec();
    const { registry: npm } = registry(exec);

    await npm.publish(descriptor("b", [], { registryTarget: "github" }), { dryRun: true, signal: new AbortController().signal });
    expect(calls[0].args.slice(-3)).toEqual(["--registry", GITHUB_PACKAGES_REGISTRY, "--dry-run"]);
  });

  it("classifies a failed publish from the child's output", async () => {
    const failure = Object.assign(new Error("Command failed: npm publish"), { stderr: "npm ERR! code EPUBLISHCONFLICT" });
    const { exec } = recordingExec(failure);
    const { registry: npm } = registry(exec);

    await expect(npm.publish(pkg, { dryRun: false, signal: new AbortController().signal })).rejects.toThrow(AlreadyPublishedError);
  });
});
