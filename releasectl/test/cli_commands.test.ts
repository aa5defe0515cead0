import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { bundle } from "../src/commands/bundle.js";
import { cleanup } from "../src/commands/cleanup.js";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { preview } from "../src/commands/preview.js";
import { release, releaseOptions } from "../src/commands/release.js";
import { status, statusLines } from "../src/commands/status.js";
import { validate } from "../src/commands/validate.js";
import { loadConfig } from "../src/config/loader.js";
import {
  AlreadyInProgressError,
  ConfigError,
  CredentialMissingError,
  GraphCycleError,
  RollbackStepError,
  StateCorruptionError,
  TransientNetworkError,
  UsageError,
  WorkspaceLostError,
} from "../src/errors.js";
import { Reporter } from "../src/output/reporter.js";
import { ReleaseHome } from "../src/workspace/home.js";
import { listDir, testEnv, writeJson, type FixturePackage, type TestEnv } from "./helpers.js";

const PACKAGES: FixturePackage[] = [{ name: "core" }, { name: "ui", dependencies: { core: "^1.0.0" } }];

const envs: TestEnv[] = [];

function env(packages: FixturePackage[] = PACKAGES, config: string | null = null): TestEnv {
  const e = testEnv(packages, config);
  envs.push(e);
  return e;
}

afterEach(() => {
  for (const e of envs.splice(0)) e.cleanup();
});

function humanReporter(): { reporter: Reporter; stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const reporter = new Reporter({
    format: "human",
    stdout: { write: (c: string) => stdout.push(c) },
    stderr: { write: (c: string) => stderr.push(c) },
  });
  return { reporter, stdout, stderr };
}

describe("exit codes", () => {
  it("maps each failure class to its code", () => {
    expect(exitCodeFor(new UsageError("x"))).toBe(EXIT.INVALID_ARGS);
    expect(exitCodeFor(new ConfigError("x"))).toBe(EXIT.VALIDATION_FAILED);
    expect(exitCodeFor(new GraphCycleError(["a", "b"]))).toBe(EXIT.VALIDATION_FAILED);
    expect(exitCodeFor(new CredentialMissingError(["NPM_TOKEN"], "registry publishing"))).toBe(EXIT.VALIDATION_FAILED);
    expect(exitCodeFor(new AlreadyInProgressError(null))).toBe(EXIT.LOCK_CONFLICT);
    expect(exitCodeFor(new WorkspaceLostError("/tmp/x", "gone"))).toBe(EXIT.WORKSPACE_LOST);
    expect(exitCodeFor(new StateCorruptionError("/tmp/x", "bad"))).toBe(EXIT.STATE_CORRUPT);
    expect(exitCodeFor(new RollbackStepError("git_tag", new Error("x")))).toBe(EXIT.ROLLBACK_FAILED);
    expect(exitCodeFor(new TransientNetworkError("x"))).toBe(EXIT.RELEASE_FAILED);
    expect(exitCodeFor(new Error("x"))).toBe(EXIT.RELEASE_FAILED);
  });
});

describe("releaseOptions", () => {
  it("combines flags with configuration", async () => {
    const e = env(PACKAGES, "bundles:\n  enabled: true\n  command: [make-bundle]\n");
    const config = await loadConfig({ root: e.source, env: {} });
    expect(releaseOptions({ bump: "patch", githubRelease: false, sequential: true, continueOnFailure: true }, config)).toEqual({
      push: true,
      github_release: false,
      bundles: true,
      keep_temp: false,
      failure_policy: "continue",
      max_concurrency: 1,
      max_attempts: 3,
      clear_runway: true,
    });
    expect(releaseOptions({ bump: "patch", concurrency: 8, maxAttempts: 5 }, config)).toMatchObject({
      max_concurrency: 8,
      max_attempts: 5,
      failure_policy: "abort",
    });
    expect(releaseOptions({ bump: "patch", clearRunway: false }, config).clear_runway).toBe(false);
  });

  it("rejects conflicting or invalid counts", async () => {
    const config = await loadConfig({ root: env().source, env: {} });
    expect(() => releaseOptions({ bump: "patch", sequential: true, concurrency: 2 }, config)).toThrow("--sequential and --concurrency conflict");
    expect(() => releaseOptions({ bump: "patch", concurrency: 0 }, config)).toThrow(UsageError);
  });
});

describe("status", () => {
  it("reports that nothing is active", async () => {
    const e = env();
    const r = await status(e.ctx());
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.exitCode).toBe(EXIT.NO_ACTIVE_RELEASE);
  });

  it("shows phase, lock, packages and the last error of a failed release", async () => {
    const e = env();
    await release(e.ctx({ env: {} }), { bump: "minor" });

    const r = await status(e.ctx());
    expect(r.ok).toBe(true);
    if (!r.ok || r.kind !== "active") return;
    expect(statusLines(r.state, r.workspace, r.lock)).toEqual([
      `release ${r.state.release_id} (minor)`,
      "phase: failed (during validation)",
      `workspace: ${r.workspace.path}`,
      `lock: pid ${process.pid}`,
      "packages:",
      "  core  pending",
      "  ui    pending",
      "last error: [CREDENTIAL_MISSING] missing credentials for registry publishing: NPM_TOKEN",
    ]);
  });

  it("lists finished releases", async () => {
    const e = env();
    const empty = await status(e.ctx(), { history: true });
    expect(empty).toEqual({ ok: true, kind: "history", entries: [] });

    await release(e.ctx(), { bump: "minor" });
    const r = await status(e.ctx(), { history: true });
    expect(r.ok).toBe(true);
    if (!r.ok || r.kind !== "history") return;
    expect(r.entries).toHaveLength(1);
    expect(r.entries[0]).toMatchObject({ current_phase: "completed", release_version: "1.1.0", tag: "v1.1.0" });
  });

  it("reports an unreadable history record as a structured warning", async () => {
    const e = env();
    const dir = new ReleaseHome(e.home).historyDir(e.source);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, "rel-bad.json"), "nope");

    const r = await status(e.ctx(), { history: true });
    expect(r).toEqual({ ok: true, kind: "history", entries: [] });
    expect(e.out.records().filter((rec) => rec.level === "warn")).toEqual([
      {
        level: "warn",
        code: "HISTORY_UNREADABLE",
        message: "ignoring history record rel-bad: not valid JSON",
        release_id: "rel-bad",
      },
    ]);
  });
});

describe("cleanup", () => {
  it("removes the clone, pointer and lock of an abandoned release", async () => {
    const e = env();
    await release(e.ctx({ env: {} }), { bump: "minor" });
    const home = new ReleaseHome(e.home);
    const [clone] = listDir(e.clones);

    const r = await cleanup(e.ctx());
    expect(r).toEqual({ ok: true, removed: [path.join(e.clones, clone), home.lockPath(e.source)] });
    expect(listDir(e.clones)).toEqual([]);
    expect(fs.existsSync(home.pointerPath(e.source))).toBe(false);

    // a fresh release can start again
    expect((await release(e.ctx(), { bump: "minor" })).ok).toBe(true);
  });

  it("says so when there is nothing to clean up", async () => {
    const e = env();
    const out = humanReporter();
    expect(await cleanup(e.ctx({ reporter: out.reporter }))).toEqual({ ok: true, removed: [] });
    expect(out.stdout).toEqual(["Nothing to clean up.\n"]);
  });

  it("leaves a lock held by another running process unless forced", async () => {
    const e = env();
    const lockPath = new ReleaseHome(e.home).lockPath(e.source);
    // the parent process is alive for the duration of the test
    writeJson(lockPath, { pid: process.ppid, release_id: "rel-elsewhere", acquired_at: "2026-01-01T00:00:00.000Z" });

    const refused = await cleanup(e.ctx());
    expect(refused.ok).toBe(false);
    if (refused.ok) return;
    expect(refused.exitCode).toBe(EXIT.LOCK_CONFLICT);
    expect(fs.existsSync(lockPath)).toBe(true);

    expect(await cleanup(e.ctx(), { force: true })).toEqual({ ok: true, removed: [lockPath] });
  });

  it("needs force to clear an unreadable lock", async () => {
    const e = env();
    const lockPath = new ReleaseHome(e.home).lockPath(e.source);
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, "garbage");

    const refused = await cleanup(e.ctx());
    expect(refused.ok).toBe(false);
    if (refused.ok) return;
    expect(refused.exitCode).toBe(EXIT.STATE_CORRUPT);
    expect(await cleanup(e.ctx(), { force: true })).toEqual({ ok: true, removed: [lockPath] });
  });

  it("deletes history with --all", async () => {
    const e = env();
    await release(e.ctx(), { bump: "minor" });
    const historyDir = new ReleaseHome(e.home).historyDir(e.source);
    expect(listDir(historyDir)).toHaveLength(1);

    expect(await cleanup(e.ctx(), { all: true })).toEqual({ ok: true, removed: [historyDir] });
    expect(fs.existsSync(historyDir)).toBe(false);
  });
});

describe("validate", () => {
  it("passes a healthy workspace and prints tiers when verbose", async () => {
    const e = env();
    const r = await validate(e.ctx(), { verbose: true });
    expect(r).toEqual({ ok: true, diagnostics: [], tiers: [["core"], ["ui"]] });
    expect(e.out.codes()).toEqual(["TIERS", "OK"]);
  });

  it("warns about missing credentials without failing", async () => {
    const e = env();
    const r = await validate(e.ctx({ env: {} }));
    expect(r.ok).toBe(true);
    expect(r.diagnostics).toEqual([
      { level: "warn", code: "CREDENTIAL_MISSING", message: "missing credentials for registry publishing: NPM_TOKEN" },
      { level: "warn", code: "CREDENTIAL_MISSING", message: "missing credentials for the release host: GH_TOKEN, GITHUB_TOKEN" },
    ]);
  });

  it("fails on a dependency cycle", async () => {
    const e = env([
      { name: "a", dependencies: { b: "^1.0.0" } },
      { name: "b", dependencies: { a: "^1.0.0" } },
    ]);
    const r = await validate(e.ctx());
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.exitCode).toBe(EXIT.VALIDATION_FAILED);
    expect(r.diagnostics.map((d) => [d.level, d.code])).toEqual([["error", "GRAPH_CYCLE"]]);
  });

  it("fails on invalid configuration", async () => {
    const e = env(PACKAGES, "publish:\n  max_concurrency: 0\n");
    const r = await validate(e.ctx());
    expect(r.ok).toBe(false);
    expect(r.diagnostics.map((d) => d.code)).toEqual(["CONFIG_INVALID"]);
  });

  it("reports an unknown primary package, private packages and a missing bundle command", async () => {
    const e = env(
      [{ name: "core" }, { name: "internal", private: true }],
      "primary_package: nope\nbundles:\n  enabled: true\n",
    );
    const r = await validate(e.ctx());
    expect(r.ok).toBe(false);
    expect(r.diagnostics.map((d) => [d.level, d.code])).toEqual([
      ["error", "PRIMARY_PACKAGE_UNKNOWN"],
      ["info", "PACKAGE_PRIVATE"],
      ["error", "BUNDLES_COMMAND_MISSING"],
    ]);
  });

  it("points at the manifest that does not parse", async () => {
    const e = env();
    const file = path.join(e.source, "packages", "ui", "package.json");
    fs.writeFileSync(file, "{");
    const r = await validate(e.ctx());
    expect(r.diagnostics).toHaveLength(1);
    expect(r.diagnostics[0]).toMatchObject({ level: "error", code: "MANIFEST_PARSE", path: file });
  });
});

describe("preview", () => {
  it("prints planned versions, range rewrites and tiers", async () => {
    const e = env();
    const out = humanReporter();
    const r = await preview(e.ctx({ reporter: out.reporter }), "minor");
    expect(r).toEqual({
      ok: true,
      version: "1.1.0",
      tag: "v1.1.0",
      packages: { core: { from: "1.0.0", to: "1.1.0" }, ui: { from: "1.0.0", to: "1.1.0" } },
      tiers: [["core"], ["ui"]],
      ranges: [{ package: "ui", dependency: "core", from: "^1.0.0", to: "^1.1.0" }],
    });
    expect(out.stdout.join("")).toBe(
      [
        "release 1.1.0 (tag v1.1.0)",
        "packages:",
        "  core  1.0.0 -> 1.1.0",
        "  ui    1.0.0 -> 1.1.0",
        "ranges:",
        "  ui: core ^1.0.0 -> ^1.1.0",
        "tiers:",
        "  0: core",
        "  1: ui",
        "",
      ].join("\n"),
    );
    expect(listDir(e.clones)).toEqual([]);
  });

  it("rejects a bad bump with a hint", async () => {
    const e = env();
    const out = humanReporter();
    const r = await preview(e.ctx({ reporter: out.reporter }), "later");
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.exitCode).toBe(EXIT.INVALID_ARGS);
    expect(out.stderr).toEqual([
      'error: expected patch, minor, major or a version, got "later"\n',
      "  next: Run `releasectl --help` for usage.\n",
    ]);
  });
});

describe("bundle", () => {
  it("builds in a clone and keeps it for collection", async () => {
    const e = env();
    const r = await bundle(e.ctx(), { platform: "deb" });
    expect(r).toEqual({ ok: true, artifacts: [{ platform: "deb", path: path.join(e.artifacts, "widgets-deb.pkg") }], uploadedTo: null });
    expect(listDir(e.clones)).toHaveLength(1);
    expect(fs.existsSync(new ReleaseHome(e.home).lockPath(e.source))).toBe(false);
    expect(fs.existsSync(new ReleaseHome(e.home).pointerPath(e.source))).toBe(false);
  });

  it("uploads to the release entry of the current version", async () => {
    const e = env();
    await e.fakes.host.createRelease({ tag: "v1.0.0", name: "v1.0.0", notes: "", draft: false, prerelease: false });

    const r = await bundle(e.ctx(), { platform: "rpm", upload: true });
    expect(r.ok).toBe(true);
    if (!r.ok) return;
    expect(r.uploadedTo).toBe(100);
    expect(e.fakes.host.releases.get(100)?.assets).toEqual(["widgets-rpm.pkg"]);
    expect(listDir(e.clones)).toEqual([]);
  });

  it("fails an upload with no release entry and removes the clone", async () => {
    const e = env();
    const r = await bundle(e.ctx(), { platform: "deb", upload: true });
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.exitCode).toBe(EXIT.RELEASE_FAILED);
    expect(e.fakes.bundler.built).toEqual([]);
    expect(listDir(e.clones)).toEqual([]);
  });

  it("rejects an unknown platform", async () => {
    const e = env();
    const r = await bundle(e.ctx(), { platform: "zip" });
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.exitCode).toBe(EXIT.INVALID_ARGS);
  });

  it("refuses to run beside an active release", async () => {
    const e = env();
    await release(e.ctx({ env: {} }), { bump: "minor" });
    const r = await bundle(e.ctx(), { platform: "deb" });
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.exitCode).toBe(EXIT.LOCK_CONFLICT);
  });
});
