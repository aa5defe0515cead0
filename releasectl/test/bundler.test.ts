import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { CommandBundler, defaultPlatforms, isBundlePlatform } from "../src/collaborators/bundler.js";
import type { ExecFn } from "../src/collaborators/exec.js";
import { CollaboratorError, ConfigError } from "../src/errors.js";
import { tmpDir } from "./helpers.js";

describe("bundle platforms", () => {
  it("defaults to the formats the host can build", () => {
    expect(defaultPlatforms("linux")).toEqual(["deb", "rpm", "appimage"]);
    expect(defaultPlatforms("darwin")).toEqual(["app", "dmg"]);
    expect(defaultPlatforms("win32")).toEqual(["msi", "nsis"]);
  });

  it("recognises known formats", () => {
    expect(isBundlePlatform("dmg")).toBe(true);
    expect(isBundlePlatform("zip")).toBe(false);
  });
});

describe("CommandBundler", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = tmpDir("bundle");
    fs.mkdirSync(path.join(cwd, "dist"));
    fs.writeFileSync(path.join(cwd, "dist", "widgets.deb"), "deb");
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function recordingExec(stdout: string, failOn: string | null = null): { exec: ExecFn; calls: string[] } {
    const calls: string[] = [];
    const exec: ExecFn = async (file, args) => {
      const line = [file, ...args].join(" ");
      calls.push(line);
      if (failOn !== null && line.startsWith(failOn)) {
        throw Object.assign(new Error("Command failed"), { stderr: `${file} exploded` });
      }
      return { stdout: file === "npm" ? "" : stdout, stderr: "" };
    };
    return { exec, calls };
  }

  function bundler(exec: ExecFn, command: readonly string[] = ["make-bundle", "{platform}", "--target={target}"]): CommandBundler {
    return new CommandBundler({ cwd, command, prebuildCommand: ["npm", "run", "build"], host: "linux", exec });
  }

  it("runs the prebuild once and returns the printed artifact", async () => {
    const { exec, calls } = recordingExec("packing...\ndist/widgets.deb\n");
    const b = bundler(exec);

    expect(await b.build("deb", { target: null, prebuild: true })).toBe(path.join(cwd, "dist", "widgets.deb"));
    await b.build("rpm", { target: null, prebuild: true });
    expect(calls).toEqual(["npm run build", "make-bundle deb", "make-bundle rpm"]);
  });

  it("substitutes the target when one is given", async () => {
    const { exec, calls } = recordingExec("dist/widgets.deb");
    await bundler(exec).build("deb", { target: "x86_64-unknown-linux-gnu", prebuild: false });
    expect(calls).toEqual(["make-bundle deb --target=x86_64-unknown-linux-gnu"]);
  });

  it("refuses a format the host cannot build", async () => {
    const { exec, calls } = recordingExec("dist/widgets.deb");
    await expect(bundler(exec).build("dmg", { target: null, prebuild: true })).rejects.toThrow(
      "bundle dmg: dmg can only be built on darwin, not linux",
    );
    expect(calls).toEqual([]);
  });

  it("needs a configured command", async () => {
    const { exec } = recordingExec("dist/widgets.deb");
    await expect(bundler(exec, []).build("deb", { target: null, prebuild: false })).rejects.toThrow(ConfigError);
  });

  it("fails when the artifact is missing or never printed", async () => {
    const { exec: missing } = recordingExec("dist/widgets.rpm\n");
    await expect(bundler(missing).build("rpm", { target: null, prebuild: false })).rejects.toThrow(
      `bundle rpm: artifact not found: ${path.join(cwd, "dist", "widgets.rpm")}`,
    );

    const { exec: silent } = recordingExec("\n\n");
    await expect(bundler(silent).build("deb", { target: null, prebuild: false })).rejects.toThrow(
      "bundle deb: command printed no artifact path",
    );
  });

  it("wraps a failing prebuild with its output", async () => {
    const { exec } = recordingExec("dist/widgets.deb", "npm");
    const err = await bundler(exec).build("deb", { target: null, prebuild: true }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CollaboratorError);
    expect(err instanceof Error ? err.message : "").toBe("prebuild: npm exploded\nCommand failed");
  });
});
