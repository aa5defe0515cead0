import { stat } from "node:fs/promises";
import path from "node:path";
import { CollaboratorError, ConfigError } from "../errors.js";
import { formatTemplate } from "../util.js";
import { BUNDLE_PLATFORMS, type BundlePlatform, type Bundler } from "../types/collaborators.js";
import { execFileAsync, execOutput, type ExecFn } from "./exec.js";

/** OS each package format can be built on. */
export const PLATFORM_HOSTS: Record<BundlePlatform, NodeJS.Platform> = {
  deb: "linux",
  rpm: "linux",
  appimage: "linux",
  app: "darwin",
  dmg: "darwin",
  msi: "win32",
  nsis: "win32",
};

/** Formats that need the Apple signing credentials. */
export const SIGNED_PLATFORMS: readonly BundlePlatform[] = ["app", "dmg"];

export function isBundlePlatform(value: string): value is BundlePlatform {
  return BUNDLE_PLATFORMS.some((p) => p === value);
}

export function defaultPlatforms(host: NodeJS.Platform = process.platform): BundlePlatform[] {
  return BUNDLE_PLATFORMS.filter((p) => PLATFORM_HOSTS[p] === host);
}

export type CommandBundlerOptions = {
  cwd: string;
  /** argv template; `{platform}` and `{target}` are substituted. */
  command: readonly string[];
  prebuildCommand: readonly string[];
  host?: NodeJS.Platform;
  exec?: ExecFn;
};

/**
 * Bundler that shells out to a configured packaging command, once per
 * platform. The command prints the artifact path as its last stdout line.
 */
export class CommandBundler implements Bundler {
  private prebuilt = false;

  constructor(private readonly opts: CommandBundlerOptions) {}

  async build(platform: BundlePlatform, opts: { target: string | null; prebuild: boolean }): Promise<string> {
    const host = this.opts.host ?? process.platform;
    if (PLATFORM_HOSTS[platform] !== host) {
      throw new CollaboratorError(`bundle ${platform}`, `${platform} can only be built on ${PLATFORM_HOSTS[platform]}, not ${host}`);
    }
    if (this.opts.command.length === 0) {
      throw new ConfigError("bundles.command is empty; configure the packaging command to bundle");
    }

    const exec = this.opts.exec ?? execFileAsync;

    if (opts.prebuild && !this.prebuilt && this.opts.prebuildCommand.length > 0) {
      const [bin, ...args] = this.opts.prebuildCommand;
      try {
        await exec(bin, args, { cwd: this.opts.cwd });
      } catch (e) {
        throw new CollaboratorError("prebuild", execOutput(e), e);
      }
      this.prebuilt = true;
    }

    const vars: Record<string, string> = { platform };
    if (opts.target !== null) vars.target = opts.target;
    // drop arguments that mention {target} when no target was requested
    const argv = this.opts.command.map((a) => formatTemplate(a, vars)).filter((a) => !a.includes("{target}"));
    const [bin, ...args] = argv;

    let stdout: string;
    try {
      ({ stdout } = await exec(bin, args, { cwd: this.opts.cwd }));
    } catch (e) {
      throw new CollaboratorError(`bundle ${platform}`, execOutput(e), e);
    }

    const lines = stdout.split("\n").map((l) => l.trim()).filter((l) => l.length > 0);
    const last = lines[lines.length - 1];
    if (!last) throw new CollaboratorError(`bundle ${platform}`, "command printed no artifact path");

    const artifact = path.resolve(this.opts.cwd, last);
    const exists = await stat(artifact).then(
      (s) => s.isFile(),
      () => false,
    );
    if (!exists) throw new CollaboratorError(`bundle ${platform}`, `artifact not found: ${artifact}`);
    return artifact;
  }
}
