import { writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import {
  AlreadyPublishedError,
  RateLimitError,
  RegistryRejectionError,
  ReleaseError,
  TransientNetworkError,
} from "../errors.js";
import type { Registry } from "../types/collaborators.js";
import type { PackageDescriptor } from "../types/package.js";
import { execFileAsync, execOutput, type ExecFn } from "./exec.js";

export const GITHUB_PACKAGES_REGISTRY = "https://npm.pkg.github.com";

const RULES: Array<{ pattern: RegExp; make: (pkg: PackageDescriptor, output: string) => ReleaseError }> = [
  {
    pattern: /EPUBLISHCONFLICT|cannot publish over|previously published/i,
    make: (pkg, out) => new AlreadyPublishedError(pkg.name, pkg.version, out),
  },
  {
    pattern: /E429|too many requests|rate limit/i,
    make: (pkg, out) => new RateLimitError(`${pkg.name}: registry rate limit`, null, out),
  },
  {
    pattern: /ETIMEDOUT|ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|socket hang up|network/i,
    make: (pkg, out) => new TransientNetworkError(`${pkg.name}: network error talking to the registry`, { cause: out }),
  },
  {
    pattern: /\bE5\d\d\b|\b50[234] /,
    make: (pkg, out) => new TransientNetworkError(`${pkg.name}: registry server error`, { cause: out }),
  },
  {
    pattern: /E401|ENEEDAUTH|E403/,
    make: (pkg) => new RegistryRejectionError(pkg.name, "authentication or permission failure", { code: "REGISTRY_AUTH" }),
  },
];

/** Map `npm publish` output to the error taxonomy. */
export function classifyPublishFailure(pkg: PackageDescriptor, output: string): ReleaseError {
  for (const rule of RULES) {
    if (rule.pattern.test(output)) return rule.make(pkg, output);
  }
  const firstError = output.split("\n").find((l) => /npm (ERR!|error)/.test(l)) ?? output.split("\n")[0] ?? "";
  return new RegistryRejectionError(pkg.name, firstError.trim() || "publish failed");
}

export type NpmRegistryOptions = {
  /** Directory where the generated .npmrc goes (inside the isolated workspace). */
  configDir: string;
  access: "public" | "restricted";
  distTag: string;
  /** Tokens are passed through the environment, never written to disk. */
  registryToken: string | null;
  githubToken: string | null;
  npmBin?: string;
  exec?: ExecFn;
};

/**
 * Publishes with `npm publish` run inside each package directory. The
 * generated npmrc only holds `${VAR}` references that npm expands.
 */
export class NpmRegistry implements Registry {
  private npmrc: string | null = null;

  constructor(private readonly opts: NpmRegistryOptions) {}

  async publish(pkg: PackageDescriptor, opts: { dryRun: boolean; signal: AbortSignal }): Promise<void> {
    const args = ["publish", "--access", this.opts.access, "--tag", this.opts.distTag, "--userconfig", await this.userconfig()];
    if (pkg.registryTarget === "github") args.push("--registry", GITHUB_PACKAGES_REGISTRY);
    if (opts.dryRun) args.push("--dry-run");

    const exec = this.opts.exec ?? execFileAsync;
    try {
      await exec(this.opts.npmBin ?? "npm", args, {
        cwd: pkg.path,
        signal: opts.signal,
        env: {
          ...process.env,
          RELEASECTL_NPM_TOKEN: this.opts.registryToken ?? "",
          RELEASECTL_GITHUB_TOKEN: this.opts.githubToken ?? "",
        },
      });
    } catch (e) {
      throw classifyPublishFailure(pkg, execOutput(e));
    }
  }

  private async userconfig(): Promise<string> {
    if (this.npmrc) return this.npmrc;
    const file = path.join(this.opts.configDir, "npmrc");
    await mkdir(this.opts.configDir, { recursive: true });
    await writeFile(
      file,
      [
        "//registry.npmjs.org/:_authToken=${RELEASECTL_NPM_TOKEN}",
        "//npm.pkg.github.com/:_authToken=${RELEASECTL_GITHUB_TOKEN}",
        "",
      ].join("\n"),
      { encoding: "utf8", mode: 0o600 },
    );
    this.npmrc = file;
    return file;
  }
}
