import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PackageJsonEditor } from "../src/collaborators/manifest-editor.js";
import type { CommandContext } from "../src/commands/context.js";
import type { Sleep } from "../src/core/retry.js";
import { Reporter } from "../src/output/reporter.js";
import type {
  BundlePlatform,
  Bundler,
  Collaborators,
  HostedRelease,
  Registry,
  ReleaseHost,
  SourceControl,
} from "../src/types/collaborators.js";
import type { PackageDescriptor, RegistryTarget } from "../src/types/package.js";
import type { Cloner, OriginResolver } from "../src/workspace/isolated.js";

export const ORIGIN_URL = "https://github.com/example-org/widgets.git";
export const SOURCE_COMMIT = "0000000000000000000000000000000000000001";

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `releasectl-test-${prefix}-`));
}

export function writeJson(file: string, data: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(data, null, 2) + "\n");
}

export function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf8"));
}

export type FixturePackage = {
  name: string;
  version?: string;
  private?: boolean;
  dependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
  publishConfig?: Record<string, string>;
};

/** A root package.json with `packages/*` workspaces plus one directory per package. */
export function writeWorkspace(root: string, packages: readonly FixturePackage[]): void {
  writeJson(path.join(root, "package.json"), { name: "fixture-root", private: true, workspaces: ["packages/*"] });
  for (const p of packages) {
    const dir = p.name.replace(/^@[^/]+\//, "");
    writeJson(path.join(root, "packages", dir, "package.json"), { version: "1.0.0", ...p });
  }
}

/** Descriptor built by hand, for graph and publisher tests that need no files. */
export function descriptor(
  name: string,
  deps: readonly string[] = [],
  opts: { version?: string; registryTarget?: RegistryTarget } = {},
): PackageDescriptor {
  const registryTarget = opts.registryTarget ?? "npm";
  return {
    name,
    version: opts.version ?? "1.0.0",
    path: `/fixture/packages/${name}`,
    manifestPath: `/fixture/packages/${name}/package.json`,
    internalDeps: new Set(deps),
    internalRefs: deps.map((d) => ({ field: "dependencies" as const, name: d, range: "^1.0.0" })),
    registryTarget,
    private: registryTarget === "none",
  };
}

export type OutputRecord = { level: string; code: string; message?: string } & Record<string, unknown>;

/** A jsonl reporter writing into memory. */
export function memoryReporter(): { reporter: Reporter; records: () => OutputRecord[]; codes: () => string[] } {
  const chunks: string[] = [];
  const sink = { write: (chunk: string) => chunks.push(chunk) };
  const reporter = new Reporter({ format: "jsonl", verbose: true, stdout: sink, stderr: sink });
  const records = (): OutputRecord[] =>
    chunks
      .join("")
      .split("\n")
      .filter((l) => l.length > 0)
      .map((l): OutputRecord => JSON.parse(l));
  return { reporter, records, codes: () => records().map((r) => r.code) };
}

export const noSleep: Sleep = async () => undefined;

export class FakeGit implements SourceControl {
  head = SOURCE_COMMIT;
  readonly calls: string[] = [];
  readonly tags = new Set<string>();
  readonly remoteTags = new Set<string>();
  failOn: string | null = null;
  private seq = 0;

  private record(call: string): void {
    this.calls.push(call);
    if (this.failOn !== null && call.startsWith(this.failOn)) throw new Error(`git ${call} failed`);
  }

  async headCommit(): Promise<string> {
    return this.head;
  }

  async commit(message: string, files: readonly string[]): Promise<string> {
    this.record(`commit ${message} [${files.join(",")}]`);
    this.head = `commit-${++this.seq}`;
    return this.head;
  }

  async tag(name: string): Promise<string> {
    this.record(`tag ${name}`);
    this.tags.add(name);
    return `tagobj-${name}`;
  }

  async push(opts: { tag: string | null }): Promise<void> {
    this.record(`push ${opts.tag ?? "-"}`);
    if (opts.tag) this.remoteTags.add(opts.tag);
  }

  async revert(commit: string): Promise<string> {
    this.record(`revert ${commit}`);
    this.head = `revert-${++this.seq}`;
    return this.head;
  }

  // a read; not recorded so call lists show only what changed
  async remoteTagExists(name: string): Promise<boolean> {
    return this.remoteTags.has(name);
  }

  async deleteTag(name: string, opts: { remote: boolean }): Promise<void> {
    this.record(`delete-tag ${name}${opts.remote ? " remote" : ""}`);
    this.tags.delete(name);
    if (opts.remote) this.remoteTags.delete(name);
  }
}

export class FakeHost implements ReleaseHost {
  readonly releases = new Map<number, { tag: string; notes: string; assets: string[] }>();
  readonly calls: string[] = [];
  /** Errors thrown, in order, by the next createRelease calls. */
  createFailures: unknown[] = [];
  private nextId = 100;

  async createRelease(input: Parameters<ReleaseHost["createRelease"]>[0]): Promise<HostedRelease> {
    this.calls.push(`create ${input.tag}`);
    const failure = this.createFailures.shift();
    if (failure !== undefined) throw failure;
    const id = this.nextId++;
    this.releases.set(id, { tag: input.tag, notes: input.notes, assets: [] });
    return { id, htmlUrl: `https://github.com/example-org/widgets/releases/tag/${input.tag}` };
  }

  async findReleaseByTag(tag: string): Promise<HostedRelease | null> {
    this.calls.push(`find ${tag}`);
    for (const [id, r] of this.releases) {
      if (r.tag === tag) return { id, htmlUrl: `https://github.com/example-org/widgets/releases/tag/${tag}` };
    }
    return null;
  }

  async uploadArtifact(releaseId: number, artifactPath: string): Promise<void> {
    this.calls.push(`upload ${releaseId} ${path.basename(artifactPath)}`);
    this.releases.get(releaseId)?.assets.push(path.basename(artifactPath));
  }

  async deleteRelease(releaseId: number): Promise<void> {
    this.calls.push(`delete ${releaseId}`);
    this.releases.delete(releaseId);
  }
}

type Outcome = Error | ((pkg: PackageDescriptor) => Promise<void>);

/**
 * Registry that records publish order and concurrency. `script[name]` lists
 * what successive attempts for a package do: an error value is thrown, a
 * function is awaited, and once the list runs out the attempt succeeds.
 */
export class FakeRegistry implements Registry {
  readonly attempts: string[] = [];
  readonly published: string[] = [];
  readonly dryRuns: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  script: Record<string, Outcome[]> = {};
  onPublish: ((pkg: PackageDescriptor) => void) | null = null;

  async publish(pkg: PackageDescriptor, opts: { dryRun: boolean; signal: AbortSignal }): Promise<void> {
    this.attempts.push(pkg.name);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      // let other tasks in the tier start before this one settles
      await new Promise((resolve) => setImmediate(resolve));
      this.onPublish?.(pkg);
      const next = this.script[pkg.name]?.shift();
      if (typeof next === "function") await next(pkg);
      else if (next !== undefined) throw next;
      if (opts.dryRun) this.dryRuns.push(pkg.name);
      else this.published.push(pkg.name);
    } finally {
      this.inFlight--;
    }
  }
}

export class FakeBundler implements Bundler {
  readonly built: BundlePlatform[] = [];

  constructor(private readonly dir: string) {}

  async build(platform: BundlePlatform): Promise<string> {
    this.built.push(platform);
    const file = path.join(this.dir, `widgets-${platform}.pkg`);
    fs.writeFileSync(file, platform);
    return file;
  }
}

export type Fakes = {
  git: FakeGit;
  host: FakeHost;
  registry: FakeRegistry;
  bundler: FakeBundler;
  collaborators: Collaborators;
};

export function fakeCollaborators(artifactDir: string): Fakes {
  const git = new FakeGit();
  const host = new FakeHost();
  const registry = new FakeRegistry();
  const bundler = new FakeBundler(artifactDir);
  return {
    git,
    host,
    registry,
    bundler,
    collaborators: { manifests: new PackageJsonEditor(), git, host, registry, bundler },
  };
}

/** Cloner that copies a fixture directory instead of running git. */
export function copyCloner(fixture: string, head: string = SOURCE_COMMIT): Cloner {
  return async ({ dest }) => {
    fs.cpSync(fixture, dest, { recursive: true });
    return head;
  };
}

export const fixedOrigin: OriginResolver = async () => ORIGIN_URL;

export type TestEnv = {
  root: string;
  source: string;
  home: string;
  clones: string;
  artifacts: string;
  fakes: Fakes;
  out: ReturnType<typeof memoryReporter>;
  ctx: (overrides?: Partial<CommandContext>) => CommandContext;
  cleanup: () => void;
};

/**
 * Source checkout, home and clone directories under one temp root, with
 * fake collaborators wired through the command context.
 */
export function testEnv(packages: readonly FixturePackage[], config: string | null = null): TestEnv {
  const root = tmpDir("env");
  const source = path.join(root, "source");
  const home = path.join(root, "home");
  const clones = path.join(root, "clones");
  const artifacts = path.join(root, "artifacts");
  for (const d of [source, home, clones, artifacts]) fs.mkdirSync(d, { recursive: true });
  writeWorkspace(source, packages);
  if (config !== null) fs.writeFileSync(path.join(source, "releasectl.yaml"), config);

  const fakes = fakeCollaborators(artifacts);
  const out = memoryReporter();
  return {
    root,
    source,
    home,
    clones,
    artifacts,
    fakes,
    out,
    ctx: (overrides = {}) => ({
      sourcePath: source,
      env: { NPM_TOKEN: "test-token", GH_TOKEN: "test-token" },
      reporter: out.reporter,
      homeDir: home,
      tmpRoot: clones,
      cloner: copyCloner(source),
      resolveOrigin: fixedOrigin,
      collaborators: () => fakes.collaborators,
      sleep: noSleep,
      random: () => 0,
      ...overrides,
    }),
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}

export function listDir(dir: string): string[] {
  return fs.existsSync(dir) ? fs.readdirSync(dir).sort() : [];
}
