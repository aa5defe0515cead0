#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { bundle } from "./commands/bundle.js";
import { cleanup } from "./commands/cleanup.js";
import type { CommandContext } from "./commands/context.js";
import { EXIT } from "./commands/exit-codes.js";
import { preview } from "./commands/preview.js";
import { release } from "./commands/release.js";
import { resume } from "./commands/resume.js";
import { rollback } from "./commands/rollback.js";
import { status } from "./commands/status.js";
import { validate } from "./commands/validate.js";
import { Reporter, type OutputFormat } from "./output/reporter.js";

type GlobalOpts = { workspace: string; config?: string; format: OutputFormat; verbose?: boolean };

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

const interrupt = new AbortController();
let interrupted = false;
process.on("SIGINT", () => {
  if (interrupted) process.exit(EXIT.INTERRUPTED);
  interrupted = true;
  process.stderr.write("interrupt: finishing in-flight work; press Ctrl-C again to exit now\n");
  interrupt.abort();
});

const program = new Command();

program
  .name("releasectl")
  .description("Publish every package of a workspace from an isolated clone, with resume and rollback")
  .version("0.1.0")
  .option("--workspace <path>", "Source checkout to release", process.cwd())
  .option("--config <file>", "Project config file (default: releasectl.yaml in the workspace)")
  .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
  .option("--verbose", "Print debug output")
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

function context(): CommandContext {
  const opts = program.opts<GlobalOpts>();
  return {
    sourcePath: opts.workspace,
    configFile: opts.config,
    reporter: new Reporter({ format: opts.format, verbose: opts.verbose }),
    signal: interrupt.signal,
  };
}

function finish(res: { ok: true } | { ok: false; exitCode: number }): void {
  process.exitCode = res.ok ? EXIT.SUCCESS : res.exitCode;
}

program
  .command("release")
  .description("Version, tag and publish every package")
  .argument("<bump>", "patch | minor | major | an exact version")
  .option("--dry-run", "Run every phase without pushing or publishing")
  .option("--no-push", "Do not push the release commit and tag")
  .option("--no-github-release", "Do not create a release entry")
  .option("--no-bundles", "Do not build or upload bundles")
  .option("--keep-temp", "Keep the isolated clone after completion")
  .option("--concurrency <n>", "Packages published in parallel within a tier", parseCount)
  .option("--sequential", "Publish one package at a time")
  .option("--continue-on-failure", "Keep publishing independent packages after a failure")
  .option("--max-attempts <n>", "Attempts per package for transient failures", parseCount)
  .option("--no-clear-runway", "Leave a remote tag for the new version in place")
  .action(
    async (
      bump: string,
      opts: {
        dryRun?: boolean;
        push: boolean;
        githubRelease: boolean;
        bundles: boolean;
        keepTemp?: boolean;
        concurrency?: number;
        sequential?: boolean;
        continueOnFailure?: boolean;
        maxAttempts?: number;
        clearRunway: boolean;
      },
    ) => {
      finish(await release(context(), { bump, ...opts }));
    },
  );

program
  .command("resume")
  .description("Continue the active release from where it stopped")
  .action(async () => {
    finish(await resume(context()));
  });

program
  .command("status")
  .description("Show the active release")
  .option("--history", "List finished releases instead")
  .action(async (opts: { history?: boolean }) => {
    finish(await status(context(), opts));
  });

program
  .command("rollback")
  .description("Undo the active release (published packages stay published)")
  .option("--force", "Also roll back a completed release")
  .action(async (opts: { force?: boolean }) => {
    finish(await rollback(context(), opts));
  });

program
  .command("cleanup")
  .description("Abandon the active release and remove its clone, pointer and lock")
  .option("--force", "Clear a lock held by a running process or unreadable files")
  .option("--all", "Also delete release history")
  .action(async (opts: { force?: boolean; all?: boolean }) => {
    finish(await cleanup(context(), opts));
  });

program
  .command("validate")
  .description("Check config, manifests, the dependency graph and credentials")
  .action(async () => {
    // --verbose also prints the publish tiers
    finish(await validate(context(), { verbose: program.opts<GlobalOpts>().verbose }));
  });

program
  .command("bundle")
  .description("Build platform bundles in an isolated clone")
  .option("--platform <name>", "Build only this platform")
  .option("--build", "Run the prebuild command first (default)")
  .option("--no-build", "Skip the prebuild command")
  .option("--upload", "Attach the bundles to the release entry of the current version")
  .option("--target <triple>", "Target triple passed to the bundle command")
  .action(async (opts: { platform?: string; build: boolean; upload?: boolean; target?: string }) => {
    finish(await bundle(context(), opts));
  });

program
  .command("preview")
  .description("Show planned versions and publish tiers without changing anything")
  .argument("<bump>", "patch | minor | major | an exact version")
  .action(async (bump: string) => {
    finish(await preview(context(), bump));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.RELEASE_FAILED);
});
