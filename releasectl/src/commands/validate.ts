import { checkCredentials, type CredentialNeeds } from "../config/credentials.js";
import { PLATFORM_HOSTS, SIGNED_PLATFORMS, defaultPlatforms } from "../collaborators/bundler.js";
import { DependencyGraph } from "../graph/dependency-graph.js";
import { ManifestParseError, errorCode, errorMessage } from "../errors.js";
import { loadManifests } from "../manifest/loader.js";
import { openRuntime, type CommandContext, type Runtime } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateResult =
  | { ok: true; diagnostics: Diagnostic[]; tiers: string[][] }
  | { ok: false; diagnostics: Diagnostic[]; exitCode: ExitCode };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

function fromError(e: unknown): Diagnostic {
  const path = e instanceof ManifestParseError ? e.manifestPath : undefined;
  return diag("error", errorCode(e), errorMessage(e), path ? { path } : undefined);
}

/** Credential gaps are warnings here; a release stops on them in its validation phase. */
function credentialDiagnostics(rt: Runtime, graph: DependencyGraph): Diagnostic[] {
  const out: Diagnostic[] = [];
  const targets = graph.descriptors().map((d) => d.registryTarget);
  const platforms = rt.config.bundles.platforms.length > 0 ? rt.config.bundles.platforms : defaultPlatforms();
  const needs: Array<[keyof CredentialNeeds, boolean]> = [
    ["registry", targets.includes("npm")],
    ["host", rt.config.github.enabled || targets.includes("github")],
    [
      "signing",
      rt.config.bundles.enabled && rt.config.bundles.require_signing && platforms.some((p) => SIGNED_PLATFORMS.includes(p)),
    ],
  ];
  for (const [need, wanted] of needs) {
    if (!wanted) continue;
    try {
      checkCredentials(rt.credentials, { registry: need === "registry", host: need === "host", signing: need === "signing" });
    } catch (e) {
      out.push(diag("warn", errorCode(e), errorMessage(e)));
    }
  }
  return out;
}

function bundleDiagnostics(rt: Runtime): Diagnostic[] {
  const bundles = rt.config.bundles;
  if (!bundles.enabled) return [];
  const out: Diagnostic[] = [];
  if (bundles.command.length === 0) {
    out.push(diag("error", "BUNDLES_COMMAND_MISSING", "bundles are enabled but bundles.command is empty"));
  }
  for (const p of bundles.platforms) {
    if (PLATFORM_HOSTS[p] !== process.platform) {
      out.push(diag("warn", "BUNDLE_PLATFORM_HOST", `${p} bundles can only be built on ${PLATFORM_HOSTS[p]}`));
    }
  }
  return out;
}

/**
 * Check config, manifests, the dependency graph and credentials against the
 * source checkout without changing anything.
 */
export async function validate(ctx: CommandContext, opts: { verbose?: boolean } = {}): Promise<ValidateResult> {
  const diagnostics: Diagnostic[] = [];
  const finish = (tiers: string[][]): ValidateResult => {
    for (const d of diagnostics) {
      const fields = { ...(d.path ? { path: d.path } : {}), ...(d.details ?? {}) };
      if (d.level === "error") ctx.reporter.error(d.code, d.message, fields);
      else if (d.level === "warn") ctx.reporter.warn(d.code, d.message, fields);
      else ctx.reporter.info(d.code, d.message, fields);
    }
    if (diagnostics.some((d) => d.level === "error")) {
      return { ok: false, diagnostics, exitCode: EXIT.VALIDATION_FAILED };
    }
    if (opts.verbose) {
      ctx.reporter.block(
        "TIERS",
        tiers.map((t, i) => `tier ${i}: ${t.join(", ")}`),
        { tiers },
      );
    }
    ctx.reporter.info("OK", "OK");
    return { ok: true, diagnostics, tiers };
  };

  let rt: Runtime;
  try {
    rt = await openRuntime(ctx);
  } catch (e) {
    diagnostics.push(fromError(e));
    return finish([]);
  }

  let graph: DependencyGraph;
  try {
    graph = DependencyGraph.build(await loadManifests({ root: rt.sourcePath, patterns: rt.config.packages }));
    graph.validate();
  } catch (e) {
    diagnostics.push(fromError(e));
    return finish([]);
  }

  const primary = rt.config.primary_package;
  if (primary !== null && !graph.has(primary)) {
    diagnostics.push(diag("error", "PRIMARY_PACKAGE_UNKNOWN", `primary_package ${primary} is not a workspace package`));
  }
  for (const d of graph.descriptors()) {
    if (d.registryTarget === "none") {
      diagnostics.push(diag("info", "PACKAGE_PRIVATE", `${d.name} is private and will not be published`, { path: d.manifestPath }));
    }
  }
  diagnostics.push(...bundleDiagnostics(rt), ...credentialDiagnostics(rt, graph));
  return finish(graph.tiers());
}
