import { parseBumpArgument, planVersions, releaseVersion, rewriteRange, type PlannedVersions } from "../core/versioning.js";
import { DependencyGraph } from "../graph/dependency-graph.js";
import { loadManifests } from "../manifest/loader.js";
import { formatTemplate } from "../util.js";
import { failure, openRuntime, type CommandContext, type CommandFailure } from "./context.js";

export type RangeChange = { package: string; dependency: string; from: string; to: string };

export type PreviewResult =
  | { ok: true; version: string; tag: string; packages: PlannedVersions; tiers: string[][]; ranges: RangeChange[] }
  | CommandFailure;

/** Planned versions, range rewrites and publish tiers for a bump. Touches nothing. */
export async function preview(ctx: CommandContext, bump: string): Promise<PreviewResult> {
  try {
    const request = parseBumpArgument(bump);
    const rt = await openRuntime(ctx);
    const graph = DependencyGraph.build(await loadManifests({ root: rt.sourcePath, patterns: rt.config.packages }));
    graph.validate();

    const packages = planVersions(graph.descriptors(), request);
    const version = releaseVersion(packages, rt.config.primary_package);
    const tag = formatTemplate(rt.config.git.tag_format, { version });
    const tiers = graph.tiers();

    const ranges: RangeChange[] = [];
    for (const d of graph.descriptors()) {
      for (const ref of d.internalRefs) {
        const to = rewriteRange(ref.range, packages[ref.name].to);
        if (to !== null) ranges.push({ package: d.name, dependency: ref.name, from: ref.range, to });
      }
    }

    const width = Math.max(0, ...Object.keys(packages).map((n) => n.length));
    const lines = [`release ${version} (tag ${tag})`, "packages:"];
    for (const name of Object.keys(packages)) {
      const privateNote = graph.get(name).registryTarget === "none" ? "  (not published)" : "";
      lines.push(`  ${name.padEnd(width)}  ${packages[name].from} -> ${packages[name].to}${privateNote}`);
    }
    if (ranges.length > 0) {
      lines.push("ranges:");
      for (const r of ranges) lines.push(`  ${r.package}: ${r.dependency} ${r.from} -> ${r.to}`);
    }
    lines.push("tiers:", ...tiers.map((t, i) => `  ${i}: ${t.join(", ")}`));

    ctx.reporter.block("PREVIEW", lines, { version, tag, packages, tiers, ranges });
    return { ok: true, version, tag, packages, tiers, ranges };
  } catch (e) {
    return failure(ctx, e);
  }
}
