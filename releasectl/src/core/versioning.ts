import semver from "semver";
import { UsageError } from "../errors.js";
import type { PackageDescriptor } from "../types/package.js";
import type { BumpKind } from "../types/state.js";

export type VersionRequest = { kind: "patch" | "minor" | "major" } | { kind: "explicit"; version: string };

export type PlannedVersions = Record<string, { from: string; to: string }>;

/** `patch`, `minor`, `major` or an exact semantic version. */
export function parseBumpArgument(arg: string): VersionRequest {
  if (arg === "patch" || arg === "minor" || arg === "major") return { kind: arg };
  const version = semver.valid(arg.replace(/^v/, ""));
  if (version === null) throw new UsageError(`expected patch, minor, major or a version, got "${arg}"`);
  return { kind: "explicit", version };
}

export function requestFromState(bumpKind: BumpKind, explicitVersion: string | null): VersionRequest {
  if (bumpKind !== "explicit") return { kind: bumpKind };
  if (explicitVersion === null) throw new UsageError("explicit bump recorded without a version");
  return { kind: "explicit", version: explicitVersion };
}

/** New version for every package. An explicit version must move each package forward. */
export function planVersions(descriptors: readonly PackageDescriptor[], request: VersionRequest): PlannedVersions {
  const plan: PlannedVersions = {};
  for (const d of [...descriptors].sort((a, b) => a.name.localeCompare(b.name))) {
    if (request.kind === "explicit") {
      if (!semver.gt(request.version, d.version)) {
        throw new UsageError(`${request.version} is not greater than ${d.name}@${d.version}`);
      }
      plan[d.name] = { from: d.version, to: request.version };
    } else {
      const to = semver.inc(d.version, request.kind);
      if (to === null) throw new UsageError(`cannot ${request.kind}-bump ${d.name}@${d.version}`);
      plan[d.name] = { from: d.version, to };
    }
  }
  return plan;
}

/** The primary package's new version, or the highest planned version. */
export function releaseVersion(plan: PlannedVersions, primary: string | null): string {
  if (primary !== null) {
    const entry = plan[primary];
    if (!entry) throw new UsageError(`primary_package ${primary} is not a workspace package`);
    return entry.to;
  }
  const versions = Object.values(plan).map((v) => v.to);
  if (versions.length === 0) throw new UsageError("no packages to release");
  return versions.sort(semver.rcompare)[0];
}

const SIMPLE_RANGE = /^([~^=]?)(\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?)$/;

/**
 * Range to write for a dependency on a package now at `version`, or null when
 * the current range should stay. `^`/`~`/exact and `workspace:` prefixes are
 * kept; `workspace:*`-style and `*` ranges are left alone, as is any other
 * range that already admits the new version.
 */
export function rewriteRange(range: string, version: string): string | null {
  let prefix = "";
  let body = range.trim();
  if (body.startsWith("workspace:")) {
    prefix = "workspace:";
    body = body.slice(prefix.length);
    if (body === "*" || body === "^" || body === "~") return null;
  }
  if (body === "" || body === "*" || body === "latest") return null;

  const m = SIMPLE_RANGE.exec(body);
  if (m) {
    const next = `${prefix}${m[1]}${version}`;
    return next === range ? null : next;
  }

  if (semver.validRange(body) !== null && semver.satisfies(version, body)) return null;
  return `${prefix}^${version}`;
}
