import { randomBytes } from "node:crypto";

/**
 * Generate a release ID.
 * Format: rel-{YYYYMMDD}-{HHMMSS}-{hex6}
 */
export function generateReleaseId(now: Date = new Date(), random: (size: number) => Buffer = randomBytes): string {
  const iso = now.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, "");
  const time = iso.slice(11, 19).replace(/:/g, "");
  return `rel-${date}-${time}-${random(3).toString("hex")}`;
}
