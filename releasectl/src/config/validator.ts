import { defaultRegistry } from "../schema/registry.js";
import type { ReleasectlConfig } from "../types/config.js";

export type ConfigValidationResult = { ok: true; config: ReleasectlConfig } | { ok: false; errors: string };

/** Validate a merged config against schemas/config.schema.json. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const registry = await defaultRegistry();
  const res = await registry.check("config", config);
  if (!res.ok) return { ok: false, errors: res.errors };

  const publish = res.value.publish;
  if (publish.max_delay_ms < publish.base_delay_ms) {
    return { ok: false, errors: "publish.max_delay_ms must not be below publish.base_delay_ms" };
  }
  return { ok: true, config: res.value };
}
