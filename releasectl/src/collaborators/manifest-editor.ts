import { readFile, writeFile } from "node:fs/promises";
import { ManifestParseError } from "../errors.js";
import { isRecord } from "../util.js";
import type { ManifestEditor } from "../types/collaborators.js";
import type { DependencyField } from "../types/package.js";

type Layout = { indent: string; eol: string; finalNewline: boolean };

function detectLayout(text: string): Layout {
  const indent = /^([ \t]+)"/m.exec(text)?.[1] ?? "  ";
  const eol = text.includes("\r\n") ? "\r\n" : "\n";
  return { indent, eol, finalNewline: /\r?\n$/.test(text) };
}

/**
 * package.json editor that keeps key order, indentation, line endings and
 * the trailing newline of the file it rewrites.
 */
export class PackageJsonEditor implements ManifestEditor {
  async snapshot(manifestPath: string): Promise<string> {
    return readFile(manifestPath, "utf8");
  }

  async restore(manifestPath: string, content: string): Promise<void> {
    await writeFile(manifestPath, content, "utf8");
  }

  async bump(manifestPath: string, version: string): Promise<void> {
    await this.edit(manifestPath, (json) => {
      json.version = version;
    });
  }

  async setDependencyRange(manifestPath: string, field: DependencyField, name: string, range: string): Promise<void> {
    await this.edit(manifestPath, (json) => {
      const block = json[field];
      if (!isRecord(block) || !(name in block)) {
        throw new ManifestParseError(manifestPath, `no ${field} entry for ${name}`);
      }
      block[name] = range;
    });
  }

  private async edit(manifestPath: string, change: (json: Record<string, unknown>) => void): Promise<void> {
    const text = await readFile(manifestPath, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw new ManifestParseError(manifestPath, "invalid JSON", e);
    }
    if (!isRecord(json)) throw new ManifestParseError(manifestPath, "expected a JSON object");

    change(json);

    const layout = detectLayout(text);
    let out = JSON.stringify(json, null, layout.indent);
    if (layout.eol !== "\n") out = out.replace(/\n/g, layout.eol);
    if (layout.finalNewline) out += layout.eol;
    await writeFile(manifestPath, out, "utf8");
  }
}
