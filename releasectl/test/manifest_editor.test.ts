import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { PackageJsonEditor } from "../src/collaborators/manifest-editor.js";
import { ManifestParseError } from "../src/errors.js";
import { tmpDir } from "./helpers.js";

describe("PackageJsonEditor", () => {
  const editor = new PackageJsonEditor();
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = tmpDir("editor");
    file = path.join(dir, "package.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("keeps a four-space indent and key order", async () => {
    fs.writeFileSync(file, '{\n    "name": "a",\n    "version": "1.0.0",\n    "dependencies": {\n        "b": "^1.0.0"\n    }\n}\n');

    await editor.bump(file, "1.1.0");
    await editor.setDependencyRange(file, "dependencies", "b", "^1.1.0");

    expect(fs.readFileSync(file, "utf8")).toBe(
      '{\n    "name": "a",\n    "version": "1.1.0",\n    "dependencies": {\n        "b": "^1.1.0"\n    }\n}\n',
    );
  });

  it("keeps tabs and a missing final newline", async () => {
    fs.writeFileSync(file, '{\n\t"name": "a",\n\t"version": "1.0.0"\n}');
    await editor.bump(file, "2.0.0");
    expect(fs.readFileSync(file, "utf8")).toBe('{\n\t"name": "a",\n\t"version": "2.0.0"\n}');
  });

  it("keeps CRLF line endings", async () => {
    fs.writeFileSync(file, '{\r\n  "name": "a",\r\n  "version": "1.0.0"\r\n}\r\n');
    await editor.bump(file, "1.0.1");
    expect(fs.readFileSync(file, "utf8")).toBe('{\r\n  "name": "a",\r\n  "version": "1.0.1"\r\n}\r\n');
  });

  it("refuses to add a dependency entry that is not there", async () => {
    fs.writeFileSync(file, '{\n  "name": "a",\n  "version": "1.0.0"\n}\n');
    await expect(editor.setDependencyRange(file, "peerDependencies", "b", "^1.0.0")).rejects.toThrow(
      `${file}: no peerDependencies entry for b`,
    );
  });

  it("reports invalid JSON", async () => {
    fs.writeFileSync(file, "{ nope");
    await expect(editor.bump(file, "1.0.1")).rejects.toThrow(ManifestParseError);
  });

  it("restores a snapshot byte for byte", async () => {
    const original = '{"name":"a","version":"1.0.0"}';
    fs.writeFileSync(file, original);
    const snap = await editor.snapshot(file);
    await editor.bump(file, "3.0.0");
    await editor.restore(file, snap);
    expect(fs.readFileSync(file, "utf8")).toBe(original);
  });
});
