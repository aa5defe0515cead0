import type { DependencyField, PackageDescriptor } from "./package.js";

export const BUNDLE_PLATFORMS = ["deb", "rpm", "appimage", "app", "dmg", "msi", "nsis"] as const;
export type BundlePlatform = (typeof BUNDLE_PLATFORMS)[number];

/** Format-preserving package.json edits. Paths are absolute. */
export interface ManifestEditor {
  snapshot(manifestPath: string): Promise<string>;
  restore(manifestPath: string, content: string): Promise<void>;
  bump(manifestPath: string, version: string): Promise<void>;
  setDependencyRange(manifestPath: string, field: DependencyField, name: string, range: string): Promise<void>;
}

export interface SourceControl {
  headCommit(): Promise<string>;
  /** Stages `files` (workspace-relative) and commits; returns the commit id. */
  commit(message: string, files: readonly string[]): Promise<string>;
  tag(name: string, message: string): Promise<string>;
  push(opts: { tag: string | null }): Promise<void>;
  revert(commit: string): Promise<string>;
  /** Whether the configured remote already carries `refs/tags/<name>`. */
  remoteTagExists(name: string): Promise<boolean>;
  deleteTag(name: string, opts: { remote: boolean }): Promise<void>;
}

export type HostedRelease = { id: number; htmlUrl: string };

export interface ReleaseHost {
  createRelease(input: {
    tag: string;
    name: string;
    notes: string;
    draft: boolean;
    prerelease: boolean;
  }): Promise<HostedRelease>;
  findReleaseByTag(tag: string): Promise<HostedRelease | null>;
  uploadArtifact(releaseId: number, artifactPath: string): Promise<void>;
  deleteRelease(releaseId: number): Promise<void>;
}

export interface Registry {
  publish(pkg: PackageDescriptor, opts: { dryRun: boolean; signal: AbortSignal }): Promise<void>;
}

export interface Bundler {
  /** Returns the absolute path of the produced artifact. */
  build(platform: BundlePlatform, opts: { target: string | null; prebuild: boolean }): Promise<string>;
}

/** Capabilities bound to one isolated workspace. */
export type Collaborators = {
  manifests: ManifestEditor;
  git: SourceControl;
  host: ReleaseHost;
  registry: Registry;
  bundler: Bundler;
};
