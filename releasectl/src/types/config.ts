/** Configuration types for the layered config. */
import type { BundlePlatform } from "./collaborators.js";

export type FailurePolicy = "abort" | "continue";

export type PublishConfig = {
  max_concurrency: number;
  max_attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
  jitter: number;
  timeout_ms: number;
  failure_policy: FailurePolicy;
  access: "public" | "restricted";
  dist_tag: string;
};

export type GitConfig = {
  remote: string;
  branch: string;
  tag_format: string;
  commit_message: string;
  author_name: string;
  author_email: string;
  clear_runway: boolean;
};

export type GitHubConfig = {
  enabled: boolean;
  api_url: string;
  upload_url: string;
  draft: boolean;
  prerelease: boolean;
};

export type BundlesConfig = {
  enabled: boolean;
  platforms: BundlePlatform[];
  /** argv template; `{platform}` and `{target}` are substituted. */
  command: string[];
  prebuild_command: string[];
  require_signing: boolean;
};

export type ReleasectlConfig = {
  schema_version: string;
  /** Workspace member globs; empty means the root package.json `workspaces`. */
  packages: string[];
  primary_package: string | null;
  home: string | null;
  git: GitConfig;
  publish: PublishConfig;
  github: GitHubConfig;
  bundles: BundlesConfig;
};
