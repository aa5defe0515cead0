import path from "node:path";
import type { Credentials } from "../config/credentials.js";
import { STATE_DIR } from "../state/store.js";
import type { Collaborators } from "../types/collaborators.js";
import type { ReleasectlConfig } from "../types/config.js";
import { CommandBundler } from "./bundler.js";
import { GitOperations } from "./git.js";
import { GitHubReleaseHost, parseRepository } from "./github.js";
import { PackageJsonEditor } from "./manifest-editor.js";
import { NpmRegistry } from "./npm-registry.js";

export type CollaboratorFactoryInput = {
  workspacePath: string;
  /** Remote URL the workspace was cloned from; names the GitHub repository. */
  originUrl: string;
  config: ReleasectlConfig;
  credentials: Credentials;
};

export type CollaboratorFactory = (input: CollaboratorFactoryInput) => Collaborators;

/** Default capabilities, every one bound to the isolated workspace path. */
export const createCollaborators: CollaboratorFactory = ({ workspacePath, originUrl, config, credentials }) => ({
  manifests: new PackageJsonEditor(),
  git: new GitOperations(workspacePath, config.git),
  host: new GitHubReleaseHost({
    repository: parseRepository(originUrl),
    token: credentials.hostToken,
    apiUrl: config.github.api_url,
    uploadUrl: config.github.upload_url,
  }),
  registry: new NpmRegistry({
    configDir: path.join(workspacePath, STATE_DIR),
    access: config.publish.access,
    distTag: config.publish.dist_tag,
    registryToken: credentials.registryToken,
    githubToken: credentials.hostToken,
  }),
  bundler: new CommandBundler({
    cwd: workspacePath,
    command: config.bundles.command,
    prebuildCommand: config.bundles.prebuild_command,
  }),
});
