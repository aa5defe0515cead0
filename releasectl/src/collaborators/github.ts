import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  CollaboratorError,
  CredentialMissingError,
  RateLimitError,
  TransientNetworkError,
  errorMessage,
} from "../errors.js";
import { isRecord } from "../util.js";
import type { HostedRelease, ReleaseHost } from "../types/collaborators.js";
import { HOST_TOKEN_VARS } from "../config/credentials.js";

export type Repository = { owner: string; repo: string };

/** owner/repo from an https, ssh or scp-style GitHub remote URL. */
export function parseRepository(remoteUrl: string): Repository | null {
  const m =
    /^(?:https?:\/\/|ssh:\/\/)?(?:[^@/]+@)?github\.com[:/]([^/]+)\/([^/]+?)(?:\.git)?\/?$/.exec(remoteUrl.trim());
  if (!m) return null;
  return { owner: m[1], repo: m[2] };
}

export type GitHubReleaseHostOptions = {
  repository: Repository | null;
  token: string | null;
  apiUrl: string;
  uploadUrl: string;
  fetchImpl?: typeof fetch;
};

type Method = "GET" | "POST" | "DELETE";

/** Release host backed by the GitHub REST API. */
export class GitHubReleaseHost implements ReleaseHost {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: GitHubReleaseHostOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async createRelease(input: {
    tag: string;
    name: string;
    notes: string;
    draft: boolean;
    prerelease: boolean;
  }): Promise<HostedRelease> {
    const body = JSON.stringify({
      tag_name: input.tag,
      name: input.name,
      body: input.notes,
      draft: input.draft,
      prerelease: input.prerelease,
    });
    const res = await this.request("POST", this.repoUrl("/releases"), body, "application/json");
    return toRelease(await res.json(), "create release");
  }

  async findReleaseByTag(tag: string): Promise<HostedRelease | null> {
    const res = await this.request("GET", this.repoUrl(`/releases/tags/${encodeURIComponent(tag)}`), null, null, [404]);
    if (res.status === 404) return null;
    return toRelease(await res.json(), "find release");
  }

  async uploadArtifact(releaseId: number, artifactPath: string): Promise<void> {
    const { owner, repo } = this.repository();
    const name = encodeURIComponent(path.basename(artifactPath));
    const url = `${this.opts.uploadUrl.replace(/\/+$/, "")}/repos/${owner}/${repo}/releases/${releaseId}/assets?name=${name}`;
    const data = await readFile(artifactPath);
    await this.request("POST", url, data, "application/octet-stream");
  }

  async deleteRelease(releaseId: number): Promise<void> {
    // already gone counts as deleted
    await this.request("DELETE", this.repoUrl(`/releases/${releaseId}`), null, null, [404]);
  }

  private repository(): Repository {
    if (!this.opts.repository) {
      throw new CollaboratorError("github", "the origin remote is not a github.com repository");
    }
    return this.opts.repository;
  }

  private repoUrl(suffix: string): string {
    const { owner, repo } = this.repository();
    return `${this.opts.apiUrl.replace(/\/+$/, "")}/repos/${owner}/${repo}${suffix}`;
  }

  private async request(
    method: Method,
    url: string,
    body: string | Buffer | null,
    contentType: string | null,
    allowed: readonly number[] = [],
  ): Promise<Response> {
    if (this.opts.token === null) throw new CredentialMissingError([...HOST_TOKEN_VARS], "the release host");

    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      Authorization: `Bearer ${this.opts.token}`,
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": "releasectl",
    };
    if (contentType) headers["Content-Type"] = contentType;

    let res: Response;
    try {
      res = await this.fetchImpl(url, { method, headers, body });
    } catch (e) {
      throw new TransientNetworkError(`${method} ${url}: ${errorMessage(e)}`, { cause: e });
    }

    if (res.ok || allowed.includes(res.status)) return res;

    const text = await res.text().catch(() => "");
    const what = `${method} ${url} returned ${res.status}${text ? `: ${text.slice(0, 300)}` : ""}`;

    if (res.status === 429 || (res.status === 403 && res.headers.get("x-ratelimit-remaining") === "0")) {
      throw new RateLimitError(what, retryAfterMs(res.headers));
    }
    if (res.status >= 500) throw new TransientNetworkError(what);
    throw new CollaboratorError("github", what);
  }
}

/** From `retry-after` (seconds) or `x-ratelimit-reset` (epoch seconds). */
export function retryAfterMs(headers: Headers, now: number = Date.now()): number | null {
  const after = headers.get("retry-after");
  if (after !== null && /^\d+$/.test(after)) return Number(after) * 1000;
  const reset = headers.get("x-ratelimit-reset");
  if (reset !== null && /^\d+$/.test(reset)) return Math.max(0, Number(reset) * 1000 - now);
  return null;
}

function toRelease(json: unknown, operation: string): HostedRelease {
  if (isRecord(json) && typeof json.id === "number" && typeof json.html_url === "string") {
    return { id: json.id, htmlUrl: json.html_url };
  }
  throw new CollaboratorError(`github ${operation}`, "unexpected response body");
}
