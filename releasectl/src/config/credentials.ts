import { CredentialMissingError } from "../errors.js";

export const REGISTRY_TOKEN_VAR = "NPM_TOKEN";
/** Accepted names for the release-host token; the first non-empty one wins. */
export const HOST_TOKEN_VARS = ["GH_TOKEN", "GITHUB_TOKEN"] as const;
export const SIGNING_VARS = ["APPLE_CERTIFICATE", "APPLE_CERTIFICATE_PASSWORD", "APPLE_TEAM_ID"] as const;
export const NOTARIZATION_VARS = ["APPLE_API_KEY", "APPLE_API_ISSUER", "APPLE_API_KEY_PATH"] as const;

export type Credentials = {
  registryToken: string | null;
  hostToken: string | null;
  hostTokenSource: (typeof HOST_TOKEN_VARS)[number] | null;
  /** All of SIGNING_VARS present. */
  signing: boolean;
  /** All of NOTARIZATION_VARS present. */
  notarization: boolean;
  /** Variables of a partially supplied signing or notarization set. */
  incomplete: string[];
};

export type CredentialNeeds = {
  registry: boolean;
  host: boolean;
  signing: boolean;
};

function read(env: NodeJS.ProcessEnv, name: string): string | null {
  const v = env[name];
  return v !== undefined && v.trim().length > 0 ? v : null;
}

export function readCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  let hostToken: string | null = null;
  let hostTokenSource: Credentials["hostTokenSource"] = null;
  for (const name of HOST_TOKEN_VARS) {
    const v = read(env, name);
    if (v !== null) {
      hostToken = v;
      hostTokenSource = name;
      break;
    }
  }

  const incomplete: string[] = [];
  const setState = (names: readonly string[]): boolean => {
    const missing = names.filter((n) => read(env, n) === null);
    if (missing.length > 0 && missing.length < names.length) incomplete.push(...missing);
    return missing.length === 0;
  };

  return {
    registryToken: read(env, REGISTRY_TOKEN_VAR),
    hostToken,
    hostTokenSource,
    signing: setState(SIGNING_VARS),
    notarization: setState(NOTARIZATION_VARS),
    incomplete,
  };
}

/** Throws CredentialMissingError for the first unmet need. */
export function checkCredentials(creds: Credentials, needs: CredentialNeeds): void {
  if (needs.registry && creds.registryToken === null) {
    throw new CredentialMissingError([REGISTRY_TOKEN_VAR], "registry publishing");
  }
  if (needs.host && creds.hostToken === null) {
    throw new CredentialMissingError([...HOST_TOKEN_VARS], "the release host");
  }
  if (!needs.signing) return;
  if (!creds.signing) throw new CredentialMissingError([...SIGNING_VARS], "code signing");
  if (creds.incomplete.length > 0) {
    throw new CredentialMissingError(creds.incomplete, "notarization");
  }
}
