import path, { type PlatformPath } from "node:path";
import { ConfigurationError } from "../llm/errors";

export const SECRETS_DIRNAME = ".hosted-llm-sampler";
export const SECRETS_FILENAME = "secrets.json";
export const SECRETS_PATH_ENV = "SAMPLER_SECRETS_PATH";

export interface SecretPathOptions {
  readonly platform?: NodeJS.Platform;
  readonly env?: NodeJS.ProcessEnv;
}

function pathApi(platform: NodeJS.Platform): PlatformPath {
  return platform === "win32" ? path.win32 : path.posix;
}

function resolveHomeDirectory(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): string {
  const variable = platform === "win32" ? "USERPROFILE" : "HOME";
  const home = env[variable]?.trim();
  if (home) {
    return home;
  }
  throw new ConfigurationError(
    `CONFIGURATION_ERROR ${variable} is required to resolve the secrets path (or set ${SECRETS_PATH_ENV})`
  );
}

/**
 * `SAMPLER_SECRETS_PATH` wins when set; otherwise the file lives under the
 * user's home directory.
 */
export function resolveSecretsFilePath(options: SecretPathOptions = {}): string {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const api = pathApi(platform);

  const explicit = env[SECRETS_PATH_ENV]?.trim();
  if (explicit) {
    return api.resolve(explicit);
  }
  return api.join(resolveHomeDirectory(platform, env), SECRETS_DIRNAME, SECRETS_FILENAME);
}
