import { ConfigurationError } from "../llm/errors";
import type { ClientResolutionEnv } from "../llm/client.config";
import { readFileIfExists, writeFileAtomically } from "./secret.file";
import { resolveSecretsFilePath } from "./secret.paths";
import type { SecretProfile, SecretProviderEntry, SecretStore } from "./secret.schema";
import { NAME_PATTERN, validateSecretStore } from "./secret.schema";

const SECRET_SET_GUIDE = "Run: node --import tsx runtime/cli/secret.ts set <profile> poe <apiKey>";
export const POE_PROVIDER = "poe";

export interface SecretManagerOptions {
  readonly platform?: NodeJS.Platform;
  readonly env?: NodeJS.ProcessEnv;
}

export interface SetSecretInput {
  readonly profileName: string;
  readonly providerName: string;
  readonly apiKey: string;
  readonly baseUrl?: string;
}

export interface ISecretManager {
  loadProfile(profileName: string): Promise<SecretProfile>;
  getInjectionEnv(profile: SecretProfile): ClientResolutionEnv;
}

function assertName(name: string, fieldName: string): string {
  const trimmed = name.trim();
  if (trimmed === "") {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${fieldName} must be non-empty`);
  }
  if (!NAME_PATTERN.test(trimmed)) {
    throw new ConfigurationError(
      `CONFIGURATION_ERROR ${fieldName} must match pattern ${NAME_PATTERN.source}`
    );
  }
  return trimmed;
}

export class FileSecretManager implements ISecretManager {
  private readonly options: SecretManagerOptions;

  constructor(options: SecretManagerOptions = {}) {
    this.options = options;
  }

  getSecretsFilePath(): string {
    return resolveSecretsFilePath({
      platform: this.options.platform,
      env: this.options.env,
    });
  }

  async loadProfile(profileName: string): Promise<SecretProfile> {
    const normalizedProfile = assertName(profileName, "profile");
    const store = await this.readSecretStore();
    if (!store) {
      throw new ConfigurationError(
        `CONFIGURATION_ERROR secrets file not found at ${this.getSecretsFilePath()}. ${SECRET_SET_GUIDE}`
      );
    }

    const profile = store[normalizedProfile];
    if (!profile) {
      const available = Object.keys(store).sort();
      const suffix =
        available.length > 0
          ? ` available profiles: ${available.join(", ")}`
          : " no profiles are configured.";
      throw new ConfigurationError(
        `CONFIGURATION_ERROR secret profile '${normalizedProfile}' was not found in ${this.getSecretsFilePath()}.${suffix}`
      );
    }
    return profile;
  }

  getInjectionEnv(profile: SecretProfile): ClientResolutionEnv {
    const poe = profile.providers[POE_PROVIDER];
    if (!poe) {
      throw new ConfigurationError(
        `CONFIGURATION_ERROR profile is missing provider='${POE_PROVIDER}' secret. ${SECRET_SET_GUIDE}`
      );
    }
    return poe.baseUrl
      ? { POE_API_KEY: poe.apiKey, POE_BASE_URL: poe.baseUrl }
      : { POE_API_KEY: poe.apiKey };
  }

  async setSecret(input: SetSecretInput): Promise<void> {
    const profileName = assertName(input.profileName, "profile");
    const providerName = assertName(input.providerName, "provider").toLowerCase();
    const apiKey = input.apiKey.trim();
    if (apiKey === "") {
      throw new ConfigurationError("CONFIGURATION_ERROR apiKey must be non-empty");
    }

    const existing = (await this.readSecretStore()) ?? {};
    const nextStore: Record<string, { providers: Record<string, SecretProviderEntry> }> = {};
    for (const [name, profile] of Object.entries(existing)) {
      nextStore[name] = { providers: { ...profile.providers } };
    }

    const profile = nextStore[profileName] ?? { providers: {} };
    const baseUrl = input.baseUrl?.trim();
    profile.providers[providerName] = baseUrl ? { apiKey, baseUrl } : { apiKey };
    nextStore[profileName] = profile;

    await writeFileAtomically(this.getSecretsFilePath(), `${JSON.stringify(nextStore, null, 2)}\n`);
  }

  private async readSecretStore(): Promise<SecretStore | null> {
    const targetPath = this.getSecretsFilePath();
    let serialized: string | null;
    try {
      serialized = await readFileIfExists(targetPath);
    } catch (error) {
      throw new ConfigurationError(
        `CONFIGURATION_ERROR failed to read secrets file at ${targetPath}`,
        { cause: error }
      );
    }
    if (serialized === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(serialized);
    } catch (error) {
      throw new ConfigurationError(
        `CONFIGURATION_ERROR failed to parse secrets file at ${targetPath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    return validateSecretStore(parsed);
  }
}
