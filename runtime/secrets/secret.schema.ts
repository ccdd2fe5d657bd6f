import { ConfigurationError } from "../llm/errors";

export interface SecretProviderEntry {
  readonly apiKey: string;
  readonly baseUrl?: string;
}

export interface SecretProfile {
  readonly providers: Readonly<Record<string, SecretProviderEntry>>;
}

export type SecretStore = Readonly<Record<string, SecretProfile>>;

export const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, where: string, field: string): string | undefined {
  if (typeof value === "undefined") {
    return undefined;
  }
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigurationError(`CONFIGURATION_ERROR '${field}' must be a non-empty string at ${where}`);
  }
  return value.trim();
}

function validateProviderEntry(value: unknown, where: string): SecretProviderEntry {
  if (!isRecord(value)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR invalid provider entry at ${where}`);
  }

  const apiKey = optionalString(value.apiKey, where, "apiKey");
  if (!apiKey) {
    throw new ConfigurationError(`CONFIGURATION_ERROR apiKey is required at ${where}`);
  }

  const baseUrl = optionalString(value.baseUrl, where, "baseUrl");
  return baseUrl ? { apiKey, baseUrl } : { apiKey };
}

function validateProfile(profileName: string, value: unknown): SecretProfile {
  if (!NAME_PATTERN.test(profileName)) {
    throw new ConfigurationError(
      `CONFIGURATION_ERROR invalid profile name '${profileName}'. expected pattern: ${NAME_PATTERN.source}`
    );
  }
  const providersRow = isRecord(value) ? value.providers : undefined;
  if (!isRecord(providersRow)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR profile '${profileName}' must include providers`);
  }

  const providers: Record<string, SecretProviderEntry> = {};
  for (const [providerName, providerValue] of Object.entries(providersRow)) {
    const where = `profile='${profileName}' provider='${providerName}'`;
    if (!NAME_PATTERN.test(providerName)) {
      throw new ConfigurationError(`CONFIGURATION_ERROR invalid provider name at ${where}`);
    }
    providers[providerName.toLowerCase()] = validateProviderEntry(providerValue, where);
  }
  return { providers };
}

export function validateSecretStore(value: unknown): SecretStore {
  if (!isRecord(value)) {
    throw new ConfigurationError(
      "CONFIGURATION_ERROR secrets.json must be an object keyed by profile name"
    );
  }

  const out: Record<string, SecretProfile> = {};
  for (const [profileName, profileValue] of Object.entries(value)) {
    out[profileName] = validateProfile(profileName, profileValue);
  }
  return out;
}
