import { ConfigurationError } from "./errors";
import type { LLMLogger } from "./llm.types";
import { DEFAULT_POE_BASE_URL, loadPoeApiKey, PoeClient } from "./poe.adapter";

export interface ClientConfig {
  readonly modelName: string;
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly sleepPeriodically: boolean;
}

export interface ClientResolutionArgs {
  readonly model?: string;
  readonly baseUrl?: string;
  readonly sleepPeriodically?: boolean;
}

export interface ClientResolutionEnv {
  readonly POE_API_KEY?: string;
  readonly POE_MODEL?: string;
  readonly POE_BASE_URL?: string;
  readonly POE_SLEEP_PERIODICALLY?: string;
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parseBooleanFlag(value: string | undefined, field: string): boolean | undefined {
  const trimmed = toTrimmedString(value);
  if (!trimmed) {
    return undefined;
  }
  const lowered = trimmed.toLowerCase();
  if (TRUE_VALUES.has(lowered)) {
    return true;
  }
  if (FALSE_VALUES.has(lowered)) {
    return false;
  }
  throw new ConfigurationError(
    `CONFIGURATION_ERROR ${field} must be one of: 1|true|yes|on|0|false|no|off`
  );
}

function normalizeBaseUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (error) {
    throw new ConfigurationError(`CONFIGURATION_ERROR baseUrl '${value}' is not a valid URL`, {
      cause: error,
    });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(`CONFIGURATION_ERROR baseUrl must use http or https`);
  }
  return parsed.toString().replace(/\/+$/, "");
}

export function resolveClientConfig(
  args: ClientResolutionArgs,
  env: ClientResolutionEnv
): ClientConfig {
  const modelName = toTrimmedString(args.model) ?? toTrimmedString(env.POE_MODEL);
  if (!modelName) {
    throw new ConfigurationError(
      "CONFIGURATION_ERROR model must be set via --model or POE_MODEL (the bot name on poe.com)"
    );
  }

  const baseUrl = normalizeBaseUrl(
    toTrimmedString(args.baseUrl) ?? toTrimmedString(env.POE_BASE_URL) ?? DEFAULT_POE_BASE_URL
  );

  const sleepPeriodically =
    args.sleepPeriodically ??
    parseBooleanFlag(env.POE_SLEEP_PERIODICALLY, "POE_SLEEP_PERIODICALLY") ??
    false;

  return {
    modelName,
    apiKey: loadPoeApiKey({ POE_API_KEY: env.POE_API_KEY }),
    baseUrl,
    sleepPeriodically,
  };
}

export function createClientFromConfig(
  config: ClientConfig,
  overrides: { readonly logger?: LLMLogger; readonly sleep?: (ms: number) => Promise<void> } = {}
): PoeClient {
  return new PoeClient(
    config.modelName,
    {
      baseUrl: config.baseUrl,
      sleepPeriodically: config.sleepPeriodically,
      logger: overrides.logger,
      sleep: overrides.sleep,
    },
    { POE_API_KEY: config.apiKey }
  );
}
