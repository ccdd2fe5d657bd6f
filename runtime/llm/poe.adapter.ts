import {
  consoleLogger,
  resolveSampleOptions,
  type LLMClient,
  type LLMLogger,
  type SampleOptions,
  type SampleOutcome,
} from "./llm.types";
import { asMessage, classifyHttpStatus, ConfigurationError, resolveErrorCode, TransportFailure } from "./errors";
import { truncate } from "./truncate";

export const POE_API_KEY_ENV = "POE_API_KEY";
export const DEFAULT_POE_BASE_URL = "https://api.poe.com/v1";
export const DEFAULT_CALLS_BETWEEN_SLEEPING = 10;
export const DEFAULT_SLEEP_MS = 10_000;
export const SYSTEM_INSTRUCTION = "You are a helpful assistant.";

export interface PoeClientOptions {
  readonly sleepPeriodically?: boolean;
  readonly baseUrl?: string;
  readonly callsBetweenSleeping?: number;
  readonly sleepMs?: number;
  readonly logger?: LLMLogger;
  readonly sleep?: (ms: number) => Promise<void>;
}

interface ChatMessage {
  readonly role: "system" | "user";
  readonly content: string;
}

interface ChatCompletionRequest {
  readonly model: string;
  readonly messages: readonly ChatMessage[];
  readonly temperature: number;
  readonly max_tokens: number;
  readonly stop?: readonly string[];
  readonly stream: false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function loadPoeApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = env[POE_API_KEY_ENV];
  if (typeof apiKey !== "string" || apiKey.trim() === "") {
    throw new ConfigurationError(
      `CONFIGURATION_ERROR ${POE_API_KEY_ENV} is not set. Set it to your Poe API key from https://poe.com/api_key`
    );
  }
  return apiKey.trim();
}

/**
 * Returns the message content of the first choice, or null when the envelope
 * carries no usable text.
 */
export function extractChoiceContent(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null) {
    return null;
  }

  const choices = (payload as { choices?: unknown }).choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    return null;
  }

  const first: unknown = choices[0];
  if (typeof first !== "object" || first === null) {
    return null;
  }

  const message = (first as { message?: unknown }).message;
  if (typeof message !== "object" || message === null) {
    return null;
  }

  const content = (message as { content?: unknown }).content;
  return typeof content === "string" && content !== "" ? content : null;
}

/**
 * Samples text from a Poe bot through its OpenAI-compatible endpoint.
 *
 * `temperature`, `maxTokens` and `terminators` are forwarded. `seed` and
 * `timeoutSeconds` have no counterpart on this endpoint and are ignored.
 * Terminators are also applied locally since the bot may not honor `stop`.
 */
export class PoeClient implements LLMClient {
  readonly modelName: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly sleepPeriodically: boolean;
  private readonly callsBetweenSleeping: number;
  private readonly sleepMs: number;
  private readonly logger: LLMLogger;
  private readonly sleep: (ms: number) => Promise<void>;
  private nCalls = 0;

  constructor(modelName: string, options: PoeClientOptions = {}, env: NodeJS.ProcessEnv = process.env) {
    const trimmedModel = modelName.trim();
    if (trimmedModel === "") {
      throw new ConfigurationError("CONFIGURATION_ERROR model name must be non-empty (e.g. GPT-4o, Claude-3-Opus)");
    }
    const callsBetweenSleeping = options.callsBetweenSleeping ?? DEFAULT_CALLS_BETWEEN_SLEEPING;
    if (!Number.isInteger(callsBetweenSleeping) || callsBetweenSleeping < 1) {
      throw new ConfigurationError("CONFIGURATION_ERROR callsBetweenSleeping must be an integer >= 1");
    }

    this.apiKey = loadPoeApiKey(env);
    this.modelName = trimmedModel;
    this.baseUrl = (options.baseUrl ?? DEFAULT_POE_BASE_URL).replace(/\/+$/, "");
    this.sleepPeriodically = options.sleepPeriodically ?? false;
    this.callsBetweenSleeping = callsBetweenSleeping;
    this.sleepMs = options.sleepMs ?? DEFAULT_SLEEP_MS;
    this.logger = options.logger ?? consoleLogger;
    this.sleep = options.sleep ?? sleep;
  }

  get callCount(): number {
    return this.nCalls;
  }

  async sampleText(prompt: string, options?: SampleOptions): Promise<string> {
    const outcome = await this.sampleTextOutcome(prompt, options);
    return outcome.ok ? outcome.text : "";
  }

  async sampleTextOutcome(prompt: string, options?: SampleOptions): Promise<SampleOutcome> {
    const resolved = resolveSampleOptions(options);
    const stop = resolved.terminators.filter((terminator) => terminator !== "");

    this.nCalls += 1;
    if (this.sleepPeriodically && this.nCalls % this.callsBetweenSleeping === 0) {
      this.logger.info(`poe pacing: sleeping ${this.sleepMs}ms after ${this.nCalls} calls`);
      await this.sleep(this.sleepMs);
    }

    const body: ChatCompletionRequest = {
      model: this.modelName,
      messages: [
        { role: "system", content: SYSTEM_INSTRUCTION },
        { role: "user", content: prompt },
      ],
      temperature: resolved.temperature,
      max_tokens: resolved.maxTokens,
      ...(stop.length > 0 ? { stop } : {}),
      stream: false,
    };

    let payload: unknown;
    try {
      payload = await this.postChatCompletion(body);
    } catch (error) {
      this.logger.error(
        `poe request failed code=${resolveErrorCode(error)} message=${asMessage(error)} model=${this.modelName} prompt=${JSON.stringify(prompt)}`
      );
      return { ok: false, reason: "transport_failure", error };
    }

    const content = extractChoiceContent(payload);
    if (content === null) {
      return { ok: false, reason: "empty_content" };
    }

    const text = truncate(content, resolved.terminators);
    return text === "" ? { ok: false, reason: "empty_content" } : { ok: true, text };
  }

  private async postChatCompletion(body: ChatCompletionRequest): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const code = classifyHttpStatus(response.status);
      const detail = await response.text().catch(() => "");
      throw new TransportFailure(code, `request failed ${detail.slice(0, 300)}`.trim());
    }

    try {
      return (await response.json()) as unknown;
    } catch (error) {
      throw new TransportFailure("POE_BAD_RESPONSE", "response body is not JSON", { cause: error });
    }
  }
}
