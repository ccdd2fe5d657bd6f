/**
 * Shared contract for text-sampling clients.
 *
 * Every option is best-effort: a backend that cannot honor one still accepts it,
 * so callers written against this interface can swap clients freely.
 */

export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_TERMINATORS: readonly string[] = Object.freeze([]);
export const DEFAULT_TEMPERATURE = 1.0;
export const DEFAULT_TIMEOUT_SECONDS = 120;

export interface SampleOptions {
  readonly maxTokens?: number;
  /** Stop substrings; the returned text ends before the first one found. */
  readonly terminators?: readonly string[];
  readonly temperature?: number;
  readonly timeoutSeconds?: number;
  readonly seed?: number;
}

export interface ResolvedSampleOptions {
  readonly maxTokens: number;
  readonly terminators: readonly string[];
  readonly temperature: number;
  readonly timeoutSeconds: number;
  readonly seed?: number;
}

export type SampleFailureReason = "transport_failure" | "empty_content";

export type SampleOutcome =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly reason: SampleFailureReason; readonly error?: unknown };

export interface LLMClient {
  /** Resolves to "" when no usable text came back, whatever the cause. */
  sampleText(prompt: string, options?: SampleOptions): Promise<string>;
}

export interface LLMLogger {
  readonly info: (message: string) => void;
  readonly error: (message: string) => void;
}

export const consoleLogger: LLMLogger = {
  info: (message) => console.log(message),
  error: (message) => console.error(message),
};

export function resolveSampleOptions(options: SampleOptions = {}): ResolvedSampleOptions {
  return {
    maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    terminators: options.terminators ?? DEFAULT_TERMINATORS,
    temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    timeoutSeconds: options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
    seed: options.seed,
  };
}
