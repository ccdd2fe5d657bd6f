export const CONFIGURATION_ERROR = "CONFIGURATION_ERROR";

export class ConfigurationError extends Error {
  readonly kind = CONFIGURATION_ERROR;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class TransportFailure extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { readonly cause?: unknown }) {
    super(`${code}: ${message}`, options);
    this.name = "TransportFailure";
    this.code = code;
  }
}

export function classifyHttpStatus(status: number): string {
  if (status === 401 || status === 403) {
    return `POE_PERMANENT_HTTP_${status}`;
  }
  if (status === 429 || status === 503) {
    return `POE_TRANSIENT_HTTP_${status}`;
  }
  return `POE_HTTP_${status}`;
}

export function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function resolveErrorCode(error: unknown): string {
  if (error instanceof TransportFailure) {
    return error.code;
  }
  return "POE_REQUEST_FAILED";
}
