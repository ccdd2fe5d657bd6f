const MASKED_SECRET = "****";

export function redactSecretValue(_value: string | undefined): string {
  return MASKED_SECRET;
}

/** Replaces every occurrence of the given secrets inside a log line. */
export function redactSecretsIn(message: string, secrets: readonly string[]): string {
  let out = message;
  for (const secret of secrets) {
    if (secret.trim() === "") {
      continue;
    }
    out = out.split(secret).join(MASKED_SECRET);
  }
  return out;
}
