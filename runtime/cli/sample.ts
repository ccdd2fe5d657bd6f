import { createClientFromConfig, resolveClientConfig, type ClientResolutionEnv } from "../llm/client.config";
import { ConfigurationError } from "../llm/errors";
import type { LLMLogger } from "../llm/llm.types";
import { FileSecretManager, type ISecretManager } from "../secrets/secret.manager";
import { redactSecretsIn } from "../secrets/secret.redaction";
import { consoleIo, isEntrypoint, type CliIo } from "./cli.io";
import { parseSampleArgs } from "./sample.args";

export interface SampleCliDeps {
  readonly env?: NodeJS.ProcessEnv;
  readonly secretManager?: ISecretManager;
  readonly now?: () => number;
}

async function resolveEnv(
  profile: string | undefined,
  env: NodeJS.ProcessEnv,
  secretManager: ISecretManager
): Promise<ClientResolutionEnv> {
  if (!profile) {
    return env;
  }
  const loaded = await secretManager.loadProfile(profile);
  return { ...env, ...secretManager.getInjectionEnv(loaded) };
}

export async function runSampleCli(
  argv: readonly string[],
  io: CliIo = consoleIo,
  deps: SampleCliDeps = {}
): Promise<number> {
  const args = parseSampleArgs(argv);
  const env = await resolveEnv(
    args.profile,
    deps.env ?? process.env,
    deps.secretManager ?? new FileSecretManager()
  );
  const config = resolveClientConfig(args, env);
  const secrets = [config.apiKey];
  const logger: LLMLogger = {
    info: (message) => io.log(redactSecretsIn(message, secrets)),
    error: (message) => io.error(redactSecretsIn(message, secrets)),
  };
  const client = createClientFromConfig(config, { logger });

  const now = deps.now ?? Date.now;
  const start = now();
  const outcome = await client.sampleTextOutcome(args.prompt, {
    maxTokens: args.maxTokens,
    terminators: args.terminators,
    temperature: args.temperature,
    timeoutSeconds: args.timeoutSeconds,
    seed: args.seed,
  });

  io.log(`model=${config.modelName}`);
  io.log(`latencyMs=${now() - start}`);
  io.log(`ok=${String(outcome.ok)}`);
  if (outcome.ok) {
    io.log(outcome.text);
    return 0;
  }
  io.log(`error.reason=${outcome.reason}`);
  return 1;
}

async function main(): Promise<void> {
  try {
    process.exitCode = await runSampleCli(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.log("ok=false");
      console.log(`error.code=${error.kind}`);
      console.error(`sample configuration error: ${error.message}`);
      process.exitCode = 1;
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    console.log("ok=false");
    console.error(`sample failed: ${message}`);
    process.exitCode = 1;
  }
}

if (isEntrypoint(import.meta.url)) {
  await main();
}
