import { ConfigurationError } from "../llm/errors";
import { FileSecretManager } from "../secrets/secret.manager";
import { redactSecretValue } from "../secrets/secret.redaction";
import { consoleIo, isEntrypoint, type CliIo } from "./cli.io";

function usage(): string {
  return "Usage: secret set <profile> <provider> <apiKey> [baseUrl]";
}

export async function runSecretCli(
  argv: readonly string[],
  io: CliIo = consoleIo,
  manager: FileSecretManager = new FileSecretManager()
): Promise<number> {
  const [command, profile, provider, apiKey, baseUrl] = argv;
  if (command !== "set") {
    io.error(`secret command not supported. ${usage()}`);
    return 1;
  }

  if (
    typeof profile !== "string" ||
    typeof provider !== "string" ||
    typeof apiKey !== "string"
  ) {
    io.error(`secret set requires profile, provider, and apiKey. ${usage()}`);
    return 1;
  }

  await manager.setSecret({
    profileName: profile,
    providerName: provider,
    apiKey,
    baseUrl,
  });

  io.log(
    `secret set completed profile=${profile.trim()} provider=${provider.trim().toLowerCase()} apiKey=${redactSecretValue(apiKey)} path=${manager.getSecretsFilePath()}`
  );
  return 0;
}

async function main(): Promise<void> {
  try {
    process.exitCode = await runSecretCli(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`secret configuration error: ${error.message}`);
      process.exitCode = 1;
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(`secret command failed: ${message}`);
    process.exitCode = 1;
  }
}

if (isEntrypoint(import.meta.url)) {
  await main();
}
