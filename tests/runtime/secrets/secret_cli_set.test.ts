/**
 * Intent: `secret set` writes the secrets file atomically and never echoes the raw key.
 * Scope: CLI `runSecretCli` success and usage paths.
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { runSecretCli } from "../../../runtime/cli/secret";
import { FileSecretManager } from "../../../runtime/secrets/secret.manager";

function makeManager(t: test.TestContext): FileSecretManager {
  const home = fs.mkdtempSync(path.join(os.tmpdir(), "secret-cli-home-"));
  t.after(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });
  return new FileSecretManager({ platform: "linux", env: { HOME: home } as NodeJS.ProcessEnv });
}

test("secret set: creates parent dir and writes expected JSON structure atomically", async (t) => {
  const manager = makeManager(t);
  const logs: string[] = [];
  const errors: string[] = [];
  const io = { log: (msg: string) => logs.push(msg), error: (msg: string) => errors.push(msg) };
  const rawKey = "test-secret-poe";

  const exitCode = await runSecretCli(["set", "default", "Poe", rawKey, "http://localhost:9000/v1"], io, manager);

  assert.equal(exitCode, 0);
  assert.deepEqual(errors, []);

  const secretsPath = manager.getSecretsFilePath();
  const parsed = JSON.parse(fs.readFileSync(secretsPath, "utf8")) as unknown;
  assert.deepEqual(parsed, {
    default: { providers: { poe: { apiKey: rawKey, baseUrl: "http://localhost:9000/v1" } } },
  });
  assert.equal(fs.statSync(secretsPath).mode & 0o777, 0o600);

  const leftovers = fs
    .readdirSync(path.dirname(secretsPath))
    .filter((name) => name.startsWith("secrets.json.tmp-"));
  assert.deepEqual(leftovers, []);

  assert.deepEqual(logs, [
    `secret set completed profile=default provider=poe apiKey=**** path=${secretsPath}`,
  ]);
});

test("secret set: unknown command and missing arguments print usage", async (t) => {
  const manager = makeManager(t);
  const errors: string[] = [];
  const io = { log: () => undefined, error: (msg: string) => errors.push(msg) };

  assert.equal(await runSecretCli(["get", "default"], io, manager), 1);
  assert.equal(await runSecretCli(["set", "default", "poe"], io, manager), 1);

  assert.deepEqual(errors, [
    "secret command not supported. Usage: secret set <profile> <provider> <apiKey> [baseUrl]",
    "secret set requires profile, provider, and apiKey. Usage: secret set <profile> <provider> <apiKey> [baseUrl]",
  ]);
  assert.equal(fs.existsSync(manager.getSecretsFilePath()), false);
});
