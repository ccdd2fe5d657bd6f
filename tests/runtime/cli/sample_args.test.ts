import test from "node:test";
import assert from "node:assert/strict";
import { parseSampleArgs } from "../../../runtime/cli/sample.args";
import { ConfigurationError } from "../../../runtime/llm/errors";

test("sample args: flags, repeated --stop and prompt after --", () => {
  const args = parseSampleArgs([
    "--model",
    "GPT-4o",
    "--stop",
    "\n",
    "--stop",
    "END",
    "--temperature",
    "0.5",
    "--maxTokens",
    "128",
    "--seed",
    "7",
    "--timeoutSeconds",
    "30",
    "--sleepPeriodically",
    "--profile",
    "work",
    "--",
    "Tell",
    "--model",
    "me",
  ]);

  assert.deepEqual(args, {
    prompt: "Tell --model me",
    model: "GPT-4o",
    baseUrl: undefined,
    profile: "work",
    terminators: ["\n", "END"],
    temperature: 0.5,
    maxTokens: 128,
    seed: 7,
    timeoutSeconds: 30,
    sleepPeriodically: true,
  });
});

test("sample args: positional words form the prompt", () => {
  const args = parseSampleArgs(["Hello", "there"]);
  assert.equal(args.prompt, "Hello there");
  assert.deepEqual(args.terminators, []);
  assert.equal(args.model, undefined);
  assert.equal(args.sleepPeriodically, undefined);
});

test("sample args: invalid values are configuration errors", () => {
  assert.throws(() => parseSampleArgs([]), ConfigurationError);
  assert.throws(() => parseSampleArgs(["--model"]), ConfigurationError);
  assert.throws(() => parseSampleArgs(["--maxTokens", "1.5", "hi"]), ConfigurationError);
  assert.throws(() => parseSampleArgs(["--temperature", "warm", "hi"]), ConfigurationError);
  assert.throws(() => parseSampleArgs(["hi", "--stop"]), ConfigurationError);
});
