import { ConfigurationError } from "../llm/errors";

export interface SampleCliArgs {
  prompt: string;
  model?: string;
  baseUrl?: string;
  profile?: string;
  terminators: string[];
  temperature?: number;
  maxTokens?: number;
  seed?: number;
  timeoutSeconds?: number;
  sleepPeriodically?: boolean;
}

const STRING_FLAGS = ["--model", "--baseUrl", "--profile"] as const;
const NUMERIC_FLAGS = ["--temperature", "--maxTokens", "--seed", "--timeoutSeconds"] as const;
const INTEGER_FLAGS: ReadonlySet<string> = new Set(["--maxTokens", "--seed"]);

type StringFlag = (typeof STRING_FLAGS)[number];
type NumericFlag = (typeof NUMERIC_FLAGS)[number];

function isStringFlag(token: string): token is StringFlag {
  return (STRING_FLAGS as readonly string[]).includes(token);
}

function isNumericFlag(token: string): token is NumericFlag {
  return (NUMERIC_FLAGS as readonly string[]).includes(token);
}

function requireValue(flag: string, next: string | undefined): string {
  if (typeof next !== "string" || next.trim() === "") {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${flag} requires a value`);
  }
  return next;
}

function parseNumber(flag: NumericFlag, raw: string): number {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${flag} must be a number`);
  }
  if (INTEGER_FLAGS.has(flag) && !Number.isInteger(parsed)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${flag} must be an integer`);
  }
  return parsed;
}

export function parseSampleArgs(argv: readonly string[]): SampleCliArgs {
  const positional: string[] = [];
  const strings: Partial<Record<StringFlag, string>> = {};
  const numbers: Partial<Record<NumericFlag, number>> = {};
  const terminators: string[] = [];
  let sleepPeriodically: boolean | undefined;
  let afterSeparator = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (afterSeparator) {
      positional.push(token);
      continue;
    }
    if (token === "--") {
      afterSeparator = true;
      continue;
    }
    if (token === "--sleepPeriodically") {
      sleepPeriodically = true;
      continue;
    }
    if (token === "--stop") {
      const next = argv[i + 1];
      if (typeof next !== "string" || next === "") {
        throw new ConfigurationError("CONFIGURATION_ERROR --stop requires a value");
      }
      terminators.push(next);
      i += 1;
      continue;
    }
    if (isStringFlag(token)) {
      strings[token] = requireValue(token, argv[i + 1]).trim();
      i += 1;
      continue;
    }
    if (isNumericFlag(token)) {
      numbers[token] = parseNumber(token, requireValue(token, argv[i + 1]));
      i += 1;
      continue;
    }
    positional.push(token);
  }

  const prompt = positional.join(" ");
  if (prompt.trim() === "") {
    throw new ConfigurationError("CONFIGURATION_ERROR a prompt is required: sample [flags] -- <prompt>");
  }

  return {
    prompt,
    model: strings["--model"],
    baseUrl: strings["--baseUrl"],
    profile: strings["--profile"],
    terminators,
    temperature: numbers["--temperature"],
    maxTokens: numbers["--maxTokens"],
    seed: numbers["--seed"],
    timeoutSeconds: numbers["--timeoutSeconds"],
    sleepPeriodically,
  };
}
