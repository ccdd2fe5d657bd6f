import { pathToFileURL } from "node:url";

export interface CliIo {
  readonly log: (message: string) => void;
  readonly error: (message: string) => void;
}

export const consoleIo: CliIo = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

export function isEntrypoint(moduleUrl: string): boolean {
  const scriptPath = process.argv[1];
  if (typeof scriptPath !== "string" || scriptPath.trim() === "") {
    return false;
  }
  return moduleUrl === pathToFileURL(scriptPath).href;
}
