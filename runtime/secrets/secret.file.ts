import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

const SECRET_FILE_MODE = 0o600;
const SECRET_DIR_MODE = 0o700;

/** Reads the file, resolving to null when it does not exist. */
export async function readFileIfExists(targetPath: string): Promise<string | null> {
  try {
    return await fs.readFile(targetPath, "utf8");
  } catch (error) {
    if (error instanceof Error && (error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export async function writeFileAtomically(targetPath: string, data: string): Promise<void> {
  const dirPath = path.dirname(targetPath);
  const tempPath = `${targetPath}.tmp-${process.pid}-${randomUUID()}`;

  await fs.mkdir(dirPath, { recursive: true, mode: SECRET_DIR_MODE });

  let fileHandle: fs.FileHandle | undefined;
  try {
    fileHandle = await fs.open(tempPath, "wx", SECRET_FILE_MODE);
    await fileHandle.writeFile(data, "utf8");
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = undefined;
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close();
    }
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
