import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

/** Returns null when the file does not exist; other read errors propagate. */
export const readBinaryFile = async (filePath: string): Promise<Uint8Array | null> => {
  try {
    return new Uint8Array(await fs.readFile(filePath));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
};

/**
 * Replaces the file atomically through a temp file in the same directory.
 * Callers serialize writes to one path; the temp file is removed on failure.
 */
export const writeBinaryFile = async (filePath: string, data: Uint8Array): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tempFile = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tempFile, data);
    await fs.rename(tempFile, filePath);
  } catch (error) {
    await fs.rm(tempFile, { force: true });
    throw error;
  }
};
