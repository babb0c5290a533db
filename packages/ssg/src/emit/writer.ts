import { constants } from "node:fs";
import { copyFile, mkdir, open, rm } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * Write a file through an explicitly opened handle. The handle is closed on every
 * path; if the write fails the partial file is removed before the error propagates.
 * Fails if the file already exists, since output only ever goes into a fresh tree.
 */
export async function writeFileScoped(path: string, contents: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const handle = await open(path, "wx");
  let written = false;
  try {
    await handle.writeFile(contents, typeof contents === "string" ? "utf-8" : undefined);
    await handle.sync();
    written = true;
  } finally {
    await handle.close();
    if (!written) {
      await rm(path, { force: true });
    }
  }
}

/** Byte-for-byte copy; a partially copied file is removed on failure. */
export async function copyFileScoped(from: string, to: string): Promise<void> {
  await mkdir(dirname(to), { recursive: true });
  try {
    await copyFile(from, to, constants.COPYFILE_EXCL);
  } catch (error) {
    if (!isAlreadyExists(error)) {
      await rm(to, { force: true });
    }
    throw error;
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}
