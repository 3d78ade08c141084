import { existsSync } from "fs";
import { mkdir, readdir, rm, writeFile } from "fs/promises";
import { extname } from "path";
import { SUPPORTED_VIDEO_FORMATS } from "@/config/constants";

export function isVideoFile(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return SUPPORTED_VIDEO_FORMATS.some((format) => format === ext);
}

export function fileExists(filePath: string): boolean {
  return existsSync(filePath);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Counts files with the given extension in a directory (order is irrelevant).
 * A directory that does not exist yet holds zero files.
 */
export async function countFiles(directory: string, extension: string): Promise<number> {
  const suffix = `.${extension.toLowerCase()}`;

  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return 0;
    }
    throw error;
  }

  return entries.filter((entry) => entry.toLowerCase().endsWith(suffix)).length;
}

export const removePath = (path: string) => rm(path, { recursive: true, force: true });

/**
 * Deletes anything on the passed path and creates an empty directory in its place.
 */
export async function prepareEmptyDir(path: string): Promise<void> {
  await removePath(path);
  await mkdir(path, { recursive: true });
}

/**
 * Creates the file or empties it.
 */
export async function truncateFile(path: string): Promise<void> {
  await writeFile(path, "");
}
