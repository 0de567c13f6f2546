import { stat } from "fs/promises";

/**
 * Check if a regular file exists at the given path
 * Directories and other special files count as absent
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
