/**
 * File system utilities
 * Local file metadata and JSON loading
 */

import fs from "node:fs";

export const statAsync = fs.promises.stat;
export const readFileAsync = fs.promises.readFile;

/**
 * Size of a regular file, or null when the path is missing or not a file
 * @param filePath - Local path to inspect
 */
export async function getRegularFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await statAsync(filePath);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Load and parse a JSON file
 * @param filePath - The path to the file
 * @returns The parsed value, or undefined when the file does not exist
 * @throws When the file exists but cannot be read or parsed
 */
export async function loadJsonFromFile(filePath: string): Promise<unknown> {
  let data: string;
  try {
    data = await readFileAsync(filePath, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
  return JSON.parse(data);
}
