/**
 * File utilities for ticketplan outputs
 */

import fs from "node:fs/promises";
import path from "node:path";
import { FileSystemError } from "./errors.js";

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to create directory: ${dirPath}`, {
      path: dirPath,
      operation: "write",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Write text to a file, creating parent directories
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  try {
    await fs.writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${filePath}`, {
      path: filePath,
      operation: "write",
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Write a JSON file with pretty formatting
 */
export async function writeJsonFile(filePath: string, data: unknown, indent = 2): Promise<void> {
  await writeTextFile(filePath, JSON.stringify(data, null, indent) + "\n");
}
