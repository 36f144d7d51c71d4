/**
 * Secure file I/O helpers for the DOGE provider.
 *
 * Site grants and the audit trail reveal which pages a user trusts and
 * what they spent. These helpers enforce owner-only permissions (700 for
 * dirs, 600 for files) regardless of the system umask.
 */

import { writeFile, mkdir, appendFile, chmod, rename } from "node:fs/promises";
import { dirname } from "node:path";

/** Owner-only directory permissions (rwx------) */
export const DIR_PERMS = 0o700;

/** Owner-only file permissions (rw-------) */
export const FILE_PERMS = 0o600;

/**
 * Create a directory with secure permissions (700).
 */
export async function secureMkdir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true, mode: DIR_PERMS });
  // mkdir's mode is subject to umask
  await chmod(dirPath, DIR_PERMS);
}

/**
 * Replace a file atomically with secure permissions (600).
 * Writes a sibling temp file, then renames it over the target.
 */
export async function secureWriteFile(filePath: string, data: string): Promise<void> {
  await secureMkdir(dirname(filePath));
  const tmpPath = `${filePath}.tmp`;
  await writeFile(tmpPath, data, { encoding: "utf-8", mode: FILE_PERMS });
  await chmod(tmpPath, FILE_PERMS);
  await rename(tmpPath, filePath);
}

/**
 * Append to a file with secure permissions (600), creating it if needed.
 */
export async function secureAppendFile(filePath: string, data: string): Promise<void> {
  await secureMkdir(dirname(filePath));
  await appendFile(filePath, data, { encoding: "utf-8", mode: FILE_PERMS });
  // Catch files created before hardening
  await chmod(filePath, FILE_PERMS);
}
