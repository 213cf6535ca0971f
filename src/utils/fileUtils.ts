import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { isErrorWithCode } from '../types/index.js';
import { logger } from './logger.js';

/**
 * File utilities for atomic operations and safe file handling
 */

function isMissing(error: unknown): boolean {
  return isErrorWithCode(error) && error.code === 'ENOENT';
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Write data to a file atomically using temp file + rename
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${randomUUID()}`;

  try {
    await ensureDirectory(path.dirname(filePath));
    await fs.writeFile(tempPath, data, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await removeFileSafe(tempPath).catch(cleanupError => {
      logger.warn('Failed to remove temp file', { tempPath, cleanupError: String(cleanupError) });
    });
    throw error;
  }
}

/**
 * Read a file safely, returning null if it doesn't exist
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a file safely (no error if it doesn't exist)
 */
export async function removeFileSafe(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (!isMissing(error)) {
      throw error;
    }
  }
}
