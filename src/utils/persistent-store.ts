/**
 * Persistent Store - atomic, owner-only file persistence
 *
 * Provides:
 * - Atomic writes: temp file in the same directory, then rename
 * - Owner-only permissions: directories 0700, files 0600
 * - Missing files read as null rather than throwing
 */

import { randomBytes } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { logger } from './logger.js';

const log = logger.store;

export const PRIVATE_DIR_MODE = 0o700;
export const PRIVATE_FILE_MODE = 0o600;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isMissingFile(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

/**
 * Create a directory (and parents) readable by the owner only
 */
export async function ensurePrivateDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true, mode: PRIVATE_DIR_MODE });
  await fs.chmod(dir, PRIVATE_DIR_MODE);
}

/**
 * Write text through a temp file and rename it into place. Readers see either
 * the old content or the new, never a partial file.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString('hex')}.tmp`);

  await ensurePrivateDir(dir);
  try {
    await fs.writeFile(tempPath, content, { encoding: 'utf-8', mode: PRIVATE_FILE_MODE, flag: 'wx' });
    await fs.rename(tempPath, filePath);
  } catch (error) {
    log.error('Atomic write failed', { file: filePath, error: error instanceof Error ? error.message : String(error) });
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      log.debug('Temp file cleanup failed', { file: tempPath, error: String(cleanupError) });
    });
    throw error;
  }
}

/**
 * Read a text file; null when it does not exist
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}
