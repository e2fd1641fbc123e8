/**
 * Filesystem helpers shared by the on-disk stores.
 */

import { randomUUID } from 'node:crypto'
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'

export const USER_CACHE_DIR = join(homedir(), '.cache', 'research-relay')

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
export function guardAgainstUserCache(cacheDir: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  if (cacheDir.startsWith(USER_CACHE_DIR)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${cacheDir}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/research-relay/`
    )
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/** File contents, or null when the file does not exist. */
export async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) return null
    throw error
  }
}

export async function listOptional(path: string): Promise<string[]> {
  try {
    return await readdir(path)
  } catch (error) {
    if (isMissingFile(error)) return []
    throw error
  }
}

/**
 * Write a file atomically: temp file in the same directory, then rename.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const tempPath = `${path}.${process.pid}.${randomUUID()}.tmp`
  try {
    await writeFile(tempPath, content)
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
