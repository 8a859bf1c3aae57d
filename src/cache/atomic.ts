/**
 * Atomic File Writes
 *
 * Write to a sibling temp file, fsync, then rename over the destination.
 * Readers see either the old file or the complete new one, never a partial write.
 */

import { randomBytes } from 'node:crypto'
import { mkdir, open, rename, rm } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

/** Suffix shared by every in-progress write */
export const TEMP_FILE_SUFFIX = '.tmp'

/**
 * Check for the error code Node attaches to failed fs calls.
 */
export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

/**
 * Atomically replace `path` with `data`.
 *
 * The temp file lives in the destination directory so the rename never
 * crosses a filesystem. It is removed on every failure path.
 */
export async function writeFileAtomic(path: string, data: string): Promise<void> {
  const dir = dirname(path)
  await mkdir(dir, { recursive: true })

  const tempPath = join(
    dir,
    `.${basename(path)}.${process.pid}.${randomBytes(6).toString('hex')}${TEMP_FILE_SUFFIX}`
  )

  let renamed = false
  try {
    const handle = await open(tempPath, 'wx')
    try {
      await handle.writeFile(data, 'utf-8')
      await handle.sync()
    } finally {
      await handle.close()
    }
    await rename(tempPath, path)
    renamed = true
  } finally {
    if (!renamed) {
      await rm(tempPath, { force: true })
    }
  }
}
