/**
 * Keyed Locks
 *
 * Mutual exclusion per key, within a process and across processes.
 *
 * - In-process: callers for the same key queue on a promise chain.
 * - Cross-process: the holder owns `<locksDir>/<key>.lock`, created with
 *   exclusive create. Stale lock files (old, or owned by a dead pid) are broken.
 *
 * Unrelated keys never wait on each other.
 */

import { mkdir, open, readFile, rm, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { raceAbort, sleep } from '../shared/abort'
import { isErrnoCode } from './atomic'

const KEY_PATTERN = /^[a-zA-Z0-9_-]{1,128}$/

export interface KeyedLockOptions {
  /** How often to retry a held lock file (default 50ms) */
  readonly pollMs?: number | undefined
  /** Lock files older than this are considered abandoned (default 10 minutes) */
  readonly staleMs?: number | undefined
}

interface LockFileContent {
  pid: number
  acquiredAt: string
}

function parseLockFile(raw: string): LockFileContent | null {
  try {
    const parsed: unknown = JSON.parse(raw)
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'pid' in parsed &&
      typeof parsed.pid === 'number' &&
      'acquiredAt' in parsed &&
      typeof parsed.acquiredAt === 'string'
    ) {
      return { pid: parsed.pid, acquiredAt: parsed.acquiredAt }
    }
    return null
  } catch {
    // Holder has created the file but not written it yet
    return null
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoCode(error, 'EPERM')
  }
}

export class KeyedLock {
  private readonly chains = new Map<string, Promise<void>>()
  private readonly pollMs: number
  private readonly staleMs: number

  constructor(
    private readonly locksDir: string,
    options: KeyedLockOptions = {}
  ) {
    this.pollMs = options.pollMs ?? 50
    this.staleMs = options.staleMs ?? 10 * 60 * 1000
  }

  /**
   * Run fn while holding the lock for key. The lock is released on every exit path.
   * Waiting is cancelled (with the signal's reason) if the signal aborts first.
   */
  async withLock<R>(key: string, fn: () => Promise<R>, signal?: AbortSignal): Promise<R> {
    const path = this.lockPath(key)
    const previous = this.chains.get(key) ?? Promise.resolve()

    const run = (async () => {
      await raceAbort(previous, signal)
      await this.acquireFile(path, signal)
      try {
        return await fn()
      } finally {
        await rm(path, { force: true })
      }
    })()

    const tail = run.then(
      () => undefined,
      () => undefined
    )
    this.chains.set(key, tail)

    try {
      return await run
    } finally {
      if (this.chains.get(key) === tail) {
        this.chains.delete(key)
      }
    }
  }

  /**
   * Run fn only if the lock for key is free right now.
   * Returns `{ acquired: false }` instead of waiting.
   */
  async tryWithLock<R>(
    key: string,
    fn: () => Promise<R>
  ): Promise<{ acquired: true; value: R } | { acquired: false }> {
    if (this.chains.has(key)) {
      return { acquired: false }
    }

    const path = this.lockPath(key)
    if (!(await this.tryCreate(path))) {
      return { acquired: false }
    }

    try {
      return { acquired: true, value: await fn() }
    } finally {
      await rm(path, { force: true })
    }
  }

  /**
   * Whether any caller in this process currently holds or awaits key.
   */
  isHeldLocally(key: string): boolean {
    return this.chains.has(key)
  }

  private lockPath(key: string): string {
    if (!KEY_PATTERN.test(key)) {
      throw new Error(`Invalid lock key: "${key}"`)
    }
    return join(this.locksDir, `${key}.lock`)
  }

  private async acquireFile(path: string, signal?: AbortSignal): Promise<void> {
    for (;;) {
      signal?.throwIfAborted()
      if (await this.tryCreate(path)) return
      if (await this.breakIfStale(path)) continue
      await sleep(this.pollMs, signal)
    }
  }

  private async tryCreate(path: string): Promise<boolean> {
    await mkdir(this.locksDir, { recursive: true })
    try {
      const handle = await open(path, 'wx')
      try {
        const content: LockFileContent = { pid: process.pid, acquiredAt: new Date().toISOString() }
        await handle.writeFile(JSON.stringify(content))
      } finally {
        await handle.close()
      }
      return true
    } catch (error) {
      if (isErrnoCode(error, 'EEXIST')) return false
      throw error
    }
  }

  /**
   * Remove the lock file if its holder is gone or it has outlived staleMs.
   */
  private async breakIfStale(path: string): Promise<boolean> {
    try {
      const [info, raw] = await Promise.all([stat(path), readFile(path, 'utf-8')])
      const content = parseLockFile(raw)
      const ageMs = Date.now() - info.mtimeMs
      const ownerGone = content !== null && content.pid !== process.pid && !isProcessAlive(content.pid)

      if (ownerGone || ageMs > this.staleMs) {
        // Someone else may already have broken it and re-acquired
        const current = await stat(path)
        if (current.ino === info.ino) {
          await rm(path, { force: true })
        }
        return true
      }
      return false
    } catch (error) {
      // Released between our create attempt and this check
      if (isErrnoCode(error, 'ENOENT')) return true
      throw error
    }
  }
}
