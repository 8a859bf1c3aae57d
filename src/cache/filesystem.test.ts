import { existsSync, mkdirSync, readdirSync, rmSync, utimesSync, writeFileSync } from 'node:fs'
import { homedir, tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { FilesystemStore } from './filesystem'

const FP_A = `aa${'1'.repeat(62)}`
const FP_B = `bb${'2'.repeat(62)}`
const FP_C = `cc${'3'.repeat(62)}`

interface Report {
  summary: string
  savings: number
}

describe('FilesystemStore', () => {
  let testDir: string
  let nowMs: number
  let store: FilesystemStore

  const entryPath = (fp: string) => join(testDir, 'entries', fp.slice(0, 2), `${fp}.json`)

  beforeEach(() => {
    testDir = join(tmpdir(), `store-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
    nowMs = Date.parse('2026-03-01T12:00:00.000Z')
    store = new FilesystemStore(testDir, { now: () => nowMs })
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  describe('lookup', () => {
    it('should return null for unknown fingerprint', async () => {
      expect(await store.lookup(FP_A)).toBeNull()
    })

    it('should return committed result', async () => {
      await store.commit<Report>(FP_A, { summary: 'ok', savings: 120 })

      const entry = await store.lookup<Report>(FP_A)

      expect(entry?.result).toEqual({ summary: 'ok', savings: 120 })
      expect(entry?.fingerprint).toBe(FP_A)
      expect(entry?.createdAt).toBe('2026-03-01T12:00:00.000Z')
    })

    it('should reject invalid fingerprints', async () => {
      await expect(store.lookup('../../etc/passwd')).rejects.toThrow('Invalid fingerprint')
    })

    it('should survive a new store instance on the same directory', async () => {
      await store.commit(FP_A, { summary: 'durable', savings: 1 })

      const reopened = new FilesystemStore(testDir)

      expect((await reopened.lookup<Report>(FP_A))?.result.summary).toBe('durable')
    })
  })

  describe('commit', () => {
    it('should write entry under fingerprint prefix directory', async () => {
      await store.commit(FP_A, { summary: 'x', savings: 0 })

      expect(existsSync(entryPath(FP_A))).toBe(true)
    })

    it('should keep the first committed result', async () => {
      await store.commit(FP_A, { summary: 'first', savings: 1 })
      const second = await store.commit(FP_A, { summary: 'second', savings: 2 })

      expect(second.result).toEqual({ summary: 'first', savings: 1 })
      expect((await store.lookup<Report>(FP_A))?.result.summary).toBe('first')
    })

    it('should store entry metadata', async () => {
      await store.commit(FP_A, { summary: 'x', savings: 0 }, { vendor: 'acme', costMicros: 1500 })

      const entry = await store.lookup(FP_A)

      expect(entry?.meta).toEqual({ vendor: 'acme', costMicros: 1500 })
    })

    it('should leave no temp files behind', async () => {
      await store.commit(FP_A, { summary: 'x', savings: 0 })

      expect(readdirSync(join(testDir, 'entries', 'aa'))).toEqual([`${FP_A}.json`])
    })

    it('should evict oldest entries past maxEntries', async () => {
      const limited = new FilesystemStore(testDir, { now: () => nowMs, maxEntries: 2 })

      await limited.commit(FP_A, { summary: 'a', savings: 0 })
      nowMs += 1000
      await limited.commit(FP_B, { summary: 'b', savings: 0 })
      nowMs += 1000
      await limited.commit(FP_C, { summary: 'c', savings: 0 })

      expect(await limited.lookup(FP_A)).toBeNull()
      expect(await limited.lookup(FP_B)).not.toBeNull()
      expect(await limited.lookup(FP_C)).not.toBeNull()
    })

    it('should never evict the entry just committed', async () => {
      const tiny = new FilesystemStore(testDir, { now: () => nowMs, maxBytes: 1 })

      await tiny.commit(FP_A, { summary: 'a', savings: 0 })

      expect(await tiny.lookup(FP_A)).not.toBeNull()
    })
  })

  describe('expiry', () => {
    it('should stamp expiresAt from ttlSeconds', async () => {
      const ttlStore = new FilesystemStore(testDir, { now: () => nowMs, ttlSeconds: 60 })

      const entry = await ttlStore.commit(FP_A, { summary: 'x', savings: 0 })

      expect(entry.expiresAt).toBe('2026-03-01T12:01:00.000Z')
    })

    it('should treat expired entries as absent without deleting them', async () => {
      const ttlStore = new FilesystemStore(testDir, { now: () => nowMs, ttlSeconds: 60 })
      await ttlStore.commit(FP_A, { summary: 'x', savings: 0 })

      nowMs += 60_000

      expect(await ttlStore.lookup(FP_A)).toBeNull()
      expect(existsSync(entryPath(FP_A))).toBe(true)
    })

    it('should allow recommitting an expired fingerprint', async () => {
      const ttlStore = new FilesystemStore(testDir, { now: () => nowMs, ttlSeconds: 60 })
      await ttlStore.commit(FP_A, { summary: 'old', savings: 0 })
      nowMs += 120_000

      await ttlStore.commit(FP_A, { summary: 'new', savings: 0 })

      expect((await ttlStore.lookup<Report>(FP_A))?.result.summary).toBe('new')
    })

    it('should remove entries past expiresAt', async () => {
      const ttlStore = new FilesystemStore(testDir, { now: () => nowMs, ttlSeconds: 60 })
      await ttlStore.commit(FP_A, { summary: 'x', savings: 0 })
      nowMs += 30_000
      await ttlStore.commit(FP_B, { summary: 'y', savings: 0 })
      nowMs += 45_000

      const evicted = await ttlStore.evictExpired()

      expect(evicted).toBe(1)
      expect(existsSync(entryPath(FP_A))).toBe(false)
      expect(await ttlStore.lookup(FP_B)).not.toBeNull()
    })

    it('should remove entries older than the given ttl', async () => {
      await store.commit(FP_A, { summary: 'x', savings: 0 })
      nowMs += 10_000
      await store.commit(FP_B, { summary: 'y', savings: 0 })
      nowMs += 5_000

      const evicted = await store.evictExpired(12)

      expect(evicted).toBe(1)
      expect(await store.lookup(FP_A)).toBeNull()
      expect(await store.lookup(FP_B)).not.toBeNull()
    })

    it('should return 0 when nothing expired', async () => {
      await store.commit(FP_A, { summary: 'x', savings: 0 })

      expect(await store.evictExpired(3600)).toBe(0)
    })

    it('should sweep temp files left by crashed writes', async () => {
      const dir = join(testDir, 'entries', 'aa')
      mkdirSync(dir, { recursive: true })
      const stale = join(dir, `.${FP_A}.json.123.abc.tmp`)
      const fresh = join(dir, `.${FP_A}.json.456.def.tmp`)
      writeFileSync(stale, '{"partial":')
      writeFileSync(fresh, '{"partial":')
      const twoHoursAgo = (nowMs - 2 * 60 * 60 * 1000) / 1000
      utimesSync(stale, twoHoursAgo, twoHoursAgo)
      utimesSync(fresh, nowMs / 1000, nowMs / 1000)

      expect(await store.evictExpired()).toBe(0)

      expect(readdirSync(dir)).toEqual([`.${FP_A}.json.456.def.tmp`])
    })

    it('should drop quarantined entries after a week', async () => {
      const quarantineDir = join(testDir, 'quarantine')
      mkdirSync(quarantineDir, { recursive: true })
      const old = join(quarantineDir, `${FP_A}.1.json`)
      const recent = join(quarantineDir, `${FP_B}.2.json`)
      writeFileSync(old, 'not json')
      writeFileSync(recent, 'not json')
      const eightDaysAgo = (nowMs - 8 * 24 * 60 * 60 * 1000) / 1000
      utimesSync(old, eightDaysAgo, eightDaysAgo)
      utimesSync(recent, nowMs / 1000, nowMs / 1000)

      await store.evictExpired()

      expect(readdirSync(quarantineDir)).toEqual([`${FP_B}.2.json`])
      expect((await store.stats()).quarantined).toBe(1)
    })
  })

  describe('corruption', () => {
    it('should quarantine unparseable entries and report a miss', async () => {
      mkdirSync(join(testDir, 'entries', 'aa'), { recursive: true })
      writeFileSync(entryPath(FP_A), '{"version":1,"fingerprint":"aa')

      expect(await store.lookup(FP_A)).toBeNull()
      expect(existsSync(entryPath(FP_A))).toBe(false)
      expect(readdirSync(join(testDir, 'quarantine'))).toEqual([`${FP_A}.${nowMs}.json`])
    })

    it('should quarantine entries with the wrong shape', async () => {
      mkdirSync(join(testDir, 'entries', 'aa'), { recursive: true })
      writeFileSync(entryPath(FP_A), JSON.stringify({ version: 1, fingerprint: FP_A }))

      expect(await store.lookup(FP_A)).toBeNull()
      expect((await store.stats()).quarantined).toBe(1)
    })

    it('should quarantine entries stored under another fingerprint', async () => {
      mkdirSync(join(testDir, 'entries', 'aa'), { recursive: true })
      writeFileSync(
        entryPath(FP_A),
        JSON.stringify({ version: 1, fingerprint: FP_B, result: {}, createdAt: '2026-01-01T00:00:00Z' })
      )

      expect(await store.lookup(FP_A)).toBeNull()
      expect((await store.stats()).quarantined).toBe(1)
    })

    it('should recompute and commit after quarantine', async () => {
      mkdirSync(join(testDir, 'entries', 'aa'), { recursive: true })
      writeFileSync(entryPath(FP_A), 'not json')
      await store.lookup(FP_A)

      await store.commit(FP_A, { summary: 'fresh', savings: 0 })

      expect((await store.lookup<Report>(FP_A))?.result.summary).toBe('fresh')
    })
  })

  describe('list and stats', () => {
    it('should list entries oldest first', async () => {
      await store.commit(FP_B, { summary: 'b', savings: 0 }, { vendor: 'beta' })
      nowMs += 1000
      await store.commit(FP_A, { summary: 'a', savings: 0 })

      const entries = await store.list()

      expect(entries.map((e) => e.fingerprint)).toEqual([FP_B, FP_A])
      expect(entries[0]?.vendor).toBe('beta')
    })

    it('should ignore leftover temp files', async () => {
      mkdirSync(join(testDir, 'entries', 'aa'), { recursive: true })
      writeFileSync(join(testDir, 'entries', 'aa', `.${FP_A}.json.123.abc.tmp`), '{"partial":')

      expect(await store.list()).toEqual([])
      expect(await store.lookup(FP_A)).toBeNull()
    })

    it('should report entry count and size', async () => {
      await store.commit(FP_A, { summary: 'x', savings: 0 })
      await store.commit(FP_B, { summary: 'y', savings: 0 })

      const stats = await store.stats()

      expect(stats.entries).toBe(2)
      expect(stats.totalBytes).toBeGreaterThan(0)
      expect(stats.quarantined).toBe(0)
    })
  })

  describe('clear', () => {
    it('should remove all entries', async () => {
      await store.commit(FP_A, { summary: 'x', savings: 0 })
      await store.commit(FP_B, { summary: 'y', savings: 0 })

      const removed = await store.clear()

      expect(removed).toBe(2)
      expect(await store.lookup(FP_A)).toBeNull()
      expect(await store.list()).toEqual([])
    })

    it('should handle an empty cache', async () => {
      expect(await store.clear()).toBe(0)
    })
  })

  it('should refuse the real user cache directory under test', () => {
    expect(() => new FilesystemStore(join(homedir(), '.cache', 'spend-sentinel'))).toThrow(
      "TEST ERROR: Attempted to access user's real cache directory!"
    )
  })
})
