import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { isErrnoCode, writeFileAtomic } from './atomic'

describe('writeFileAtomic', () => {
  let testDir: string

  beforeEach(() => {
    testDir = join(tmpdir(), `atomic-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  it('should create missing directories', async () => {
    const path = join(testDir, 'a', 'b', 'file.json')

    await writeFileAtomic(path, '{"ok":true}')

    expect(readFileSync(path, 'utf-8')).toBe('{"ok":true}')
  })

  it('should replace existing content', async () => {
    const path = join(testDir, 'file.json')
    writeFileSync(path, 'old')

    await writeFileAtomic(path, 'new')

    expect(readFileSync(path, 'utf-8')).toBe('new')
    expect(readdirSync(testDir)).toEqual(['file.json'])
  })

  it('should remove the temp file when the rename fails', async () => {
    const path = join(testDir, 'occupied')
    mkdirSync(join(path, 'child'), { recursive: true })

    await expect(writeFileAtomic(path, 'data')).rejects.toThrow()

    expect(readdirSync(testDir)).toEqual(['occupied'])
  })
})

describe('isErrnoCode', () => {
  it('should match the code on fs errors', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' })

    expect(isErrnoCode(error, 'ENOENT')).toBe(true)
    expect(isErrnoCode(error, 'EEXIST')).toBe(false)
  })

  it('should reject non-errors', () => {
    expect(isErrnoCode({ code: 'ENOENT' }, 'ENOENT')).toBe(false)
  })
})
