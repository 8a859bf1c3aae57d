/**
 * Usage Log
 *
 * Append-only JSON Lines file, one UsageRecord per line.
 * The log is the source of truth for every usage figure; summaries are derived.
 */

import { mkdir, open, readFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { isErrnoCode } from '../cache/atomic'
import { createSilentLogger, type Logger } from '../logger'
import type { UsageRecord } from './types'

const usageRecordSchema = z.object({
  timestamp: z.string(),
  outcome: z.enum(['hit', 'miss_success', 'miss_failure']),
  fingerprint: z.string(),
  vendor: z.string().optional(),
  costMicros: z.number().nonnegative(),
  model: z.string().optional(),
  inputTokens: z.number().optional(),
  outputTokens: z.number().optional(),
  permitId: z.string().optional(),
  error: z.string().optional()
})

export class UsageLog {
  private readonly logger: Logger

  constructor(
    readonly path: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createSilentLogger()
  }

  /**
   * Durably append one record. A torn last line left by a crash is
   * terminated first so it cannot swallow this record.
   */
  async append(record: UsageRecord): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })
    const handle = await open(this.path, 'a+')
    try {
      const { size } = await handle.stat()
      let prefix = ''
      if (size > 0) {
        const last = Buffer.alloc(1)
        await handle.read(last, 0, 1, size - 1)
        if (last.toString('utf-8') !== '\n') prefix = '\n'
      }
      await handle.appendFile(`${prefix}${JSON.stringify(record)}\n`, 'utf-8')
      await handle.sync()
    } finally {
      await handle.close()
    }
  }

  /**
   * Read every valid record. Missing file means no usage yet.
   * Lines that do not parse are skipped.
   */
  async read(): Promise<UsageRecord[]> {
    let raw: string
    try {
      raw = await readFile(this.path, 'utf-8')
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return []
      throw error
    }

    const records: UsageRecord[] = []
    let skipped = 0
    for (const line of raw.split('\n')) {
      if (line.trim() === '') continue
      const parsed = parseLine(line)
      if (parsed) {
        records.push(parsed)
      } else {
        skipped++
      }
    }

    if (skipped > 0) {
      this.logger.verbose(`Skipped ${skipped} unreadable usage log line(s)`)
    }
    return records
  }
}

function parseLine(line: string): UsageRecord | null {
  try {
    const parsed = usageRecordSchema.safeParse(JSON.parse(line))
    return parsed.success ? parsed.data : null
  } catch {
    // Torn write
    return null
  }
}
