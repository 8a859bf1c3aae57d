/**
 * Counting semaphore bounding in-process external calls.
 */

import { raceAbort } from '../shared/abort'

export class Semaphore {
  private available: number
  private readonly waiters: Array<() => void> = []

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, got ${capacity}`)
    }
    this.available = capacity
  }

  /**
   * Run fn once a slot is free. Waiting ends early if the signal aborts.
   */
  async run<R>(fn: () => Promise<R>, signal?: AbortSignal): Promise<R> {
    await this.acquire(signal)
    try {
      return await fn()
    } finally {
      this.release()
    }
  }

  get inUse(): number {
    return this.capacity - this.available
  }

  private async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()
    if (this.available > 0) {
      this.available--
      return
    }

    let grant: () => void = () => undefined
    const granted = new Promise<void>((resolve) => {
      grant = resolve
    })
    this.waiters.push(grant)

    try {
      await raceAbort(granted, signal)
    } catch (error) {
      const index = this.waiters.indexOf(grant)
      if (index >= 0) {
        this.waiters.splice(index, 1)
      } else {
        // Slot was handed over as the signal fired
        this.release()
      }
      throw error
    }
  }

  private release(): void {
    const next = this.waiters.shift()
    if (next) {
      next()
    } else {
      this.available++
    }
  }
}
