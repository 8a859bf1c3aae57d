import { describe, expect, it } from 'vitest'
import { abortReason, CancelledError, createDeadline, raceAbort, sleep, TimeoutError } from './abort'

describe('abort helpers', () => {
  describe('abortReason', () => {
    it('should return the signal reason when it is an Error', () => {
      const controller = new AbortController()
      controller.abort(new TimeoutError(50))

      const reason = abortReason(controller.signal)

      expect(reason).toBeInstanceOf(TimeoutError)
      expect(reason.message).toBe('Operation timed out after 50ms')
    })

    it('should fall back to CancelledError', () => {
      const controller = new AbortController()
      controller.abort('not an error')

      expect(abortReason(controller.signal)).toBeInstanceOf(CancelledError)
    })
  })

  describe('raceAbort', () => {
    it('should resolve with the promise when not aborted', async () => {
      const controller = new AbortController()

      await expect(raceAbort(Promise.resolve(42), controller.signal)).resolves.toBe(42)
    })

    it('should reject immediately for an already-aborted signal', async () => {
      const controller = new AbortController()
      controller.abort()

      await expect(raceAbort(Promise.resolve(1), controller.signal)).rejects.toBeInstanceOf(
        CancelledError
      )
    })

    it('should reject when the signal aborts first', async () => {
      const controller = new AbortController()
      const pending = new Promise<number>(() => undefined)

      const raced = raceAbort(pending, controller.signal)
      controller.abort(new CancelledError('stop'))

      await expect(raced).rejects.toThrow('stop')
    })

    it('should pass rejections through', async () => {
      await expect(raceAbort(Promise.reject(new Error('boom')))).rejects.toThrow('boom')
    })
  })

  describe('sleep', () => {
    it('should resolve after the delay', async () => {
      const start = Date.now()
      await sleep(10)
      expect(Date.now() - start).toBeGreaterThanOrEqual(5)
    })

    it('should reject when aborted', async () => {
      const controller = new AbortController()
      const waiting = sleep(10_000, controller.signal)
      controller.abort()

      await expect(waiting).rejects.toBeInstanceOf(CancelledError)
    })
  })

  describe('createDeadline', () => {
    it('should abort with TimeoutError after timeoutMs', async () => {
      const deadline = createDeadline(undefined, 5)
      await new Promise((resolve) => setTimeout(resolve, 20))

      expect(deadline.signal.aborted).toBe(true)
      expect(deadline.signal.reason).toBeInstanceOf(TimeoutError)
      deadline.dispose()
    })

    it('should follow the caller signal', () => {
      const controller = new AbortController()
      const deadline = createDeadline(controller.signal, undefined)

      controller.abort(new CancelledError('caller gave up'))

      expect(deadline.signal.aborted).toBe(true)
      expect(abortReason(deadline.signal).message).toBe('caller gave up')
      deadline.dispose()
    })

    it('should start aborted when the caller signal already is', () => {
      const controller = new AbortController()
      controller.abort()

      const deadline = createDeadline(controller.signal, 1000)

      expect(deadline.signal.aborted).toBe(true)
      deadline.dispose()
    })

    it('should not fire after dispose', async () => {
      const deadline = createDeadline(undefined, 5)
      deadline.dispose()
      await new Promise((resolve) => setTimeout(resolve, 20))

      expect(deadline.signal.aborted).toBe(false)
    })
  })
})
