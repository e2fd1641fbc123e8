import { describe, expect, it } from 'vitest'
import { PipelineCancelledError } from '../errors'
import { deferred } from '../test-support'
import { RunQueue } from './run-queue'

describe('RunQueue', () => {
  it('runs tasks immediately while there is room', async () => {
    const queue = new RunQueue(2)

    expect(await queue.run(async () => 'done')).toBe('done')
    expect(queue.running).toBe(0)
  })

  it('holds tasks beyond the limit until a slot frees, in arrival order', async () => {
    const queue = new RunQueue(1)
    const gate = deferred()
    const order: string[] = []

    const first = queue.run(async () => {
      order.push('first')
      await gate.promise
    })
    const second = queue.run(async () => {
      order.push('second')
    })
    const third = queue.run(async () => {
      order.push('third')
    })

    await new Promise((resolve) => setTimeout(resolve, 0))
    expect(queue.pending).toBe(2)
    expect(order).toEqual(['first'])

    gate.resolve()
    await Promise.all([first, second, third])
    expect(order).toEqual(['first', 'second', 'third'])
  })

  it('frees the slot when a task throws', async () => {
    const queue = new RunQueue(1)

    await expect(queue.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom')
    expect(await queue.run(async () => 'next')).toBe('next')
  })

  it('drops a waiting task when its signal aborts', async () => {
    const queue = new RunQueue(1)
    const gate = deferred()
    const controller = new AbortController()
    const blocker = queue.run(() => gate.promise)

    const waiting = queue.run(async () => 'never', controller.signal)
    controller.abort()

    await expect(waiting).rejects.toBeInstanceOf(PipelineCancelledError)
    expect(queue.pending).toBe(0)
    gate.resolve()
    await blocker
  })

  it('rejects a non-positive concurrency', () => {
    expect(() => new RunQueue(0)).toThrow(RangeError)
  })
})
