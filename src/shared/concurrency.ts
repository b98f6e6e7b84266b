// SPDX-License-Identifier: GPL-2.0-or-later
// Lightweight concurrency helpers: a p-limit shaped limiter and a poisonable guard

import { PoisonedError } from './errors'

export type LimitFunction = <T>(fn: () => Promise<T>) => Promise<T>

export function pLimit(concurrency: number): LimitFunction {
  if (concurrency < 1) throw new RangeError('concurrency must be at least 1')
  let active = 0
  const queue: Array<() => void> = []

  function next(): void {
    if (active >= concurrency) return
    const run = queue.shift()
    if (run) {
      active++
      run()
    }
  }

  return function limit<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      queue.push(() => {
        fn().then(resolve, reject).finally(() => {
          active--
          next()
        })
      })
      next()
    })
  }
}

/**
 * Exclusive access to a mutable value.
 * Callbacks run synchronously, so no other caller can observe the value
 * mid-update. A callback that throws leaves the value possibly half
 * updated: the guard is poisoned and every later access throws PoisonedError.
 */
export class Guarded<T> {
  private readonly value: T
  private readonly resource: string
  private poisonCause: unknown = undefined
  private poisoned = false

  constructor(resource: string, value: T) {
    this.resource = resource
    this.value = value
  }

  get isPoisoned(): boolean {
    return this.poisoned
  }

  with<R>(fn: (value: T) => R): R {
    if (this.poisoned) throw new PoisonedError(this.resource, this.poisonCause)
    try {
      return fn(this.value)
    } catch (err) {
      this.poisoned = true
      this.poisonCause = err
      throw err
    }
  }
}
