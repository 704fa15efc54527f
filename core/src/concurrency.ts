/**
 * Synchronization helpers for the scanner.
 *
 * Scanner operations are synchronous, so a call holds the guard from entry to
 * return and no other event can interleave with it. The guard is reentrant:
 * a scanner operation may call another one while holding it. Promises handed
 * out by the scanner are settled while the guard is held but never awaited
 * inside it.
 */

import { ContractViolationError } from './errors.js'

export class ScannerLock {
  private depth = 0

  constructor(readonly name: string) {}

  get isHeld(): boolean {
    return this.depth > 0
  }

  get holdCount(): number {
    return this.depth
  }

  runExclusive<T>(fn: () => T): T {
    this.depth++
    try {
      const result = fn()
      if (result instanceof Promise) {
        throw new ContractViolationError(`Lock ${this.name} cannot be held across an await`)
      }
      return result
    } finally {
      this.depth--
    }
  }
}

/**
 * A promise that is settled exactly once from the outside.
 */
export class Deferred<T> {
  private resolveFn: (value: T) => void = () => {}
  private rejectFn: (reason: Error) => void = () => {}
  private settled = false

  readonly promise: Promise<T> = new Promise<T>((resolve, reject) => {
    this.resolveFn = resolve
    this.rejectFn = reject
  })

  get isSettled(): boolean {
    return this.settled
  }

  resolve(value: T): void {
    this.markSettled()
    this.resolveFn(value)
  }

  reject(reason: Error): void {
    this.markSettled()
    this.rejectFn(reason)
  }

  private markSettled(): void {
    if (this.settled) {
      throw new ContractViolationError('Deferred result is already settled')
    }
    this.settled = true
  }
}
