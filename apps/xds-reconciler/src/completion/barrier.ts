import { CancelledError } from '../errors.js'

/** One registered acknowledgment. Only its first `resolve` counts. */
export interface Completion {
  resolve(err?: Error): void
  readonly settled: boolean
}

/**
 * Waits for a known set of asynchronous acknowledgments.
 *
 * Each `register()` adds one pending completion. `wait()` settles once every
 * completion resolved without error, as soon as any completion fails (first
 * failure wins), or when the governing signal aborts. A barrier with nothing
 * registered resolves at once.
 */
export class CompletionBarrier {
  private pending = 0
  private failure: Error | undefined
  private readonly waiters: { resolve: () => void; reject: (err: Error) => void }[] = []

  constructor(
    private readonly signal: AbortSignal,
    readonly label: string
  ) {
    signal.addEventListener('abort', () => this.flush(), { once: true })
  }

  get pendingCount(): number {
    return this.pending
  }

  register(): Completion {
    this.pending++
    let settled = false
    return {
      resolve: (err) => {
        if (settled) return
        settled = true
        this.pending--
        if (err && !this.failure) this.failure = err
        this.flush()
      },
      get settled() {
        return settled
      },
    }
  }

  wait(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject })
      this.flush()
    })
  }

  private outcome(): { done: false } | { done: true; err?: Error } {
    if (this.failure) return { done: true, err: this.failure }
    if (this.pending === 0) return { done: true }
    if (this.signal.aborted) {
      const reason: unknown = this.signal.reason
      return { done: true, err: reason instanceof Error ? reason : new CancelledError() }
    }
    return { done: false }
  }

  private flush(): void {
    const outcome = this.outcome()
    if (!outcome.done) return
    for (const waiter of this.waiters.splice(0)) {
      if (outcome.err) waiter.reject(outcome.err)
      else waiter.resolve()
    }
  }
}
