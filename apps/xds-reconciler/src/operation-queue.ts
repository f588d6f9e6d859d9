/**
 * Runs queued operations one at a time, in submission order. A failing
 * operation rejects only its own promise.
 */
export class OperationQueue {
  private queue: Array<{ run: () => Promise<void>; reject: (error: unknown) => void }> = []
  private processing = false

  get size(): number {
    return this.queue.length + (this.processing ? 1 : 0)
  }

  enqueue<T>(operation: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({ run: async () => resolve(await operation()), reject })
      if (!this.processing) void this.processNext()
    })
  }

  private async processNext(): Promise<void> {
    this.processing = true
    let next = this.queue.shift()
    while (next) {
      try {
        await next.run()
      } catch (e) {
        next.reject(e)
      }
      next = this.queue.shift()
    }
    this.processing = false
  }
}
