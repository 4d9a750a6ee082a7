/**
 * FIFO admission for QR renders. At most `concurrency` jobs are in flight;
 * the rest wait in arrival order. The encoding itself happens on
 * WorkerQrRenderer's threads, sized to the same limit.
 */
export class RenderPool {
  private running = 0
  private readonly waiting: Array<() => void> = []

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Render concurrency must be a positive integer, got ${concurrency}`)
    }
  }

  get active(): number {
    return this.running
  }

  get pending(): number {
    return this.waiting.length
  }

  async run<T>(job: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await job()
    } finally {
      this.release()
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.concurrency) {
      this.running++
      return Promise.resolve()
    }
    return new Promise(resolve => {
      this.waiting.push(resolve)
    })
  }

  // Hands the slot straight to the next waiter, so `running` stays put
  private release(): void {
    const next = this.waiting.shift()
    if (next) {
      next()
    } else {
      this.running--
    }
  }
}
