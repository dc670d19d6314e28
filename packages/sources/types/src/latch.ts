type Waiter = { resolve: () => void; reject: (e: unknown) => void }

/**
 * One-shot readiness flag with abortable waiters; the usual backing for
 * `ValueSource.waitUntilReady`.
 */
export class ReadinessLatch {
  private ready = false
  private waiters = new Set<Waiter>()

  get isSet(): boolean {
    return this.ready
  }

  set(): void {
    if (this.ready) return
    this.ready = true
    for (const w of this.waiters) w.resolve()
    this.waiters.clear()
  }

  wait(signal?: AbortSignal): Promise<void> {
    if (this.ready) return Promise.resolve()
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.waiters.delete(waiter)
        reject(signal?.reason ?? new Error('aborted'))
      }
      const waiter: Waiter = {
        resolve: () => {
          signal?.removeEventListener('abort', onAbort)
          resolve()
        },
        reject,
      }
      if (signal?.aborted) {
        onAbort()
        return
      }
      this.waiters.add(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }
}
