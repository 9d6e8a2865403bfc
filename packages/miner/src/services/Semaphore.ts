/**
 * Semaphore
 * Counting permit pool; waiters are served in arrival order.
 */
export class Semaphore {
  private available: number
  private readonly waiters: (() => void)[] = []

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) throw new RangeError('semaphore needs at least one permit')
    this.available = permits
  }

  get permits(): number {
    return this.available
  }

  /** Resolves with a release function; calling it more than once has no effect. */
  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--
    } else {
      await new Promise<void>(resolve => this.waiters.push(resolve))
    }
    let released = false
    return () => {
      if (released) return
      released = true
      this.handOff()
    }
  }

  private handOff() {
    const next = this.waiters.shift()
    if (next) next()
    else this.available++
  }
}
