export interface Lease<T> {
  index: number
  item: T
}

/**
 * BatchPool
 * Fixed arena of items plus a FIFO queue of free indices. An item is either parked here
 * or leased out; whoever holds the lease hands the index back with release().
 */
export class BatchPool<T> {
  private readonly items: readonly T[]
  private readonly free: number[] = []
  private readonly parked: boolean[]

  constructor(items: readonly T[]) {
    this.items = [...items]
    this.parked = this.items.map(() => true)
    this.items.forEach((_, i) => this.free.push(i))
  }

  get capacity(): number {
    return this.items.length
  }

  get idle(): number {
    return this.free.length
  }

  get(index: number): T {
    this.checkIndex(index)
    return this.items[index]
  }

  /** Leases up to `max` parked items without waiting. */
  drain(max: number): Lease<T>[] {
    const out: Lease<T>[] = []
    while (out.length < max) {
      const index = this.free.shift()
      if (index === undefined) break
      this.parked[index] = false
      out.push({ index, item: this.items[index] })
    }
    return out
  }

  release(index: number): void {
    this.checkIndex(index)
    if (this.parked[index]) throw new Error(`batch ${index} released twice`)
    this.parked[index] = true
    this.free.push(index)
  }

  private checkIndex(index: number) {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new RangeError(`batch index ${index} out of range 0..${this.items.length - 1}`)
    }
  }
}
