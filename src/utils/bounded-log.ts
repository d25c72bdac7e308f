/**
 * Append-only log with a fixed capacity. Appending past capacity evicts the
 * oldest entry. Entries are never mutated; `amendLast` swaps in a new record.
 */
export class BoundedLog<T> {
  private readonly capacity: number
  private entries: T[] = []

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  /**
   * @returns the evicted entry, if the log was full
   */
  append(entry: T): T | undefined {
    this.entries.push(entry)
    if (this.entries.length > this.capacity) {
      return this.entries.shift()
    }
    return undefined
  }

  /**
   * Replace the most recent entry with the record returned by `amend`.
   * Returning null leaves the log untouched.
   */
  amendLast(amend: (last: T) => T | null): T | null {
    const lastIndex = this.entries.length - 1
    if (lastIndex < 0) {
      return null
    }

    const replacement = amend(this.entries[lastIndex])
    if (replacement === null) {
      return null
    }

    this.entries = [...this.entries.slice(0, lastIndex), replacement]
    return replacement
  }

  last(): T | undefined {
    return this.entries[this.entries.length - 1]
  }

  toArray(): readonly T[] {
    return [...this.entries]
  }

  /**
   * Replace the contents, keeping only the newest `capacity` entries.
   */
  replaceAll(entries: readonly T[]): void {
    this.entries = entries.slice(-this.capacity)
  }

  clear(): void {
    this.entries = []
  }

  get size(): number {
    return this.entries.length
  }

  getCapacity(): number {
    return this.capacity
  }
}
