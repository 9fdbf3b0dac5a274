/**
 * Releases completed results strictly in index order. `complete` inserts and
 * drains in one synchronous step, so completions from concurrent workers can
 * never interleave inside it.
 */
export class ReorderBuffer<T> {
  private next = 0;
  private readonly pending = new Map<number, { value: T }>();

  constructor(private readonly emit: (value: T, index: number) => void) {}

  /** Index of the next result to be emitted. */
  get nextIndex(): number {
    return this.next;
  }

  /** Results completed but waiting on a lower index. */
  get held(): number {
    return this.pending.size;
  }

  complete(index: number, value: T): void {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Invalid result index: ${index}`);
    }
    if (index < this.next || this.pending.has(index)) {
      throw new Error(`Result ${index} was already completed`);
    }

    this.pending.set(index, { value });

    let entry = this.pending.get(this.next);
    while (entry !== undefined) {
      this.pending.delete(this.next);
      this.emit(entry.value, this.next);
      this.next++;
      entry = this.pending.get(this.next);
    }
  }
}
