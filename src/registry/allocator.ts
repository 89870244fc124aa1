/**
 * Hands out contiguous blocks of mutation ids.
 *
 * Ids start at 1 so that 0 never names a mutation. `reserve` is a single
 * fetch-and-add: blocks never overlap and leave no gaps.
 */
export class IdAllocator {
  private next: number;

  constructor(start = 1) {
    if (!Number.isSafeInteger(start) || start < 1) {
      throw new RangeError(`Id allocator must start at a positive integer, got ${start}`);
    }
    this.next = start;
  }

  reserve(count: number): number {
    if (!Number.isSafeInteger(count) || count < 1) {
      throw new RangeError(`Cannot reserve ${count} ids`);
    }
    const base = this.next;
    this.next += count;
    return base;
  }

  /** The id the next reservation will start at. */
  peek(): number {
    return this.next;
  }
}
