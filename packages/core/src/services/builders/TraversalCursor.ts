/**
 * Read position over a traversal sequence.
 *
 * `take()` is the only way to read: it returns the value under the cursor and
 * moves past it, or `undefined` once the sequence is exhausted. A forward
 * cursor starts at the first value, a backward cursor at the last.
 */
export class TraversalCursor<T> {
  private position: number;
  private taken = 0;

  constructor(
    private readonly values: readonly T[],
    private readonly direction: 'forward' | 'backward' = 'forward'
  ) {
    this.position = direction === 'forward' ? 0 : values.length - 1;
  }

  get consumed(): number {
    return this.taken;
  }

  get exhausted(): boolean {
    return this.position < 0 || this.position >= this.values.length;
  }

  take(): T | undefined {
    if (this.exhausted) return undefined;

    const value = this.values[this.position];
    this.position += this.direction === 'forward' ? 1 : -1;
    this.taken++;
    return value;
  }
}
