/**
 * A mutable cell holding an immutable value
 *
 * Every update goes through swap(), which applies a pure function to the
 * current value and stores the result in one step.
 */
export class Atom<T> {
  constructor(private value: T) {}

  get(): T {
    return this.value;
  }

  /**
   * Replace the value with `update(value)`
   *
   * @returns The values before and after the update
   */
  swap(update: (value: T) => T): { before: T; after: T } {
    const before = this.value;
    const after = update(before);
    this.value = after;
    return { before, after };
  }
}
