/**
 * Single-resolution promise handle
 *
 * The first resolve() or reject() wins; later calls are ignored and report
 * false.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private resolver: (value: T) => void = () => undefined;
  private rejecter: (reason: unknown) => void = () => undefined;
  private state: 'pending' | 'resolved' | 'rejected' = 'pending';

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolver = resolve;
      this.rejecter = reject;
    });
  }

  get settled(): boolean {
    return this.state !== 'pending';
  }

  resolve(value: T): boolean {
    if (this.state !== 'pending') return false;
    this.state = 'resolved';
    this.resolver(value);
    return true;
  }

  reject(reason: unknown): boolean {
    if (this.state !== 'pending') return false;
    this.state = 'rejected';
    this.rejecter(reason);
    return true;
  }
}
