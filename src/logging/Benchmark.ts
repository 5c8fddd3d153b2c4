/**
 * Wall-clock time of a dispatched call, for trace logs.
 */
export class Benchmark {
  private readonly start = Date.now();

  private constructor() {
    // created through measure()
  }

  static measure(): Benchmark {
    return new Benchmark();
  }

  elapsedMs(): number {
    return Date.now() - this.start;
  }

  elapsed(): string {
    return `${this.elapsedMs()}ms`;
  }
}
