/**
 * A helper type to avoid having to type `{ type: "..." }` for every error detail types.
 */
export type Err<T extends string> = { type: T };

/**
 * The custom error type that every error originating from the library should extend.
 * The rendered message is the given message, or the detail type when none is given.
 */
export class CustomError<T extends { type: string }> extends Error {
  constructor(public detail: T, message?: string, public originalError?: unknown) {
    super(message ?? detail.type);
    this.name = 'CustomError';
    Error.captureStackTrace(this, CustomError);
  }

  /**
   * Messages of this error and every wrapped error below it, outermost first.
   */
  causeChain(): string[] {
    const chain = [this.message];
    let cause = this.originalError;
    while (cause !== undefined) {
      if (cause instanceof CustomError) {
        chain.push(cause.message);
        cause = cause.originalError;
      } else {
        chain.push(cause instanceof Error ? cause.message : String(cause));
        cause = undefined;
      }
    }
    return chain;
  }
}
