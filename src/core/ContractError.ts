import { CustomError, Err } from '../utils/CustomError';

export type ContractErrorDetail =
  | Err<'DecodeError'>
  | Err<'HandlerError'>
  | Err<'NotImplemented'>
  | Err<'QuerierError'>;

/**
 * The single recoverable error of a contract call. Whatever went wrong (malformed payload,
 * handler failure, missing entry point) - the caller gets this type and its message.
 */
export class ContractError extends CustomError<ContractErrorDetail> {
  constructor(detail: ContractErrorDetail, message?: string, originalError?: unknown) {
    super(detail, message, originalError);
    this.name = 'ContractError';
  }

  static from(error: unknown): ContractError {
    if (error instanceof ContractError) {
      return error;
    }
    return new ContractError({ type: 'HandlerError' }, errorMessage(error), error);
  }
}

/**
 * Thrown when a value breaks a structural guarantee of the message model
 * (e.g. a baseline message carrying the custom variant). Never turned into a {@link ContractResult}.
 */
export class InvariantViolationError extends CustomError<Err<'InvariantViolation'>> {
  constructor(message: string) {
    super({ type: 'InvariantViolation' }, message);
    this.name = 'InvariantViolationError';
  }
}

export type ContractResult<T> =
  | { type: 'ok'; result: T }
  | { type: 'error'; error: ContractError; errorMessage: string };

// eslint-disable-next-line @typescript-eslint/no-redeclare
export const ContractResult = {
  ok<T>(result: T): ContractResult<T> {
    return { type: 'ok', result };
  },

  error<T>(error: ContractError): ContractResult<T> {
    return { type: 'error', error, errorMessage: error.message };
  },

  map<T, U>(result: ContractResult<T>, fn: (value: T) => U): ContractResult<U> {
    return result.type === 'ok' ? ContractResult.ok(fn(result.result)) : result;
  },

  unwrap<T>(result: ContractResult<T>): T {
    if (result.type === 'error') {
      throw result.error;
    }
    return result.result;
  }
};

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}
