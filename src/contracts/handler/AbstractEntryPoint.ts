import { fromBinary } from '../../core/Binary';
import { ContractError, ContractResult, errorMessage, InvariantViolationError } from '../../core/ContractError';
import { Decoder } from '../../core/Decoder';
import { Binary } from '../../core/types';
import { LoggerFactory } from '../../logging/LoggerFactory';
import { EntryPoint, EntryPointKind } from '../EntryPoint';

export abstract class AbstractEntryPoint<K extends EntryPointKind, Args extends unknown[], R>
  implements EntryPoint<K, Args, R>
{
  protected logger = LoggerFactory.INST.create('EntryPoint');

  protected constructor(readonly kind: K) {}

  abstract call(...args: Args): ContractResult<R>;

  /**
   * Parses the raw payload and shapes it with the decoder.
   * Both malformed JSON and a payload of the wrong shape end up as a {@link ContractError}.
   */
  protected decode<Msg>(decoder: Decoder<Msg>, payload: Binary): ContractResult<Msg> {
    try {
      return ContractResult.ok(decoder.parse(fromBinary(payload)));
    } catch (e) {
      this.logger.debug(`Failed to decode ${this.kind} message`, errorMessage(e));
      return ContractResult.error(
        new ContractError({ type: 'DecodeError' }, `Error parsing ${this.kind} message: ${errorMessage(e)}`, e)
      );
    }
  }

  /**
   * Runs the handler logic - whatever it throws becomes a {@link ContractError},
   * except for invariant violations, which are fatal.
   */
  protected run(logic: () => R): ContractResult<R> {
    try {
      return ContractResult.ok(logic());
    } catch (e) {
      if (e instanceof InvariantViolationError) {
        this.logger.fatal(`Invariant violated in ${this.kind}`, e.message);
        throw e;
      }
      this.logger.debug(`Error from ${this.kind} handler`, errorMessage(e));
      return ContractResult.error(ContractError.from(e));
    }
  }

  protected decodeAndRun<Msg>(decoder: Decoder<Msg>, payload: Binary, logic: (msg: Msg) => R): ContractResult<R> {
    const decoded = this.decode(decoder, payload);
    if (decoded.type === 'error') {
      return decoded;
    }
    return this.run(() => logic(decoded.result));
  }
}
