import { Api } from '../core/deps/Api';
import { Addr } from '../core/types';
import { LoggerFactory } from '../logging/LoggerFactory';

const MIN_ADDRESS_LENGTH = 3;

/**
 * Address handling without any bech32 - a canonical address is the UTF-8 encoding of the human one.
 */
export class MockApi implements Api {
  private readonly logger = LoggerFactory.INST.create('MockApi');

  addrValidate(human: string): Addr {
    if (human.length < MIN_ADDRESS_LENGTH) {
      throw new Error(
        `Invalid input: human address too short for this mock implementation (must be >= ${MIN_ADDRESS_LENGTH}).`
      );
    }
    if (human !== human.toLowerCase()) {
      throw new Error('Invalid input: address not normalized');
    }
    return human;
  }

  addrCanonicalize(human: string): Uint8Array {
    return Buffer.from(this.addrValidate(human), 'utf8');
  }

  addrHumanize(canonical: Uint8Array): Addr {
    return this.addrValidate(Buffer.from(canonical).toString('utf8'));
  }

  debug(message: string): void {
    this.logger.debug(message);
  }
}
