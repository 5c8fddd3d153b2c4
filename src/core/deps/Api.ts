import { Addr } from '../types';

/**
 * Host-provided helpers available to every entry point.
 */
export interface Api {
  addrValidate(human: string): Addr;

  addrCanonicalize(human: string): Uint8Array;

  addrHumanize(canonical: Uint8Array): Addr;

  debug(message: string): void;
}
