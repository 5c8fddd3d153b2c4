import { ContractError, ContractResult } from '../../core/ContractError';
import { EntryPointKind } from '../EntryPoint';
import { AbstractEntryPoint } from './AbstractEntryPoint';

/**
 * Installed for an optional entry point the contract does not provide - every call fails.
 * Never produces a value, so it fits the calling shape of any kind.
 */
export class NotImplementedEntryPoint<K extends EntryPointKind> extends AbstractEntryPoint<K, unknown[], never> {
  readonly isDefault = true;

  constructor(kind: K, private readonly diagnostic: string) {
    super(kind);
  }

  call(): ContractResult<never> {
    return ContractResult.error(new ContractError({ type: 'NotImplemented' }, this.diagnostic));
  }
}
