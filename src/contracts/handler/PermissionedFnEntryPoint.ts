import { ContractResult } from '../../core/ContractError';
import { Decoder } from '../../core/Decoder';
import { DepsMut } from '../../core/deps/Deps';
import { ContractResponse } from '../../core/messages/ContractResponse';
import { Binary, Env } from '../../core/types';
import { PermissionedFn, PermissionedKind } from '../EntryPoint';
import { AbstractEntryPoint } from './AbstractEntryPoint';

/**
 * `sudo` or `migrate` - privileged calls, no sender identity.
 */
export class PermissionedFnEntryPoint<K extends PermissionedKind, Msg, Q, C> extends AbstractEntryPoint<
  K,
  [deps: DepsMut<Q>, env: Env, msg: Binary],
  ContractResponse<C>
> {
  constructor(kind: K, private readonly decoder: Decoder<Msg>, private readonly fn: PermissionedFn<Msg, Q, C>) {
    super(kind);
  }

  call(deps: DepsMut<Q>, env: Env, msg: Binary): ContractResult<ContractResponse<C>> {
    return this.decodeAndRun(this.decoder, msg, (decoded) => this.fn(deps, env, decoded));
  }
}
