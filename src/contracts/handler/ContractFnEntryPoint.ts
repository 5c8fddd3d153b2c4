import { ContractResult } from '../../core/ContractError';
import { Decoder } from '../../core/Decoder';
import { DepsMut } from '../../core/deps/Deps';
import { ContractResponse } from '../../core/messages/ContractResponse';
import { Binary, Env, MessageInfo } from '../../core/types';
import { ContractFn, ContractKind } from '../EntryPoint';
import { AbstractEntryPoint } from './AbstractEntryPoint';

/**
 * `instantiate` or `execute` - the handler gets the sender identity along with the decoded message.
 */
export class ContractFnEntryPoint<K extends ContractKind, Msg, Q, C> extends AbstractEntryPoint<
  K,
  [deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Binary],
  ContractResponse<C>
> {
  constructor(kind: K, private readonly decoder: Decoder<Msg>, private readonly fn: ContractFn<Msg, Q, C>) {
    super(kind);
  }

  call(deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Binary): ContractResult<ContractResponse<C>> {
    return this.decodeAndRun(this.decoder, msg, (decoded) => this.fn(deps, env, info, decoded));
  }
}
