import { ContractResult } from '../../core/ContractError';
import { DepsMut } from '../../core/deps/Deps';
import { ContractResponse } from '../../core/messages/ContractResponse';
import { Reply } from '../../core/messages/Reply';
import { Env } from '../../core/types';
import { EntryPointKind, ReplyFn } from '../EntryPoint';
import { AbstractEntryPoint } from './AbstractEntryPoint';

/**
 * `reply` - gets the structured sub-message outcome, nothing to decode.
 */
export class ReplyFnEntryPoint<Q, C> extends AbstractEntryPoint<
  EntryPointKind.Reply,
  [deps: DepsMut<Q>, env: Env, reply: Reply],
  ContractResponse<C>
> {
  constructor(private readonly fn: ReplyFn<Q, C>) {
    super(EntryPointKind.Reply);
  }

  call(deps: DepsMut<Q>, env: Env, reply: Reply): ContractResult<ContractResponse<C>> {
    return this.run(() => this.fn(deps, env, reply));
  }
}
