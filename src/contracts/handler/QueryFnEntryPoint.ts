import { ContractResult } from '../../core/ContractError';
import { Decoder } from '../../core/Decoder';
import { Deps } from '../../core/deps/Deps';
import { Binary, Env } from '../../core/types';
import { EntryPointKind, QueryFn } from '../EntryPoint';
import { AbstractEntryPoint } from './AbstractEntryPoint';

export class QueryFnEntryPoint<Msg, Q> extends AbstractEntryPoint<
  EntryPointKind.Query,
  [deps: Deps<Q>, env: Env, msg: Binary],
  Binary
> {
  constructor(private readonly decoder: Decoder<Msg>, private readonly fn: QueryFn<Msg, Q>) {
    super(EntryPointKind.Query);
  }

  call(deps: Deps<Q>, env: Env, msg: Binary): ContractResult<Binary> {
    return this.decodeAndRun(this.decoder, msg, (decoded) => this.fn(deps, env, decoded));
  }
}
