import { ContractResult } from '../core/ContractError';
import { Deps, DepsMut } from '../core/deps/Deps';
import { ContractResponse } from '../core/messages/ContractResponse';
import { Reply } from '../core/messages/Reply';
import { Binary, Env, MessageInfo, NoExtension } from '../core/types';

/**
 * The uniform interface the host engine calls a contract through.
 * Payloads arrive encoded, failures come back as an error {@link ContractResult}.
 *
 * * `Q` - a chain-specific query type
 * * `C` - a chain-specific message type
 */
export interface Contract<Q = NoExtension, C = NoExtension> {
  execute(deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Binary): ContractResult<ContractResponse<C>>;

  instantiate(deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Binary): ContractResult<ContractResponse<C>>;

  query(deps: Deps<Q>, env: Env, msg: Binary): ContractResult<Binary>;

  sudo(deps: DepsMut<Q>, env: Env, msg: Binary): ContractResult<ContractResponse<C>>;

  reply(deps: DepsMut<Q>, env: Env, reply: Reply): ContractResult<ContractResponse<C>>;

  migrate(deps: DepsMut<Q>, env: Env, msg: Binary): ContractResult<ContractResponse<C>>;
}
