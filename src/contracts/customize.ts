import { toJsonString } from '../core/Binary';
import { InvariantViolationError } from '../core/ContractError';
import { Deps, DepsMut } from '../core/deps/Deps';
import { QuerierWrapper } from '../core/deps/Querier';
import { ContractResponse } from '../core/messages/ContractResponse';
import { CosmosMsg } from '../core/messages/CosmosMsg';
import { SubMsg } from '../core/messages/SubMsg';
import { NoExtension } from '../core/types';
import { resolveOptions, WrapperOptions } from '../core/WrapperOptions';

/**
 * Any `DepsMut<Q>` can be made into `DepsMut<NoExtension>` - same storage and api,
 * the querier is re-typed over the very same raw querier.
 * Only narrowing towards `NoExtension` is provided.
 */
export function customizeDepsMut<Q>(deps: DepsMut<Q>): DepsMut<NoExtension> {
  return {
    storage: deps.storage,
    api: deps.api,
    querier: new QuerierWrapper<NoExtension>(deps.querier.querier)
  };
}

/**
 * Any `Deps<Q>` can be made into `Deps<NoExtension>`.
 */
export function customizeDeps<Q>(deps: Deps<Q>): Deps<NoExtension> {
  return {
    storage: deps.storage,
    api: deps.api,
    querier: new QuerierWrapper<NoExtension>(deps.querier.querier)
  };
}

function customizeMsg<C>(subMsg: SubMsg<NoExtension>, stargate: boolean): CosmosMsg<C> {
  const { msg } = subMsg;
  if (typeof msg !== 'object' || msg === null) {
    throw new InvariantViolationError(`unknown message variant ${toJsonString(subMsg)}`);
  }
  if ('wasm' in msg) {
    return { wasm: msg.wasm };
  }
  if ('bank' in msg) {
    return { bank: msg.bank };
  }
  if ('staking' in msg) {
    return { staking: msg.staking };
  }
  if ('distribution' in msg) {
    return { distribution: msg.distribution };
  }
  if ('custom' in msg) {
    throw new InvariantViolationError('custom message variant cannot be built without an extension');
  }
  if (stargate) {
    if ('ibc' in msg) {
      return { ibc: msg.ibc };
    }
    if ('stargate' in msg) {
      return { stargate: msg.stargate };
    }
  }
  throw new InvariantViolationError(`unknown message variant ${toJsonString(subMsg)}`);
}

/**
 * `SubMsg<NoExtension>` can be made into any `SubMsg<C>`. Only the message changes its type,
 * id, reply policy and gas limit are carried over.
 */
export function customizeSubMsg<C>(subMsg: SubMsg<NoExtension>, options?: Partial<WrapperOptions>): SubMsg<C> {
  const { stargate } = resolveOptions(options);
  const customized: SubMsg<C> = {
    id: subMsg.id,
    msg: customizeMsg<C>(subMsg, stargate),
    replyOn: subMsg.replyOn
  };
  if (subMsg.gasLimit !== undefined) {
    customized.gasLimit = subMsg.gasLimit;
  }
  return customized;
}

/**
 * `ContractResponse<NoExtension>` can be made into any `ContractResponse<C>`.
 */
export function customizeResponse<C>(
  response: ContractResponse<NoExtension>,
  options?: Partial<WrapperOptions>
): ContractResponse<C> {
  const resolved = resolveOptions(options);
  const customized = new ContractResponse<C>()
    .addSubmessages(response.messages.map((subMsg) => customizeSubMsg<C>(subMsg, resolved)))
    .addEvents(response.events)
    .addAttributes(response.attributes);
  if (response.data !== undefined) {
    customized.setData(response.data);
  }
  return customized;
}
