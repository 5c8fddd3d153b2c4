import { ContractResult } from '../core/ContractError';
import { NoExtension } from '../core/types';
import { WrapperOptions } from '../core/WrapperOptions';
import { customizeDeps, customizeDepsMut, customizeResponse } from './customize';
import {
  ContractEntryPoint,
  ContractKind,
  EntryPointKind,
  PermissionedEntryPoint,
  PermissionedKind,
  QueryEntryPoint,
  ReplyEntryPoint
} from './EntryPoint';

/*
 * Entry points authored against the baseline extension types can be bound against any
 * concrete pair of extension types: the request context is narrowed before the call
 * ("query" casting), the produced response is widened after it ("message" casting).
 * The entry point kind and the default marker are preserved.
 */

export function castContractFnQuery<K extends ContractKind, NewQ, C>(
  entry: ContractEntryPoint<K, NoExtension, C>
): ContractEntryPoint<K, NewQ, C> {
  return {
    kind: entry.kind,
    isDefault: entry.isDefault,
    call: (deps, env, info, msg) => entry.call(customizeDepsMut(deps), env, info, msg)
  };
}

export function castContractFnMessage<K extends ContractKind, Q, NewC>(
  entry: ContractEntryPoint<K, Q, NoExtension>,
  options?: Partial<WrapperOptions>
): ContractEntryPoint<K, Q, NewC> {
  return {
    kind: entry.kind,
    isDefault: entry.isDefault,
    call: (deps, env, info, msg) =>
      ContractResult.map(entry.call(deps, env, info, msg), (response) => customizeResponse<NewC>(response, options))
  };
}

export function castContractFn<K extends ContractKind, NewQ, NewC>(
  entry: ContractEntryPoint<K, NoExtension, NoExtension>,
  options?: Partial<WrapperOptions>
): ContractEntryPoint<K, NewQ, NewC> {
  return castContractFnQuery<K, NewQ, NewC>(castContractFnMessage<K, NoExtension, NewC>(entry, options));
}

export function castPermissionedFnQuery<K extends PermissionedKind, NewQ, C>(
  entry: PermissionedEntryPoint<K, NoExtension, C>
): PermissionedEntryPoint<K, NewQ, C> {
  return {
    kind: entry.kind,
    isDefault: entry.isDefault,
    call: (deps, env, msg) => entry.call(customizeDepsMut(deps), env, msg)
  };
}

export function castPermissionedFnMessage<K extends PermissionedKind, Q, NewC>(
  entry: PermissionedEntryPoint<K, Q, NoExtension>,
  options?: Partial<WrapperOptions>
): PermissionedEntryPoint<K, Q, NewC> {
  return {
    kind: entry.kind,
    isDefault: entry.isDefault,
    call: (deps, env, msg) =>
      ContractResult.map(entry.call(deps, env, msg), (response) => customizeResponse<NewC>(response, options))
  };
}

export function castPermissionedFn<K extends PermissionedKind, NewQ, NewC>(
  entry: PermissionedEntryPoint<K, NoExtension, NoExtension>,
  options?: Partial<WrapperOptions>
): PermissionedEntryPoint<K, NewQ, NewC> {
  return castPermissionedFnQuery<K, NewQ, NewC>(castPermissionedFnMessage<K, NoExtension, NewC>(entry, options));
}

export function castReplyFnQuery<NewQ, C>(entry: ReplyEntryPoint<NoExtension, C>): ReplyEntryPoint<NewQ, C> {
  return {
    kind: EntryPointKind.Reply,
    isDefault: entry.isDefault,
    call: (deps, env, reply) => entry.call(customizeDepsMut(deps), env, reply)
  };
}

export function castReplyFnMessage<Q, NewC>(
  entry: ReplyEntryPoint<Q, NoExtension>,
  options?: Partial<WrapperOptions>
): ReplyEntryPoint<Q, NewC> {
  return {
    kind: EntryPointKind.Reply,
    isDefault: entry.isDefault,
    call: (deps, env, reply) =>
      ContractResult.map(entry.call(deps, env, reply), (response) => customizeResponse<NewC>(response, options))
  };
}

export function castReplyFn<NewQ, NewC>(
  entry: ReplyEntryPoint<NoExtension, NoExtension>,
  options?: Partial<WrapperOptions>
): ReplyEntryPoint<NewQ, NewC> {
  return castReplyFnQuery<NewQ, NewC>(castReplyFnMessage<NoExtension, NewC>(entry, options));
}

/**
 * Queries produce no response to widen - narrowing the context is all there is.
 */
export function castQueryFn<NewQ>(entry: QueryEntryPoint<NoExtension>): QueryEntryPoint<NewQ> {
  return {
    kind: EntryPointKind.Query,
    isDefault: entry.isDefault,
    call: (deps, env, msg) => entry.call(customizeDeps(deps), env, msg)
  };
}
