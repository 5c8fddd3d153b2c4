import { ContractResult } from '../core/ContractError';
import { Deps, DepsMut } from '../core/deps/Deps';
import { ContractResponse } from '../core/messages/ContractResponse';
import { Reply } from '../core/messages/Reply';
import { Binary, Env, MessageInfo, NoExtension } from '../core/types';

export enum EntryPointKind {
  Instantiate = 'instantiate',
  Execute = 'execute',
  Query = 'query',
  Sudo = 'sudo',
  Reply = 'reply',
  Migrate = 'migrate'
}

// entry points called by an account - with sender identity and funds
export type ContractKind = EntryPointKind.Instantiate | EntryPointKind.Execute;

// entry points called by the chain itself
export type PermissionedKind = EntryPointKind.Sudo | EntryPointKind.Migrate;

/**
 * `instantiate` or `execute` handler.
 * Logic failures are reported by throwing.
 */
export type ContractFn<Msg, Q = NoExtension, C = NoExtension> = (
  deps: DepsMut<Q>,
  env: Env,
  info: MessageInfo,
  msg: Msg
) => ContractResponse<C>;

/**
 * `sudo` or `migrate` handler.
 */
export type PermissionedFn<Msg, Q = NoExtension, C = NoExtension> = (
  deps: DepsMut<Q>,
  env: Env,
  msg: Msg
) => ContractResponse<C>;

export type ReplyFn<Q = NoExtension, C = NoExtension> = (
  deps: DepsMut<Q>,
  env: Env,
  reply: Reply
) => ContractResponse<C>;

export type QueryFn<Msg, Q = NoExtension> = (deps: Deps<Q>, env: Env, msg: Msg) => Binary;

/**
 * A handler bound to exactly one entry point kind - the uniform calling convention
 * every contract handler is normalized into.
 */
export interface EntryPoint<K extends EntryPointKind, Args extends unknown[], R> {
  readonly kind: K;

  // set on the fallback installed for a missing optional entry point, kept through casting
  readonly isDefault?: boolean;

  call(...args: Args): ContractResult<R>;
}

export type ContractEntryPoint<K extends ContractKind, Q = NoExtension, C = NoExtension> = EntryPoint<
  K,
  [deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Binary],
  ContractResponse<C>
>;

export type InstantiateEntryPoint<Q = NoExtension, C = NoExtension> = ContractEntryPoint<
  EntryPointKind.Instantiate,
  Q,
  C
>;

export type ExecuteEntryPoint<Q = NoExtension, C = NoExtension> = ContractEntryPoint<EntryPointKind.Execute, Q, C>;

export type PermissionedEntryPoint<K extends PermissionedKind, Q = NoExtension, C = NoExtension> = EntryPoint<
  K,
  [deps: DepsMut<Q>, env: Env, msg: Binary],
  ContractResponse<C>
>;

export type SudoEntryPoint<Q = NoExtension, C = NoExtension> = PermissionedEntryPoint<EntryPointKind.Sudo, Q, C>;

export type MigrateEntryPoint<Q = NoExtension, C = NoExtension> = PermissionedEntryPoint<EntryPointKind.Migrate, Q, C>;

export type ReplyEntryPoint<Q = NoExtension, C = NoExtension> = EntryPoint<
  EntryPointKind.Reply,
  [deps: DepsMut<Q>, env: Env, reply: Reply],
  ContractResponse<C>
>;

export type QueryEntryPoint<Q = NoExtension> = EntryPoint<
  EntryPointKind.Query,
  [deps: Deps<Q>, env: Env, msg: Binary],
  Binary
>;
