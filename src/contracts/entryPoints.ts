import { Decoder } from '../core/Decoder';
import { NoExtension } from '../core/types';
import {
  ContractFn,
  EntryPointKind,
  ExecuteEntryPoint,
  InstantiateEntryPoint,
  MigrateEntryPoint,
  PermissionedFn,
  QueryEntryPoint,
  QueryFn,
  ReplyEntryPoint,
  ReplyFn,
  SudoEntryPoint
} from './EntryPoint';
import { ContractFnEntryPoint } from './handler/ContractFnEntryPoint';
import { NotImplementedEntryPoint } from './handler/NotImplementedEntryPoint';
import { PermissionedFnEntryPoint } from './handler/PermissionedFnEntryPoint';
import { QueryFnEntryPoint } from './handler/QueryFnEntryPoint';
import { ReplyFnEntryPoint } from './handler/ReplyFnEntryPoint';

/**
 * Tagging wrappers - each binds a plain function or closure to exactly one entry point kind
 * and one message type (through its decoder), e.g.
 * ```typescript
 * const execute = entryPoint.execute(ExecuteMsgSchema, (deps, env, info, msg) => {
 *   return new ContractResponse().addAttribute('action', 'increment');
 * });
 * ```
 */
export const entryPoint = {
  instantiate<Msg, Q = NoExtension, C = NoExtension>(
    decoder: Decoder<Msg>,
    fn: ContractFn<Msg, Q, C>
  ): InstantiateEntryPoint<Q, C> {
    return new ContractFnEntryPoint(EntryPointKind.Instantiate, decoder, fn);
  },

  execute<Msg, Q = NoExtension, C = NoExtension>(
    decoder: Decoder<Msg>,
    fn: ContractFn<Msg, Q, C>
  ): ExecuteEntryPoint<Q, C> {
    return new ContractFnEntryPoint(EntryPointKind.Execute, decoder, fn);
  },

  query<Msg, Q = NoExtension>(decoder: Decoder<Msg>, fn: QueryFn<Msg, Q>): QueryEntryPoint<Q> {
    return new QueryFnEntryPoint(decoder, fn);
  },

  sudo<Msg, Q = NoExtension, C = NoExtension>(
    decoder: Decoder<Msg>,
    fn: PermissionedFn<Msg, Q, C>
  ): SudoEntryPoint<Q, C> {
    return new PermissionedFnEntryPoint(EntryPointKind.Sudo, decoder, fn);
  },

  migrate<Msg, Q = NoExtension, C = NoExtension>(
    decoder: Decoder<Msg>,
    fn: PermissionedFn<Msg, Q, C>
  ): MigrateEntryPoint<Q, C> {
    return new PermissionedFnEntryPoint(EntryPointKind.Migrate, decoder, fn);
  },

  reply<Q = NoExtension, C = NoExtension>(fn: ReplyFn<Q, C>): ReplyEntryPoint<Q, C> {
    return new ReplyFnEntryPoint(fn);
  }
};

/**
 * Default `sudo` entry point used when none is provided.
 */
export function defaultSudo<Q = NoExtension, C = NoExtension>(): SudoEntryPoint<Q, C> {
  return new NotImplementedEntryPoint(EntryPointKind.Sudo, 'Sudo not implemented on the contract');
}

/**
 * Default `reply` entry point used when none is provided.
 */
export function defaultReply<Q = NoExtension, C = NoExtension>(): ReplyEntryPoint<Q, C> {
  return new NotImplementedEntryPoint(EntryPointKind.Reply, 'Reply not implemented on the contract');
}

/**
 * Default `migrate` entry point used when none is provided.
 */
export function defaultMigrate<Q = NoExtension, C = NoExtension>(): MigrateEntryPoint<Q, C> {
  return new NotImplementedEntryPoint(EntryPointKind.Migrate, 'Migrate not implemented on the contract');
}

export function isDefaultEntryPoint(entry: { readonly isDefault?: boolean }): boolean {
  return entry.isDefault === true;
}
