import { ContractResult } from '../core/ContractError';
import { Deps, DepsMut } from '../core/deps/Deps';
import { ContractResponse } from '../core/messages/ContractResponse';
import { Reply } from '../core/messages/Reply';
import { Binary, Env, MessageInfo, NoExtension } from '../core/types';
import { resolveOptions, WrapperOptions } from '../core/WrapperOptions';
import { Benchmark } from '../logging/Benchmark';
import { ContractLogger } from '../logging/ContractLogger';
import { LoggerFactory } from '../logging/LoggerFactory';
import { castContractFn, castPermissionedFn, castQueryFn, castReplyFn } from './casting';
import { Contract } from './Contract';
import {
  EntryPointKind,
  ExecuteEntryPoint,
  InstantiateEntryPoint,
  MigrateEntryPoint,
  QueryEntryPoint,
  ReplyEntryPoint,
  SudoEntryPoint
} from './EntryPoint';
import { defaultMigrate, defaultReply, defaultSudo, isDefaultEntryPoint } from './entryPoints';

/**
 * Exactly one entry point per kind.
 */
export interface EntryPointRegistry<Q, C> {
  [EntryPointKind.Instantiate]: InstantiateEntryPoint<Q, C>;
  [EntryPointKind.Execute]: ExecuteEntryPoint<Q, C>;
  [EntryPointKind.Query]: QueryEntryPoint<Q>;
  [EntryPointKind.Sudo]: SudoEntryPoint<Q, C>;
  [EntryPointKind.Reply]: ReplyEntryPoint<Q, C>;
  [EntryPointKind.Migrate]: MigrateEntryPoint<Q, C>;
}

/**
 * Aggregates the entry points of a single contract and exposes them through the {@link Contract} interface.
 * The `with*` methods return a new wrapper - an instance never changes after construction.
 *
 * @example
 * ```typescript
 * const contract = ContractWrapper.new(
 *   entryPoint.execute(ExecuteMsgSchema, execute),
 *   entryPoint.instantiate(InstantiateMsgSchema, instantiate),
 *   entryPoint.query(QueryMsgSchema, query)
 * ).withReply(entryPoint.reply(reply));
 * ```
 */
export class ContractWrapper<Q = NoExtension, C = NoExtension> implements Contract<Q, C> {
  private readonly logger: ContractLogger;

  private constructor(
    private readonly entryPoints: EntryPointRegistry<Q, C>,
    private readonly options: WrapperOptions
  ) {
    this.logger = LoggerFactory.INST.create(options.loggerName);
  }

  /**
   * Wrapper with the given mandatory entry points - `sudo`, `reply` and `migrate` fail until provided.
   */
  static new<Q = NoExtension, C = NoExtension>(
    execute: ExecuteEntryPoint<Q, C>,
    instantiate: InstantiateEntryPoint<Q, C>,
    query: QueryEntryPoint<Q>,
    options?: Partial<WrapperOptions>
  ): ContractWrapper<Q, C> {
    return new ContractWrapper<Q, C>(
      {
        [EntryPointKind.Instantiate]: instantiate,
        [EntryPointKind.Execute]: execute,
        [EntryPointKind.Query]: query,
        [EntryPointKind.Sudo]: defaultSudo<Q, C>(),
        [EntryPointKind.Reply]: defaultReply<Q, C>(),
        [EntryPointKind.Migrate]: defaultMigrate<Q, C>()
      },
      resolveOptions(options)
    );
  }

  /**
   * As {@link ContractWrapper.new}, for entry points written against the baseline extension types.
   */
  static newWithEmpty<Q = NoExtension, C = NoExtension>(
    execute: ExecuteEntryPoint,
    instantiate: InstantiateEntryPoint,
    query: QueryEntryPoint,
    options?: Partial<WrapperOptions>
  ): ContractWrapper<Q, C> {
    const resolved = resolveOptions(options);
    return ContractWrapper.new<Q, C>(
      castContractFn<EntryPointKind.Execute, Q, C>(execute, resolved),
      castContractFn<EntryPointKind.Instantiate, Q, C>(instantiate, resolved),
      castQueryFn<Q>(query),
      resolved
    );
  }

  withSudo(sudo: SudoEntryPoint<Q, C>): ContractWrapper<Q, C> {
    return this.replace({ [EntryPointKind.Sudo]: sudo });
  }

  withSudoEmpty(sudo: SudoEntryPoint): ContractWrapper<Q, C> {
    return this.withSudo(castPermissionedFn<EntryPointKind.Sudo, Q, C>(sudo, this.options));
  }

  withReply(reply: ReplyEntryPoint<Q, C>): ContractWrapper<Q, C> {
    return this.replace({ [EntryPointKind.Reply]: reply });
  }

  withReplyEmpty(reply: ReplyEntryPoint): ContractWrapper<Q, C> {
    return this.withReply(castReplyFn<Q, C>(reply, this.options));
  }

  withMigrate(migrate: MigrateEntryPoint<Q, C>): ContractWrapper<Q, C> {
    return this.replace({ [EntryPointKind.Migrate]: migrate });
  }

  withMigrateEmpty(migrate: MigrateEntryPoint): ContractWrapper<Q, C> {
    return this.withMigrate(castPermissionedFn<EntryPointKind.Migrate, Q, C>(migrate, this.options));
  }

  /**
   * Whether the contract provides its own entry point of the given kind.
   */
  hasEntryPoint(kind: EntryPointKind): boolean {
    return !isDefaultEntryPoint(this.entryPoints[kind]);
  }

  execute(deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Binary): ContractResult<ContractResponse<C>> {
    return this.dispatch(EntryPointKind.Execute, () =>
      this.entryPoints[EntryPointKind.Execute].call(deps, env, info, msg)
    );
  }

  instantiate(deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Binary): ContractResult<ContractResponse<C>> {
    return this.dispatch(EntryPointKind.Instantiate, () =>
      this.entryPoints[EntryPointKind.Instantiate].call(deps, env, info, msg)
    );
  }

  query(deps: Deps<Q>, env: Env, msg: Binary): ContractResult<Binary> {
    return this.dispatch(EntryPointKind.Query, () => this.entryPoints[EntryPointKind.Query].call(deps, env, msg));
  }

  sudo(deps: DepsMut<Q>, env: Env, msg: Binary): ContractResult<ContractResponse<C>> {
    return this.dispatch(EntryPointKind.Sudo, () => this.entryPoints[EntryPointKind.Sudo].call(deps, env, msg));
  }

  reply(deps: DepsMut<Q>, env: Env, reply: Reply): ContractResult<ContractResponse<C>> {
    return this.dispatch(EntryPointKind.Reply, () => this.entryPoints[EntryPointKind.Reply].call(deps, env, reply));
  }

  migrate(deps: DepsMut<Q>, env: Env, msg: Binary): ContractResult<ContractResponse<C>> {
    return this.dispatch(EntryPointKind.Migrate, () => this.entryPoints[EntryPointKind.Migrate].call(deps, env, msg));
  }

  private replace(entryPoints: Partial<EntryPointRegistry<Q, C>>): ContractWrapper<Q, C> {
    return new ContractWrapper<Q, C>({ ...this.entryPoints, ...entryPoints }, this.options);
  }

  private dispatch<R>(kind: EntryPointKind, call: () => ContractResult<R>): ContractResult<R> {
    if (!this.options.traceCalls) {
      return call();
    }
    const benchmark = Benchmark.measure();
    const result = call();
    if (result.type === 'error') {
      this.logger.debug(`${kind} failed in ${benchmark.elapsed()}: ${result.errorMessage}`);
    } else {
      this.logger.debug(`${kind} finished in ${benchmark.elapsed()}`);
    }
    return result;
  }
}
