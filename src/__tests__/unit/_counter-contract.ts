import { z } from 'zod';
import { fromBinary, toBinary } from '../../core/Binary';
import { ReadonlyStorage, Storage } from '../../core/deps/Storage';
import { ContractResponse } from '../../core/messages/ContractResponse';
import { Event } from '../../core/messages/Event';
import { SubMsg } from '../../core/messages/SubMsg';
import { coin } from '../../core/types';
import { ContractFn, PermissionedFn, QueryFn, ReplyFn } from '../../contracts/EntryPoint';

/*
 * A small counter contract written against the baseline extension types, shared by the unit tests.
 */

export const OWNER = 'owner';

export const InstantiateMsgSchema = z.object({ count: z.number().int() });

export const ExecuteMsgSchema = z.union([
  z.object({ increment: z.object({ by: z.number().int() }) }),
  z.object({ reset: z.object({ count: z.number().int() }) }),
  z.object({ payout: z.object({ to: z.string(), amount: z.string() }) })
]);

export const QueryMsgSchema = z.union([
  z.object({ getCount: z.object({}) }),
  z.object({ balance: z.object({ address: z.string() }) })
]);

export const SudoMsgSchema = z.object({ setCount: z.object({ count: z.number().int() }) });

export const MigrateMsgSchema = z.object({ version: z.string() });

export type InstantiateMsg = z.infer<typeof InstantiateMsgSchema>;
export type ExecuteMsg = z.infer<typeof ExecuteMsgSchema>;
export type QueryMsg = z.infer<typeof QueryMsgSchema>;
export type SudoMsg = z.infer<typeof SudoMsgSchema>;
export type MigrateMsg = z.infer<typeof MigrateMsgSchema>;

const COUNT_KEY = Buffer.from('count');

export function loadCount(storage: ReadonlyStorage): number {
  const raw = storage.get(COUNT_KEY);
  return raw ? z.number().parse(fromBinary(raw)) : 0;
}

function saveCount(storage: Storage, count: number): void {
  storage.set(COUNT_KEY, toBinary(count));
}

export const instantiate: ContractFn<InstantiateMsg> = (deps, env, info, msg) => {
  saveCount(deps.storage, msg.count);
  return new ContractResponse().addAttribute('action', 'instantiate').addAttribute('owner', info.sender);
};

export const execute: ContractFn<ExecuteMsg> = (deps, env, info, msg) => {
  if ('increment' in msg) {
    saveCount(deps.storage, loadCount(deps.storage) + msg.increment.by);
    return new ContractResponse().addAttribute('action', 'increment');
  }
  if ('reset' in msg) {
    if (info.sender !== OWNER) {
      throw new Error('Unauthorized');
    }
    saveCount(deps.storage, msg.reset.count);
    return new ContractResponse().addAttribute('action', 'reset');
  }
  const send = SubMsg.replyOnSuccess(
    { bank: { send: { toAddress: msg.payout.to, amount: [coin(msg.payout.amount, 'ucosm')] } } },
    7
  );
  return new ContractResponse()
    .addSubmessage(SubMsg.withGasLimit(send, 150000))
    .addMessage({ distribution: { withdrawDelegatorReward: { validator: 'validator1' } } })
    .addEvent(new Event('payout').addAttribute('to', msg.payout.to))
    .addAttribute('action', 'payout')
    .setData(toBinary({ paid: msg.payout.amount }));
};

export const query: QueryFn<QueryMsg> = (deps, env, msg) => {
  if ('getCount' in msg) {
    return toBinary({ count: loadCount(deps.storage) });
  }
  return toBinary(deps.querier.queryBalance(msg.balance.address, 'ucosm'));
};

export const sudo: PermissionedFn<SudoMsg> = (deps, env, msg) => {
  saveCount(deps.storage, msg.setCount.count);
  return new ContractResponse().addAttribute('action', 'sudo');
};

export const migrate: PermissionedFn<MigrateMsg> = (deps, env, msg) => {
  return new ContractResponse().addAttribute('migrated_to', msg.version);
};

export const reply: ReplyFn = (deps, env, msg) => {
  if ('err' in msg.result) {
    throw new Error(`Sub-message ${msg.id} failed: ${msg.result.err}`);
  }
  return new ContractResponse().addAttribute('reply_id', msg.id);
};
