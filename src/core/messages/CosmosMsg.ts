import { Addr, Binary, Coin, NoExtension } from '../types';

export type WasmMsg =
  | { execute: { contractAddr: Addr; msg: Binary; funds: Coin[] } }
  | { instantiate: { admin?: Addr; codeId: number; msg: Binary; funds: Coin[]; label: string } }
  | { migrate: { contractAddr: Addr; newCodeId: number; msg: Binary } }
  | { updateAdmin: { contractAddr: Addr; admin: Addr } }
  | { clearAdmin: { contractAddr: Addr } };

export type BankMsg = { send: { toAddress: Addr; amount: Coin[] } } | { burn: { amount: Coin[] } };

export type StakingMsg =
  | { delegate: { validator: Addr; amount: Coin } }
  | { undelegate: { validator: Addr; amount: Coin } }
  | { redelegate: { srcValidator: Addr; dstValidator: Addr; amount: Coin } };

export type DistributionMsg =
  | { setWithdrawAddress: { address: Addr } }
  | { withdrawDelegatorReward: { validator: Addr } };

export interface IbcTimeout {
  block?: { revision: number; height: number };
  // nanoseconds since unix epoch, as a decimal string
  timestamp?: string;
}

export type IbcMsg =
  | { transfer: { channelId: string; toAddress: string; amount: Coin; timeout: IbcTimeout } }
  | { sendPacket: { channelId: string; data: Binary; timeout: IbcTimeout } }
  | { closeChannel: { channelId: string } };

/**
 * A protobuf encoded message, passed to the chain as is.
 */
export interface StargateMsg {
  typeUrl: string;
  value: Binary;
}

/**
 * The chain-specific message variant - absent for {@link NoExtension}.
 */
export type CustomMsgVariant<C> = [C] extends [never] ? never : { custom: C };

export type CosmosMsg<C = NoExtension> =
  | { wasm: WasmMsg }
  | { bank: BankMsg }
  | { staking: StakingMsg }
  | { distribution: DistributionMsg }
  | { ibc: IbcMsg }
  | { stargate: StargateMsg }
  | CustomMsgVariant<C>;
