import { z } from 'zod';
import { fromBinary, toBinary } from '../Binary';
import { ContractError } from '../ContractError';
import { Decoder } from '../Decoder';
import { Addr, Binary, Coin, NoExtension } from '../types';

export type BankQuery = { balance: { address: Addr; denom: string } } | { allBalances: { address: Addr } };

export type WasmQuery =
  | { smart: { contractAddr: Addr; msg: Binary } }
  | { raw: { contractAddr: Addr; key: Binary } }
  | { contractInfo: { contractAddr: Addr } };

export type StakingQuery =
  | { bondedDenom: Record<string, never> }
  | { allValidators: Record<string, never> }
  | { delegation: { delegator: Addr; validator: Addr } };

/**
 * The chain-specific query variant - absent for {@link NoExtension}.
 */
export type CustomQueryVariant<Q> = [Q] extends [never] ? never : { custom: Q };

export type QueryRequest<Q = NoExtension> =
  | { bank: BankQuery }
  | { wasm: WasmQuery }
  | { staking: StakingQuery }
  | CustomQueryVariant<Q>;

export type QuerierResult = { type: 'ok'; result: Binary } | { type: 'error'; errorMessage: string };

/**
 * Raw, byte-level query dispatcher provided by the host.
 */
export interface Querier {
  rawQuery(request: Binary): QuerierResult;
}

export const CoinSchema = z.object({
  denom: z.string(),
  amount: z.string()
});

const BalanceResponseSchema = z.object({ amount: CoinSchema });
const AllBalancesResponseSchema = z.object({ amount: z.array(CoinSchema) });
const BondedDenomResponseSchema = z.object({ denom: z.string() });

/**
 * Typed view over a {@link Querier}. `Q` only restricts which requests can be built,
 * the raw querier underneath is shared.
 */
export class QuerierWrapper<Q = NoExtension> {
  // ties Q to the wrapper type, so wrappers over different query types are not interchangeable
  declare readonly queryType?: (request: Q) => Q;

  constructor(readonly querier: Querier) {}

  query<T>(request: QueryRequest<Q>, decoder: Decoder<T>): T {
    const response = this.querier.rawQuery(toBinary(request));
    if (response.type === 'error') {
      throw new ContractError({ type: 'QuerierError' }, `Querier error: ${response.errorMessage}`);
    }
    try {
      return decoder.parse(fromBinary(response.result));
    } catch (e) {
      throw new ContractError({ type: 'QuerierError' }, 'Unexpected query response', e);
    }
  }

  queryBalance(address: Addr, denom: string): Coin {
    return this.query({ bank: { balance: { address, denom } } }, BalanceResponseSchema).amount;
  }

  queryAllBalances(address: Addr): Coin[] {
    return this.query({ bank: { allBalances: { address } } }, AllBalancesResponseSchema).amount;
  }

  queryWasmSmart<T>(contractAddr: Addr, msg: unknown, decoder: Decoder<T>): T {
    return this.query({ wasm: { smart: { contractAddr, msg: toBinary(msg) } } }, decoder);
  }

  queryBondedDenom(): string {
    return this.query({ staking: { bondedDenom: {} } }, BondedDenomResponseSchema).denom;
  }
}
