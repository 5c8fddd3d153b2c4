import { z } from 'zod';
import { fromBase64, fromBinary, toBinary } from '../core/Binary';
import { errorMessage } from '../core/ContractError';
import { Querier, QuerierResult } from '../core/deps/Querier';
import { Addr, Binary, Coin } from '../core/types';

export type WasmSmartHandler = (contractAddr: Addr, msg: unknown) => unknown;

export type CustomQueryHandler = (query: unknown) => unknown;

const BankQuerySchema = z.union([
  z.object({ balance: z.object({ address: z.string(), denom: z.string() }) }),
  z.object({ allBalances: z.object({ address: z.string() }) })
]);

const WasmQuerySchema = z.object({
  smart: z.object({ contractAddr: z.string(), msg: z.string() })
});

const StakingQuerySchema = z.object({ bondedDenom: z.object({}) });

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

/**
 * In-process stand-in for the host query dispatcher. Answers bank balance queries from
 * its own balances, everything else through the registered handlers.
 */
export class MockQuerier implements Querier {
  private readonly balances: Map<Addr, Coin[]> = new Map();
  private wasmSmartHandler: WasmSmartHandler = (contractAddr) => {
    throw new Error(`No such contract: ${contractAddr}`);
  };
  private customHandler: CustomQueryHandler = () => {
    throw new Error('Custom query handler not set');
  };

  constructor(balances: Record<Addr, Coin[]> = {}, public bondedDenom = 'stake') {
    Object.entries(balances).forEach(([address, coins]) => this.balances.set(address, coins));
  }

  updateBalance(address: Addr, coins: Coin[]): this {
    this.balances.set(address, coins);
    return this;
  }

  withWasmSmartHandler(handler: WasmSmartHandler): this {
    this.wasmSmartHandler = handler;
    return this;
  }

  withCustomHandler(handler: CustomQueryHandler): this {
    this.customHandler = handler;
    return this;
  }

  rawQuery(request: Binary): QuerierResult {
    let parsed: unknown;
    try {
      parsed = fromBinary(request);
    } catch (e) {
      return { type: 'error', errorMessage: `Parsing query request: ${errorMessage(e)}` };
    }
    try {
      return { type: 'ok', result: toBinary(this.handle(parsed)) };
    } catch (e) {
      return { type: 'error', errorMessage: errorMessage(e) };
    }
  }

  private handle(request: unknown): unknown {
    if (!isRecord(request)) {
      throw new Error('Unsupported query request');
    }
    if ('bank' in request) {
      const bank = BankQuerySchema.parse(request.bank);
      if ('balance' in bank) {
        const { address, denom } = bank.balance;
        const found = (this.balances.get(address) || []).find((coin) => coin.denom === denom);
        return { amount: found || { denom, amount: '0' } };
      }
      return { amount: this.balances.get(bank.allBalances.address) || [] };
    }
    if ('wasm' in request) {
      const { contractAddr, msg } = WasmQuerySchema.parse(request.wasm).smart;
      return this.wasmSmartHandler(contractAddr, fromBinary(fromBase64(msg)));
    }
    if ('staking' in request) {
      StakingQuerySchema.parse(request.staking);
      return { denom: this.bondedDenom };
    }
    if ('custom' in request) {
      return this.customHandler(request.custom);
    }
    throw new Error('Unsupported query request');
  }
}
