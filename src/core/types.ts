/**
 * A human readable account or contract address.
 */
export type Addr = string;

/**
 * Encoded payload - contract messages, query results, sub-message data.
 */
export type Binary = Uint8Array;

export interface Coin {
  denom: string;
  // decimal string, may exceed Number.MAX_SAFE_INTEGER
  amount: string;
}

export interface BlockInfo {
  height: number;
  // nanoseconds since unix epoch, as a decimal string
  time: string;
  chainId: string;
}

export interface TransactionInfo {
  index: number;
}

export interface ContractInfo {
  address: Addr;
}

/**
 * Execution metadata the host passes with every call.
 */
export interface Env {
  block: BlockInfo;
  transaction?: TransactionInfo;
  contract: ContractInfo;
}

export interface MessageInfo {
  sender: Addr;
  funds: Coin[];
}

/**
 * The baseline extension type - a chain with no custom queries and no custom messages.
 * Being uninhabited, it removes the `custom` variant from every union parameterized by it.
 */
export type NoExtension = never;

export function coin(amount: number | bigint | string, denom: string): Coin {
  return { denom, amount: amount.toString() };
}
