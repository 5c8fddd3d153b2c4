// an interface for the ContractWrapper options - can be used to change the behaviour of some features.
export interface WrapperOptions {
  // whether the cross-chain message variants (ibc, stargate) are carried over when a response
  // built for the baseline extension is widened to a chain-specific one.
  // With this switched off, such messages are treated as unknown variants.
  stargate: boolean;

  // logs the duration of every dispatched call, and the error message of failed ones
  traceCalls: boolean;

  // module name of the logger used by the wrapper
  loggerName: string;
}

export class DefaultWrapperOptions implements WrapperOptions {
  stargate = true;

  traceCalls = false;

  loggerName = 'ContractWrapper';
}

export function resolveOptions(options?: Partial<WrapperOptions>): WrapperOptions {
  return { ...new DefaultWrapperOptions(), ...options };
}
