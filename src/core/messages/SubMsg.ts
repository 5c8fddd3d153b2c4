import { NoExtension } from '../types';
import { CosmosMsg } from './CosmosMsg';

/**
 * When the host should call back the `reply` entry point of the emitting contract.
 */
export type ReplyOn = 'always' | 'error' | 'success' | 'never';

export interface SubMsg<C = NoExtension> {
  // correlation id, passed back in the Reply
  id: number;
  msg: CosmosMsg<C>;
  gasLimit?: number;
  replyOn: ReplyOn;
}

// eslint-disable-next-line @typescript-eslint/no-redeclare
export const SubMsg = {
  /**
   * Fire and forget - no reply, id 0.
   */
  new<C = NoExtension>(msg: CosmosMsg<C>): SubMsg<C> {
    return { id: 0, msg, replyOn: 'never' };
  },

  replyOnSuccess<C = NoExtension>(msg: CosmosMsg<C>, id: number): SubMsg<C> {
    return { id, msg, replyOn: 'success' };
  },

  replyOnError<C = NoExtension>(msg: CosmosMsg<C>, id: number): SubMsg<C> {
    return { id, msg, replyOn: 'error' };
  },

  replyAlways<C = NoExtension>(msg: CosmosMsg<C>, id: number): SubMsg<C> {
    return { id, msg, replyOn: 'always' };
  },

  withGasLimit<C = NoExtension>(subMsg: SubMsg<C>, gasLimit: number): SubMsg<C> {
    return { ...subMsg, gasLimit };
  }
};
