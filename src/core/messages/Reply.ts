import { Binary } from '../types';
import { Event } from './Event';

export interface SubMsgResponse {
  events: Event[];
  data?: Binary;
}

export type SubMsgResult = { ok: SubMsgResponse } | { err: string };

/**
 * Outcome of a sub-message, delivered to the `reply` entry point of the contract that emitted it.
 */
export interface Reply {
  // the id of the SubMsg that produced this outcome
  id: number;
  result: SubMsgResult;
}
