import { NoExtension } from '../types';
import { Api } from './Api';
import { QuerierWrapper } from './Querier';
import { ReadonlyStorage, Storage } from './Storage';

/**
 * Read-only request context, handed to queries. Borrowed for the duration of one call.
 */
export interface Deps<Q = NoExtension> {
  readonly storage: ReadonlyStorage;
  readonly api: Api;
  readonly querier: QuerierWrapper<Q>;
}

/**
 * Request context of the state-mutating entry points.
 */
export interface DepsMut<Q = NoExtension> {
  readonly storage: Storage;
  readonly api: Api;
  readonly querier: QuerierWrapper<Q>;
}

export function asDeps<Q>(deps: DepsMut<Q>): Deps<Q> {
  return { storage: deps.storage, api: deps.api, querier: deps.querier };
}
