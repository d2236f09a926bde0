/**
 * Store Manager
 * Built-in drivers: "array" (iterables of records), "query" (query builders).
 */

import type { StoreConfig } from '../config/CarpenterConfig.js';
import { ArrayStore } from '../store/ArrayStore.js';
import { QueryStore } from '../store/QueryStore.js';
import type { StoreDriver } from '../store/types.js';
import { Manager } from './Manager.js';
import type { DriverFactory, ManagerKind } from './types.js';

export class StoreManager extends Manager<StoreDriver, StoreConfig> {
  readonly kind: ManagerKind = 'store';

  protected creators(): Record<string, DriverFactory<StoreDriver, StoreConfig>> {
    return {
      array: () => new ArrayStore(),
      query: () => new QueryStore(),
    };
  }
}
