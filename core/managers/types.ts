/**
 * Manager Types
 */

import type {
  PaginatorConfig,
  SessionConfig,
  StoreConfig,
  ViewConfig,
} from '../config/CarpenterConfig.js';
import type { PaginatorDriver } from '../pagination/types.js';
import type { SessionDriver } from '../session/types.js';
import type { StoreDriver } from '../store/types.js';
import type { ViewDriver } from '../view/types.js';

export type ManagerKind = 'store' | 'session' | 'view' | 'paginator';

export const MANAGER_KINDS: readonly ManagerKind[] = ['store', 'session', 'view', 'paginator'];

export interface DriverTypes {
  store: StoreDriver;
  session: SessionDriver;
  view: ViewDriver;
  paginator: PaginatorDriver;
}

export interface DriverConfigTypes {
  store: StoreConfig;
  session: SessionConfig;
  view: ViewConfig;
  paginator: PaginatorConfig;
}

/**
 * Creates a driver from its manager's configuration
 */
export type DriverFactory<TDriver, TConfig> = (config: TConfig) => TDriver;

export type ExtensionFactory<K extends ManagerKind> = DriverFactory<DriverTypes[K], DriverConfigTypes[K]>;

export type DriverExtensions<TDriver, TConfig> = ReadonlyMap<string, DriverFactory<TDriver, TConfig>>;

/**
 * Driver key -> factory, per manager kind
 */
export type ExtensionMap = {
  [K in ManagerKind]: Map<string, ExtensionFactory<K>>;
};

export function isManagerKind(value: string): value is ManagerKind {
  return MANAGER_KINDS.some((kind) => kind === value);
}
