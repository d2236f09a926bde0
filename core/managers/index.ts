/**
 * Managers - Module Exports
 */

export { Manager } from './Manager.js';
export { StoreManager } from './StoreManager.js';
export { SessionManager } from './SessionManager.js';
export { ViewManager } from './ViewManager.js';
export { PaginationManager } from './PaginationManager.js';
export { MANAGER_KINDS, isManagerKind } from './types.js';
export type {
  ManagerKind,
  DriverTypes,
  DriverConfigTypes,
  DriverFactory,
  DriverExtensions,
  ExtensionFactory,
  ExtensionMap,
} from './types.js';
