/**
 * Session Driver Contract
 */

/**
 * Key/value persistence for table state between requests
 */
export interface SessionDriver {
  get(key: string): unknown;
  put(key: string, value: unknown): void;
  has(key: string): boolean;
  forget(key: string): void;
}

/**
 * External session storage wrapped by the "backend" driver, e.g. an
 * adapter over a web framework's request session.
 */
export interface SessionBackend {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  delete(key: string): void;
}
