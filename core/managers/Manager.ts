/**
 * Manager
 *
 * Resolves a named driver for one table build. Extensions registered
 * through Carpenter.extend() take precedence over built-in creators.
 * Each driver is created once and reused for the lifetime of the
 * manager.
 */

import type { DriverConfig } from '../config/CarpenterConfig.js';
import { DriverNotFoundError } from '../errors/index.js';
import type { Logger } from '../logging/Logger.js';
import { silentLogger } from '../logging/Logger.js';
import type { DriverExtensions, DriverFactory, ManagerKind } from './types.js';

export abstract class Manager<TDriver, TConfig extends DriverConfig> {
  protected readonly config: TConfig;
  protected readonly logger: Logger;
  private readonly extensions: DriverExtensions<TDriver, TConfig>;
  private readonly drivers: Map<string, TDriver> = new Map();

  constructor(config: TConfig, extensions: DriverExtensions<TDriver, TConfig>, logger: Logger = silentLogger) {
    this.config = config;
    this.extensions = extensions;
    this.logger = logger;
  }

  abstract readonly kind: ManagerKind;

  /**
   * Built-in driver creators by key
   */
  protected abstract creators(): Record<string, DriverFactory<TDriver, TConfig>>;

  getDefaultDriver(): string {
    return this.config.driver;
  }

  /**
   * Get a driver instance, creating it on first use
   * @param name - Driver key (default: the configured driver)
   */
  driver(name: string = this.getDefaultDriver()): TDriver {
    const existing = this.drivers.get(name);
    if (existing !== undefined) {
      return existing;
    }

    const driver = this.createDriver(name);
    this.drivers.set(name, driver);
    return driver;
  }

  hasDriver(name: string): boolean {
    return this.extensions.has(name) || Object.prototype.hasOwnProperty.call(this.creators(), name);
  }

  private createDriver(name: string): TDriver {
    const extension = this.extensions.get(name);
    if (extension !== undefined) {
      this.logger.debug(`Creating ${this.kind} driver '${name}' from extension`);
      return extension(this.config);
    }

    const creators = this.creators();
    if (Object.prototype.hasOwnProperty.call(creators, name)) {
      return creators[name](this.config);
    }

    throw new DriverNotFoundError(this.kind, name);
  }
}
