/**
 * Carpenter
 *
 * Registry of named table builders. Each get()/make() constructs a new
 * Table wired to new store, session, view and paginator managers, so no
 * driver state is shared between builds.
 *
 * @example
 * ```typescript
 * const carpenter = new Carpenter({ paginator: { perPage: 25 } });
 *
 * carpenter.add('users', (table) => {
 *   table.column('name');
 *   table.column('email').setPresenter((value) => String(value).toLowerCase());
 *   table.data(users).paginate();
 * });
 *
 * const html = carpenter.get('users').setRequest(request).render();
 * ```
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { CarpenterConfig, CarpenterConfigInput } from '../config/CarpenterConfig.js';
import { resolveConfig } from '../config/CarpenterConfig.js';
import {
  BuilderResolutionError,
  CarpenterCollectionError,
  ConfigurationError,
  TableLocationNotFoundError,
} from '../errors/index.js';
import type { Logger } from '../logging/Logger.js';
import { silentLogger } from '../logging/Logger.js';
import { PaginationManager } from '../managers/PaginationManager.js';
import { SessionManager } from '../managers/SessionManager.js';
import { StoreManager } from '../managers/StoreManager.js';
import { ViewManager } from '../managers/ViewManager.js';
import type { ExtensionFactory, ExtensionMap, ManagerKind } from '../managers/types.js';
import { Table } from '../table/Table.js';
import type { TableManagers } from '../table/Table.js';
import type { BuilderRef, TableBuilder, TableBuilderInput, TableClass } from './BuilderRef.js';
import { toBuilderRef } from './BuilderRef.js';

export interface CarpenterOptions {
  logger?: Logger;
}

/**
 * Shape of a module loaded by loadTables()
 */
type TableRegistrar = (carpenter: Carpenter) => unknown;

function findRegistrar(loaded: unknown): TableRegistrar | null {
  if (typeof loaded !== 'object' || loaded === null) {
    return null;
  }
  for (const name of ['default', 'register']) {
    const candidate: unknown = Reflect.get(loaded, name);
    if (typeof candidate === 'function') {
      return (carpenter) => candidate(carpenter);
    }
  }
  return null;
}

export class Carpenter {
  private readonly config: CarpenterConfig;
  private readonly logger: Logger;

  /** Table name -> builder */
  private readonly collection: Map<string, BuilderRef> = new Map();

  /** Type name -> class used by class builder references */
  private readonly classes: Map<string, TableClass> = new Map();

  private readonly extensions: ExtensionMap = {
    store: new Map(),
    session: new Map(),
    view: new Map(),
    paginator: new Map(),
  };

  constructor(config: CarpenterConfigInput = {}, options: CarpenterOptions = {}) {
    this.config = resolveConfig(config);
    this.logger = options.logger ?? silentLogger;
  }

  getConfig(): Readonly<CarpenterConfig> {
    return this.config;
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Register a table builder. An existing builder with the same name is
   * replaced.
   * @param builder - Function, "Class" / "Class@method" string, or BuilderRef
   */
  add(name: string, builder: TableBuilderInput): void {
    if (this.collection.has(name)) {
      this.logger.debug(`Replacing table builder '${name}'`);
    }
    this.collection.set(name, toBuilderRef(builder));
  }

  has(name: string): boolean {
    return this.collection.has(name);
  }

  /**
   * Make a class available to "Class@method" builder references
   */
  registerClass(typeName: string, tableClass: TableClass): this {
    this.classes.set(typeName, tableClass);
    return this;
  }

  /**
   * Register a driver for a manager. Later registrations for the same
   * key replace earlier ones.
   */
  extend<K extends ManagerKind>(manager: K, key: string, factory: ExtensionFactory<K>): this {
    const extensions: Map<string, ExtensionFactory<K>> = this.extensions[manager];
    extensions.set(key, factory);
    this.logger.debug(`Registered ${manager} driver '${key}'`);
    return this;
  }

  // ===========================================================================
  // Building
  // ===========================================================================

  /**
   * Build a registered table, then run the optional callback on it
   * @throws CarpenterCollectionError if no table has that name
   */
  get(name: string, callback?: (table: Table) => void): Table {
    const ref = this.collection.get(name);
    if (ref === undefined) {
      throw new CarpenterCollectionError(name);
    }

    const table = this.buildTable(name, this.resolveBuilder(ref));
    if (callback !== undefined) {
      callback(table);
    }
    return table;
  }

  /**
   * Build a table from a builder without registering it
   */
  make(name: string, builder: TableBuilder): Table {
    return this.buildTable(name, builder);
  }

  /**
   * Import the configured tables module and let it register tables.
   * The module's default export (or "register" export) receives this
   * Carpenter.
   * @throws TableLocationNotFoundError if the file does not exist
   */
  async loadTables(): Promise<void> {
    const location = resolve(this.config.tables.location);
    if (!existsSync(location)) {
      throw new TableLocationNotFoundError(this.config.tables.location);
    }

    const loaded: unknown = await import(pathToFileURL(location).href);
    const registrar = findRegistrar(loaded);
    if (registrar === null) {
      throw new ConfigurationError(
        `'${this.config.tables.location}' must export a default or "register" function`
      );
    }
    registrar(this);
    this.logger.debug(`Loaded tables from '${location}'`);
  }

  private buildTable(name: string, builder: TableBuilder): Table {
    const table = new Table(name, this.createManagers(), this.config, this.logger);
    builder(table);
    return table;
  }

  private resolveBuilder(ref: BuilderRef): TableBuilder {
    if (ref.kind === 'callable') {
      return ref.build;
    }

    const { typeName, methodName } = ref;
    const reference = `${typeName}@${methodName}`;
    const tableClass = this.classes.get(typeName);
    if (tableClass === undefined) {
      throw new BuilderResolutionError(reference, `class '${typeName}' is not registered`);
    }

    return (table) => {
      const instance = new tableClass();
      const method: unknown = Reflect.get(instance, methodName);
      if (typeof method !== 'function') {
        throw new BuilderResolutionError(reference, `'${methodName}' is not a method`);
      }
      method.call(instance, table);
    };
  }

  private createManagers(): TableManagers {
    return {
      store: new StoreManager(this.config.store, this.extensions.store, this.logger),
      session: new SessionManager(this.config.session, this.extensions.session, this.logger),
      view: new ViewManager(this.config.view, this.extensions.view, this.logger),
      paginator: new PaginationManager(this.config.paginator, this.extensions.paginator, this.logger),
    };
  }
}
