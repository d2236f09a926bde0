/**
 * Table Carpenter - Error Classes
 *
 * Every error raised by the library extends CarpenterError and carries
 * the value that caused it. Errors thrown by presenters, spreadsheet
 * callbacks and drivers are not wrapped.
 */

import type { ManagerKind } from '../managers/types.js';

export class CarpenterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CarpenterError';
  }
}

/**
 * No table is registered under the requested name.
 */
export class CarpenterCollectionError extends CarpenterError {
  readonly tableName: string;

  constructor(tableName: string) {
    super(`No table was found with the name '${tableName}'`);
    this.name = 'CarpenterCollectionError';
    this.tableName = tableName;
  }
}

/**
 * The bulk registration file does not exist.
 */
export class TableLocationNotFoundError extends CarpenterError {
  readonly location: string;

  constructor(location: string) {
    super(`No file found for the path '${location}'`);
    this.name = 'TableLocationNotFoundError';
    this.location = location;
  }
}

export class DriverNotFoundError extends CarpenterError {
  readonly kind: ManagerKind;
  readonly driver: string;

  constructor(kind: ManagerKind, driver: string) {
    super(`Driver [${driver}] is not supported by the ${kind} manager`);
    this.name = 'DriverNotFoundError';
    this.kind = kind;
    this.driver = driver;
  }
}

/**
 * A class builder reference could not be turned into a callable.
 */
export class BuilderResolutionError extends CarpenterError {
  readonly reference: string;

  constructor(reference: string, reason: string) {
    super(`Cannot resolve table builder '${reference}': ${reason}`);
    this.name = 'BuilderResolutionError';
    this.reference = reference;
  }
}

export class TableStateError extends CarpenterError {
  readonly tableName: string;

  constructor(tableName: string, message: string) {
    super(`Table '${tableName}': ${message}`);
    this.name = 'TableStateError';
    this.tableName = tableName;
  }
}

export class UnsupportedSourceError extends CarpenterError {
  readonly driver: string;

  constructor(driver: string, expected: string) {
    super(`The ${driver} store expects ${expected}`);
    this.name = 'UnsupportedSourceError';
    this.driver = driver;
  }
}

export class ViewTemplateNotFoundError extends CarpenterError {
  readonly template: string;

  constructor(template: string) {
    super(`View template '${template}' is not registered`);
    this.name = 'ViewTemplateNotFoundError';
    this.template = template;
  }
}

export class ConfigurationError extends CarpenterError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigurationError';
  }
}
