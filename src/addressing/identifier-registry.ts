// src/addressing/identifier-registry.ts

import Logger from '../logger.js';
import {
  ADDRESSES,
  DEFAULT_IDENTIFIER_RANGES,
  DEVICE_ROLES,
  MAX_NODE_ADDRESS,
  MESSAGE_CATEGORIES,
} from '../constants/constants.js';
import {
  InvalidRangeError,
  RangeConflictError,
  RegistryFrozenError,
  UnclassifiedIdentifierError,
  UnknownAddressError,
} from '../errors.js';
import { isValidIdentifier } from '../framers/can-framer.js';
import type {
  FrameFormat,
  IdentifierRange,
  LoggerInstance,
  LogLevel,
  MessageCategory,
  RangeCategory,
  Role,
} from '../types/fieldbus-types.js';

export interface IdentifierRegistryOptions {
  logger?: Logger;
  logLevel?: LogLevel;
}

/**
 * Maps identifier ranges to message categories and reserved addresses to roles.
 * Writable until {@link IdentifierRegistry.freeze}; read-only afterwards.
 */
export class IdentifierRegistry {
  private readonly ranges: IdentifierRange[] = [];
  private readonly roles: Map<number, Role> = new Map();
  private frozen: boolean = false;
  private readonly logger: LoggerInstance;

  constructor(options: IdentifierRegistryOptions = {}) {
    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('IdentifierRegistry');
    this.logger.setLevel(options.logLevel ?? 'warn');
  }

  /**
   * Registers an identifier range for a category.
   * Overlap with a range of the same category and format is allowed.
   */
  public registerRange(
    category: RangeCategory,
    low: number,
    high: number,
    format: FrameFormat = 'standard'
  ): IdentifierRange {
    this.assertWritable();
    if (!isValidIdentifier(low, format) || !isValidIdentifier(high, format) || low > high) {
      throw new InvalidRangeError(low, high, format);
    }

    const conflict = this.ranges.find(
      r => r.format === format && r.category !== category && low <= r.high && r.low <= high
    );
    if (conflict) {
      throw new RangeConflictError(category, low, high, conflict.category);
    }

    const range: IdentifierRange = Object.freeze({ category, low, high, format });
    this.ranges.push(range);
    this.logger.debug('Range registered', { category, low, high, format });
    return range;
  }

  public classify(identifier: number, format: FrameFormat = 'standard'): MessageCategory {
    const range = this.ranges.find(
      r => r.format === format && identifier >= r.low && identifier <= r.high
    );
    return range ? range.category : MESSAGE_CATEGORIES.UNCLASSIFIED;
  }

  /**
   * @throws UnclassifiedIdentifierError
   */
  public classifyOrThrow(identifier: number, format: FrameFormat = 'standard'): RangeCategory {
    const category = this.classify(identifier, format);
    if (category === MESSAGE_CATEGORIES.UNCLASSIFIED) {
      throw new UnclassifiedIdentifierError(identifier, format);
    }
    return category;
  }

  public registerRole(address: number, role: Role): void {
    this.assertWritable();
    if (!Number.isInteger(address) || address < 0 || address > MAX_NODE_ADDRESS) {
      throw new UnknownAddressError(address);
    }
    this.roles.set(address, role);
    this.logger.debug('Role registered', { address, role });
  }

  /**
   * @throws UnknownAddressError for addresses without a reserved role
   */
  public resolveRole(address: number): Role {
    const role = this.roles.get(address);
    if (role === undefined) throw new UnknownAddressError(address);
    return role;
  }

  public hasRole(address: number): boolean {
    return this.roles.has(address);
  }

  public freeze(): void {
    if (this.frozen) return;
    this.frozen = true;
    this.logger.info('Registry frozen', {
      ranges: this.ranges.length,
      roles: this.roles.size,
    });
  }

  public isFrozen(): boolean {
    return this.frozen;
  }

  public getRanges(format?: FrameFormat): IdentifierRange[] {
    return format ? this.ranges.filter(r => r.format === format) : [...this.ranges];
  }

  private assertWritable(): void {
    if (this.frozen) throw new RegistryFrozenError();
  }
}

/**
 * Registry with the default ranges and reserved role addresses.
 */
export function createDefaultRegistry(options: IdentifierRegistryOptions = {}): IdentifierRegistry {
  const registry = new IdentifierRegistry(options);
  for (const { category, low, high, format } of DEFAULT_IDENTIFIER_RANGES) {
    registry.registerRange(category, low, high, format);
  }
  registry.registerRole(ADDRESSES.CONTROLLER, DEVICE_ROLES.CONTROLLER);
  registry.registerRole(ADDRESSES.TASK_CONTROLLER, DEVICE_ROLES.TASK_CONTROLLER);
  registry.registerRole(ADDRESSES.VIRTUAL_TERMINAL, DEVICE_ROLES.VIRTUAL_TERMINAL);
  registry.registerRole(ADDRESSES.BROADCAST, DEVICE_ROLES.BROADCAST);
  return registry;
}
