// src/application/device-registry.ts

import Logger from '../logger.js';
import { DEFAULT_ENGINE_OPTIONS } from '../constants/constants.js';
import type { DeviceCapability } from '../constants/constants.js';
import { InvalidTransitionError, UnknownAddressError } from '../errors.js';
import type {
  DeviceRecord,
  DeviceRole,
  DeviceState,
  DeviceStateHandler,
  DisconnectReason,
  LoggerInstance,
  LogLevel,
} from '../types/fieldbus-types.js';

export interface DeviceRegistryOptions {
  livenessWindowMs?: number;
  addressHoldMs?: number;
  logger?: Logger;
  logLevel?: LogLevel;
}

interface PendingNotification {
  snapshot: Readonly<DeviceRecord>;
  previous: DeviceState;
  reason?: DisconnectReason;
}

interface HeldAddress {
  record: DeviceRecord;
  until: number;
}

/**
 * Tracks devices on the network by address:
 * unknown -> discovered -> connected <-> active -> disconnected.
 *
 * A disconnected device leaves the registry; its address stays held until the hold expires
 * or {@link DeviceRegistry.releaseAddress} is called.
 * State changes are queued and reach handlers on {@link DeviceRegistry.flushNotifications}.
 */
export class DeviceRegistry {
  private readonly devices = new Map<number, DeviceRecord>();
  private readonly held = new Map<number, HeldAddress>();
  private readonly handlers = new Set<DeviceStateHandler>();
  private pending: PendingNotification[] = [];
  private readonly livenessWindowMs: number;
  private readonly addressHoldMs: number;
  private readonly logger: LoggerInstance;

  constructor(options: DeviceRegistryOptions = {}) {
    this.livenessWindowMs = options.livenessWindowMs ?? DEFAULT_ENGINE_OPTIONS.livenessWindowMs;
    this.addressHoldMs = options.addressHoldMs ?? this.livenessWindowMs;
    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('DeviceRegistry');
    this.logger.setLevel(options.logLevel ?? 'warn');
  }

  /**
   * Subscribes to state changes.
   * @returns unsubscribe function
   */
  public onStateChange(handler: DeviceStateHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  public discover(
    address: number,
    role: DeviceRole,
    capabilities: DeviceCapability[],
    now: number = Date.now()
  ): DeviceRecord {
    if (this.devices.has(address)) {
      throw new InvalidTransitionError(this.getState(address, now), 'discovered');
    }
    const record: DeviceRecord = {
      address,
      role,
      capabilities: [...capabilities],
      state: 'discovered',
      discoveredAt: now,
      lastSeen: now,
    };
    this.devices.set(address, record);
    this.logger.info('Device discovered', { address, role });
    this.emit(record, 'unknown');
    return record;
  }

  public markConnected(address: number): void {
    this.transition(address, ['discovered', 'active'], 'connected');
  }

  public markActive(address: number): void {
    this.transition(address, ['connected'], 'active');
  }

  /**
   * Refreshes the liveness timestamp of a known device.
   * @returns false for addresses the registry does not track
   */
  public touch(address: number, now: number = Date.now()): boolean {
    const record = this.devices.get(address);
    if (!record) return false;
    record.lastSeen = now;
    return true;
  }

  /**
   * Removes a device and holds its address.
   */
  public disconnect(address: number, reason: DisconnectReason, now: number = Date.now()): DeviceRecord {
    const record = this.devices.get(address);
    if (!record) throw new UnknownAddressError(address);

    const previous = record.state;
    record.state = 'disconnected';
    this.devices.delete(address);
    this.held.set(address, { record, until: now + this.addressHoldMs });

    this.logger.warn('Device disconnected', { address, reason });
    this.emit(record, previous, reason);
    return record;
  }

  /**
   * Disconnects every device silent for longer than the liveness window.
   */
  public expire(now: number = Date.now()): DeviceRecord[] {
    const stale = Array.from(this.devices.values()).filter(
      record => now - record.lastSeen > this.livenessWindowMs
    );
    return stale.map(record => this.disconnect(record.address, 'liveness-timeout', now));
  }

  public isHeld(address: number, now: number = Date.now()): boolean {
    const hold = this.held.get(address);
    if (!hold) return false;
    if (now >= hold.until) {
      this.held.delete(address);
      return false;
    }
    return true;
  }

  /**
   * Frees a held address for a new device.
   * @returns true when the address was held
   */
  public releaseAddress(address: number): boolean {
    const released = this.held.delete(address);
    if (released) this.logger.debug('Address released', { address });
    return released;
  }

  /**
   * Known device, or the last record of a disconnected one while its address is held.
   */
  public get(address: number, now: number = Date.now()): Readonly<DeviceRecord> | undefined {
    const record =
      this.devices.get(address) ?? (this.isHeld(address, now) ? this.held.get(address)?.record : undefined);
    return record ? { ...record, capabilities: [...record.capabilities] } : undefined;
  }

  public has(address: number): boolean {
    return this.devices.has(address);
  }

  public getState(address: number, now: number = Date.now()): DeviceState {
    const record = this.devices.get(address);
    if (record) return record.state;
    return this.isHeld(address, now) ? 'disconnected' : 'unknown';
  }

  public list(): Array<Readonly<DeviceRecord>> {
    return Array.from(this.devices.values(), record => ({
      ...record,
      capabilities: [...record.capabilities],
    }));
  }

  private transition(address: number, from: DeviceState[], to: DeviceState): void {
    const record = this.devices.get(address);
    if (!record) throw new UnknownAddressError(address);
    if (record.state === to) return;
    if (!from.includes(record.state)) {
      throw new InvalidTransitionError(record.state, to);
    }
    const previous = record.state;
    record.state = to;
    this.logger.debug(`Device ${previous} -> ${to}`, { address });
    this.emit(record, previous);
  }

  private emit(record: DeviceRecord, previous: DeviceState, reason?: DisconnectReason): void {
    const snapshot: Readonly<DeviceRecord> = { ...record, capabilities: [...record.capabilities] };
    this.pending.push({ snapshot, previous, reason });
  }

  /**
   * Delivers queued state changes to the handlers.
   * @returns number of notifications delivered
   */
  public flushNotifications(): number {
    const batch = this.pending;
    this.pending = [];
    for (const { snapshot, previous, reason } of batch) {
      for (const handler of this.handlers) {
        try {
          handler(snapshot, previous, reason);
        } catch (err: unknown) {
          this.logger.error('Device state handler failed', {
            address: snapshot.address,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }
    return batch.length;
  }
}
