// src/bus/can-bus.ts

import { Mutex } from 'async-mutex';
import Logger from '../logger.js';
import { BUS_BITRATES, DEFAULT_BUS_OPTIONS, MAX_NODE_ADDRESS } from '../constants/constants.js';
import type { BusBitrate } from '../constants/constants.js';
import {
  BusConfigError,
  BusNotActiveError,
  DuplicateNodeAddressError,
  NodeInactiveError,
  NodeNotRegisteredError,
  QueueFullError,
} from '../errors.js';
import { acceptsFrame, describeFilter, validateFilter } from './frame-filter.js';
import { frameBits, LoadMeter } from './load-meter.js';
import type {
  BusFrame,
  BusOptions,
  BusStatistics,
  BusStatus,
  CanFrame,
  CycleResult,
  FrameFilter,
  LoggerInstance,
  NodeHandle,
  NodeOptions,
  NodeStatus,
  TransmitReceipt,
} from '../types/fieldbus-types.js';

interface BusNode {
  handle: NodeHandle;
  active: boolean;
  filters: FrameFilter[];
  txQueue: BusFrame[];
  rxQueue: BusFrame[];
  txQueueCapacity: number;
  rxQueueCapacity: number;
  framesSent: number;
  framesReceived: number;
  droppedFrames: number;
}

const VALID_BITRATES: readonly number[] = Object.values(BUS_BITRATES);

function isBusBitrate(value: number): value is BusBitrate {
  return VALID_BITRATES.includes(value);
}

/**
 * Arbitration order: the 11-bit base identifier decides first, a standard frame beats an
 * extended one with the same base, then the full identifier, then enqueue order.
 */
export function compareArbitration(a: BusFrame, b: BusFrame): number {
  const baseA = a.format === 'standard' ? a.identifier : a.identifier >>> 18;
  const baseB = b.format === 'standard' ? b.identifier : b.identifier >>> 18;
  if (baseA !== baseB) return baseA - baseB;
  if (a.format !== b.format) return a.format === 'standard' ? -1 : 1;
  if (a.identifier !== b.identifier) return a.identifier - b.identifier;
  return a.sequence - b.sequence;
}

/**
 * Shared broadcast medium with per-node queues, filters and priority arbitration.
 * Frames move from outboxes to inboxes only inside {@link CanBus.runCycle}.
 */
export class CanBus {
  private readonly nodes: Map<number, BusNode> = new Map();
  private readonly deliveryMutex = new Mutex();
  private readonly loadMeter: LoadMeter;
  private readonly logger: LoggerInstance;

  private active: boolean = false;
  private bitrate: BusBitrate;
  private nextNodeId: number = 1;
  private sequence: number = 0;

  private readonly txQueueCapacity: number;
  private readonly rxQueueCapacity: number;
  private readonly maxFramesPerCycle: number;
  private readonly loopback: boolean;

  private stats = {
    framesTransmitted: 0,
    framesDelivered: 0,
    framesDropped: 0,
    cycles: 0,
    errorCount: 0,
  };

  constructor(options: BusOptions = {}) {
    const bitrate = options.bitrate ?? DEFAULT_BUS_OPTIONS.bitrate;
    if (!isBusBitrate(bitrate)) {
      throw new BusConfigError(`Unsupported bitrate: ${String(bitrate)}`);
    }
    this.bitrate = bitrate;
    this.txQueueCapacity = options.txQueueCapacity ?? DEFAULT_BUS_OPTIONS.txQueueCapacity;
    this.rxQueueCapacity = options.rxQueueCapacity ?? DEFAULT_BUS_OPTIONS.rxQueueCapacity;
    this.maxFramesPerCycle = options.maxFramesPerCycle ?? DEFAULT_BUS_OPTIONS.maxFramesPerCycle;
    this.loopback = options.loopback ?? DEFAULT_BUS_OPTIONS.loopback;

    if (!(this.maxFramesPerCycle >= 1)) {
      throw new BusConfigError(`maxFramesPerCycle must be at least 1, got ${this.maxFramesPerCycle}`);
    }

    this.loadMeter = new LoadMeter(
      this.bitrate,
      options.loadWindowMs ?? DEFAULT_BUS_OPTIONS.loadWindowMs
    );

    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('CanBus');
    this.logger.setLevel(options.logLevel ?? 'warn');
  }

  // =========================================================
  // Lifecycle
  // =========================================================

  /**
   * Activates the bus.
   * @param bitrate - one of the standard CAN bitrates
   */
  public start(bitrate: number = this.bitrate): void {
    if (!isBusBitrate(bitrate)) {
      throw new BusConfigError(
        `Unsupported bitrate: ${bitrate}. Supported: ${VALID_BITRATES.join(', ')}`
      );
    }
    this.bitrate = bitrate;
    this.loadMeter.setBitrate(bitrate);
    this.active = true;
    this.logger.info('Bus started', { bitrate });
  }

  /**
   * Deactivates the bus and discards every queued frame. Nodes stay registered.
   */
  public stop(): void {
    let discarded = 0;
    for (const node of this.nodes.values()) {
      discarded += node.txQueue.length + node.rxQueue.length;
      node.txQueue = [];
      node.rxQueue = [];
    }
    this.active = false;
    this.loadMeter.reset();
    this.logger.info('Bus stopped', { discarded });
  }

  public isActive(): boolean {
    return this.active;
  }

  public getBitrate(): BusBitrate {
    return this.bitrate;
  }

  // =========================================================
  // Nodes
  // =========================================================

  public registerNode(address: number, filters: FrameFilter[] = [], options: NodeOptions = {}): NodeHandle {
    if (!Number.isInteger(address) || address < 0 || address > MAX_NODE_ADDRESS) {
      throw new BusConfigError(`Node address must be 0-${MAX_NODE_ADDRESS}, got ${address}`);
    }
    for (const node of this.nodes.values()) {
      if (node.handle.address === address) throw new DuplicateNodeAddressError(address);
    }
    filters.forEach(validateFilter);

    const txQueueCapacity = options.txQueueCapacity ?? this.txQueueCapacity;
    const rxQueueCapacity = options.rxQueueCapacity ?? this.rxQueueCapacity;
    if (txQueueCapacity < 1 || rxQueueCapacity < 1) {
      throw new BusConfigError('Queue capacities must be at least 1');
    }

    const handle: NodeHandle = Object.freeze({ id: this.nextNodeId++, address });
    this.nodes.set(handle.id, {
      handle,
      active: true,
      filters: [...filters],
      txQueue: [],
      rxQueue: [],
      txQueueCapacity,
      rxQueueCapacity,
      framesSent: 0,
      framesReceived: 0,
      droppedFrames: 0,
    });

    this.logger.debug('Node registered', {
      address,
      filters: filters.map(describeFilter).join(', ') || 'none',
    });
    return handle;
  }

  public deregisterNode(handle: NodeHandle): void {
    const node = this.getNode(handle);
    this.nodes.delete(node.handle.id);
    this.logger.debug('Node deregistered', { address: node.handle.address });
  }

  public isRegistered(handle: NodeHandle): boolean {
    return this.nodes.has(handle.id);
  }

  public activateNode(handle: NodeHandle): void {
    this.getNode(handle).active = true;
  }

  /**
   * Takes a node off the bus; both of its queues are cleared.
   */
  public deactivateNode(handle: NodeHandle): void {
    const node = this.getNode(handle);
    node.active = false;
    node.txQueue = [];
    node.rxQueue = [];
  }

  public setFilters(handle: NodeHandle, filters: FrameFilter[]): void {
    filters.forEach(validateFilter);
    this.getNode(handle).filters = [...filters];
  }

  public getFilters(handle: NodeHandle): FrameFilter[] {
    return [...this.getNode(handle).filters];
  }

  // =========================================================
  // Transmit / receive
  // =========================================================

  /**
   * Queues a frame for the next delivery cycle. Acceptance does not imply delivery.
   * @throws BusNotActiveError | NodeInactiveError | QueueFullError
   */
  public transmit(handle: NodeHandle, frame: CanFrame): TransmitReceipt {
    const node = this.getNode(handle);
    const address = node.handle.address;

    if (!this.active) {
      this.stats.errorCount++;
      throw new BusNotActiveError();
    }
    if (!node.active) {
      this.stats.errorCount++;
      throw new NodeInactiveError(address);
    }
    if (node.txQueue.length >= node.txQueueCapacity) {
      this.stats.errorCount++;
      this.logger.warn('Transmit queue full', { address, identifier: frame.identifier });
      throw new QueueFullError(address, node.txQueueCapacity);
    }

    const queuedAt = Date.now();
    const outbound: BusFrame = {
      identifier: frame.identifier,
      format: frame.format,
      payload: frame.payload,
      dlc: frame.dlc,
      tag: frame.tag,
      raw: frame.raw,
      direction: 'outbound',
      timestamp: queuedAt,
      source: address,
      sequence: ++this.sequence,
    };
    node.txQueue.push(outbound);
    this.stats.framesTransmitted++;

    this.logger.trace('Frame queued', { address, identifier: frame.identifier, dlc: frame.dlc });
    return { sequence: outbound.sequence, queuedAt, pending: node.txQueue.length };
  }

  /**
   * Drains the frames pending for a node at the time of the call.
   * Lazy: a frame leaves the queue when the iterator reaches it.
   */
  public poll(handle: NodeHandle): IterableIterator<BusFrame> {
    const node = this.getNode(handle);
    return this.drainQueue(node, node.rxQueue.length);
  }

  public pendingReceive(handle: NodeHandle): number {
    return this.getNode(handle).rxQueue.length;
  }

  public pendingTransmit(handle: NodeHandle): number {
    return this.getNode(handle).txQueue.length;
  }

  private *drainQueue(node: BusNode, count: number): Generator<BusFrame, void, undefined> {
    for (let i = 0; i < count; i++) {
      const frame = node.rxQueue.shift();
      if (!frame) return;
      node.framesReceived++;
      yield frame;
    }
  }

  /**
   * One delivery pass: arbitrate all pending frames and deliver them to matching receivers
   * in ascending identifier order. Passes never interleave.
   */
  public async runCycle(): Promise<CycleResult> {
    return this.deliveryMutex.runExclusive(() => this.deliverPending());
  }

  private deliverPending(): CycleResult {
    if (!this.active) {
      return { delivered: 0, dropped: 0, deferred: 0 };
    }

    const pending: BusFrame[] = [];
    for (const node of this.nodes.values()) {
      if (node.active) pending.push(...node.txQueue);
    }
    pending.sort(compareArbitration);

    const winners = pending.slice(0, this.maxFramesPerCycle);
    const won = new Set(winners);
    const deferred = pending.length - winners.length;

    // Staged so that no receiver sees half of a pass
    const staged = new Map<number, BusFrame[]>();
    const now = Date.now();
    let delivered = 0;
    let dropped = 0;

    for (const frame of winners) {
      const sender = this.findByAddress(frame.source);
      if (sender) sender.framesSent++;
      this.loadMeter.record(frameBits(frame), now);

      for (const receiver of this.nodes.values()) {
        if (!receiver.active) continue;
        if (!this.loopback && receiver.handle.address === frame.source) continue;
        if (!acceptsFrame(receiver.filters, frame)) continue;

        const inbox = staged.get(receiver.handle.id) ?? [];
        if (receiver.rxQueue.length + inbox.length >= receiver.rxQueueCapacity) {
          receiver.droppedFrames++;
          dropped++;
          this.logger.debug('Receive queue full, frame dropped', {
            address: receiver.handle.address,
            identifier: frame.identifier,
          });
          continue;
        }
        inbox.push({ ...frame, direction: 'inbound', timestamp: now });
        staged.set(receiver.handle.id, inbox);
        delivered++;
      }
    }

    for (const node of this.nodes.values()) {
      if (node.txQueue.length > 0) {
        node.txQueue = node.txQueue.filter(frame => !won.has(frame));
      }
      const inbox = staged.get(node.handle.id);
      if (inbox) node.rxQueue.push(...inbox);
    }

    this.stats.cycles++;
    this.stats.framesDelivered += delivered;
    this.stats.framesDropped += dropped;

    if (winners.length > 0) {
      this.logger.trace('Cycle completed', { delivered, dropped, deferred });
    }
    return { delivered, dropped, deferred };
  }

  // =========================================================
  // Accounting
  // =========================================================

  /**
   * Bus load fraction (0.0–1.0) over the utilization window.
   */
  public getLoad(): number {
    return this.loadMeter.load();
  }

  public getNodeStatus(handle: NodeHandle): NodeStatus {
    return this.describeNode(this.getNode(handle));
  }

  public getStatus(): BusStatus {
    return {
      active: this.active,
      bitrate: this.bitrate,
      load: this.getLoad(),
      ...this.stats,
      nodes: Array.from(this.nodes.values(), node => this.describeNode(node)),
    };
  }

  public getStatistics(): BusStatistics {
    const { framesTransmitted, framesDelivered, framesDropped, errorCount } = this.stats;
    const totalFrames = framesTransmitted + framesDelivered;
    const failures = errorCount + framesDropped;
    return {
      totalFrames,
      framesTransmitted,
      framesDelivered,
      framesDropped,
      errorCount,
      errorRatePercent: Math.round((failures / Math.max(totalFrames + errorCount, 1)) * 10000) / 100,
      loadPercent: Math.round(this.getLoad() * 10000) / 100,
    };
  }

  private describeNode(node: BusNode): NodeStatus {
    return {
      id: node.handle.id,
      address: node.handle.address,
      active: node.active,
      txQueueSize: node.txQueue.length,
      rxQueueSize: node.rxQueue.length,
      txQueueCapacity: node.txQueueCapacity,
      rxQueueCapacity: node.rxQueueCapacity,
      framesSent: node.framesSent,
      framesReceived: node.framesReceived,
      droppedFrames: node.droppedFrames,
      filters: [...node.filters],
    };
  }

  private getNode(handle: NodeHandle): BusNode {
    const node = this.nodes.get(handle.id);
    if (!node || node.handle !== handle) throw new NodeNotRegisteredError(handle.id);
    return node;
  }

  private findByAddress(address: number): BusNode | undefined {
    for (const node of this.nodes.values()) {
      if (node.handle.address === address) return node;
    }
    return undefined;
  }
}
