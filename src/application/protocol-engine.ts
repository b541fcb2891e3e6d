// src/application/protocol-engine.ts

import Logger from '../logger.js';
import { CanBus } from '../bus/can-bus.js';
import { CanFramer } from '../framers/can-framer.js';
import { IdentifierRegistry } from '../addressing/identifier-registry.js';
import { composeIdentifier, parseIdentifier } from '../addressing/protocol-identifier.js';
import { DeviceRegistry } from './device-registry.js';
import { TaskManager, assertInRange, canTransition, isActive, isTerminal } from './task-manager.js';
import { RequestTracker } from './request-tracker.js';
import { VirtualTerminalRouter } from './vt-router.js';
import type { RouteResult } from './vt-router.js';
import { ProtocolDiagnostics } from '../utils/diagnostics.js';
import { buildConnectAck, parseNetworkMessage } from '../messages/network-management.js';
import {
  buildTaskAbort,
  buildTaskCommand,
  buildTaskStart,
  parseTaskControlMessage,
} from '../messages/task-control.js';
import type { TaskCommand } from '../messages/task-control.js';
import {
  buildProcessData,
  fromWireValue,
  parseProcessData,
  toWireValue,
} from '../messages/process-data.js';
import { buildVirtualTerminalMessage, parseVirtualTerminalMessage } from '../messages/virtual-terminal.js';
import { actuatorIdentifier, buildActuatorCommand } from '../messages/actuator-command.js';
import { sensorIdentifier } from '../messages/sensor-reading.js';
import {
  ADDRESSES,
  BROADCAST_TASK_ID,
  CONTROL_MESSAGE_PRIORITY,
  DEFAULT_ACTUATOR_BASE_IDENTIFIER,
  DEFAULT_ENGINE_OPTIONS,
  DEFAULT_MESSAGE_PRIORITY,
  MESSAGE_CATEGORIES,
  PDU_FORMATS,
  PROCESS_DATA_NACK_REASONS,
} from '../constants/constants.js';
import type { DeviceCapability, SensorType } from '../constants/constants.js';
import {
  BusNotActiveError,
  InvalidTransitionError,
  ProtocolViolationError,
  QueueFullError,
  RequestCancelledError,
  TaskNotActiveError,
  UnclassifiedIdentifierError,
  UnknownAddressError,
  UnknownTaskError,
  toError,
} from '../errors.js';
import type {
  AnalysisResult,
  BusFrame,
  CanFrame,
  DecodedFrame,
  DeviceRecord,
  DeviceRole,
  DeviceState,
  DeviceStateHandler,
  DiagnosticsStats,
  DisconnectReason,
  DrainReport,
  FrameFilter,
  FrameFormat,
  FrameHandler,
  InboundFrame,
  InitialParameter,
  LoggerInstance,
  NodeHandle,
  ParameterDefinition,
  ParameterKey,
  PayloadInput,
  ProcessDataParameter,
  ProtocolEngineOptions,
  RangeCategory,
  RequestParameterOptions,
  Role,
  SetParameterReceipt,
  Task,
  TaskEventHandler,
  TaskState,
  TransmitReceipt,
  VirtualTerminalHandler,
  VirtualTerminalMessage,
} from '../types/fieldbus-types.js';

/**
 * Application protocol engine: device discovery, task lifecycle, process data and
 * operator interface routing on top of a {@link CanBus} node.
 *
 * Inbound traffic is processed only by {@link ProtocolEngine.drain} (or
 * {@link ProtocolEngine.processCycle}); every handler runs from there.
 */
export class ProtocolEngine {
  public readonly address: number;

  private readonly bus: CanBus;
  private readonly registry: IdentifierRegistry;
  private readonly framer: CanFramer;
  private readonly devices: DeviceRegistry;
  private readonly tasks: TaskManager;
  private readonly requests: RequestTracker;
  private readonly vtRouter = new VirtualTerminalRouter();
  private readonly diagnostics: ProtocolDiagnostics;
  private readonly frameHandlers = new Map<RangeCategory, Set<FrameHandler>>();
  private readonly logger: LoggerInstance;

  private readonly actuatorBaseIdentifier: number;
  private readonly nodeFilters?: FrameFilter[];
  private readonly nodeOptions: ProtocolEngineOptions['nodeOptions'];
  private node: NodeHandle | null = null;
  private disconnectsInDrain: number = 0;

  constructor(bus: CanBus, registry: IdentifierRegistry, options: ProtocolEngineOptions = {}) {
    this.bus = bus;
    this.registry = registry;
    this.address = options.address ?? DEFAULT_ENGINE_OPTIONS.address;
    this.actuatorBaseIdentifier = options.actuatorBaseIdentifier ?? DEFAULT_ACTUATOR_BASE_IDENTIFIER;
    this.nodeFilters = options.nodeFilters;
    this.nodeOptions = options.nodeOptions;
    this.framer = new CanFramer(options.tagFn);

    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('ProtocolEngine');
    this.logger.setLevel(options.logLevel ?? 'info');

    const livenessWindowMs = options.livenessWindowMs ?? DEFAULT_ENGINE_OPTIONS.livenessWindowMs;
    this.devices = new DeviceRegistry({
      livenessWindowMs,
      addressHoldMs: options.addressHoldMs ?? livenessWindowMs,
      logger: loggerInstance,
      logLevel: options.logLevel,
    });
    this.tasks = new TaskManager({
      maxTaskHistory: options.maxTaskHistory,
      logger: loggerInstance,
      logLevel: options.logLevel,
    });
    this.requests = new RequestTracker(options.requestTimeoutMs ?? DEFAULT_ENGINE_OPTIONS.requestTimeoutMs);
    this.diagnostics = new ProtocolDiagnostics({
      maxRecordedErrors: options.maxRecordedErrors,
      logger: loggerInstance,
      logLevel: options.logLevel,
    });
  }

  // =========================================================
  // Lifecycle
  // =========================================================

  /**
   * Freezes the identifier registry and joins the bus.
   */
  public start(): void {
    if (this.node) return;
    this.registry.freeze();
    const filters = this.nodeFilters ?? this.deriveFilters();
    this.node = this.bus.registerNode(this.address, filters, this.nodeOptions);
    this.logger.info('Engine started', { address: this.address, filters: filters.length });
  }

  /**
   * Leaves the bus. Pending requests are cancelled; devices and tasks are kept.
   */
  public stop(): void {
    if (!this.node) return;
    this.requests.rejectAll(new RequestCancelledError('Protocol engine stopped'));
    this.bus.deregisterNode(this.node);
    this.node = null;
    this.logger.info('Engine stopped', { address: this.address });
  }

  public isStarted(): boolean {
    return this.node !== null;
  }

  /**
   * One bus delivery pass followed by a drain.
   */
  public async processCycle(): Promise<DrainReport> {
    await this.bus.runCycle();
    return this.drain();
  }

  /**
   * Processes every frame pending for the engine node, checks device liveness and
   * delivers queued device and task notifications.
   */
  public drain(): DrainReport {
    const node = this.requireNode();
    const now = Date.now();
    let received = 0;
    let handled = 0;
    this.disconnectsInDrain = 0;

    for (const frame of this.bus.poll(node)) {
      received++;
      if (this.processFrame(frame)) handled++;
    }

    for (const device of this.devices.expire(now)) {
      this.onDeviceLost(device.address, 'liveness-timeout');
    }

    this.devices.flushNotifications();
    this.tasks.flushEvents();

    return { received, handled, dropped: received - handled, disconnected: this.disconnectsInDrain };
  }

  // =========================================================
  // Subscriptions
  // =========================================================

  /**
   * Registers a handler for every decoded frame of a category.
   * @returns unsubscribe function
   */
  public onFrame(category: RangeCategory, handler: FrameHandler): () => void {
    const handlers = this.frameHandlers.get(category) ?? new Set<FrameHandler>();
    handlers.add(handler);
    this.frameHandlers.set(category, handlers);
    return () => {
      handlers.delete(handler);
    };
  }

  public onDeviceStateChange(handler: DeviceStateHandler): () => void {
    return this.devices.onStateChange(handler);
  }

  public onTaskEvent(handler: TaskEventHandler): () => void {
    return this.tasks.onEvent(handler);
  }

  public registerScreenHandler(
    screenId: number,
    handler: VirtualTerminalHandler,
    commandId?: number
  ): () => void {
    return this.vtRouter.register(screenId, handler, commandId);
  }

  // =========================================================
  // Domain adapter
  // =========================================================

  /**
   * Transmits a sensor reading on the identifier of its sensor type.
   * @throws InvalidPayloadError | BusNotActiveError | QueueFullError
   */
  public publishSensorReading(sensor: SensorType, payload: PayloadInput): TransmitReceipt {
    const identifier = sensorIdentifier(sensor);
    if (this.registry.classify(identifier, 'standard') !== MESSAGE_CATEGORIES.SENSOR) {
      throw new UnclassifiedIdentifierError(identifier, 'standard');
    }
    return this.send(identifier, payload, 'standard');
  }

  /**
   * Sends an actuator command to a known device or to every device (broadcast, untracked).
   * @throws UnknownAddressError
   */
  public issueActuatorCommand(address: number, command: number, parameters: PayloadInput = []): TransmitReceipt {
    if (address !== ADDRESSES.BROADCAST && !this.devices.has(address)) {
      throw new UnknownAddressError(address);
    }
    const identifier = actuatorIdentifier(this.actuatorBaseIdentifier, address);
    return this.send(identifier, buildActuatorCommand(command, parameters), 'standard');
  }

  // =========================================================
  // Tasks
  // =========================================================

  /**
   * Requests a task on an implement and sends its initial parameter values.
   * A live task on the same implement is aborted first.
   */
  public startTask(address: number, parameters: readonly InitialParameter[] = []): Readonly<Task> {
    const node = this.requireNode();
    if (!this.devices.has(address)) throw new UnknownAddressError(address);

    const initialValues = parameters.map(({ definition, value }) => {
      assertInRange(definition, value);
      return { ddi: definition.ddi, raw: toWireValue(value, definition.scale) };
    });

    // all frames of the start fit in the transmit queue, or none is sent
    const superseded = this.tasks.liveTasks(address);
    const { txQueueSize, txQueueCapacity } = this.bus.getNodeStatus(node);
    if (txQueueCapacity - txQueueSize < superseded.length + 1 + initialValues.length) {
      throw new QueueFullError(this.address, txQueueCapacity);
    }

    for (const live of superseded) {
      this.sendProtocol(PDU_FORMATS.TASK_CONTROL, address, buildTaskAbort(live.id), CONTROL_MESSAGE_PRIORITY);
      this.finishTask(live.id, 'aborted', 'superseded');
    }

    const task = this.tasks.create(address, parameters);
    let startQueued = false;
    try {
      this.sendProtocol(PDU_FORMATS.TASK_CONTROL, address, buildTaskStart(task.id), CONTROL_MESSAGE_PRIORITY);
      startQueued = true;
      for (const { ddi, raw } of initialValues) {
        this.sendProtocol(PDU_FORMATS.PROCESS_DATA, address, buildProcessData('initial', task.id, ddi, raw));
      }
    } catch (err: unknown) {
      if (startQueued) this.sendAbortQuietly(address, task.id);
      this.finishTask(task.id, 'aborted', 'start not transmitted');
      throw err;
    }
    return task;
  }

  public pauseTask(taskId: number): Readonly<Task> {
    return this.commandTask(taskId, 'pause', 'suspended');
  }

  public resumeTask(taskId: number): Readonly<Task> {
    return this.commandTask(taskId, 'resume', 'running');
  }

  public endTask(taskId: number): Readonly<Task> {
    return this.commandTask(taskId, 'end', 'completed');
  }

  public abortTask(taskId: number, reason: number = 0): Readonly<Task> {
    const task = this.requireLiveTask(taskId);
    this.sendProtocol(
      PDU_FORMATS.TASK_CONTROL,
      task.implementAddress,
      buildTaskAbort(taskId, reason),
      CONTROL_MESSAGE_PRIORITY
    );
    return this.finishTask(taskId, 'aborted', 'aborted by controller');
  }

  // =========================================================
  // Process data
  // =========================================================

  /**
   * Sends a new parameter value. The stored value changes only when the implement acknowledges.
   * @throws TaskNotActiveError | OutOfRangeError | UnknownParameterError
   */
  public setParameter(
    taskId: number,
    key: ParameterKey | ParameterDefinition,
    value: number
  ): SetParameterReceipt {
    const task = this.tasks.assertActive(taskId);
    const { definition } = this.tasks.resolveParameter(taskId, key);
    assertInRange(definition, value);

    const raw = toWireValue(value, definition.scale);
    this.sendProtocol(
      PDU_FORMATS.PROCESS_DATA,
      task.implementAddress,
      buildProcessData('set', taskId, definition.ddi, raw)
    );
    this.tasks.addParameter(taskId, definition);
    this.tasks.addPendingSet(taskId, definition.ddi, value);
    this.logger.debug('Parameter set sent', { taskId, ddi: definition.ddi, value });
    return { taskId, ddi: definition.ddi, value, tracked: true };
  }

  /**
   * Sends a parameter value to every implement. No acknowledgment is tracked.
   */
  public broadcastParameter(definition: ParameterDefinition, value: number): SetParameterReceipt {
    assertInRange(definition, value);
    const raw = toWireValue(value, definition.scale);
    this.sendProtocol(
      PDU_FORMATS.PROCESS_DATA,
      ADDRESSES.BROADCAST,
      buildProcessData('set', BROADCAST_TASK_ID, definition.ddi, raw)
    );
    return { taskId: BROADCAST_TASK_ID, ddi: definition.ddi, value, tracked: false };
  }

  /**
   * Asks the implement for a parameter's current value. Settles once a response frame is
   * drained, or rejects with a timeout or cancellation.
   */
  public async requestParameter(
    taskId: number,
    key: ParameterKey | ParameterDefinition,
    options: RequestParameterOptions = {}
  ): Promise<number> {
    const task = this.tasks.assertActive(taskId);
    const { definition } = this.tasks.resolveParameter(taskId, key);
    if (options.signal?.aborted) {
      throw new RequestCancelledError(`Request for DDI ${definition.ddi} cancelled before sending`);
    }

    this.sendProtocol(
      PDU_FORMATS.PROCESS_DATA,
      task.implementAddress,
      buildProcessData('request', taskId, definition.ddi)
    );
    this.tasks.addParameter(taskId, definition);
    return this.requests.wait(
      { address: task.implementAddress, taskId, ddi: definition.ddi },
      options
    );
  }

  public getParameter(taskId: number, key: ParameterKey): ProcessDataParameter {
    return this.tasks.resolveParameter(taskId, key);
  }

  // =========================================================
  // Operator interface
  // =========================================================

  /**
   * Routes an operator interface frame to its screen handler.
   * Failures are recorded and returned, never thrown.
   */
  public routeMessage(frame: CanFrame): RouteResult {
    let message: VirtualTerminalMessage;
    try {
      const decoded = this.framer.decode(frame.raw);
      const { pduFormat, source, destination } = parseIdentifier(decoded.identifier);
      if (
        decoded.format !== 'extended' ||
        (pduFormat !== PDU_FORMATS.VT_TO_ECU && pduFormat !== PDU_FORMATS.ECU_TO_VT)
      ) {
        throw new ProtocolViolationError(
          `Frame 0x${decoded.identifier.toString(16)} is not an operator interface message`
        );
      }
      message = { source, destination, ...parseVirtualTerminalMessage(decoded.payload) };
    } catch (err: unknown) {
      const error = toError(err);
      this.diagnostics.recordError(error, { identifier: frame.identifier });
      return { ok: false, error };
    }

    const result = this.vtRouter.route(message);
    if (!result.ok) {
      this.diagnostics.recordError(result.error, {
        identifier: frame.identifier,
        address: message.source,
      });
    }
    return result;
  }

  public sendVirtualTerminalMessage(
    destination: number,
    commandId: number,
    screenId: number,
    data: PayloadInput = []
  ): TransmitReceipt {
    return this.sendProtocol(
      PDU_FORMATS.ECU_TO_VT,
      destination,
      buildVirtualTerminalMessage(commandId, screenId, data)
    );
  }

  // =========================================================
  // Queries
  // =========================================================

  /**
   * Role of a reserved address or of a known device.
   * @throws UnknownAddressError
   */
  public resolveRole(address: number): Role {
    if (this.registry.hasRole(address)) return this.registry.resolveRole(address);
    const device = this.devices.get(address);
    if (device && device.state !== 'disconnected') return device.role;
    throw new UnknownAddressError(address);
  }

  public getDevice(address: number): Readonly<DeviceRecord> | undefined {
    return this.devices.get(address);
  }

  public getDeviceState(address: number): DeviceState {
    return this.devices.getState(address);
  }

  public listDevices(): Array<Readonly<DeviceRecord>> {
    return this.devices.list();
  }

  /**
   * Makes a held address available to a new device before its hold expires.
   */
  public releaseAddress(address: number): boolean {
    return this.devices.releaseAddress(address);
  }

  public getTask(taskId: number): Readonly<Task> | undefined {
    return this.tasks.get(taskId);
  }

  public listTasks(): Array<Readonly<Task>> {
    return this.tasks.liveTasks();
  }

  public getTaskHistory(): Array<Readonly<Task>> {
    return this.tasks.getHistory();
  }

  public getDiagnostics(): DiagnosticsStats {
    return this.diagnostics.getStats();
  }

  public analyze(): AnalysisResult {
    return this.diagnostics.analyze();
  }

  public get pendingRequests(): number {
    return this.requests.size;
  }

  // =========================================================
  // Inbound processing
  // =========================================================

  private processFrame(frame: BusFrame): boolean {
    let decoded: DecodedFrame;
    try {
      decoded = this.framer.decode(frame.raw);
    } catch (err: unknown) {
      this.diagnostics.recordError(toError(err), { identifier: frame.identifier, address: frame.source });
      return false;
    }

    const category = this.registry.classify(decoded.identifier, decoded.format);
    this.diagnostics.recordFrameReceived(category);
    if (category === MESSAGE_CATEGORIES.UNCLASSIFIED) {
      this.diagnostics.recordError(new UnclassifiedIdentifierError(decoded.identifier, decoded.format), {
        identifier: decoded.identifier,
        address: frame.source,
      });
      return false;
    }

    const sender = decoded.format === 'extended' ? parseIdentifier(decoded.identifier).source : frame.source;
    this.devices.touch(sender, frame.timestamp);

    if (decoded.format === 'extended' && category === MESSAGE_CATEGORIES.SYSTEM_CONTROL) {
      if (!this.handleProtocolFrame(frame, decoded)) return false;
    }

    this.notifyFrame(category, { frame, category, payload: decoded.payload });
    this.diagnostics.recordFrameHandled();
    return true;
  }

  private handleProtocolFrame(frame: BusFrame, decoded: DecodedFrame): boolean {
    const { pduFormat, destination, source } = parseIdentifier(decoded.identifier);
    if (source === this.address) return true;
    if (destination !== this.address && destination !== ADDRESSES.BROADCAST) return true;

    if (pduFormat === PDU_FORMATS.VT_TO_ECU || pduFormat === PDU_FORMATS.ECU_TO_VT) {
      return this.routeMessage(frame).ok;
    }

    try {
      switch (pduFormat) {
        case PDU_FORMATS.NETWORK_MANAGEMENT:
          this.handleNetworkManagement(source, decoded.payload, frame.timestamp);
          break;
        case PDU_FORMATS.TASK_CONTROL:
          this.handleTaskControl(source, decoded.payload);
          break;
        case PDU_FORMATS.PROCESS_DATA:
          this.handleProcessData(source, decoded.payload);
          break;
        default:
          throw new ProtocolViolationError(`Unsupported PDU format 0x${pduFormat.toString(16)}`);
      }
      return true;
    } catch (err: unknown) {
      this.diagnostics.recordError(toError(err), { identifier: decoded.identifier, address: source });
      return false;
    }
  }

  private handleNetworkManagement(source: number, payload: Uint8Array, timestamp: number): void {
    const message = parseNetworkMessage(payload);
    switch (message.opcode) {
      case 'announce':
        this.handleAnnouncement(source, message.role, message.capabilities, timestamp);
        return;
      case 'heartbeat':
        if (!this.devices.has(source)) throw new UnknownAddressError(source);
        return;
      case 'disconnect':
        if (!this.devices.has(source)) throw new UnknownAddressError(source);
        this.devices.disconnect(source, 'disconnect-frame', timestamp);
        this.onDeviceLost(source, 'disconnect-frame');
        return;
      case 'connect-ack':
        throw new ProtocolViolationError(`Unexpected connect acknowledgement from 0x${source.toString(16)}`);
    }
  }

  private handleAnnouncement(
    source: number,
    role: DeviceRole,
    capabilities: DeviceCapability[],
    timestamp: number
  ): void {
    if (this.devices.has(source)) {
      this.logger.debug('Repeated announcement', { address: source });
      this.sendProtocol(PDU_FORMATS.NETWORK_MANAGEMENT, source, buildConnectAck(source), CONTROL_MESSAGE_PRIORITY);
      return;
    }
    if (source === ADDRESSES.NULL || source === ADDRESSES.BROADCAST) {
      throw new ProtocolViolationError(`Announcement from reserved address 0x${source.toString(16)}`);
    }
    if (this.devices.isHeld(source, timestamp)) {
      throw new ProtocolViolationError(`Address 0x${source.toString(16)} is held after a disconnect`);
    }
    if (this.registry.hasRole(source) && this.registry.resolveRole(source) !== role) {
      throw new ProtocolViolationError(
        `Address 0x${source.toString(16)} is reserved for ${this.registry.resolveRole(source)}`
      );
    }

    this.sendProtocol(PDU_FORMATS.NETWORK_MANAGEMENT, source, buildConnectAck(source), CONTROL_MESSAGE_PRIORITY);
    this.devices.discover(source, role, capabilities, timestamp);
    this.devices.markConnected(source);
  }

  private handleTaskControl(source: number, payload: Uint8Array): void {
    const message = parseTaskControlMessage(payload);
    const task = this.requireImplementTask(message.taskId, source);

    switch (message.opcode) {
      case 'ack':
        if (task.state !== 'requested') {
          throw new ProtocolViolationError(`Unsolicited acknowledgement for task ${task.id}`);
        }
        if (message.accepted) {
          this.tasks.transition(task.id, 'assigned');
          if (this.devices.getState(source) === 'connected') this.devices.markActive(source);
        } else {
          this.finishTask(task.id, 'aborted', `rejected by implement (code ${message.code})`);
        }
        return;
      case 'status':
        if (task.state === 'requested') {
          throw new ProtocolViolationError(`Status for task ${task.id} before acknowledgement`);
        }
        this.tasks.setProgress(task.id, message.progress);
        if (message.status === 'finished') {
          this.finishTask(task.id, 'completed', 'finished by implement');
        } else if (message.status === 'failed') {
          this.finishTask(task.id, 'aborted', 'failed on implement');
        } else if (task.state === 'assigned') {
          this.tasks.transition(task.id, 'running');
        }
        return;
      case 'abort':
        this.finishTask(task.id, 'aborted', `aborted by implement (reason ${message.reason})`);
        return;
      default:
        throw new ProtocolViolationError(`Unexpected task ${message.opcode} from implement`);
    }
  }

  private handleProcessData(source: number, payload: Uint8Array): void {
    const message = parseProcessData(payload);
    const task = this.requireImplementTask(message.taskId, source);
    if (!isActive(task.state)) throw new TaskNotActiveError(task.id, task.state);
    const { taskId, ddi } = message;

    switch (message.opcode) {
      case 'set-ack': {
        const value = this.tasks.takePendingSet(taskId, ddi);
        if (value === undefined) {
          throw new ProtocolViolationError(`Unsolicited set acknowledgement for DDI ${ddi}`);
        }
        this.tasks.applyValue(taskId, ddi, value);
        return;
      }
      case 'nack': {
        if (this.tasks.takePendingSet(taskId, ddi) === undefined) {
          throw new ProtocolViolationError(`Unsolicited negative acknowledgement for DDI ${ddi}`);
        }
        this.tasks.rejectValue(
          taskId,
          ddi,
          PROCESS_DATA_NACK_REASONS[message.reason] ?? `reason ${message.reason}`
        );
        return;
      }
      case 'response': {
        const key = { address: source, taskId, ddi };
        if (!this.requests.has(key)) {
          throw new ProtocolViolationError(`Unsolicited response for DDI ${ddi}`);
        }
        const { definition } = this.tasks.resolveParameter(taskId, ddi);
        const value = fromWireValue(message.rawValue, definition.scale);
        this.requests.resolve(key, value);
        // the waiter gets what the implement reported; only in-range values are stored
        assertInRange(definition, value);
        this.tasks.applyValue(taskId, ddi, value);
        return;
      }
      default:
        throw new ProtocolViolationError(`Unexpected process data ${message.opcode} from implement`);
    }
  }

  private notifyFrame(category: RangeCategory, inbound: InboundFrame): void {
    const handlers = this.frameHandlers.get(category);
    if (!handlers) return;
    for (const handler of handlers) {
      try {
        handler(inbound);
      } catch (err: unknown) {
        this.logger.error('Frame handler failed', {
          category,
          identifier: inbound.frame.identifier,
          error: toError(err).message,
        });
      }
    }
  }

  // =========================================================
  // Internals
  // =========================================================

  private onDeviceLost(address: number, reason: DisconnectReason): void {
    this.disconnectsInDrain++;
    const why = reason === 'liveness-timeout' ? 'implement lost' : 'implement disconnected';
    for (const task of this.tasks.liveTasks(address)) {
      this.finishTask(task.id, 'aborted', why);
    }
  }

  private commandTask(
    taskId: number,
    command: TaskCommand,
    to: Exclude<TaskState, 'requested' | 'assigned' | 'aborted'>
  ): Readonly<Task> {
    const task = this.requireLiveTask(taskId);
    if (!canTransition(task.state, to)) {
      throw new InvalidTransitionError(task.state, to);
    }
    this.sendProtocol(
      PDU_FORMATS.TASK_CONTROL,
      task.implementAddress,
      buildTaskCommand(command, taskId),
      CONTROL_MESSAGE_PRIORITY
    );
    return to === 'completed'
      ? this.finishTask(taskId, to, `${command} by controller`)
      : this.tasks.transition(taskId, to);
  }

  /**
   * Terminal transition: waiters for the task are rejected and the implement
   * drops back to connected when it has no active task left.
   */
  private finishTask(taskId: number, to: 'completed' | 'aborted', reason: string): Readonly<Task> {
    const task = this.tasks.transition(taskId, to, reason);
    this.requests.rejectWhere(key => key.taskId === taskId, new TaskNotActiveError(taskId, to));

    const address = task.implementAddress;
    const stillActive = this.tasks.liveTasks(address).some(live => isActive(live.state));
    if (!stillActive && this.devices.getState(address) === 'active') {
      this.devices.markConnected(address);
    }
    return task;
  }

  private sendAbortQuietly(address: number, taskId: number): void {
    try {
      this.sendProtocol(PDU_FORMATS.TASK_CONTROL, address, buildTaskAbort(taskId), CONTROL_MESSAGE_PRIORITY);
    } catch (err: unknown) {
      this.logger.warn('Abort for a partly sent task not transmitted', {
        address,
        taskId,
        error: toError(err).message,
      });
    }
  }

  private requireLiveTask(taskId: number): Readonly<Task> {
    const task = this.tasks.get(taskId);
    if (!task) throw new UnknownTaskError(taskId);
    if (isTerminal(task.state)) throw new TaskNotActiveError(taskId, task.state);
    return task;
  }

  private requireImplementTask(taskId: number, source: number): Readonly<Task> {
    const task = this.tasks.get(taskId);
    if (!task) throw new UnknownTaskError(taskId);
    if (task.implementAddress !== source) {
      throw new ProtocolViolationError(
        `Task ${taskId} belongs to 0x${task.implementAddress.toString(16)}, not 0x${source.toString(16)}`
      );
    }
    if (isTerminal(task.state)) throw new TaskNotActiveError(taskId, task.state);
    return task;
  }

  private deriveFilters(): FrameFilter[] {
    return this.registry
      .getRanges()
      .map(({ low, high, format }): FrameFilter => ({ kind: 'range', low, high, format }));
  }

  private requireNode(): NodeHandle {
    if (!this.node) throw new BusNotActiveError('Protocol engine is not started');
    return this.node;
  }

  private send(identifier: number, payload: PayloadInput, format: FrameFormat): TransmitReceipt {
    const frame = this.framer.encode(identifier, payload, format);
    const receipt = this.bus.transmit(this.requireNode(), frame);
    this.diagnostics.recordFrameSent(identifier);
    return receipt;
  }

  private sendProtocol(
    pduFormat: number,
    destination: number,
    payload: Uint8Array,
    priority: number = DEFAULT_MESSAGE_PRIORITY
  ): TransmitReceipt {
    const identifier = composeIdentifier({ priority, pduFormat, destination, source: this.address });
    return this.send(identifier, payload, 'extended');
  }
}
