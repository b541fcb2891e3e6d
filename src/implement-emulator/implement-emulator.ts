// src/implement-emulator/implement-emulator.ts

import Logger from '../logger.js';
import { CanBus } from '../bus/can-bus.js';
import { CanFramer } from '../framers/can-framer.js';
import { composeIdentifier, parseIdentifier } from '../addressing/protocol-identifier.js';
import { buildAnnounce, buildDisconnect, buildHeartbeat, parseNetworkMessage } from '../messages/network-management.js';
import { buildTaskAbort, buildTaskAck, buildTaskStatus, parseTaskControlMessage } from '../messages/task-control.js';
import type { TaskStatusCode } from '../messages/task-control.js';
import {
  buildProcessData,
  buildProcessDataNack,
  fromWireValue,
  parseProcessData,
  toWireValue,
} from '../messages/process-data.js';
import type { ProcessDataMessage } from '../messages/process-data.js';
import { buildVirtualTerminalMessage, parseVirtualTerminalMessage } from '../messages/virtual-terminal.js';
import type { VirtualTerminalPayload } from '../messages/virtual-terminal.js';
import { actuatorIdentifier, parseActuatorCommand } from '../messages/actuator-command.js';
import type { ActuatorCommand } from '../messages/actuator-command.js';
import { encodeSensorValue, sensorIdentifier } from '../messages/sensor-reading.js';
import {
  ADDRESSES,
  BROADCAST_TASK_ID,
  CONTROL_MESSAGE_PRIORITY,
  DEFAULT_ACTUATOR_BASE_IDENTIFIER,
  DEFAULT_MESSAGE_PRIORITY,
  DEVICE_ROLES,
  PDU_FORMATS,
} from '../constants/constants.js';
import type { DeviceCapability, SensorType } from '../constants/constants.js';
import { BusNotActiveError, ProtocolViolationError, UnknownTaskError, toError } from '../errors.js';
import type {
  BusFrame,
  DeviceRole,
  EmulatedTask,
  FrameFilter,
  ImplementEmulatorOptions,
  LoggerInstance,
  NodeHandle,
  PayloadInput,
  TransmitReceipt,
} from '../types/fieldbus-types.js';

const NACK_UNKNOWN_PARAMETER = 1;
const NACK_OUT_OF_RANGE = 2;
const NACK_TASK_NOT_ACTIVE = 3;

/**
 * A simulated implement on the bus. It announces itself, answers task control and
 * process data frames, and records actuator commands and operator interface messages.
 */
class ImplementEmulator {
  public readonly address: number;
  public connected: boolean = false;
  public controllerAddress: number | null = null;

  private readonly bus: CanBus;
  private readonly framer = new CanFramer();
  private readonly role: DeviceRole;
  private readonly capabilities: DeviceCapability[];
  private readonly autoAcknowledgeTasks: boolean;
  private readonly autoAcknowledgeSets: boolean;
  private readonly autoRespond: boolean;
  private readonly limits: NonNullable<ImplementEmulatorOptions['limits']>;
  private readonly nodeOptions: ImplementEmulatorOptions['nodeOptions'];
  private readonly tasks = new Map<number, EmulatedTask>();
  private readonly commands: ActuatorCommand[] = [];
  private readonly screens: Array<VirtualTerminalPayload & { source: number }> = [];
  private node: NodeHandle | null = null;
  private heartbeatCounter: number = 0;
  private loggerEnabled: boolean;
  private readonly logger: LoggerInstance;

  constructor(bus: CanBus, address: number, options: ImplementEmulatorOptions = {}) {
    if (!Number.isInteger(address) || address < 0 || address >= ADDRESSES.NULL) {
      throw new RangeError(`Implement address must be 0-253, got ${address}`);
    }
    this.bus = bus;
    this.address = address;
    this.role = options.role ?? DEVICE_ROLES.IMPLEMENT;
    this.capabilities = options.capabilities ?? ['PROCESS_DATA'];
    this.autoAcknowledgeTasks = options.autoAcknowledgeTasks ?? true;
    this.autoAcknowledgeSets = options.autoAcknowledgeSets ?? true;
    this.autoRespond = options.autoRespond ?? true;
    this.limits = options.limits ?? {};
    this.nodeOptions = options.nodeOptions;

    this.loggerEnabled = !!options.loggerEnabled;
    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger(`Implement@${address.toString(16)}`);
    this.logger.setLevel(this.loggerEnabled ? 'info' : 'error');
  }

  enableLogger(): void {
    if (!this.loggerEnabled) {
      this.loggerEnabled = true;
      this.logger.setLevel('info');
    }
  }

  disableLogger(): void {
    if (this.loggerEnabled) {
      this.loggerEnabled = false;
      this.logger.setLevel('error');
    }
  }

  // =========================================================
  // Network management
  // =========================================================

  /**
   * Joins the bus and announces the implement. `connected` turns true on the connect-ack.
   */
  join(): TransmitReceipt {
    if (!this.node) {
      this.node = this.bus.registerNode(this.address, this.filters(), this.nodeOptions);
    }
    this.logger.info('Announcing', { address: this.address, role: this.role });
    return this.sendProtocol(
      PDU_FORMATS.NETWORK_MANAGEMENT,
      ADDRESSES.BROADCAST,
      buildAnnounce(this.role, this.capabilities),
      CONTROL_MESSAGE_PRIORITY
    );
  }

  heartbeat(): TransmitReceipt {
    this.heartbeatCounter = (this.heartbeatCounter + 1) & 0xff;
    return this.sendProtocol(
      PDU_FORMATS.NETWORK_MANAGEMENT,
      this.controllerAddress ?? ADDRESSES.BROADCAST,
      buildHeartbeat(this.heartbeatCounter)
    );
  }

  /**
   * Sends a disconnect frame. The node stays on the bus until {@link ImplementEmulator.leave}.
   */
  disconnect(reason: number = 0): TransmitReceipt {
    const receipt = this.sendProtocol(
      PDU_FORMATS.NETWORK_MANAGEMENT,
      this.controllerAddress ?? ADDRESSES.BROADCAST,
      buildDisconnect(reason),
      CONTROL_MESSAGE_PRIORITY
    );
    this.connected = false;
    this.logger.info('Disconnected', { address: this.address });
    return receipt;
  }

  /**
   * Removes the node from the bus without telling anyone.
   */
  leave(): void {
    if (!this.node) return;
    this.bus.deregisterNode(this.node);
    this.node = null;
    this.connected = false;
  }

  // =========================================================
  // Cycle
  // =========================================================

  async processCycle(): Promise<number> {
    await this.bus.runCycle();
    return this.drain();
  }

  /**
   * Handles every pending frame.
   * @returns number of frames processed
   */
  drain(): number {
    const node = this.requireNode();
    let processed = 0;
    for (const frame of this.bus.poll(node)) {
      processed++;
      try {
        this.handleFrame(frame);
      } catch (err: unknown) {
        this.logger.warn(`Frame ignored: ${toError(err).message}`, { identifier: frame.identifier });
      }
    }
    return processed;
  }

  // =========================================================
  // Manual responses
  // =========================================================

  acknowledgeTask(taskId: number, accepted: boolean = true, code: number = 1): TransmitReceipt {
    const task = this.requireTask(taskId);
    if (!accepted) task.state = 'aborted';
    return this.sendProtocol(
      PDU_FORMATS.TASK_CONTROL,
      task.controller,
      buildTaskAck(taskId, accepted, code),
      CONTROL_MESSAGE_PRIORITY
    );
  }

  sendStatus(taskId: number, status: TaskStatusCode, progress: number = 0): TransmitReceipt {
    const task = this.requireTask(taskId);
    if (status === 'working' && task.state === 'assigned') task.state = 'working';
    if (status === 'finished') task.state = 'ended';
    if (status === 'failed') task.state = 'aborted';
    return this.sendProtocol(PDU_FORMATS.TASK_CONTROL, task.controller, buildTaskStatus(taskId, status, progress));
  }

  abortTask(taskId: number, reason: number = 0): TransmitReceipt {
    const task = this.requireTask(taskId);
    task.state = 'aborted';
    return this.sendProtocol(
      PDU_FORMATS.TASK_CONTROL,
      task.controller,
      buildTaskAbort(taskId, reason),
      CONTROL_MESSAGE_PRIORITY
    );
  }

  /**
   * Sends the current value of a parameter as a response frame.
   */
  respond(taskId: number, ddi: number): TransmitReceipt {
    const task = this.requireTask(taskId);
    const raw = task.values.get(ddi);
    if (raw === undefined) {
      return this.sendProtocol(
        PDU_FORMATS.PROCESS_DATA,
        task.controller,
        buildProcessDataNack(taskId, ddi, NACK_UNKNOWN_PARAMETER)
      );
    }
    return this.sendProtocol(PDU_FORMATS.PROCESS_DATA, task.controller, buildProcessData('response', taskId, ddi, raw));
  }

  /**
   * Changes a value locally, as if the operator turned a knob on the implement.
   */
  setLocalValue(taskId: number, ddi: number, value: number): void {
    this.requireTask(taskId).values.set(ddi, toWireValue(value, this.limits[ddi]?.scale));
  }

  publishSensorReading(sensor: SensorType, value: number): TransmitReceipt {
    return this.send(sensorIdentifier(sensor), encodeSensorValue(value), 'standard');
  }

  sendVirtualTerminalMessage(commandId: number, screenId: number, data: PayloadInput = []): TransmitReceipt {
    return this.sendProtocol(
      PDU_FORMATS.VT_TO_ECU,
      this.controllerAddress ?? ADDRESSES.TASK_CONTROLLER,
      buildVirtualTerminalMessage(commandId, screenId, data)
    );
  }

  // =========================================================
  // State
  // =========================================================

  getTask(taskId: number): Readonly<EmulatedTask> | undefined {
    const task = this.tasks.get(taskId);
    return task ? { ...task, values: new Map(task.values) } : undefined;
  }

  getValue(taskId: number, ddi: number): number | undefined {
    const raw = this.tasks.get(taskId)?.values.get(ddi);
    return raw === undefined ? undefined : fromWireValue(raw, this.limits[ddi]?.scale);
  }

  get receivedCommands(): ActuatorCommand[] {
    return this.commands.map(command => ({ ...command, parameters: command.parameters.slice() }));
  }

  get receivedScreens(): Array<VirtualTerminalPayload & { source: number }> {
    return this.screens.map(screen => ({ ...screen, data: screen.data.slice() }));
  }

  // =========================================================
  // Inbound
  // =========================================================

  private handleFrame(frame: BusFrame): void {
    const decoded = this.framer.decode(frame.raw);
    if (decoded.format === 'standard') {
      this.commands.push(parseActuatorCommand(decoded.payload));
      this.logger.info('Actuator command received', { identifier: decoded.identifier });
      return;
    }

    const { pduFormat, source } = parseIdentifier(decoded.identifier);
    switch (pduFormat) {
      case PDU_FORMATS.NETWORK_MANAGEMENT: {
        const message = parseNetworkMessage(decoded.payload);
        if (message.opcode === 'connect-ack' && message.address === this.address) {
          this.connected = true;
          this.controllerAddress = source;
          this.logger.info('Connected', { address: this.address });
        }
        return;
      }
      case PDU_FORMATS.TASK_CONTROL:
        this.handleTaskControl(source, decoded.payload);
        return;
      case PDU_FORMATS.PROCESS_DATA:
        this.handleProcessData(source, parseProcessData(decoded.payload));
        return;
      case PDU_FORMATS.ECU_TO_VT:
        this.screens.push({ source, ...parseVirtualTerminalMessage(decoded.payload) });
        return;
      default:
        throw new ProtocolViolationError(`Unsupported PDU format 0x${pduFormat.toString(16)}`);
    }
  }

  private handleTaskControl(source: number, payload: Uint8Array): void {
    const message = parseTaskControlMessage(payload);
    const { taskId } = message;

    if (message.opcode === 'start') {
      this.tasks.set(taskId, { taskId, controller: source, state: 'assigned', values: new Map() });
      this.logger.info('Task started', { taskId });
      if (this.autoAcknowledgeTasks) this.acknowledgeTask(taskId);
      return;
    }

    const task = this.requireTask(taskId);
    switch (message.opcode) {
      case 'pause':
        task.state = 'paused';
        return;
      case 'resume':
        task.state = 'working';
        return;
      case 'end':
        task.state = 'ended';
        return;
      case 'abort':
        task.state = 'aborted';
        return;
      default:
        throw new ProtocolViolationError(`Unexpected task ${message.opcode} from 0x${source.toString(16)}`);
    }
  }

  private handleProcessData(source: number, message: ProcessDataMessage): void {
    if (message.opcode === 'nack') return;
    const { taskId, ddi } = message;

    if (taskId === BROADCAST_TASK_ID) {
      if (message.opcode === 'set') {
        for (const task of this.tasks.values()) task.values.set(ddi, message.rawValue);
      }
      return;
    }

    const task = this.tasks.get(taskId);
    const live = task !== undefined && task.state !== 'ended' && task.state !== 'aborted';

    switch (message.opcode) {
      case 'initial':
        task?.values.set(ddi, message.rawValue);
        return;
      case 'set':
        if (!this.autoAcknowledgeSets) {
          if (live) task.values.set(ddi, message.rawValue);
          return;
        }
        if (!live) {
          this.sendProtocol(PDU_FORMATS.PROCESS_DATA, source, buildProcessDataNack(taskId, ddi, NACK_TASK_NOT_ACTIVE));
          return;
        }
        if (!this.withinLimits(ddi, message.rawValue)) {
          this.sendProtocol(PDU_FORMATS.PROCESS_DATA, source, buildProcessDataNack(taskId, ddi, NACK_OUT_OF_RANGE));
          return;
        }
        task.values.set(ddi, message.rawValue);
        this.sendProtocol(
          PDU_FORMATS.PROCESS_DATA,
          source,
          buildProcessData('set-ack', taskId, ddi, message.rawValue)
        );
        return;
      case 'request':
        if (this.autoRespond && live) this.respond(taskId, ddi);
        return;
      default:
        return;
    }
  }

  private withinLimits(ddi: number, raw: number): boolean {
    const limit = this.limits[ddi];
    if (!limit) return true;
    const value = fromWireValue(raw, limit.scale);
    return value >= limit.low && value <= limit.high;
  }

  // =========================================================
  // Internals
  // =========================================================

  private filters(): FrameFilter[] {
    return [
      { kind: 'mask', mask: 0xff00, match: this.address << 8, format: 'extended' },
      { kind: 'mask', mask: 0xff00, match: ADDRESSES.BROADCAST << 8, format: 'extended' },
      {
        kind: 'exact',
        identifier: actuatorIdentifier(DEFAULT_ACTUATOR_BASE_IDENTIFIER, this.address),
        format: 'standard',
      },
      {
        kind: 'exact',
        identifier: actuatorIdentifier(DEFAULT_ACTUATOR_BASE_IDENTIFIER, ADDRESSES.BROADCAST),
        format: 'standard',
      },
    ];
  }

  private requireTask(taskId: number): EmulatedTask {
    const task = this.tasks.get(taskId);
    if (!task) throw new UnknownTaskError(taskId);
    return task;
  }

  private requireNode(): NodeHandle {
    if (!this.node) throw new BusNotActiveError('Implement has not joined the bus');
    return this.node;
  }

  private send(identifier: number, payload: PayloadInput, format: 'standard' | 'extended'): TransmitReceipt {
    return this.bus.transmit(this.requireNode(), this.framer.encode(identifier, payload, format));
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

export { ImplementEmulator };
