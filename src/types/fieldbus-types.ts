// src/types/fieldbus-types.ts

import type Logger from '../logger.js';
import type {
  BusBitrate,
  DeviceCapability,
  DEVICE_ROLES,
  MESSAGE_CATEGORIES,
} from '../constants/constants.js';

// !=============================================================================
// ! Frames
// !=============================================================================

export type FrameFormat = 'standard' | 'extended';

export type FrameDirection = 'outbound' | 'inbound';

/** Encoded frame: everything here is part of the wire identity */
export interface CanFrame {
  readonly identifier: number;
  readonly format: FrameFormat;
  readonly payload: Uint8Array;
  readonly dlc: number;
  readonly tag: number;
  readonly raw: Uint8Array;
}

/** Result of decoding raw wire bytes */
export interface DecodedFrame {
  identifier: number;
  format: FrameFormat;
  payload: Uint8Array;
}

/** A frame as it travels over the bus, with transport metadata */
export interface BusFrame extends CanFrame {
  readonly direction: FrameDirection;
  readonly timestamp: number;
  readonly source: number;
  readonly sequence: number;
}

export type PayloadInput = Uint8Array | readonly number[];

export type TagFunction = (data: Uint8Array) => Uint8Array;

// !=============================================================================
// ! Bus transport
// !=============================================================================

export type FrameFilter =
  | { kind: 'exact'; identifier: number; format?: FrameFormat }
  | { kind: 'range'; low: number; high: number; format?: FrameFormat }
  | { kind: 'mask'; mask: number; match: number; format?: FrameFormat }
  | { kind: 'accept-all' };

export interface NodeHandle {
  readonly id: number;
  readonly address: number;
}

export interface NodeOptions {
  txQueueCapacity?: number;
  rxQueueCapacity?: number;
}

export interface BusOptions {
  bitrate?: BusBitrate;
  txQueueCapacity?: number;
  rxQueueCapacity?: number;
  /** Width of the utilization window */
  loadWindowMs?: number;
  /** Frames delivered per cycle; arbitration losers wait for the next cycle */
  maxFramesPerCycle?: number;
  /** Deliver frames back to the sending node too */
  loopback?: boolean;
  logger?: Logger;
  logLevel?: LogLevel;
}

export interface TransmitReceipt {
  sequence: number;
  queuedAt: number;
  pending: number;
}

export interface CycleResult {
  delivered: number;
  dropped: number;
  deferred: number;
}

export interface NodeStatus {
  id: number;
  address: number;
  active: boolean;
  txQueueSize: number;
  rxQueueSize: number;
  txQueueCapacity: number;
  rxQueueCapacity: number;
  framesSent: number;
  framesReceived: number;
  droppedFrames: number;
  filters: FrameFilter[];
}

export interface BusStatus {
  active: boolean;
  bitrate: BusBitrate;
  load: number;
  framesTransmitted: number;
  framesDelivered: number;
  framesDropped: number;
  cycles: number;
  errorCount: number;
  nodes: NodeStatus[];
}

export interface BusStatistics {
  totalFrames: number;
  framesTransmitted: number;
  framesDelivered: number;
  framesDropped: number;
  errorCount: number;
  /** Percentage of rejected transmissions and drops among all frames */
  errorRatePercent: number;
  loadPercent: number;
}

// !=============================================================================
// ! Addressing
// !=============================================================================

export type MessageCategory = (typeof MESSAGE_CATEGORIES)[keyof typeof MESSAGE_CATEGORIES];

export type RangeCategory = Exclude<MessageCategory, 'unclassified'>;

export type Role = (typeof DEVICE_ROLES)[keyof typeof DEVICE_ROLES];

export type DeviceRole = Exclude<Role, 'broadcast'>;

export interface IdentifierRange {
  readonly category: RangeCategory;
  readonly low: number;
  readonly high: number;
  readonly format: FrameFormat;
}

/** Fields of a 29-bit application identifier */
export interface ProtocolIdentifier {
  priority: number;
  pduFormat: number;
  destination: number;
  source: number;
}

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Structured fields attached to a log line */
export interface LogContext {
  address?: number;
  identifier?: number;
  taskId?: number;
  ddi?: number;
  category?: string;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

/** Named child logger */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  group(): void;
  groupEnd(): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Devices
// !=============================================================================

export type DeviceState = 'unknown' | 'discovered' | 'connected' | 'active' | 'disconnected';

export interface DeviceRecord {
  address: number;
  role: DeviceRole;
  capabilities: DeviceCapability[];
  state: DeviceState;
  discoveredAt: number;
  lastSeen: number;
}

export type DisconnectReason = 'disconnect-frame' | 'liveness-timeout';

export type DeviceStateHandler = (
  device: Readonly<DeviceRecord>,
  previous: DeviceState,
  reason?: DisconnectReason
) => void;

// !=============================================================================
// ! Tasks and process data
// !=============================================================================

export type TaskState = 'requested' | 'assigned' | 'running' | 'suspended' | 'completed' | 'aborted';

export interface ParameterDefinition {
  /** Data dictionary identifier (16 bit) */
  readonly ddi: number;
  readonly name: string;
  readonly unit: string;
  readonly low: number;
  readonly high: number;
  /** Wire value = round(value * scale), int32 */
  readonly scale?: number;
}

export interface ProcessDataParameter {
  definition: ParameterDefinition;
  /** Last value confirmed by the implement; null until one is known */
  value: number | null;
  updatedAt: number;
}

export interface InitialParameter {
  definition: ParameterDefinition;
  value: number;
}

/** Task identifier or a parameter reference: by DDI or by name */
export type ParameterKey = number | string;

export interface Task {
  id: number;
  implementAddress: number;
  state: TaskState;
  parameters: Map<number, ProcessDataParameter>;
  progress: number;
  createdAt: number;
  updatedAt: number;
  endReason?: string;
}

export interface SetParameterReceipt {
  taskId: number;
  ddi: number;
  value: number;
  tracked: boolean;
}

export interface RequestParameterOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type TaskEvent =
  | { type: 'state'; task: Readonly<Task>; previous: TaskState }
  | { type: 'parameter'; task: Readonly<Task>; parameter: ProcessDataParameter }
  | { type: 'parameter-rejected'; task: Readonly<Task>; ddi: number; reason: string };

export type TaskEventHandler = (event: TaskEvent) => void;

// !=============================================================================
// ! Operator interface
// !=============================================================================

export interface VirtualTerminalMessage {
  source: number;
  destination: number;
  commandId: number;
  screenId: number;
  data: Uint8Array;
}

export type VirtualTerminalHandler = (message: VirtualTerminalMessage) => void;

// !=============================================================================
// ! Engine
// !=============================================================================

export interface InboundFrame {
  frame: BusFrame;
  category: MessageCategory;
  payload: Uint8Array;
}

export type FrameHandler = (inbound: InboundFrame) => void;

export interface ProtocolEngineOptions {
  address?: number;
  livenessWindowMs?: number;
  /** How long an address stays reserved after its device disconnected */
  addressHoldMs?: number;
  requestTimeoutMs?: number;
  maxTaskHistory?: number;
  maxRecordedErrors?: number;
  actuatorBaseIdentifier?: number;
  /** Bus filters of the engine node; derived from the registry ranges when omitted */
  nodeFilters?: FrameFilter[];
  nodeOptions?: NodeOptions;
  tagFn?: TagFunction;
  logger?: Logger;
  logLevel?: LogLevel;
}

export interface DrainReport {
  received: number;
  handled: number;
  dropped: number;
  disconnected: number;
}

export interface RecordedError {
  name: string;
  message: string;
  timestamp: number;
  identifier?: number;
  address?: number;
}

export interface DiagnosticsStats {
  uptimeSeconds: number;
  totalSessions: number;
  framesReceived: number;
  framesHandled: number;
  framesSent: number;
  framesDropped: number;
  framesByCategory: Record<MessageCategory, number>;
  errorCount: number;
  /** Errors per received frame, percent; null before the first frame */
  errorRate: number | null;
  errorCounts: Record<string, number>;
  commonErrors: Array<{ name: string; count: number }>;
  lastErrors: RecordedError[];
  lastErrorTimestamp: number | null;
}

export interface DiagnosticsOptions {
  maxRecordedErrors?: number;
  /** Error rate (percent) above which analyze() reports the engine unhealthy */
  errorRateThreshold?: number;
  logger?: Logger;
  logLevel?: LogLevel;
}

export interface AnalysisResult {
  warnings: string[];
  isHealthy: boolean;
  stats: DiagnosticsStats;
}

// !=============================================================================
// ! Cycle runner
// !=============================================================================

export interface CycleRunnerOptions {
  id?: string;
  interval?: number;
  steps: Array<() => Promise<unknown>>;
  onError?: (error: Error, stepIndex: number) => void;
  logger?: Logger;
  logLevel?: LogLevel;
}

export interface CycleRunnerStats {
  totalRuns: number;
  totalErrors: number;
  lastError: Error | null;
  lastRunTime: number | null;
}

export interface CycleRunnerState {
  stopped: boolean;
  paused: boolean;
  inProgress: boolean;
}

// !=============================================================================
// ! Implement emulator
// !=============================================================================

export interface ImplementEmulatorOptions {
  role?: DeviceRole;
  capabilities?: DeviceCapability[];
  /** Acknowledge task start frames automatically */
  autoAcknowledgeTasks?: boolean;
  /** Acknowledge set-value frames automatically */
  autoAcknowledgeSets?: boolean;
  /** Answer value requests automatically */
  autoRespond?: boolean;
  /** Parameter value ranges the emulator enforces (nack outside them) */
  limits?: Record<number, { low: number; high: number; scale?: number }>;
  nodeOptions?: NodeOptions;
  loggerEnabled?: boolean;
  logger?: Logger;
}

export interface EmulatedTask {
  taskId: number;
  controller: number;
  state: 'assigned' | 'working' | 'paused' | 'ended' | 'aborted';
  values: Map<number, number>;
}
