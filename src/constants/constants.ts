// src/constants/constants.ts

/**
 * Standard CAN bitrates (bit/s)
 */
export const BUS_BITRATES = {
  RATE_125K: 125_000,
  RATE_250K: 250_000,
  RATE_500K: 500_000,
  RATE_1M: 1_000_000,
} as const;

export type BusBitrate = (typeof BUS_BITRATES)[keyof typeof BUS_BITRATES];

/**
 * Identifier widths
 */
export const MAX_STANDARD_IDENTIFIER = 0x7ff;
export const MAX_EXTENDED_IDENTIFIER = 0x1fffffff;
export const MAX_PAYLOAD_LENGTH = 8;

/**
 * Frame length on the wire in bits, without bit stuffing.
 * Standard: SOF+ID+RTR+IDE+r0+DLC+CRC+delimiters+ACK+EOF = 44, +3 interframe space.
 * Extended: 20 more bits for SRR, IDE, the 18-bit extension and r1.
 */
export const STANDARD_FRAME_OVERHEAD_BITS = 47;
export const EXTENDED_FRAME_OVERHEAD_BITS = 67;

/**
 * Message categories resolved from identifier ranges
 */
export const MESSAGE_CATEGORIES = {
  SENSOR: 'sensor',
  ACTUATOR: 'actuator',
  SYSTEM_CONTROL: 'system-control',
  UNCLASSIFIED: 'unclassified',
} as const;

/**
 * Application-layer roles
 */
export const DEVICE_ROLES = {
  CONTROLLER: 'controller',
  TASK_CONTROLLER: 'task-controller',
  VIRTUAL_TERMINAL: 'virtual-terminal',
  IMPLEMENT: 'implement',
  BROADCAST: 'broadcast',
} as const;

/** Role codes carried in announcement frames */
export const ROLE_CODES = {
  controller: 0x00,
  'task-controller': 0x01,
  'virtual-terminal': 0x02,
  implement: 0x03,
} as const;

/**
 * Reserved application addresses
 */
export const ADDRESSES = {
  CONTROLLER: 0xf0,
  TASK_CONTROLLER: 0xf7,
  VIRTUAL_TERMINAL: 0x26,
  NULL: 0xfe,
  BROADCAST: 0xff,
} as const;

export const MAX_NODE_ADDRESS = 0xff;

/**
 * PDU format (PF) byte per message family of the application protocol
 */
export const PDU_FORMATS = {
  TASK_CONTROL: 0xca,
  PROCESS_DATA: 0xcb,
  VT_TO_ECU: 0xe6,
  ECU_TO_VT: 0xe7,
  NETWORK_MANAGEMENT: 0xee,
} as const;

export const DEFAULT_MESSAGE_PRIORITY = 6;
export const CONTROL_MESSAGE_PRIORITY = 3;

/**
 * Network management opcodes (first payload byte)
 */
export const NETWORK_OPCODES = {
  ANNOUNCE: 0x01,
  CONNECT_ACK: 0x02,
  DISCONNECT: 0x03,
  HEARTBEAT: 0x04,
} as const;

/** Task ids 1-254 name single tasks; 0xFF addresses every task of the receiver */
export const MAX_TASK_ID = 0xfe;
export const BROADCAST_TASK_ID = 0xff;

/**
 * Task control opcodes
 */
export const TASK_OPCODES = {
  START: 0x01,
  ACK: 0x02,
  STATUS: 0x03,
  PAUSE: 0x04,
  RESUME: 0x05,
  END: 0x06,
  ABORT: 0x07,
} as const;

/**
 * Implement-side status codes carried in task status frames
 */
export const TASK_STATUS_CODES = {
  WORKING: 0x00,
  IDLE: 0x01,
  FINISHED: 0x02,
  FAILED: 0x03,
} as const;

/**
 * Process data opcodes
 */
export const PROCESS_DATA_OPCODES = {
  SET_VALUE: 0x01,
  SET_ACK: 0x02,
  REQUEST_VALUE: 0x03,
  RESPONSE_VALUE: 0x04,
  INITIAL_VALUE: 0x05,
  SET_NACK: 0x06,
} as const;

/**
 * Negative acknowledgement reasons sent by implements
 */
export const PROCESS_DATA_NACK_REASONS: Record<number, string> = {
  1: 'Unknown parameter',
  2: 'Value out of range',
  3: 'Task not active',
  4: 'Implement busy',
};

/**
 * Capability bits declared in announcement frames
 */
export const DEVICE_CAPABILITIES = {
  SECTION_CONTROL: 0x0001,
  RATE_CONTROL: 0x0002,
  GEO_LOGGING: 0x0004,
  VIRTUAL_TERMINAL_CLIENT: 0x0008,
  PROCESS_DATA: 0x0010,
  IRRIGATION: 0x0020,
  FERTILIZER: 0x0040,
} as const;

export type DeviceCapability = keyof typeof DEVICE_CAPABILITIES;

/**
 * Sensor class -> standard identifier
 */
export const SENSOR_IDENTIFIERS = {
  temperature: 0x100,
  humidity: 0x101,
  pressure: 0x102,
  'soil-moisture': 0x103,
  npk: 0x104,
  other: 0x1ff,
} as const;

export type SensorType = keyof typeof SENSOR_IDENTIFIERS;

/**
 * Actuator command codes (first payload byte of an actuator frame)
 */
export const ACTUATOR_COMMANDS = {
  START: 0x01,
  STOP: 0x02,
  SET_RATE: 0x03,
  STATUS: 0x04,
} as const;

/**
 * Default identifier ranges registered at startup
 */
export const DEFAULT_IDENTIFIER_RANGES = [
  { category: 'system-control', low: 0x000, high: 0x0ff, format: 'standard' },
  { category: 'sensor', low: 0x100, high: 0x1ff, format: 'standard' },
  { category: 'actuator', low: 0x200, high: 0x2ff, format: 'standard' },
  { category: 'system-control', low: 0x0, high: MAX_EXTENDED_IDENTIFIER, format: 'extended' },
] as const;

export const DEFAULT_ACTUATOR_BASE_IDENTIFIER = 0x200;

/**
 * Bus defaults
 */
export const DEFAULT_BUS_OPTIONS = {
  bitrate: BUS_BITRATES.RATE_250K,
  txQueueCapacity: 64,
  rxQueueCapacity: 64,
  loadWindowMs: 1000,
  maxFramesPerCycle: Number.POSITIVE_INFINITY,
  loopback: false,
} as const;

/**
 * Protocol engine defaults
 */
export const DEFAULT_ENGINE_OPTIONS = {
  address: ADDRESSES.TASK_CONTROLLER,
  livenessWindowMs: 3000,
  requestTimeoutMs: 1000,
  maxTaskHistory: 32,
  maxRecordedErrors: 10,
} as const;

/**
 * Cycle runner defaults
 */
export const DEFAULT_CYCLE_INTERVAL_MS = 10;
