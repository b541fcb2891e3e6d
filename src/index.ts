// src/index.ts

export { default as Logger } from './logger.js';
export * from './errors.js';
export * from './constants/constants.js';
export type * from './types/fieldbus-types.js';

export { CanFramer, encodeFrame, decodeFrame, isValidIdentifier, maxIdentifier } from './framers/can-framer.js';
export { crc15Can } from './utils/crc.js';

export { CanBus, compareArbitration } from './bus/can-bus.js';
export { ACCEPT_ALL, acceptsFrame, describeFilter, filterMatches, validateFilter } from './bus/frame-filter.js';
export { LoadMeter, frameBits } from './bus/load-meter.js';

export { composeIdentifier, parseIdentifier } from './addressing/protocol-identifier.js';
export { IdentifierRegistry, createDefaultRegistry } from './addressing/identifier-registry.js';
export type { IdentifierRegistryOptions } from './addressing/identifier-registry.js';

export * from './messages/network-management.js';
export * from './messages/task-control.js';
export * from './messages/process-data.js';
export * from './messages/virtual-terminal.js';
export * from './messages/sensor-reading.js';
export * from './messages/actuator-command.js';

export { ProtocolEngine } from './application/protocol-engine.js';
export { DeviceRegistry } from './application/device-registry.js';
export type { DeviceRegistryOptions } from './application/device-registry.js';
export { TaskManager, assertInRange, canTransition, isActive, isTerminal } from './application/task-manager.js';
export type { TaskManagerOptions } from './application/task-manager.js';
export { RequestTracker } from './application/request-tracker.js';
export type { RequestKey } from './application/request-tracker.js';
export { VirtualTerminalRouter } from './application/vt-router.js';
export type { RouteResult } from './application/vt-router.js';
export { ProtocolDiagnostics } from './utils/diagnostics.js';

export { ImplementEmulator } from './implement-emulator/implement-emulator.js';
export { CycleRunner } from './cycle-runner.js';
export { createFieldBusStack } from './stack.js';
export type { FieldBusStack, FieldBusStackConfig } from './stack.js';
