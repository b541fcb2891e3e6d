// src/stack.ts

import Logger from './logger.js';
import { CanBus } from './bus/can-bus.js';
import { createDefaultRegistry } from './addressing/identifier-registry.js';
import type { IdentifierRegistry } from './addressing/identifier-registry.js';
import { ProtocolEngine } from './application/protocol-engine.js';
import { CycleRunner } from './cycle-runner.js';
import type {
  BusOptions,
  DrainReport,
  FrameFormat,
  LogLevel,
  ProtocolEngineOptions,
  RangeCategory,
  Role,
} from './types/fieldbus-types.js';

export interface FieldBusStackConfig {
  bus?: Omit<BusOptions, 'logger' | 'logLevel'>;
  engine?: Omit<ProtocolEngineOptions, 'logger' | 'logLevel'>;
  /** Ranges registered on top of the defaults */
  ranges?: Array<{ category: RangeCategory; low: number; high: number; format?: FrameFormat }>;
  /** Reserved addresses registered on top of the defaults */
  roles?: Array<{ address: number; role: Role }>;
  /** Period of the cycle runner in ms; no runner is created when omitted */
  cycleInterval?: number;
  /** Extra steps the runner executes after the engine cycle */
  cycleSteps?: Array<() => Promise<unknown>>;
  onCycleError?: (error: Error, stepIndex: number) => void;
  logger?: Logger;
  logLevel?: LogLevel;
}

export interface FieldBusStack {
  logger: Logger;
  registry: IdentifierRegistry;
  bus: CanBus;
  engine: ProtocolEngine;
  runner: CycleRunner | null;
  /** Starts the bus, the engine and, if configured, the runner */
  start(): void;
  stop(): void;
  processCycle(): Promise<DrainReport>;
}

/**
 * Wires registry, bus, engine and runner around one shared logger.
 */
export function createFieldBusStack(config: FieldBusStackConfig = {}): FieldBusStack {
  const logger = config.logger ?? new Logger();
  const logLevel = config.logLevel;

  const registry = createDefaultRegistry({ logger, logLevel });
  for (const { category, low, high, format } of config.ranges ?? []) {
    registry.registerRange(category, low, high, format);
  }
  for (const { address, role } of config.roles ?? []) {
    registry.registerRole(address, role);
  }

  const bus = new CanBus({ ...config.bus, logger, logLevel });
  const engine = new ProtocolEngine(bus, registry, { ...config.engine, logger, logLevel });

  const runner =
    config.cycleInterval === undefined
      ? null
      : new CycleRunner({
          id: 'fieldbus',
          interval: config.cycleInterval,
          steps: [() => engine.processCycle(), ...(config.cycleSteps ?? [])],
          onError: config.onCycleError,
          logger,
          logLevel,
        });

  return {
    logger,
    registry,
    bus,
    engine,
    runner,
    start() {
      if (!bus.isActive()) bus.start(config.bus?.bitrate);
      engine.start();
      runner?.start();
    },
    stop() {
      runner?.stop();
      engine.stop();
      bus.stop();
    },
    processCycle() {
      return engine.processCycle();
    },
  };
}
