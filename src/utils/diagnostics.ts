// src/utils/diagnostics.ts

import Logger from '../logger.js';
import { DEFAULT_ENGINE_OPTIONS, MESSAGE_CATEGORIES } from '../constants/constants.js';
import type {
  AnalysisResult,
  DiagnosticsOptions,
  DiagnosticsStats,
  LoggerInstance,
  MessageCategory,
  RecordedError,
} from '../types/fieldbus-types.js';

function emptyCategoryCounts(): Record<MessageCategory, number> {
  return {
    [MESSAGE_CATEGORIES.SENSOR]: 0,
    [MESSAGE_CATEGORIES.ACTUATOR]: 0,
    [MESSAGE_CATEGORIES.SYSTEM_CONTROL]: 0,
    [MESSAGE_CATEGORIES.UNCLASSIFIED]: 0,
  };
}

/**
 * Collects inbound traffic and error statistics of a protocol engine.
 */
class ProtocolDiagnostics {
  private readonly maxRecordedErrors: number;
  private readonly errorRateThreshold: number;
  private readonly logger: LoggerInstance;
  private startTime: number = Date.now();
  private totalSessions: number = 0;

  private framesReceived: number = 0;
  private framesHandled: number = 0;
  private framesSent: number = 0;
  private framesDropped: number = 0;
  private framesByCategory: Record<MessageCategory, number> = emptyCategoryCounts();
  private errorCount: number = 0;
  private errorCounts: Record<string, number> = {};
  private lastErrors: RecordedError[] = [];
  private lastErrorTimestamp: number | null = null;

  constructor(options: DiagnosticsOptions = {}) {
    this.maxRecordedErrors = options.maxRecordedErrors ?? DEFAULT_ENGINE_OPTIONS.maxRecordedErrors;
    this.errorRateThreshold = options.errorRateThreshold ?? 10;
    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('Diagnostics');
    this.logger.setLevel(options.logLevel ?? 'warn');
    this.reset();
  }

  /**
   * Resets all counters; a new session starts.
   */
  reset(): void {
    this.startTime = Date.now();
    this.framesReceived = 0;
    this.framesHandled = 0;
    this.framesSent = 0;
    this.framesDropped = 0;
    this.framesByCategory = emptyCategoryCounts();
    this.errorCount = 0;
    this.errorCounts = {};
    this.lastErrors = [];
    this.lastErrorTimestamp = null;
    this.totalSessions += 1;
  }

  recordFrameReceived(category: MessageCategory): void {
    this.framesReceived++;
    this.framesByCategory[category]++;
  }

  recordFrameHandled(): void {
    this.framesHandled++;
  }

  recordFrameSent(identifier?: number): void {
    this.framesSent++;
    this.logger.trace('Frame sent', { identifier });
  }

  /**
   * Records an inbound problem. The frame it came with counts as dropped.
   */
  recordError(error: Error, context: { identifier?: number; address?: number; dropped?: boolean } = {}): void {
    const timestamp = Date.now();
    this.errorCount++;
    this.errorCounts[error.name] = (this.errorCounts[error.name] ?? 0) + 1;
    if (context.dropped ?? true) this.framesDropped++;

    this.lastErrors.push({
      name: error.name,
      message: error.message,
      timestamp,
      identifier: context.identifier,
      address: context.address,
    });
    if (this.lastErrors.length > this.maxRecordedErrors) this.lastErrors.shift();
    this.lastErrorTimestamp = timestamp;

    this.logger.warn(error.message, {
      error: error.name,
      identifier: context.identifier,
      address: context.address,
    });
  }

  get errorRate(): number | null {
    return this.framesReceived === 0 ? null : (this.errorCount / this.framesReceived) * 100;
  }

  get uptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  analyze(): AnalysisResult {
    const warnings: string[] = [];
    if (this.errorRate != null && this.errorRate > this.errorRateThreshold) {
      warnings.push(
        `High error rate: ${this.errorRate.toFixed(2)}% (threshold: ${this.errorRateThreshold}%)`
      );
    }
    const unclassified = this.framesByCategory[MESSAGE_CATEGORIES.UNCLASSIFIED];
    if (unclassified > 0) {
      warnings.push(`Unclassified frames received: ${unclassified}`);
    }
    return {
      warnings,
      isHealthy: warnings.length === 0,
      stats: this.getStats(),
    };
  }

  getStats(): DiagnosticsStats {
    return {
      uptimeSeconds: this.uptimeSeconds,
      totalSessions: this.totalSessions,
      framesReceived: this.framesReceived,
      framesHandled: this.framesHandled,
      framesSent: this.framesSent,
      framesDropped: this.framesDropped,
      framesByCategory: { ...this.framesByCategory },
      errorCount: this.errorCount,
      errorRate: this.errorRate,
      errorCounts: { ...this.errorCounts },
      commonErrors: Object.entries(this.errorCounts)
        .sort((a, b) => b[1] - a[1])
        .slice(0, 3)
        .map(([name, count]) => ({ name, count })),
      lastErrors: this.lastErrors.map(entry => ({ ...entry })),
      lastErrorTimestamp: this.lastErrorTimestamp,
    };
  }

  serialize(): string {
    return JSON.stringify(this.getStats(), null, 2);
  }
}

export { ProtocolDiagnostics };
