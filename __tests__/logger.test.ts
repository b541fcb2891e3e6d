import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Logger from '../src/logger.js';
import { ProtocolDiagnostics } from '../src/utils/diagnostics.js';
import type { LogContext, LogLevel } from '../src/types/fieldbus-types.js';

describe('Logger', () => {
  let logger: Logger;
  let seen: Array<{ level: LogLevel; args: unknown[]; context: LogContext }>;

  beforeEach(() => {
    for (const level of ['debug', 'info', 'warn', 'error'] as const) {
      vi.spyOn(console, level).mockImplementation(() => undefined);
    }
    logger = new Logger();
    seen = [];
    logger.watch(entry => seen.push(entry));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('splits a trailing context object from the message', () => {
    const log = logger.createLogger('CanBus');
    log.info('Bus started', { bitrate: 250000 });
    expect(seen).toEqual([{ level: 'info', args: ['Bus started'], context: { bitrate: 250000, logger: 'CanBus' } }]);
  });

  it('filters by category level, muted address and paused category', () => {
    const log = logger.createLogger('ProtocolEngine');
    log.setLevel('warn');
    log.info('hidden');
    log.warn('shown', { address: 0x10 });

    logger.mute(0x10);
    log.error('muted', { address: 0x10 });
    logger.unmute(0x10);

    log.pause();
    log.error('paused');
    log.resume();
    logger.setLevel('error');
    log.warn('below global level');

    expect(seen.map(entry => entry.args[0])).toEqual(['shown']);
    expect(logger.getCounts()).toEqual({ trace: 0, debug: 0, info: 0, warn: 1, error: 0 });
  });

  it('formats the header from the configured fields', () => {
    logger.disableColors();
    logger.setLogFormat(['level', 'logger', 'address']);
    logger.createLogger('CanBus').warn('Frame dropped', { address: 0x10, identifier: 0x101 });

    expect(console.warn).toHaveBeenCalledWith('[WARN][CanBus][SA:0x10]', '', 'Frame dropped', '{"identifier":257}', '');
  });

  it('applies custom field formatters and global context', () => {
    logger.disableColors();
    logger.setLogFormat(['address', 'taskId']);
    logger.setCustomFormatter('address', value => `<${String(value)}>`);
    logger.setGlobalContext({ taskId: 3 });
    logger.error('Task aborted', { address: 0x10 });

    expect(console.error).toHaveBeenCalledWith('<16>[T:3]', '', 'Task aborted', '');
  });

  it('validates its settings', () => {
    expect(() => logger.setRateLimit(-1)).toThrow('Rate limit must be a non-negative number');
    expect(() => logger.createLogger('')).toThrow('Logger name required');
  });

  it('prints nothing when disabled', () => {
    logger.disable();
    logger.error('dropped');
    expect(logger.isEnabled()).toBe(false);
    expect(console.error).not.toHaveBeenCalled();
    expect(seen).toEqual([]);
  });
});

describe('ProtocolDiagnostics', () => {
  let diagnostics: ProtocolDiagnostics;

  beforeEach(() => {
    diagnostics = new ProtocolDiagnostics({ maxRecordedErrors: 2, logLevel: 'error' });
  });

  it('reports no error rate before any frame arrived', () => {
    expect(diagnostics.errorRate).toBeNull();
    expect(diagnostics.analyze()).toMatchObject({ warnings: [], isHealthy: true });
  });

  it('counts frames by category and errors by name', () => {
    diagnostics.recordFrameReceived('sensor');
    diagnostics.recordFrameReceived('sensor');
    diagnostics.recordFrameReceived('system-control');
    diagnostics.recordFrameHandled();
    diagnostics.recordFrameHandled();
    diagnostics.recordFrameSent(0x101);
    diagnostics.recordError(new TypeError('bad payload'), { identifier: 0x18cbf710, address: 0x10 });

    const stats = diagnostics.getStats();
    expect(stats).toMatchObject({
      framesReceived: 3,
      framesHandled: 2,
      framesSent: 1,
      framesDropped: 1,
      errorCount: 1,
      errorCounts: { TypeError: 1 },
      commonErrors: [{ name: 'TypeError', count: 1 }],
    });
    expect(stats.framesByCategory).toEqual({ sensor: 2, actuator: 0, 'system-control': 1, unclassified: 0 });
    expect(stats.lastErrors[0]).toMatchObject({ name: 'TypeError', message: 'bad payload', identifier: 0x18cbf710, address: 0x10 });
    expect(diagnostics.analyze().warnings).toEqual(['High error rate: 33.33% (threshold: 10%)']);
  });

  it('keeps only the most recent errors', () => {
    diagnostics.recordError(new Error('first'));
    diagnostics.recordError(new Error('second'));
    diagnostics.recordError(new Error('third'), { dropped: false });

    const stats = diagnostics.getStats();
    expect(stats.lastErrors.map(entry => entry.message)).toEqual(['second', 'third']);
    expect(stats.framesDropped).toBe(2);
    expect(stats.errorCounts).toEqual({ Error: 3 });
  });

  it('starts a new session on reset', () => {
    diagnostics.recordFrameReceived('actuator');
    diagnostics.reset();
    expect(diagnostics.getStats()).toMatchObject({ totalSessions: 2, framesReceived: 0, lastErrorTimestamp: null });
    expect(JSON.parse(diagnostics.serialize())).toMatchObject({ totalSessions: 2 });
  });
});
