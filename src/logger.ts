// src/logger.ts

import type { LogContext, LoggerInstance, LogLevel } from './types/fieldbus-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'address' | 'identifier' | 'taskId' | 'ddi';

type FormattableField = Exclude<LogField, 'timestamp' | 'level'>;

type WatchCallback = (data: { level: LogLevel; args: unknown[]; context: LogContext }) => void;

const VALID_FIELDS: LogField[] = [
  'timestamp',
  'level',
  'logger',
  'address',
  'identifier',
  'taskId',
  'ddi',
];

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'highlight' | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    highlight: '\x1b[1;41m',
    reset: '\x1b[0m',
  };

  private groupLevel: number = 0;
  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logStats: {
    byAddress: Record<number, number>;
    byCategory: Record<string, number>;
  } = { byAddress: {}, byCategory: {} };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'address', 'identifier', 'taskId'];
  private customFormatters: Partial<Record<FormattableField, (value: unknown) => string>> = {};
  private mutedAddresses: Set<number> = new Set();
  private highlightRules: Array<Pick<LogContext, 'address' | 'identifier' | 'taskId'>> = [];
  private watchCallback: WatchCallback | null = null;
  private logRateLimit: number = 0;
  private lastLogTime: number = 0;

  private getIndent(): string {
    return '  '.repeat(this.groupLevel);
  }

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private formatField(field: FormattableField, value: unknown, fallback: (v: unknown) => string): string {
    const formatter = this.customFormatters[field] ?? fallback;
    return formatter(value);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @returns [header, indent, ...args, reset]
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };
    const isHighlighted: boolean = this.highlightRules.some(
      rule =>
        (rule.address == null || rule.address === merged.address) &&
        (rule.identifier == null || rule.identifier === merged.identifier) &&
        (rule.taskId == null || rule.taskId === merged.taskId)
    );

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && merged.logger) {
      headerParts.push(this.formatField('logger', merged.logger, v => `[${String(v)}]`));
    }
    if (this.logFormat.includes('address') && merged.address != null) {
      headerParts.push(
        this.formatField(
          'address',
          merged.address,
          v => `[SA:0x${Number(v).toString(16).padStart(2, '0').toUpperCase()}]`
        )
      );
    }
    if (this.logFormat.includes('identifier') && merged.identifier != null) {
      headerParts.push(
        this.formatField(
          'identifier',
          merged.identifier,
          v => `[ID:0x${Number(v).toString(16).toUpperCase()}]`
        )
      );
    }
    if (this.logFormat.includes('taskId') && merged.taskId != null) {
      headerParts.push(this.formatField('taskId', merged.taskId, v => `[T:${String(v)}]`));
    }
    if (this.logFormat.includes('ddi') && merged.ddi != null) {
      headerParts.push(this.formatField('ddi', merged.ddi, v => `[DDI:${String(v)}]`));
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    delete contextToPrint.logger;
    for (const field of this.logFormat) {
      if (field !== 'timestamp' && field !== 'level') delete contextToPrint[field];
    }
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [
      `${color}${isHighlighted ? this.COLORS.highlight : ''}${headerParts.join('')}`,
      this.getIndent(),
      ...formattedArgs,
      reset,
    ];
  }

  /**
   * Determines whether a message passes the level, category and mute filters.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.address != null && this.mutedAddresses.has(context.address)) return false;
    if (context.logger) {
      const categoryLevel = this.categoryLevels[context.logger];
      if (categoryLevel === 'none') return false;
      if (categoryLevel) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext, immediate: boolean = false): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (context.address != null) {
      this.logStats.byAddress[context.address] = (this.logStats.byAddress[context.address] ?? 0) + 1;
    }
    if (context.category != null) {
      this.logStats.byCategory[context.category] =
        (this.logStats.byCategory[context.category] ?? 0) + 1;
    }

    this.watchCallback?.({ level, args, context });

    const now: number = Date.now();
    if (!immediate && this.logRateLimit > 0 && now - this.lastLogTime < this.logRateLimit) return;
    this.lastLogTime = now;

    const formatted: string[] = this.format(level, args, context);
    // console.trace would print a stack
    const sink = level === 'trace' ? 'debug' : level;
    if (this.useColors) {
      const [head = '', indent = '', ...rest] = formatted;
      console[sink](head + indent, ...rest);
    } else {
      console[sink](...formatted);
    }
  }

  /**
   * Splits the arguments into the message parts and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra }, level === 'warn' || level === 'error');
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  group(): void {
    this.groupLevel++;
  }

  groupEnd(): void {
    if (this.groupLevel > 0) this.groupLevel--;
  }

  setLevel(level: LogLevel): void {
    if (!this.LEVELS.includes(level)) throw new Error(`Unknown log level: ${String(level)}`);
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${String(level)}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setRateLimit(ms: number): void {
    if (typeof ms !== 'number' || ms < 0)
      throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogField[]): void {
    if (!Array.isArray(fields) || !fields.every(f => VALID_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${VALID_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: FormattableField, formatter: (value: unknown) => string): void {
    if (typeof formatter !== 'function') {
      throw new Error('Formatter must be a function');
    }
    this.customFormatters[field] = formatter;
  }

  mute(address: number): void {
    this.mutedAddresses.add(address);
  }

  unmute(address: number): void {
    this.mutedAddresses.delete(address);
  }

  highlight(rule: Pick<LogContext, 'address' | 'identifier' | 'taskId'>): void {
    this.highlightRules.push({ ...rule });
  }

  clearHighlights(): void {
    this.highlightRules = [];
  }

  watch(callback: WatchCallback): void {
    if (typeof callback !== 'function') throw new Error('Watch callback must be a function');
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  summary(): void {
    console.log('\x1b[1;36m=== Logger Summary ===\x1b[0m');
    for (const level of this.LEVELS) {
      console.log(`${level}: ${this.logCounts[level]}`);
    }
    console.log(
      `Total Messages: ${Object.values(this.logCounts).reduce((sum, count) => sum + count, 0)}`
    );
    console.log(`By Address: ${JSON.stringify(this.logStats.byAddress, null, 2)}`);
    console.log(`By Category: ${JSON.stringify(this.logStats.byCategory, null, 2)}`);
    console.log(`Rate Limit: ${this.logRateLimit}ms`);
    console.log(`Current Level: ${this.currentLevel}`);
    console.log(
      `Categories: ${Object.keys(this.categoryLevels).length ? JSON.stringify(this.categoryLevels, null, 2) : 'None'}`
    );
    console.log(`Muted addresses: ${JSON.stringify([...this.mutedAddresses])}`);
    console.log('\x1b[1;36m=====================\x1b[0m');
  }

  /**
   * Creates a logger bound to a category name.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      group: () => this.group(),
      groupEnd: () => this.groupEnd(),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error || value instanceof Uint8Array) return false;
  return Object.values(value).every(
    v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
  );
}

export default Logger;
