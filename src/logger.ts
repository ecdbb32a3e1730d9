// src/logger.ts

import { LogContext, LogField, LoggerInstance, LogLevel, LogRecord } from './types/sensor-types.js';

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'address', 'funcCode'];
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private static hexByte(value: number): string {
    return `0x${value.toString(16).padStart(2, '0')}`;
  }

  /**
   * Formats a log record: colored header followed by the arguments and any
   * context fields that are not part of the header.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && context.logger) headerParts.push(`[${context.logger}]`);
    if (this.logFormat.includes('address') && context.address != null) {
      headerParts.push(`[A:${Logger.hexByte(context.address)}]`);
    }
    if (this.logFormat.includes('funcCode') && context.funcCode != null) {
      headerParts.push(`[F:${Logger.hexByte(context.funcCode)}]`);
    }
    if (this.logFormat.includes('register') && context.register != null) {
      headerParts.push(`[R:0x${context.register.toString(16).padStart(4, '0')}]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
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

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel !== undefined) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const formatted: string[] = this.format(level, args, context);
    // console.trace would print a stack trace for every record
    const method = level === 'trace' ? 'debug' : level;
    console[method](...formatted);
  }

  /**
   * Splits a trailing plain object off the arguments and treats it as context.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (Logger.isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private static isLogContext(value: unknown): value is LogContext {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    if (value instanceof Error || value instanceof Uint8Array) return false;
    return Object.values(value).every(
      v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
    );
  }

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output(level, newArgs, { ...context, ...extra });
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

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
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

  disableColors(): void {
    this.useColors = false;
  }

  setLogFormat(fields: LogField[]): void {
    const validFields: LogField[] = [
      'timestamp',
      'level',
      'logger',
      'address',
      'funcCode',
      'register',
    ];
    if (!fields.every(f => validFields.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${validFields.join(', ')}`);
    }
    this.logFormat = fields;
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  getCounts(): Readonly<Record<LogLevel, number>> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger bound to a category. Levels set through the instance
   * apply to that category only.
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      setLevel: (lvl: LogLevel | 'none') => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

/** Process-wide logger shared by every category */
export const rootLogger = new Logger();

export default Logger;
