import { LogLevel, type LogEntry } from '../types/common.js';

export type LogEmitter = (entry: LogEntry) => void;

type LogData = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  warn: 'warning',
  err: 'error',
  crit: 'critical',
  fatal: 'emergency',
};

/**
 * Parse a level name from config or a client request.
 * Accepts RFC 5424 names and the common short aliases (`warn`, `fatal`, ...).
 */
export function parseLogLevel(value: string): LogLevel | null {
  const normalized = value.trim().toLowerCase();
  const parsed = LogLevel.safeParse(normalized);
  if (parsed.success) {
    return parsed.data;
  }
  return LEVEL_ALIASES[normalized] ?? null;
}

/**
 * Structured logger for the classifier server.
 * Entries go to the MCP client through the emitter when one is set,
 * otherwise to stderr (stdout belongs to the stdio transport).
 */
export class Logger {
  private minLevel: LogLevel = 'info';
  private emitter: LogEmitter | null = null;
  private serverName: string;

  constructor(serverName: string) {
    this.serverName = serverName;
  }

  setEmitter(emitter: LogEmitter | null): void {
    this.emitter = emitter;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Logger bound to one component, e.g. `child('hmdb')` logs as `<server>/hmdb`
   */
  child(component: string): ComponentLogger {
    return new ComponentLogger(this, component);
  }

  log(level: LogLevel, component: string, data: LogData): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      level,
      logger: `${this.serverName}/${component}`,
      data: {
        ...data,
        timestamp: new Date().toISOString(),
      },
    };

    if (this.emitter) {
      this.emitter(entry);
      return;
    }

    // Format: [LEVEL   ] logger: data
    const levelStr = level.toUpperCase().padEnd(8);
    console.error(`[${levelStr}] ${entry.logger}: ${JSON.stringify(data)}`);
  }

  debug(component: string, data: LogData): void {
    this.log('debug', component, data);
  }

  info(component: string, data: LogData): void {
    this.log('info', component, data);
  }

  notice(component: string, data: LogData): void {
    this.log('notice', component, data);
  }

  warning(component: string, data: LogData): void {
    this.log('warning', component, data);
  }

  error(component: string, data: LogData): void {
    this.log('error', component, data);
  }

  critical(component: string, data: LogData): void {
    this.log('critical', component, data);
  }
}

export class ComponentLogger {
  constructor(
    private readonly parent: Logger,
    readonly component: string
  ) {}

  debug(data: LogData): void {
    this.parent.log('debug', this.component, data);
  }

  info(data: LogData): void {
    this.parent.log('info', this.component, data);
  }

  warning(data: LogData): void {
    this.parent.log('warning', this.component, data);
  }

  error(data: LogData): void {
    this.parent.log('error', this.component, data);
  }
}
