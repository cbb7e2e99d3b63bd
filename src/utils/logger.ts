export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/* Simple structured logger helper so we can swap implementations later if needed */
export class Logger {
  private static threshold: number = LEVELS.info;

  constructor(private readonly scope?: string) {}

  static setLevel(level: LogLevel) {
    Logger.threshold = LEVELS[level];
  }

  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('debug')) return;
    console.debug(`[DEBUG] ${new Date().toISOString()} - ${this.format(message)}`, meta ?? '');
  }

  info(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('info')) return;
    console.log(`[INFO] ${new Date().toISOString()} - ${this.format(message)}`, meta ?? '');
  }

  warn(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('warn')) return;
    console.warn(`[WARN] ${new Date().toISOString()} - ${this.format(message)}`, meta ?? '');
  }

  error(message: string, meta?: unknown) {
    if (!this.enabled('error')) return;
    console.error(`[ERROR] ${new Date().toISOString()} - ${this.format(message)}`, meta ?? '');
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= Logger.threshold;
  }

  private format(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }
}

export const logger = new Logger();
