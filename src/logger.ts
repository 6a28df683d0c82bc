type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Context-scoped console logger.
 * Each module creates its own instance: `const logger = new Logger('TeamCache')`.
 */
export class Logger {
  private static debugEnabled = process.env.DEBUG === 'true';
  private static silent = false;

  constructor(private context: string) {}

  static setDebug(enabled: boolean): void {
    Logger.debugEnabled = enabled;
  }

  static isDebugEnabled(): boolean {
    return Logger.debugEnabled;
  }

  static setSilent(silent: boolean): void {
    Logger.silent = silent;
  }

  debug(message: string, data?: unknown): void {
    if (!Logger.debugEnabled) return;
    this.write('DEBUG', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('INFO', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('WARN', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('ERROR', message, data);
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (Logger.silent) return;

    const line = `[${new Date().toISOString()}] [${level}] [${this.context}] ${message}`;
    const suffix = data === undefined ? '' : ` ${formatData(data)}`;

    if (level === 'ERROR') {
      console.error(line + suffix);
    } else if (level === 'WARN') {
      console.warn(line + suffix);
    } else {
      console.log(line + suffix);
    }
  }
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return Logger.isDebugEnabled() && data.stack ? data.stack : data.message;
  }
  if (typeof data === 'string') {
    return data;
  }
  try {
    return JSON.stringify(data, (_key, value) => (value instanceof Error ? value.message : value));
  } catch {
    return String(data);
  }
}
