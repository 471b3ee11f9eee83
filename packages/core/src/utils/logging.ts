const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

type EmittingLevel = Exclude<LogLevelName, 'silent'>;

export function isLogLevelName(value: string | undefined): value is LogLevelName {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function levelFromEnv(): LogLevelName | undefined {
  const value = process.env.BATCH_UPLOADER_LOG_LEVEL?.toLowerCase();
  return isLogLevelName(value) ? value : undefined;
}

/**
 * Namespaced console logger. One threshold is shared by every namespace;
 * `silent` mutes them all.
 */
export class Logger {
  private static threshold: number = LOG_LEVELS[levelFromEnv() ?? 'info'];

  constructor(private readonly namespace: string) {}

  static setLevel(level: LogLevelName): void {
    Logger.threshold = LOG_LEVELS[level];
  }

  static isEnabled(level: EmittingLevel): boolean {
    return LOG_LEVELS[level] >= Logger.threshold;
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit('error', message, args);
  }

  private emit(level: EmittingLevel, message: string, args: unknown[]): void {
    if (Logger.isEnabled(level)) {
      console[level](`[batch-uploader:${this.namespace}] ${message}`, ...args);
    }
  }
}

export function getLogger(namespace: string): Logger {
  return new Logger(namespace);
}

/**
 * Re-reads `BATCH_UPLOADER_LOG_LEVEL`; unknown values leave the level as is.
 */
export function configureLogging(): void {
  const level = levelFromEnv();
  if (level) {
    Logger.setLevel(level);
  }
}
