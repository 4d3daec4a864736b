import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

const IS_TEST_ENV =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

/**
 * Log levels supported by paritykit.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Log level (default: 'warn', or 'silent' under test) */
  level?: LogLevel;
  /** Output file path (default: stderr) */
  file?: string;
  /** Component name for context */
  name?: string;
}

/**
 * Default level is 'warn' so CLI summaries stay readable.
 * Per-scenario progress is logged at 'debug'.
 */
const DEFAULT_LEVEL: LogLevel = IS_TEST_ENV ? 'silent' : 'warn';

function openDestination(file?: string): DestinationStream {
  return file ? pino.destination({ dest: file, mkdir: true, sync: true }) : pino.destination({ dest: 2, sync: true });
}

/**
 * Create a standalone logger instance.
 */
export function createLogger(config: LoggerConfig = {}): PinoLogger {
  return pino(loggerOptions(config), openDestination(config.file));
}

function loggerOptions(config: LoggerConfig): LoggerOptions {
  return {
    level: config.level ?? DEFAULT_LEVEL,
    name: config.name,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Component loggers are created once at module load, so the global logger
 * writes through a sink whose target can be swapped, and level changes are
 * pushed to every component logger handed out so far.
 */
class SwitchableSink implements DestinationStream {
  private target: DestinationStream = openDestination();

  write(chunk: string): void {
    this.target.write(chunk);
  }

  retarget(file?: string): void {
    this.target = openDestination(file);
  }
}

let sink: SwitchableSink | null = null;
let globalLogger: PinoLogger | null = null;
const componentLoggers = new Map<string, PinoLogger>();

function rootLogger(): PinoLogger {
  if (!globalLogger) {
    sink = new SwitchableSink();
    globalLogger = pino(loggerOptions({}), sink);
  }
  return globalLogger;
}

function applyLevel(level: LogLevel): void {
  rootLogger().level = level;
  for (const logger of componentLoggers.values()) {
    logger.level = level;
  }
}

/**
 * Get the global logger, optionally scoped to a component.
 */
export function getLogger(name?: string): PinoLogger {
  const root = rootLogger();
  if (!name) {
    return root;
  }
  let child = componentLoggers.get(name);
  if (!child) {
    child = root.child({ component: name });
    componentLoggers.set(name, child);
  }
  return child;
}

/**
 * Configure the global logger. Applies to component loggers obtained
 * before the call as well.
 */
export function configureLogger(config: LoggerConfig): void {
  rootLogger();
  sink?.retarget(config.file);
  savedLogLevel = null;
  applyLevel(config.level ?? DEFAULT_LEVEL);
}

/**
 * Reset the global logger to its defaults (for testing).
 */
export function resetLogger(): void {
  if (globalLogger) {
    sink?.retarget();
    savedLogLevel = null;
    applyLevel(DEFAULT_LEVEL);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Saved log level for restoration after temporary suppression.
 */
let savedLogLevel: LogLevel | null = null;

/**
 * Silence all logging, e.g. while a progress bar owns the terminal.
 * Call restoreLogLevel() to restore the previous level.
 */
export function suppressLogs(): void {
  if (savedLogLevel === null) {
    const current = rootLogger().level;
    savedLogLevel = isLogLevel(current) ? current : DEFAULT_LEVEL;
    applyLevel('silent');
  }
}

/**
 * Restore the log level after suppression.
 */
export function restoreLogLevel(): void {
  if (savedLogLevel !== null) {
    applyLevel(savedLogLevel);
    savedLogLevel = null;
  }
}

/**
 * Timing helper for performance measurement.
 */
export interface TimingResult {
  durationMs: number;
  log: () => void;
}

/**
 * Start a timing measurement.
 *
 * @param now - millisecond clock, `Date.now` unless a workflow injects its own
 */
export function startTiming(
  logger: PinoLogger,
  operation: string,
  now: () => number = Date.now
): () => TimingResult {
  const startTime = now();

  return () => {
    const durationMs = Math.max(0, now() - startTime);
    return {
      durationMs,
      log: () => {
        logger.debug({ operation, durationMs }, `${operation} completed`);
      },
    };
  };
}

export type { PinoLogger as Logger };
