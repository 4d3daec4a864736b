/**
 * CLI Output Module
 *
 * User-facing output for CLI commands. Quiet mode suppresses informational
 * lines; warnings and errors are always shown.
 *
 * For diagnostic/debug logging, use the logging module (src/logging/logger.ts).
 */

/**
 * Output configuration options.
 */
export interface OutputConfig {
  /** Suppress non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}

/**
 * Check if colors should be disabled based on environment.
 * Respects NO_COLOR standard (https://no-color.org/)
 */
function shouldDisableColor(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') {
    return true;
  }
  return process.env.FORCE_COLOR === '0';
}

let globalConfig: OutputConfig = {
  quiet: false,
  noColor: shouldDisableColor(),
};

/**
 * Configure global output settings.
 */
export function configureOutput(config: OutputConfig): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getOutputConfig(): OutputConfig {
  return { ...globalConfig };
}

/**
 * Reset output configuration to defaults.
 */
export function resetOutput(): void {
  globalConfig = { quiet: false, noColor: false };
}

export function isQuiet(): boolean {
  return globalConfig.quiet ?? false;
}

/**
 * Progress messages, status updates and general information.
 */
export function info(message: string): void {
  if (!globalConfig.quiet) {
    console.log(message);
  }
}

export function success(message: string): void {
  if (!globalConfig.quiet) {
    console.log(message);
  }
}

/**
 * Always shown, even in quiet mode.
 */
export function warn(message: string): void {
  console.warn(message);
}

/**
 * Always shown, even in quiet mode.
 */
export function error(message: string): void {
  console.error(message);
}

export function newline(): void {
  if (!globalConfig.quiet) {
    console.log('');
  }
}

export function lines(...messages: string[]): void {
  if (!globalConfig.quiet) {
    for (const msg of messages) {
      console.log(msg);
    }
  }
}
