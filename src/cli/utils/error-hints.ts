import { ConfigError, ConfigNotFoundError, getErrorMessage } from '../../errors/types.js';
import * as output from '../output.js';

interface ErrorHintContext {
  error: unknown;
  errorMessage: string;
}

function isMissingConfig(context: ErrorHintContext): boolean {
  return context.error instanceof ConfigNotFoundError;
}

function isMissingBackend(context: ErrorHintContext): boolean {
  return context.error instanceof ConfigError && /^backends\.(left|right) is required/.test(context.errorMessage);
}

function isMissingCatalogue(context: ErrorHintContext): boolean {
  const { errorMessage } = context;
  return errorMessage.includes('scenarios.paths') || errorMessage.startsWith('No runnable scenarios');
}

function isMissingRecording(context: ErrorHintContext): boolean {
  return context.errorMessage.startsWith('Recording file not found');
}

function isMissingSnapshot(context: ErrorHintContext): boolean {
  const { errorMessage } = context;
  return errorMessage.includes('drift.baseline and drift.candidate') || errorMessage.startsWith('Fixture snapshot not found');
}

/**
 * Remediation hints for a failed command, most specific first. Empty when
 * nothing useful can be suggested.
 */
export function errorHints(error: unknown): string[] {
  const context: ErrorHintContext = { error, errorMessage: getErrorMessage(error) };

  if (isMissingConfig(context)) {
    return ['Run paritykit from the directory that holds paritykit.yaml', 'Or pass --config <path>'];
  }
  if (isMissingBackend(context)) {
    return [
      'Declare backends.left (implementation) and backends.right (reference) in paritykit.yaml',
      'Each backend is either { type: recorded, path } or { type: process, command }',
    ];
  }
  if (isMissingCatalogue(context)) {
    return ['List scenario catalogue files under scenarios.paths', 'Entries marked skip are not runnable'];
  }
  if (isMissingRecording(context)) {
    return ['Relative backend paths resolve against the directory of the config file'];
  }
  if (isMissingSnapshot(context)) {
    return ['Pass --baseline and --candidate, or set drift.baseline and drift.candidate'];
  }
  return [];
}

export function printErrorHints(error: unknown): void {
  const hints = errorHints(error);
  if (hints.length === 0) {
    return;
  }
  output.error('\nTry:');
  for (const hint of hints) {
    output.error(`  - ${hint}`);
  }
}
