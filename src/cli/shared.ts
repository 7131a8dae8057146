import { Command, InvalidArgumentError } from 'commander';
import { TASK_STATUSES, type TaskStatus } from '../model.js';

/** Where command output goes; stdout/stderr in the binaries. */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export type OutputFormat = 'pretty' | 'json';

export function parseFormat(value: string): OutputFormat {
  if (value === 'pretty' || value === 'json') return value;
  throw new InvalidArgumentError('Expected pretty or json.');
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((s) => s === value);
}

export function parseStatus(value: string): TaskStatus {
  if (isTaskStatus(value)) return value;
  throw new InvalidArgumentError(`Expected one of: ${TASK_STATUSES.join(', ')}.`);
}

/**
 * Commander throws instead of exiting, and its help/usage text goes through
 * `out`, so a program can run inside a test process.
 */
export function baseProgram(name: string, description: string, out: Output): Command {
  return new Command()
    .name(name)
    .description(description)
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => out.log(str.replace(/\n$/, '')),
      writeErr: (str) => out.error(str.replace(/\n$/, '')),
    });
}
