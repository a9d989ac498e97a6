import { color } from './utils';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  error(message: string): void;
}

export type Sink = (chunk: string) => void;

/**
 * Writes to stderr so stdout carries nothing but the report. `debug` lines
 * only appear with --verbose.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly verbose = false,
    private readonly write: Sink = (s) => process.stderr.write(s)
  ) {}

  debug(message: string): void {
    if (this.verbose) this.write(`${message}\n`);
  }

  info(message: string): void {
    this.write(`${message}\n`);
  }

  error(message: string): void {
    this.write(`${color.red('error')}: ${message}\n`);
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  error: () => undefined,
};
