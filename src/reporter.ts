import chalk from 'chalk';

export interface ProgressEvent {
  index: number;
  total: number;
  path: string;
  compressed: boolean;
}

/** Sink for user-facing messages. Implementations must not throw. */
export interface Reporter {
  info(message: string): void;
  debug(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  progress(event: ProgressEvent): void;
}

export function formatPercent(index: number, total: number): string {
  return (100 / total * (index + 1)).toFixed(2).padStart(6, ' ') + '%';
}

export function formatProgress(event: ProgressEvent): string {
  return (
    `${formatPercent(event.index, event.total)} Uploading file path: ${event.path}` +
    (event.compressed ? ' Compressed' : '')
  );
}

export interface ConsoleReporterOptions {
  quiet?: boolean;
  verbose?: boolean;
}

export class ConsoleReporter implements Reporter {
  private quiet: boolean;
  private verbose: boolean;

  constructor(options: ConsoleReporterOptions = {}) {
    this.quiet = options.quiet ?? false;
    this.verbose = options.verbose ?? false;
  }

  info(message: string): void {
    if (this.quiet) return;
    console.log(chalk.yellow(message));
  }

  debug(message: string): void {
    if (!this.verbose) return;
    console.log(chalk.gray(message));
  }

  success(message: string): void {
    if (this.quiet) return;
    console.log(chalk.green(message));
  }

  warn(message: string): void {
    console.warn(chalk.yellow(message));
  }

  // 错误总是输出
  error(message: string): void {
    console.error(chalk.red(message));
  }

  progress(event: ProgressEvent): void {
    if (this.quiet) return;
    console.log(
      chalk.magenta(formatPercent(event.index, event.total) + ' ') +
        chalk.cyan(`Uploading file path: ${event.path}`) +
        (event.compressed ? ' ' + chalk.green('Compressed') : '')
    );
  }
}

export class SilentReporter implements Reporter {
  info(): void {}
  debug(): void {}
  success(): void {}
  warn(): void {}
  error(): void {}
  progress(): void {}
}
