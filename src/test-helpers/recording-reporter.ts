import { formatProgress, ProgressEvent, Reporter } from '../reporter';

export class RecordingReporter implements Reporter {
  lines: string[] = [];
  errors: string[] = [];

  info(message: string): void {
    this.lines.push(message);
  }

  debug(): void {}

  success(message: string): void {
    this.lines.push(message);
  }

  warn(message: string): void {
    this.lines.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }

  progress(event: ProgressEvent): void {
    this.lines.push(formatProgress(event));
  }
}
