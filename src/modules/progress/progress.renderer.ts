import { formatProgressLine } from './progress.calculator';
import type { ProgressOutput, ProgressSnapshot, TextSink } from './progress.types';

/**
 * Keeps a single status line, rewritten in place with a carriage return.
 */
export class ProgressLineRenderer implements ProgressOutput {
  private previousLength = 0;

  constructor(private readonly sink: TextSink) {}

  update(snapshot: ProgressSnapshot): void {
    this.sink.write(`\r${this.pad(formatProgressLine(snapshot))}`);
  }

  finish(snapshot: ProgressSnapshot): void {
    this.sink.write(`\r${this.pad(formatProgressLine(snapshot))}\n`);
    this.previousLength = 0;
  }

  // Blank out what is left of a longer previous line
  private pad(line: string): string {
    const padded = line.padEnd(this.previousLength, ' ');
    this.previousLength = line.length;
    return padded;
  }
}
