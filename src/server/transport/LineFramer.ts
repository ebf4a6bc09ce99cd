import { MAX_LINE_LENGTH } from '../../shared/constants';

/**
 * Splits a text stream into command lines
 *
 * Only newline-terminated lines are emitted; text still buffered when the
 * stream ends is dropped, since a line cut off by a disconnect is not a command.
 * An over-long line is discarded as it arrives and surfaces as an empty line.
 */
export class LineFramer {
  private buffer = '';
  private overflowed = false;
  private readonly maxLineLength: number;

  constructor(maxLineLength: number = MAX_LINE_LENGTH) {
    this.maxLineLength = maxLineLength;
  }

  push(chunk: string): string[] {
    const lines: string[] = [];
    let text = this.buffer + chunk;
    let newline = text.indexOf('\n');

    while (newline !== -1) {
      const raw = text.slice(0, newline);
      lines.push(this.overflowed ? '' : raw.replace(/\r$/, '').trim());
      this.overflowed = false;
      text = text.slice(newline + 1);
      newline = text.indexOf('\n');
    }

    if (text.length > this.maxLineLength) {
      this.overflowed = true;
      text = '';
    }
    this.buffer = text;
    return lines;
  }

  /**
   * Text waiting for its newline
   */
  get pending(): string {
    return this.buffer;
  }
}
