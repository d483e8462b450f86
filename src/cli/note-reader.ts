import readline from 'node:readline';
import type { Readable } from 'node:stream';

import { describeError, InputFailureError } from '../core/errors.js';
import logger from '../utils/logger.js';

/**
 * Marker that ends interactive note entry. Text after it on the same line is dropped.
 */
export const END_OF_NOTE = '#endnote#';

/**
 * Line-oriented input. `readLine` resolves to one line including its trailing
 * newline, or `null` once the input has ended.
 */
export interface LineSource {
  readLine(): Promise<string | null>;
  close(): void;
}

/**
 * LineSource over a readable stream (stdin in practice). CRLF input is
 * normalised to LF.
 */
export class ReadlineLineSource implements LineSource {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(input: Readable) {
    this.rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(): Promise<string | null> {
    const next = await this.lines.next();
    if (next.done) {
      return null;
    }
    // readline strips the terminator, `\r\n` included; lines come back with `\n`
    return `${next.value}\n`;
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Collect note text line by line until a line containing `#endnote#`.
 * The part of that final line before the marker is kept.
 */
export async function captureNote(source: LineSource): Promise<string> {
  let note = '';

  for (;;) {
    let line: string | null;
    try {
      line = await source.readLine();
    } catch (error) {
      logger.debug({ err: error }, 'Problem reading note line');
      throw new InputFailureError(`Failed to read note text: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (line === null) {
      throw new InputFailureError(`Input ended before \`${END_OF_NOTE}\` was entered`);
    }

    const markerAt = line.indexOf(END_OF_NOTE);
    if (markerAt !== -1) {
      return note + line.slice(0, markerAt);
    }
    note += line;
  }
}
