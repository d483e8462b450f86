import type { Writable } from 'node:stream';

import { Note } from '../types/index.js';

/**
 * Write-only sink for the human-readable output of a command.
 */
export interface ReportSink {
  line(text: string): void;
}

export function createStreamReport(stream: Writable): ReportSink {
  return {
    line(text: string) {
      stream.write(`${text}\n`);
    },
  };
}

export function reportNote(report: ReportSink, note: Note): void {
  report.line(`ID: ${note.id}`);
  report.line(`Name: ${note.noteName}`);
  report.line('Data:');
  report.line(note.note);
}
