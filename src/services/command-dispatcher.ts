import { NoteCommand } from '../types/index.js';
import type { NoteStore } from '../repositories/note-store.js';
import { captureNote, END_OF_NOTE, LineSource } from '../cli/note-reader.js';
import { ReportSink, reportNote } from '../cli/report.js';
import logger from '../utils/logger.js';

export interface DispatcherIO {
  input: LineSource;
  report: ReportSink;
}

const ENTRY_HINT = `(At the end of the note, enter \`${END_OF_NOTE}\` to finish writing the note):`;

/**
 * Runs one parsed command against a NoteStore.
 *
 * Store failures are rethrown as they are; the caller decides how to report
 * them and which exit code to use.
 */
export class CommandDispatcher {
  constructor(
    private readonly store: NoteStore,
    private readonly io: DispatcherIO
  ) {}

  async execute(command: NoteCommand | null): Promise<void> {
    logger.debug({ command: command?.kind ?? 'display-all' }, 'Executing command');

    if (command === null) {
      await this.displayAll();
      return;
    }

    switch (command.kind) {
      case 'add':
        await this.add(command.noteName);
        break;
      case 'delete':
        await this.store.delete(command.noteName);
        this.io.report.line(`Deleted note \`${command.noteName}\``);
        break;
      case 'delete-all': {
        const count = await this.store.deleteAll();
        this.io.report.line(`Deleted ${count} note(s)`);
        break;
      }
      case 'clear':
        await this.store.clear(command.noteName);
        this.io.report.line(`Cleared content of \`${command.noteName}\``);
        break;
      case 'update-note':
        await this.updateNote(command.noteName);
        break;
      case 'rename':
        await this.store.rename(command.noteName, command.newNoteName);
        this.io.report.line(`Renamed \`${command.noteName}\` to \`${command.newNoteName}\``);
        break;
      case 'display':
        reportNote(this.io.report, await this.store.get(command.noteName));
        break;
    }
  }

  private async add(noteName: string): Promise<void> {
    const { report, input } = this.io;
    report.line(`Enter note you want to add into \`${noteName}\``);
    report.line(ENTRY_HINT);

    const text = await captureNote(input);
    report.line(`Note to add into \`${noteName}\`:`);
    report.line(text);
    const note = await this.store.create(noteName, text);
    report.line(`Added note \`${note.noteName}\` (ID: ${note.id})`);
  }

  private async updateNote(noteName: string): Promise<void> {
    const { report, input } = this.io;
    // Fails with NotFound before asking for any text.
    const current = await this.store.get(noteName);
    report.line(`Current content of \`${noteName}\`:`);
    report.line(current.note);
    report.line(`Enter note you want to add instead old note in \`${noteName}\``);
    report.line(ENTRY_HINT);

    const text = await captureNote(input);
    report.line(`Note to add into \`${noteName}\` instead old note:`);
    report.line(text);
    await this.store.update(noteName, text);
    report.line(`Updated note \`${noteName}\``);
  }

  private async displayAll(): Promise<void> {
    const notes = await this.store.getAll();
    if (notes.length === 0) {
      this.io.report.line('Notebook is empty');
      return;
    }
    this.io.report.line('All notes in notebook:');
    for (const note of notes) {
      reportNote(this.io.report, note);
    }
  }
}
