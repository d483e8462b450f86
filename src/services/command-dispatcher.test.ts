import { beforeEach, describe, expect, it, vi } from 'vitest';

import { CommandDispatcher } from './command-dispatcher.js';
import { MemoryNoteStore } from '../repositories/memory-note-store.js';
import type { LineSource } from '../cli/note-reader.js';
import type { ReportSink } from '../cli/report.js';
import { InputFailureError, NameAlreadyTakenError, NotFoundError } from '../core/errors.js';

const HINT = '(At the end of the note, enter `#endnote#` to finish writing the note):';

function lineSource(lines: string[]) {
  const queue = [...lines];
  const source = {
    readLine: vi.fn(async (): Promise<string | null> => queue.shift() ?? null),
    close: vi.fn(),
  };
  return source satisfies LineSource;
}

describe('CommandDispatcher', () => {
  let store: MemoryNoteStore;
  let output: string[];
  let report: ReportSink;

  beforeEach(() => {
    store = new MemoryNoteStore();
    output = [];
    report = { line: (text) => output.push(text) };
  });

  function dispatcher(lines: string[] = []) {
    const input = lineSource(lines);
    return { input, dispatcher: new CommandDispatcher(store, { input, report }) };
  }

  describe('add', () => {
    it('captures the note text and creates the note', async () => {
      const { dispatcher: d } = dispatcher(['hello\n', 'world#endnote#ignored\n']);

      await d.execute({ kind: 'add', noteName: 'greeting' });

      expect(await store.get('greeting')).toEqual({ id: 1, noteName: 'greeting', note: 'hello\nworld' });
      expect(output).toEqual([
        'Enter note you want to add into `greeting`',
        HINT,
        'Note to add into `greeting`:',
        'hello\nworld',
        'Added note `greeting` (ID: 1)',
      ]);
    });

    it('surfaces NameAlreadyTaken unchanged and keeps the existing note', async () => {
      await store.create('greeting', 'original');
      const { dispatcher: d } = dispatcher(['replacement#endnote#\n']);

      await expect(d.execute({ kind: 'add', noteName: 'greeting' })).rejects.toBeInstanceOf(
        NameAlreadyTakenError
      );
      expect((await store.get('greeting')).note).toBe('original');
    });

    it('echoes the captured text before a collision is reported', async () => {
      await store.create('greeting', 'original');
      const { dispatcher: d } = dispatcher(['replacement#endnote#\n']);

      await expect(d.execute({ kind: 'add', noteName: 'greeting' })).rejects.toThrow(
        'The notename `greeting` is already taken; try another notename'
      );
      expect(output.slice(-2)).toEqual(['Note to add into `greeting`:', 'replacement']);
    });

    it('does not create anything when input fails', async () => {
      const { dispatcher: d } = dispatcher(['no marker\n']);

      await expect(d.execute({ kind: 'add', noteName: 'draft' })).rejects.toBeInstanceOf(
        InputFailureError
      );
      expect(await store.getAll()).toEqual([]);
    });
  });

  describe('update-note', () => {
    it('shows the current content, captures new text and replaces it', async () => {
      await store.create('plan', 'old plan');
      const { dispatcher: d } = dispatcher(['new plan\n', 'step two#endnote#\n']);

      await d.execute({ kind: 'update-note', noteName: 'plan' });

      expect((await store.get('plan')).note).toBe('new plan\nstep two');
      expect(output).toEqual([
        'Current content of `plan`:',
        'old plan',
        'Enter note you want to add instead old note in `plan`',
        HINT,
        'Note to add into `plan` instead old note:',
        'new plan\nstep two',
        'Updated note `plan`',
      ]);
    });

    it('fails with NotFound before asking for text', async () => {
      const { dispatcher: d, input } = dispatcher(['unused#endnote#\n']);

      await expect(d.execute({ kind: 'update-note', noteName: 'ghost' })).rejects.toBeInstanceOf(
        NotFoundError
      );
      expect(input.readLine).not.toHaveBeenCalled();
      expect(output).toEqual([]);
    });
  });

  it('deletes a single note', async () => {
    await store.create('a', '');
    await store.create('b', '');
    const { dispatcher: d } = dispatcher();

    await d.execute({ kind: 'delete', noteName: 'a' });

    expect((await store.getAll()).map((note) => note.noteName)).toEqual(['b']);
    expect(output).toEqual(['Deleted note `a`']);
  });

  it('deletes every note and reports the count', async () => {
    await store.create('a', '');
    await store.create('b', '');
    await store.create('c', '');
    const { dispatcher: d } = dispatcher();

    await d.execute({ kind: 'delete-all' });

    expect(await store.getAll()).toEqual([]);
    expect(output).toEqual(['Deleted 3 note(s)']);
  });

  it('clears a note', async () => {
    await store.create('scratch', 'text');
    const { dispatcher: d } = dispatcher();

    await d.execute({ kind: 'clear', noteName: 'scratch' });

    expect((await store.get('scratch')).note).toBe('');
    expect(output).toEqual(['Cleared content of `scratch`']);
  });

  it('renames a note', async () => {
    await store.create('draft', 'text');
    const { dispatcher: d } = dispatcher();

    await d.execute({ kind: 'rename', noteName: 'draft', newNoteName: 'final' });

    expect(await store.get('final')).toEqual({ id: 1, noteName: 'final', note: 'text' });
    expect(output).toEqual(['Renamed `draft` to `final`']);
  });

  it('surfaces a rename collision unchanged', async () => {
    await store.create('x', '1');
    await store.create('y', '2');
    const { dispatcher: d } = dispatcher();

    await expect(
      d.execute({ kind: 'rename', noteName: 'x', newNoteName: 'y' })
    ).rejects.toMatchObject({ name: 'NameAlreadyTakenError', noteName: 'y' });
    expect(output).toEqual([]);
  });

  it('displays one note', async () => {
    await store.create('list', 'milk\neggs');
    const { dispatcher: d } = dispatcher();

    await d.execute({ kind: 'display', noteName: 'list' });

    expect(output).toEqual(['ID: 1', 'Name: list', 'Data:', 'milk\neggs']);
  });

  it('surfaces NotFound when displaying an unknown note', async () => {
    const { dispatcher: d } = dispatcher();

    await expect(d.execute({ kind: 'display', noteName: 'ghost' })).rejects.toThrow(
      'Note `ghost` does not exist'
    );
  });

  it('displays every note when no command is given', async () => {
    await store.create('a', 'first');
    await store.create('b', '');
    const { dispatcher: d } = dispatcher();

    await d.execute(null);

    expect(output).toEqual([
      'All notes in notebook:',
      'ID: 1',
      'Name: a',
      'Data:',
      'first',
      'ID: 2',
      'Name: b',
      'Data:',
      '',
    ]);
  });

  it('says so when the notebook is empty', async () => {
    const { dispatcher: d } = dispatcher();

    await d.execute(null);

    expect(output).toEqual(['Notebook is empty']);
  });
});
