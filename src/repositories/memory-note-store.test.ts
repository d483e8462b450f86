import { describe, expect, it, vi } from 'vitest';

import { LocalNoteEventBus } from '../core/event-bus.js';
import { EventType } from '../types/index.js';
import { describeNoteStoreContract } from '../test-support/note-store-contract.js';
import { MemoryNoteStore } from './memory-note-store.js';

describeNoteStoreContract('MemoryNoteStore', () => new MemoryNoteStore());

describe('MemoryNoteStore', () => {
  it('returns copies so callers cannot mutate stored notes', async () => {
    const store = new MemoryNoteStore();
    const created = await store.create('shared', 'original');

    created.note = 'tampered';
    const fetched = await store.get('shared');
    fetched.noteName = 'tampered';

    expect(await store.get('shared')).toEqual({ id: 1, noteName: 'shared', note: 'original' });
  });

  it('assigns increasing ids and does not reuse them after a delete', async () => {
    const store = new MemoryNoteStore();
    await store.create('a', '');
    await store.delete('a');

    expect((await store.create('b', '')).id).toBe(2);
  });

  it('emits one event per mutation', async () => {
    const bus = new LocalNoteEventBus();
    const listener = vi.fn();
    bus.subscribe('*', listener);
    const store = new MemoryNoteStore(bus);

    await store.create('a', 'one');
    await store.update('a', 'two');
    await store.clear('a');
    await store.rename('a', 'b');
    await store.get('b');
    await store.delete('b');
    await store.deleteAll();

    expect(listener.mock.calls.map(([event]) => event.type)).toEqual([
      EventType.NoteCreated,
      EventType.NoteUpdated,
      EventType.NoteCleared,
      EventType.NoteRenamed,
      EventType.NoteDeleted,
      EventType.AllNotesDeleted,
    ]);
    expect(listener.mock.calls[1][0]).toMatchObject({
      source: 'memory-note-store',
      payload: { noteName: 'a', note: 'two' },
    });
  });

  it('does not emit when a note is renamed to its own name', async () => {
    const bus = new LocalNoteEventBus();
    const listener = vi.fn();
    bus.subscribe('*', listener);
    const store = new MemoryNoteStore(bus);
    await store.create('a', 'text');

    expect(await store.rename('a', 'a')).toEqual({ id: 1, noteName: 'a', note: 'text' });
    expect(listener.mock.calls.map(([event]) => event.type)).toEqual([EventType.NoteCreated]);
  });

  it('does not emit when a mutation fails', async () => {
    const bus = new LocalNoteEventBus();
    const listener = vi.fn();
    bus.subscribe('*', listener);
    const store = new MemoryNoteStore(bus);

    await expect(store.delete('missing')).rejects.toThrow('Note `missing` does not exist');

    expect(listener).not.toHaveBeenCalled();
  });
});
