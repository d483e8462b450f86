import { beforeEach, describe, expect, it } from 'vitest';

import { NameAlreadyTakenError, NotFoundError } from '../core/errors.js';
import type { NoteStore } from '../repositories/note-store.js';

const taken = (noteName: string) => ({ name: 'NameAlreadyTakenError', noteName });
const missing = (noteName: string) => ({ name: 'NotFoundError', noteName });

/**
 * Behaviour every NoteStore implementation must share.
 */
export function describeNoteStoreContract(label: string, createStore: () => NoteStore) {
  describe(`${label} (NoteStore contract)`, () => {
    let store: NoteStore;

    beforeEach(() => {
      store = createStore();
    });

    it('returns the created note with a generated id', async () => {
      const created = await store.create('groceries', 'milk\neggs');

      expect(created.noteName).toBe('groceries');
      expect(created.note).toBe('milk\neggs');
      expect(Number.isInteger(created.id)).toBe(true);
    });

    it('reads back what was created', async () => {
      const created = await store.create('groceries', 'milk');

      expect(await store.get('groceries')).toEqual({
        id: created.id,
        noteName: 'groceries',
        note: 'milk',
      });
    });

    it('keeps empty content as an empty string', async () => {
      await store.create('blank', '');

      expect((await store.get('blank')).note).toBe('');
    });

    it('rejects a second create with the same name and keeps the first row', async () => {
      const first = await store.create('todo', 'original');

      await expect(store.create('todo', 'replacement')).rejects.toMatchObject(taken('todo'));
      await expect(store.create('todo', 'replacement')).rejects.toBeInstanceOf(
        NameAlreadyTakenError
      );
      expect(await store.get('todo')).toEqual(first);
      expect(await store.getAll()).toHaveLength(1);
    });

    it('updates content and returns the updated note', async () => {
      const created = await store.create('plan', 'draft');

      const updated = await store.update('plan', 'final');

      expect(updated).toEqual({ id: created.id, noteName: 'plan', note: 'final' });
      expect(await store.get('plan')).toEqual(updated);
    });

    it('gives the same state when the same update is applied twice', async () => {
      await store.create('plan', 'draft');

      const once = await store.update('plan', 'final');
      const snapshot = await store.getAll();
      const twice = await store.update('plan', 'final');

      expect(twice).toEqual(once);
      expect(await store.getAll()).toEqual(snapshot);
    });

    it('does not create a note when updating an unknown name', async () => {
      await expect(store.update('ghost', 'boo')).rejects.toBeInstanceOf(NotFoundError);
      expect(await store.getAll()).toEqual([]);
    });

    it('clears content', async () => {
      await store.create('scratch', 'temporary');

      await store.clear('scratch');

      expect((await store.get('scratch')).note).toBe('');
    });

    it('fails to clear an unknown name', async () => {
      await expect(store.clear('ghost')).rejects.toMatchObject(missing('ghost'));
    });

    it('deletes a note so it can no longer be read', async () => {
      await store.create('old', 'stale');

      await store.delete('old');

      await expect(store.get('old')).rejects.toMatchObject(missing('old'));
    });

    it('fails to delete an unknown name', async () => {
      await expect(store.delete('ghost')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('deletes every note and reports how many were removed', async () => {
      await store.create('a', '1');
      await store.create('b', '2');
      await store.create('c', '3');

      expect(await store.deleteAll()).toBe(3);
      expect(await store.getAll()).toEqual([]);
    });

    it('reports zero when deleting from an empty notebook', async () => {
      expect(await store.deleteAll()).toBe(0);
    });

    it('renames a note and keeps its id and content', async () => {
      const created = await store.create('draft', 'content');

      const renamed = await store.rename('draft', 'published');

      expect(renamed).toEqual({ id: created.id, noteName: 'published', note: 'content' });
      await expect(store.get('draft')).rejects.toBeInstanceOf(NotFoundError);
      expect(await store.get('published')).toEqual(renamed);
    });

    it('refuses to rename onto an existing name and leaves both notes alone', async () => {
      const x = await store.create('x', 'first');
      const y = await store.create('y', 'second');

      await expect(store.rename('x', 'y')).rejects.toMatchObject(taken('y'));
      expect(await store.get('x')).toEqual(x);
      expect(await store.get('y')).toEqual(y);
    });

    it('fails to rename an unknown name', async () => {
      await expect(store.rename('ghost', 'spirit')).rejects.toMatchObject(missing('ghost'));
    });

    it('allows renaming a note to its own name', async () => {
      const created = await store.create('same', 'content');

      expect(await store.rename('same', 'same')).toEqual(created);
    });

    it('lists notes in insertion order, including renamed ones', async () => {
      await store.create('first', '1');
      await store.create('second', '2');
      await store.create('third', '3');
      await store.rename('first', 'renamed');

      const names = (await store.getAll()).map((note) => note.noteName);
      expect(names).toEqual(['renamed', 'second', 'third']);
    });
  });
}
