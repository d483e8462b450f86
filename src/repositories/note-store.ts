import { Note } from '../types/index.js';

/**
 * CRUD access to the notebook table, keyed by notename.
 *
 * Every operation rejects with `StorageFailureError` on a backend fault that
 * is not one of the domain outcomes listed below.
 */
export interface NoteStore {
  /**
   * Insert a new note. Rejects with `NameAlreadyTakenError` when the name is in use.
   */
  create(noteName: string, note: string): Promise<Note>;

  /**
   * Remove a single note. Rejects with `NotFoundError` when nothing matched.
   */
  delete(noteName: string): Promise<void>;

  /**
   * Remove every note and return how many were removed.
   */
  deleteAll(): Promise<number>;

  /**
   * Empty the content of a note.
   */
  clear(noteName: string): Promise<void>;

  /**
   * Replace the content of an existing note. Never creates one.
   */
  update(noteName: string, note: string): Promise<Note>;

  /**
   * Give a note a new name. Rejects with `NotFoundError` for an unknown source
   * name and `NameAlreadyTakenError` when the new name belongs to another note.
   */
  rename(noteName: string, newNoteName: string): Promise<Note>;

  get(noteName: string): Promise<Note>;

  /**
   * Every note in insertion order.
   */
  getAll(): Promise<Note[]>;
}
