import { EventType, Note } from '../types/index.js';
import type { NoteEventBus } from '../core/event-bus.js';
import { NameAlreadyTakenError, NotFoundError } from '../core/errors.js';
import { NoteStore } from './note-store.js';

/**
 * In-memory NoteStore implementation.
 * Keyed by id so that renames keep a note's position in insertion order.
 */
export class MemoryNoteStore implements NoteStore {
  private notes = new Map<number, Note>();
  private nextId = 1;
  private readonly source = 'memory-note-store';

  constructor(private readonly eventBus?: NoteEventBus) {}

  async create(noteName: string, note: string): Promise<Note> {
    if (this.findByName(noteName)) {
      throw new NameAlreadyTakenError(noteName);
    }

    const created: Note = { id: this.nextId++, noteName, note };
    this.notes.set(created.id, created);

    await this.eventBus?.emit(this.source, {
      type: EventType.NoteCreated,
      payload: { ...created },
    });
    return { ...created };
  }

  async delete(noteName: string): Promise<void> {
    const existing = this.require(noteName);
    this.notes.delete(existing.id);

    await this.eventBus?.emit(this.source, {
      type: EventType.NoteDeleted,
      payload: { id: existing.id, noteName },
    });
  }

  async deleteAll(): Promise<number> {
    const noteNames = Array.from(this.notes.values(), (note) => note.noteName);
    this.notes.clear();

    await this.eventBus?.emit(this.source, {
      type: EventType.AllNotesDeleted,
      payload: { count: noteNames.length, noteNames },
    });
    return noteNames.length;
  }

  async clear(noteName: string): Promise<void> {
    const existing = this.require(noteName);
    existing.note = '';

    await this.eventBus?.emit(this.source, {
      type: EventType.NoteCleared,
      payload: { noteName },
    });
  }

  async update(noteName: string, note: string): Promise<Note> {
    const existing = this.require(noteName);
    existing.note = note;

    await this.eventBus?.emit(this.source, {
      type: EventType.NoteUpdated,
      payload: { noteName, note },
    });
    return { ...existing };
  }

  async rename(noteName: string, newNoteName: string): Promise<Note> {
    const existing = this.require(noteName);
    if (newNoteName === noteName) {
      return { ...existing };
    }
    const holder = this.findByName(newNoteName);
    if (holder && holder.id !== existing.id) {
      throw new NameAlreadyTakenError(newNoteName);
    }
    existing.noteName = newNoteName;

    await this.eventBus?.emit(this.source, {
      type: EventType.NoteRenamed,
      payload: { noteName, newNoteName },
    });
    return { ...existing };
  }

  async get(noteName: string): Promise<Note> {
    return { ...this.require(noteName) };
  }

  async getAll(): Promise<Note[]> {
    return Array.from(this.notes.values(), (note) => ({ ...note }));
  }

  private findByName(noteName: string): Note | undefined {
    for (const note of this.notes.values()) {
      if (note.noteName === noteName) {
        return note;
      }
    }
    return undefined;
  }

  private require(noteName: string): Note {
    const note = this.findByName(noteName);
    if (!note) {
      throw new NotFoundError(noteName);
    }
    return note;
  }
}
