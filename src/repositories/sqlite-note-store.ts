import Database from 'better-sqlite3';

import { EventType, Note } from '../types/index.js';
import type { NoteEventBus } from '../core/event-bus.js';
import {
  describeError,
  NameAlreadyTakenError,
  NotebookError,
  NotFoundError,
  StorageFailureError,
} from '../core/errors.js';
import logger from '../utils/logger.js';
import type { NoteStore } from './note-store.js';

interface NoteRow {
  id: number;
  note_name: string;
  note: string | null;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS notebook (
  id        INTEGER PRIMARY KEY AUTOINCREMENT,
  note_name TEXT NOT NULL UNIQUE,
  note      TEXT
)`;

const UNIQUE_VIOLATION = 'SQLITE_CONSTRAINT_UNIQUE';

function toNote(row: NoteRow): Note {
  return {
    id: row.id,
    noteName: row.note_name,
    note: row.note ?? '',
  };
}

export interface SqliteNoteStoreOptions {
  eventBus?: NoteEventBus;
}

/**
 * SQLite-backed NoteStore over the `notebook` table.
 */
export class SqliteNoteStore implements NoteStore {
  private readonly eventBus?: NoteEventBus;
  private readonly source = 'sqlite-note-store';

  constructor(private readonly db: Database.Database, options: SqliteNoteStoreOptions = {}) {
    this.eventBus = options.eventBus;
  }

  /**
   * Open (or create) the database file at `path` and make sure the table exists.
   */
  static open(path: string, options: SqliteNoteStoreOptions = {}): SqliteNoteStore {
    let db: Database.Database;
    try {
      db = new Database(path);
    } catch (error) {
      throw new StorageFailureError(`Failed to open notebook database at ${path}`, {
        cause: error,
      });
    }
    const store = new SqliteNoteStore(db, options);
    store.initialize();
    logger.debug({ path }, 'Opened notebook database');
    return store;
  }

  initialize(): void {
    try {
      this.db.exec(SCHEMA);
    } catch (error) {
      throw this.classifyFailure(error);
    }
  }

  close(): void {
    this.db.close();
  }

  async create(noteName: string, note: string): Promise<Note> {
    const created = this.run(noteName, () =>
      this.db
        .prepare<[string, string], NoteRow>(
          'INSERT INTO notebook (note_name, note) VALUES (?, ?) RETURNING id, note_name, note'
        )
        .get(noteName, note)
    );
    if (!created) {
      throw new StorageFailureError(`Insert of \`${noteName}\` returned no row`);
    }

    const result = toNote(created);
    await this.eventBus?.emit(this.source, {
      type: EventType.NoteCreated,
      payload: result,
    });
    return result;
  }

  async delete(noteName: string): Promise<void> {
    const deleted = this.run(undefined, () =>
      this.db
        .prepare<[string], NoteRow>(
          'DELETE FROM notebook WHERE note_name = ? RETURNING id, note_name, note'
        )
        .get(noteName)
    );
    if (!deleted) {
      throw new NotFoundError(noteName);
    }

    await this.eventBus?.emit(this.source, {
      type: EventType.NoteDeleted,
      payload: { id: deleted.id, noteName },
    });
  }

  async deleteAll(): Promise<number> {
    const deleted = this.run(undefined, () =>
      this.db
        .prepare<[], Pick<NoteRow, 'id' | 'note_name'>>(
          'DELETE FROM notebook RETURNING id, note_name'
        )
        .all()
    );

    await this.eventBus?.emit(this.source, {
      type: EventType.AllNotesDeleted,
      payload: { count: deleted.length, noteNames: deleted.map((row) => row.note_name) },
    });
    return deleted.length;
  }

  async clear(noteName: string): Promise<void> {
    const cleared = this.run(undefined, () =>
      this.db
        .prepare<[string], Pick<NoteRow, 'id'>>(
          "UPDATE notebook SET note = '' WHERE note_name = ? RETURNING id"
        )
        .get(noteName)
    );
    if (!cleared) {
      throw new NotFoundError(noteName);
    }

    await this.eventBus?.emit(this.source, {
      type: EventType.NoteCleared,
      payload: { noteName },
    });
  }

  async update(noteName: string, note: string): Promise<Note> {
    const updated = this.run(undefined, () =>
      this.db
        .prepare<[string, string], NoteRow>(
          'UPDATE notebook SET note = ? WHERE note_name = ? RETURNING id, note_name, note'
        )
        .get(note, noteName)
    );
    if (!updated) {
      throw new NotFoundError(noteName);
    }

    await this.eventBus?.emit(this.source, {
      type: EventType.NoteUpdated,
      payload: { noteName, note },
    });
    return toNote(updated);
  }

  async rename(noteName: string, newNoteName: string): Promise<Note> {
    // A collision is reported against the name being claimed.
    const renamed = this.run(newNoteName, () =>
      this.db
        .prepare<[string, string], NoteRow>(
          'UPDATE notebook SET note_name = ? WHERE note_name = ? RETURNING id, note_name, note'
        )
        .get(newNoteName, noteName)
    );
    if (!renamed) {
      throw new NotFoundError(noteName);
    }
    if (newNoteName === noteName) {
      return toNote(renamed);
    }

    await this.eventBus?.emit(this.source, {
      type: EventType.NoteRenamed,
      payload: { noteName, newNoteName },
    });
    return toNote(renamed);
  }

  async get(noteName: string): Promise<Note> {
    const row = this.run(undefined, () =>
      this.db
        .prepare<[string], NoteRow>(
          'SELECT id, note_name, note FROM notebook WHERE note_name = ?'
        )
        .get(noteName)
    );
    if (!row) {
      throw new NotFoundError(noteName);
    }
    return toNote(row);
  }

  async getAll(): Promise<Note[]> {
    const rows = this.run(undefined, () =>
      this.db
        .prepare<[], NoteRow>('SELECT id, note_name, note FROM notebook ORDER BY id')
        .all()
    );
    return rows.map(toNote);
  }

  /**
   * Map a backend failure onto the domain error set. A uniqueness violation
   * becomes `NameAlreadyTakenError` for `claimedName`; everything else is a
   * storage failure.
   */
  classifyFailure(error: unknown, claimedName?: string): NotebookError {
    if (error instanceof NotebookError) {
      return error;
    }
    if (
      claimedName !== undefined &&
      error instanceof Database.SqliteError &&
      error.code === UNIQUE_VIOLATION
    ) {
      return new NameAlreadyTakenError(claimedName, { cause: error });
    }
    return new StorageFailureError(`Notebook storage failed: ${describeError(error)}`, {
      cause: error,
    });
  }

  private run<T>(claimedName: string | undefined, operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw this.classifyFailure(error, claimedName);
    }
  }
}
