/**
 * Core type definitions for notebook-cli
 */

export interface DatabaseConfig {
  path: string; // SQLite file, or ':memory:'
}

export interface ServerConfig {
  port: number;
  host: string;
}

export interface AppConfig {
  database: DatabaseConfig;
  server: ServerConfig;
  logLevel: string;
}

/**
 * A single row of the notebook table.
 * `note` is never null here: an empty string means "no content yet".
 */
export interface Note {
  id: number;
  noteName: string;
  note: string;
}

/**
 * Parsed CLI command. `null` stands for "no command given".
 */
export type NoteCommand =
  | { kind: 'add'; noteName: string }
  | { kind: 'delete'; noteName: string }
  | { kind: 'delete-all' }
  | { kind: 'clear'; noteName: string }
  | { kind: 'update-note'; noteName: string }
  | { kind: 'rename'; noteName: string; newNoteName: string }
  | { kind: 'display'; noteName: string };

export enum EventType {
  NoteCreated = 'note.created',
  NoteDeleted = 'note.deleted',
  AllNotesDeleted = 'note.all-deleted',
  NoteCleared = 'note.cleared',
  NoteUpdated = 'note.updated',
  NoteRenamed = 'note.renamed',
}

export interface NoteCreatedPayload {
  id: number;
  noteName: string;
  note: string;
}

export interface NoteDeletedPayload {
  id: number;
  noteName: string;
}

export interface AllNotesDeletedPayload {
  count: number;
  noteNames: string[];
}

export interface NoteClearedPayload {
  noteName: string;
}

export interface NoteUpdatedPayload {
  noteName: string;
  note: string;
}

export interface NoteRenamedPayload {
  noteName: string;
  newNoteName: string;
}

export interface EventPayloadMap {
  [EventType.NoteCreated]: NoteCreatedPayload;
  [EventType.NoteDeleted]: NoteDeletedPayload;
  [EventType.AllNotesDeleted]: AllNotesDeletedPayload;
  [EventType.NoteCleared]: NoteClearedPayload;
  [EventType.NoteUpdated]: NoteUpdatedPayload;
  [EventType.NoteRenamed]: NoteRenamedPayload;
}

export type NoteEvent = {
  [K in EventType]: {
    type: K;
    timestamp: Date;
    source: string;
    payload: EventPayloadMap[K];
  };
}[EventType];

export type EventListener = (event: NoteEvent) => void | Promise<void>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * A note event before the bus stamps it with `timestamp` and `source`.
 */
export type NoteEventInit = DistributiveOmit<NoteEvent, 'timestamp' | 'source'>;
