import { EventListener, EventType, NoteEvent, NoteEventInit } from '../types/index.js';
import logger from '../utils/logger.js';

export type ListenerKey = EventType | '*';

/** Removes the listener it was returned for. Calling it again does nothing. */
export type Unsubscribe = () => void;

/**
 * Carries notebook change notifications from the stores to whoever observes them.
 */
export interface NoteEventBus {
  subscribe(key: ListenerKey, listener: EventListener): Unsubscribe;
  /**
   * Stamp `init` with the current time and `source`, then hand it to the
   * listeners of its type followed by the `'*'` listeners.
   */
  emit(source: string, init: NoteEventInit): Promise<NoteEvent>;
}

/**
 * In-process bus. Listeners run one after another in subscription order;
 * a listener that throws is logged and skipped.
 */
export class LocalNoteEventBus implements NoteEventBus {
  private readonly listeners = new Map<ListenerKey, Set<EventListener>>();

  subscribe(key: ListenerKey, listener: EventListener): Unsubscribe {
    const forKey = this.listeners.get(key) ?? new Set<EventListener>();
    forKey.add(listener);
    this.listeners.set(key, forKey);

    return () => {
      forKey.delete(listener);
      if (forKey.size === 0 && this.listeners.get(key) === forKey) {
        this.listeners.delete(key);
      }
    };
  }

  async emit(source: string, init: NoteEventInit): Promise<NoteEvent> {
    const event: NoteEvent = { ...init, timestamp: new Date(), source };

    // A listener subscribed under both keys hears the event once.
    const recipients = new Set([
      ...(this.listeners.get(event.type) ?? []),
      ...(this.listeners.get('*') ?? []),
    ]);

    for (const listener of recipients) {
      try {
        await listener(event);
      } catch (err) {
        logger.error({ err, eventType: event.type, source }, 'Note event listener failed');
      }
    }
    return event;
  }
}

export function createNoteEventBus(): NoteEventBus {
  return new LocalNoteEventBus();
}
