// src/store/memory.store.ts

import { ConflictError, NotFoundError } from "../lib/errors";
import type {
  EventRecord,
  GuestRecord,
  StoredEventState,
  TableRecord,
} from "../types/seating.type";
import {
  isEmptyChangeSet,
  type SeatingStore,
  type TokenOwner,
  type TransactionWork,
} from "./seating.store";

interface EventEntry {
  event: EventRecord;
  revision: number;
  tables: Map<string, TableRecord>;
  guests: Map<string, GuestRecord>;
}

const copyEvent = (event: EventRecord): EventRecord => ({ ...event });

const snapshotOf = (entry: EventEntry): StoredEventState => ({
  event: copyEvent(entry.event),
  revision: entry.revision,
  tables: [...entry.tables.values()].map((t) => ({ ...t })),
  guests: [...entry.guests.values()].map((g) => ({ ...g })),
});

/**
 * In-process store. Every read hands out copies, so callers never hold
 * references into committed state.
 */
export class MemorySeatingStore implements SeatingStore {
  private readonly events = new Map<string, EventEntry>();
  private readonly tokens = new Map<string, TokenOwner>();

  async createEvent(event: EventRecord): Promise<void> {
    if (this.events.has(event.eventId)) {
      throw new ConflictError(`Event already exists: ${event.eventId}`);
    }
    for (const entry of this.events.values()) {
      if (entry.event.publicCode === event.publicCode) {
        throw new ConflictError(`Public code already in use: ${event.publicCode}`);
      }
    }
    this.events.set(event.eventId, {
      event: copyEvent(event),
      revision: 0,
      tables: new Map(),
      guests: new Map(),
    });
  }

  async deleteEvent(eventId: string): Promise<boolean> {
    return this.events.delete(eventId);
  }

  async findEventByPublicCode(publicCode: string): Promise<EventRecord | null> {
    for (const entry of this.events.values()) {
      if (entry.event.publicCode === publicCode) return copyEvent(entry.event);
    }
    return null;
  }

  async listEvents(): Promise<EventRecord[]> {
    return [...this.events.values()]
      .map((entry) => copyEvent(entry.event))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async loadState(eventId: string): Promise<StoredEventState | null> {
    const entry = this.events.get(eventId);
    return entry ? snapshotOf(entry) : null;
  }

  async transact<T>(eventId: string, work: TransactionWork<T>): Promise<T> {
    const entry = this.events.get(eventId);
    if (!entry) throw new NotFoundError("Event", eventId);

    const readRevision = entry.revision;
    const { changes, value } = await work(snapshotOf(entry));
    if (isEmptyChangeSet(changes)) return value;

    const current = this.events.get(eventId);
    if (current !== entry || entry.revision !== readRevision) {
      throw new ConflictError(
        `Event ${eventId} changed while the transaction was running`,
      );
    }

    for (const guestId of changes.deleteGuestIds) entry.guests.delete(guestId);
    for (const tableId of changes.deleteTableIds) entry.tables.delete(tableId);
    for (const table of changes.putTables) {
      entry.tables.set(table.tableId, { ...table });
    }
    for (const guest of changes.putGuests) {
      entry.guests.set(guest.guestId, { ...guest });
    }
    entry.revision += 1;
    return value;
  }

  async reserveToken(token: string, eventId: string): Promise<boolean> {
    if (this.tokens.has(token)) return false;
    this.tokens.set(token, { token, eventId, issuedAt: new Date() });
    return true;
  }

  async findTokenOwner(token: string): Promise<TokenOwner | null> {
    const owner = this.tokens.get(token);
    return owner ? { ...owner } : null;
  }
}
