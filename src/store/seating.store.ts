// src/store/seating.store.ts

import type {
  ChangeSet,
  EventRecord,
  StoredEventState,
} from "../types/seating.type";

export interface TransactionOutcome<T> {
  changes: ChangeSet;
  value: T;
}

export type TransactionWork<T> = (
  state: StoredEventState,
) => Promise<TransactionOutcome<T>>;

export interface TokenOwner {
  token: string;
  eventId: string;
  issuedAt: Date;
}

/**
 * Durable storage for events, tables, guests and the permanent token
 * registry.
 *
 * `transact` reads the committed state of one event, hands it to `work`, and
 * applies the returned change set atomically. The commit only succeeds if the
 * event's revision is still the one that was read; otherwise it throws
 * ConflictError. Implementations throw StorageUnavailableError when the
 * backend is unreachable or times out, and guarantee nothing was applied in
 * that case.
 */
export interface SeatingStore {
  createEvent(event: EventRecord): Promise<void>;
  deleteEvent(eventId: string): Promise<boolean>;
  findEventByPublicCode(publicCode: string): Promise<EventRecord | null>;
  listEvents(): Promise<EventRecord[]>;
  loadState(eventId: string): Promise<StoredEventState | null>;
  transact<T>(eventId: string, work: TransactionWork<T>): Promise<T>;
  reserveToken(token: string, eventId: string): Promise<boolean>;
  findTokenOwner(token: string): Promise<TokenOwner | null>;
}

export const emptyChangeSet = (): ChangeSet => ({
  putTables: [],
  deleteTableIds: [],
  putGuests: [],
  deleteGuestIds: [],
});

export const isEmptyChangeSet = (changes: ChangeSet): boolean =>
  changes.putTables.length === 0 &&
  changes.deleteTableIds.length === 0 &&
  changes.putGuests.length === 0 &&
  changes.deleteGuestIds.length === 0;
