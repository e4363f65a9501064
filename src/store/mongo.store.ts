// src/store/mongo.store.ts

import mongoose, { ClientSession } from "mongoose";
import {
  ConflictError,
  NotFoundError,
  SeatingError,
  StorageUnavailableError,
} from "../lib/errors";
import { normalizeLabel } from "../lib/normalize";
import { EventModel, IEvent } from "../models/Event";
import { GuestModel, IGuest } from "../models/Guest";
import { IssuedTokenModel, IIssuedToken } from "../models/IssuedToken";
import { ISeatingTable, SeatingTableModel } from "../models/SeatingTable";
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

const DUPLICATE_KEY = 11000;

const UNAVAILABLE_ERRORS = new Set([
  "MongoNetworkError",
  "MongoNetworkTimeoutError",
  "MongoServerSelectionError",
  "MongoNotConnectedError",
  "MongoTopologyClosedError",
  "MongoExpiredSessionError",
]);

// ─── Document ⇄ record mapping ───────────────────────────────────

const toEventRecord = (doc: IEvent): EventRecord => ({
  eventId: doc.eventId,
  name: doc.name,
  date: doc.date ?? null,
  organizerEmail: doc.organizerEmail ?? null,
  publicCode: doc.publicCode,
  tableCapacityLimit: doc.tableCapacityLimit,
  createdAt: doc.createdAt,
});

const toTableRecord = (doc: ISeatingTable): TableRecord => ({
  tableId: doc.tableId,
  label: doc.label,
  capacity: doc.capacity,
});

const toGuestRecord = (doc: IGuest): GuestRecord => ({
  guestId: doc.guestId,
  name: doc.name,
  naturalKey: doc.naturalKey,
  contact: doc.contact ?? null,
  dietary: doc.dietary ?? null,
  tableId: doc.tableId ?? null,
  seatNo: doc.seatNo ?? null,
  status: doc.status,
  checkedInAt: doc.checkedInAt ?? null,
  token: doc.token,
  createdAt: doc.createdAt,
});

const toTokenOwner = (doc: IIssuedToken): TokenOwner => ({
  token: doc.token,
  eventId: doc.eventId,
  issuedAt: doc.issuedAt,
});

const hasCode = (error: unknown, code: number): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === code;

/**
 * Maps driver failures onto the engine's taxonomy. Errors the engine already
 * understands pass through untouched.
 */
export const toStorageError = (error: unknown): Error => {
  if (error instanceof SeatingError) return error;
  if (hasCode(error, DUPLICATE_KEY)) {
    return new ConflictError("A concurrent write claimed the same key");
  }
  if (
    error instanceof mongoose.mongo.MongoError &&
    (UNAVAILABLE_ERRORS.has(error.name) ||
      error.hasErrorLabel("TransientTransactionError") ||
      error.hasErrorLabel("UnknownTransactionCommitResult"))
  ) {
    return new StorageUnavailableError(error.message, error);
  }
  if (error instanceof mongoose.Error) {
    return new StorageUnavailableError(error.message, error);
  }
  return error instanceof Error ? error : new Error(String(error));
};

export interface MongoStoreOptions {
  commitTimeoutMs: number;
}

/**
 * Mongoose-backed store. Each seating transaction runs inside a multi-document
 * transaction (replica set required) and bumps the event revision with a
 * compare-and-set before writing tables and guests.
 */
export class MongoSeatingStore implements SeatingStore {
  constructor(private readonly options: MongoStoreOptions) {}

  async createEvent(event: EventRecord): Promise<void> {
    try {
      await EventModel.create({ ...event, revision: 0 });
    } catch (error) {
      throw toStorageError(error);
    }
  }

  async deleteEvent(eventId: string): Promise<boolean> {
    const session = await mongoose.startSession();
    try {
      let deleted = false;
      await session.withTransaction(async () => {
        const res = await EventModel.deleteOne({ eventId }, { session });
        deleted = res.deletedCount === 1;
        await GuestModel.deleteMany({ eventId }, { session });
        await SeatingTableModel.deleteMany({ eventId }, { session });
      });
      return deleted;
    } catch (error) {
      throw toStorageError(error);
    } finally {
      await session.endSession();
    }
  }

  async findEventByPublicCode(publicCode: string): Promise<EventRecord | null> {
    try {
      const doc = await EventModel.findOne({ publicCode }).lean<IEvent>();
      return doc ? toEventRecord(doc) : null;
    } catch (error) {
      throw toStorageError(error);
    }
  }

  async listEvents(): Promise<EventRecord[]> {
    try {
      const docs = await EventModel.find().sort({ createdAt: 1 }).lean<IEvent[]>();
      return docs.map(toEventRecord);
    } catch (error) {
      throw toStorageError(error);
    }
  }

  async loadState(eventId: string): Promise<StoredEventState | null> {
    try {
      return await this.readState(eventId, null);
    } catch (error) {
      throw toStorageError(error);
    }
  }

  async transact<T>(eventId: string, work: TransactionWork<T>): Promise<T> {
    const session = await mongoose.startSession();
    try {
      const holder: { outcome?: { value: T } } = {};

      await session.withTransaction(
        async () => {
          const state = await this.readState(eventId, session);
          if (!state) throw new NotFoundError("Event", eventId);

          const { changes, value } = await work(state);
          holder.outcome = { value };
          if (isEmptyChangeSet(changes)) return;

          const bumped = await EventModel.updateOne(
            { eventId, revision: state.revision },
            { $inc: { revision: 1 } },
            { session },
          );
          if (bumped.modifiedCount !== 1) {
            throw new ConflictError(
              `Event ${eventId} changed while the transaction was running`,
            );
          }

          if (changes.deleteGuestIds.length > 0) {
            await GuestModel.deleteMany(
              { eventId, guestId: { $in: changes.deleteGuestIds } },
              { session },
            );
          }
          if (changes.deleteTableIds.length > 0) {
            await SeatingTableModel.deleteMany(
              { eventId, tableId: { $in: changes.deleteTableIds } },
              { session },
            );
          }
          if (changes.putTables.length > 0) {
            await SeatingTableModel.bulkWrite(
              changes.putTables.map((table) => ({
                replaceOne: {
                  filter: { eventId, tableId: table.tableId },
                  replacement: {
                    eventId,
                    ...table,
                    labelKey: normalizeLabel(table.label),
                  },
                  upsert: true,
                },
              })),
              { session },
            );
          }
          if (changes.putGuests.length > 0) {
            await GuestModel.bulkWrite(
              changes.putGuests.map((guest) => ({
                replaceOne: {
                  filter: { eventId, guestId: guest.guestId },
                  replacement: { eventId, ...guest },
                  upsert: true,
                },
              })),
              { session },
            );
          }
        },
        {
          readConcern: { level: "snapshot" },
          writeConcern: { w: "majority" },
          maxCommitTimeMS: this.options.commitTimeoutMs,
        },
      );

      if (!holder.outcome) {
        throw new StorageUnavailableError(
          `Transaction for event ${eventId} did not complete`,
        );
      }
      return holder.outcome.value;
    } catch (error) {
      throw toStorageError(error);
    } finally {
      await session.endSession();
    }
  }

  async reserveToken(token: string, eventId: string): Promise<boolean> {
    try {
      await IssuedTokenModel.create({ token, eventId, issuedAt: new Date() });
      return true;
    } catch (error) {
      if (hasCode(error, DUPLICATE_KEY)) return false;
      throw toStorageError(error);
    }
  }

  async findTokenOwner(token: string): Promise<TokenOwner | null> {
    try {
      const doc = await IssuedTokenModel.findOne({ token }).lean<IIssuedToken>();
      return doc ? toTokenOwner(doc) : null;
    } catch (error) {
      throw toStorageError(error);
    }
  }

  private async readState(
    eventId: string,
    session: ClientSession | null,
  ): Promise<StoredEventState | null> {
    const event = await EventModel.findOne({ eventId })
      .session(session)
      .lean<IEvent>();
    if (!event) return null;

    // sequential: a session runs one operation at a time inside a transaction
    const tables = await SeatingTableModel.find({ eventId })
      .session(session)
      .lean<ISeatingTable[]>();
    const guests = await GuestModel.find({ eventId })
      .session(session)
      .lean<IGuest[]>();

    return {
      event: toEventRecord(event),
      revision: event.revision,
      tables: tables.map(toTableRecord),
      guests: guests.map(toGuestRecord),
    };
  }
}
