// src/services/seating.service.ts

import { randomBytes, randomUUID } from "crypto";
import type { AdminCapability } from "../lib/adminCapability";
import {
  ConflictError,
  NotFoundError,
  TokenNotFoundError,
  assertNotCancelled,
} from "../lib/errors";
import { KeyedSerialQueue } from "../lib/keyedQueue";
import { createLog } from "../lib/logger";
import { collapseWhitespace, guestKey, normalizeLabel } from "../lib/normalize";
import { withStorageRetry, type RetryOptions } from "../lib/retry";
import { isEmptyChangeSet, type SeatingStore } from "../store/seating.store";
import type {
  ImportOptions,
  ImportResult,
  ImportRow,
  Violation,
} from "../types/import.type";
import {
  TABLE_CAPACITY_LIMIT,
  type AddGuestInput,
  type AddTableInput,
  type CheckInResult,
  type CreateEventInput,
  type EventRecord,
  type EventView,
  type ExportedGuest,
  type GuestLookup,
  type GuestPage,
  type GuestRecord,
  type SeatingExport,
  type SeatingSnapshot,
  type SeatingSummary,
  type StoredEventState,
  type TableRecord,
  type TableView,
  type UpdateGuestInput,
} from "../types/seating.type";
import type {
  DeltaSink,
  EventBroadcaster,
  SubscriptionMode,
} from "./broadcaster";
import { applyImport, checkRows, checkTables, isSeatNumber } from "./importPlanner";
import { diffDraft, toDraft, type SeatingDraft } from "./seating.diff";
import {
  byLabel,
  byName,
  bySeat,
  toEventView,
  toExportedGuest,
  toGuestView,
  toTableView,
  toTableViews,
} from "./seating.views";
import type { TokenIssuer } from "./tokenIssuer";
import {
  findInvariantViolations,
  rejection,
  validateSeating,
  type FixedOccupant,
} from "./validator";

const log = createLog("Seating");

const PUBLIC_CODE_BYTES = 8;
const PUBLIC_CODE_ATTEMPTS = 3;
const DEFAULT_PER_PAGE = 50;
const MAX_PER_PAGE = 100;

export interface SeatingEngineOptions {
  retry: RetryOptions;
  clock?: () => Date;
}

export interface SearchOptions {
  search?: string;
  page?: number;
  perPage?: number;
}

export interface LiveSubscription {
  eventId: string;
  mode: SubscriptionMode;
}

interface Committed {
  state: StoredEventState;
  sequence: number; // broadcaster sequence that `state` reflects
}

interface Mutation<T> {
  value: T;
  sequence: number;
}

const malformed = (detail: string): Violation[] => [
  { kind: "MalformedRow", rows: [], detail },
];

/**
 * Single writer for every event's seating.
 *
 * Mutations run one at a time per event: the plan edits a draft copy of the
 * committed state, the draft is audited, the diff is committed through the
 * store, and only then are the deltas published. The latest committed state
 * and its sequence are cached per event and replaced in the same synchronous
 * step as publication, so snapshots served from the cache always line up with
 * the delta stream.
 */
export class SeatingEngine {
  private readonly queue = new KeyedSerialQueue();
  private readonly committed = new Map<string, Committed>();
  private readonly clock: () => Date;

  constructor(
    private readonly store: SeatingStore,
    private readonly issuer: TokenIssuer,
    private readonly broadcaster: EventBroadcaster,
    private readonly options: SeatingEngineOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  // ─── Events ────────────────────────────────────────────────────

  async createEvent(cap: AdminCapability, input: CreateEventInput): Promise<EventView> {
    const name = collapseWhitespace(input.name);
    if (!name) throw rejection("MalformedRow", malformed("event name is empty"));

    for (let attempt = 1; ; attempt++) {
      const event: EventRecord = {
        eventId: randomUUID(),
        name,
        date: input.date ?? null,
        organizerEmail: input.organizerEmail?.trim() || null,
        publicCode: randomBytes(PUBLIC_CODE_BYTES).toString("base64url"),
        tableCapacityLimit: TABLE_CAPACITY_LIMIT,
        createdAt: this.clock(),
      };
      try {
        await this.retrying(() => this.store.createEvent(event));
        log.success(`Event created by ${cap.actor}`, {
          eventId: event.eventId,
          publicCode: event.publicCode,
        });
        return toEventView(event);
      } catch (error) {
        // a public code collision surfaces as a conflict; draw again
        if (!(error instanceof ConflictError) || attempt >= PUBLIC_CODE_ATTEMPTS) throw error;
      }
    }
  }

  async deleteEvent(cap: AdminCapability, eventId: string): Promise<void> {
    await this.queue.run(eventId, async () => {
      const deleted = await this.retrying(() => this.store.deleteEvent(eventId));
      if (!deleted) throw new NotFoundError("Event", eventId);
      this.committed.delete(eventId);
      this.broadcaster.closeEvent(eventId, "event_deleted");
    });
    log.success(`Event deleted by ${cap.actor}`, { eventId });
  }

  async listEvents(_cap: AdminCapability): Promise<EventView[]> {
    const events = await this.retrying(() => this.store.listEvents());
    return events.map(toEventView);
  }

  async getEvent(_cap: AdminCapability, eventId: string): Promise<EventView> {
    const { state } = await this.readCommitted(eventId);
    return toEventView(state.event);
  }

  async resolvePublicCode(publicCode: string): Promise<EventRecord> {
    const event = await this.retrying(() => this.store.findEventByPublicCode(publicCode));
    if (!event) throw new NotFoundError("Event", publicCode);
    return event;
  }

  // ─── Import / export ───────────────────────────────────────────

  async importSeating(
    cap: AdminCapability,
    eventId: string,
    rows: ImportRow[],
    options: ImportOptions,
  ): Promise<ImportResult> {
    checkRows(rows);
    checkTables(options.tables ?? []);
    assertNotCancelled(options.signal, "before the event was locked");

    const { value: plan, sequence } = await this.mutate(
      eventId,
      (draft) =>
        applyImport(draft, rows, options, {
          mintToken: () => this.issuer.mint(eventId),
          newId: randomUUID,
          now: this.clock(),
        }),
      options.signal,
    );

    log.success(`Imported ${rows.length} rows (${options.mode}) by ${cap.actor}`, {
      eventId,
      created: plan.outcomes.filter((o) => o.action === "created").length,
      removedGuests: plan.removedGuestIds.length,
      sequence,
    });
    return { mode: options.mode, ...plan, sequence };
  }

  async exportSeating(_cap: AdminCapability, eventId: string): Promise<SeatingExport> {
    const { state } = await this.readCommitted(eventId);
    const tables = new Map(state.tables.map((t) => [t.tableId, t]));
    return {
      event: toEventView(state.event),
      tables: toTableViews(state.tables, state.guests),
      guests: [...state.guests].sort(byName).map((g) => toExportedGuest(g, tables)),
    };
  }

  // ─── Seating and check-in ──────────────────────────────────────

  // Moving to another table drops the seat number unless a new one is given
  async assignGuestToTable(
    _cap: AdminCapability,
    eventId: string,
    guestId: string,
    tableId: string | null,
    seatNo?: number | null,
  ): Promise<ExportedGuest> {
    if (seatNo !== undefined) assertSeatNumber(seatNo, tableId);
    const { value } = await this.mutate(eventId, async (draft) => {
      const guest = requireGuest(draft, guestId);
      const nextSeat =
        seatNo !== undefined ? seatNo : guest.tableId === tableId ? guest.seatNo : null;
      if (guest.tableId !== tableId || guest.seatNo !== nextSeat) {
        assertSeatable(draft, guest, tableId, nextSeat);
        draft.guests.set(guestId, { ...guest, tableId, seatNo: nextSeat });
      }
      return exportedFrom(draft, guestId);
    });
    return value;
  }

  async checkIn(eventId: string, guestId: string): Promise<CheckInResult> {
    const { value } = await this.mutate(eventId, async (draft): Promise<CheckInResult> => {
      const guest = requireGuest(draft, guestId);
      if (guest.status === "checked_in" && guest.checkedInAt) {
        return {
          guest: toGuestView(guest),
          checkedInAt: guest.checkedInAt.toISOString(),
          wasAlreadyCheckedIn: true,
        };
      }
      const checkedInAt = this.clock();
      const next: GuestRecord = { ...guest, status: "checked_in", checkedInAt };
      draft.guests.set(guestId, next);
      return {
        guest: toGuestView(next),
        checkedInAt: checkedInAt.toISOString(),
        wasAlreadyCheckedIn: false,
      };
    });
    if (!value.wasAlreadyCheckedIn) log.info(`Guest checked in`, { eventId, guestId });
    return value;
  }

  // Portal check-in: the token is the guest's only credential
  async checkInByToken(token: string): Promise<CheckInResult> {
    const { eventId, guest } = await this.resolveToken(token);
    return this.checkIn(eventId, guest.guestId);
  }

  async revertCheckIn(
    cap: AdminCapability,
    eventId: string,
    guestId: string,
  ): Promise<ExportedGuest> {
    const { value } = await this.mutate(eventId, async (draft) => {
      const guest = requireGuest(draft, guestId);
      if (guest.status === "checked_in") {
        draft.guests.set(guestId, { ...guest, status: "not_arrived", checkedInAt: null });
      }
      return exportedFrom(draft, guestId);
    });
    log.warn(`Check-in reverted by ${cap.actor}`, { eventId, guestId });
    return value;
  }

  // ─── Guests ────────────────────────────────────────────────────

  async addGuest(
    _cap: AdminCapability,
    eventId: string,
    input: AddGuestInput,
  ): Promise<ExportedGuest> {
    const name = collapseWhitespace(input.name);
    if (!name) throw rejection("MalformedRow", malformed("guest name is empty"));
    const tableId = input.tableId ?? null;
    const seatNo = input.seatNo ?? null;
    assertSeatNumber(seatNo, tableId);

    const { value } = await this.mutate(eventId, async (draft) => {
      const key = guestKey(name, input.contact);
      assertUniqueKey(draft, key, null);
      const guest: GuestRecord = {
        guestId: randomUUID(),
        name,
        naturalKey: key,
        contact: input.contact?.trim() || null,
        dietary: input.dietary?.trim() || null,
        tableId: null,
        seatNo: null,
        status: "not_arrived",
        checkedInAt: null,
        token: "",
        createdAt: this.clock(),
      };
      if (tableId !== null) assertSeatable(draft, guest, tableId, seatNo);
      guest.tableId = tableId;
      guest.seatNo = seatNo;
      guest.token = await this.issuer.mint(eventId);
      draft.guests.set(guest.guestId, guest);
      return exportedFrom(draft, guest.guestId);
    });
    return value;
  }

  async updateGuest(
    _cap: AdminCapability,
    eventId: string,
    guestId: string,
    input: UpdateGuestInput,
  ): Promise<ExportedGuest> {
    const { value } = await this.mutate(eventId, async (draft) => {
      const guest = requireGuest(draft, guestId);
      const name = input.name === undefined ? guest.name : collapseWhitespace(input.name);
      if (!name) throw rejection("MalformedRow", malformed("guest name is empty"));
      const contact =
        input.contact === undefined ? guest.contact : input.contact?.trim() || null;
      const dietary =
        input.dietary === undefined ? guest.dietary : input.dietary?.trim() || null;
      const seatNo = input.seatNo === undefined ? guest.seatNo : input.seatNo;

      const key = guestKey(name, contact);
      assertUniqueKey(draft, key, guestId);
      if (seatNo !== guest.seatNo) {
        assertSeatNumber(seatNo, guest.tableId);
        assertSeatable(draft, guest, guest.tableId, seatNo);
      }
      draft.guests.set(guestId, { ...guest, name, contact, dietary, seatNo, naturalKey: key });
      return exportedFrom(draft, guestId);
    });
    return value;
  }

  async removeGuest(cap: AdminCapability, eventId: string, guestId: string): Promise<void> {
    await this.mutate(eventId, async (draft) => {
      requireGuest(draft, guestId);
      draft.guests.delete(guestId);
    });
    log.info(`Guest removed by ${cap.actor}`, { eventId, guestId });
  }

  async searchGuests(
    _cap: AdminCapability,
    eventId: string,
    options: SearchOptions = {},
  ): Promise<GuestPage> {
    const { state } = await this.readCommitted(eventId);
    const needle = normalizeLabel(options.search ?? "");
    const matches = state.guests
      .filter((g) => !needle || normalizeLabel(g.name).includes(needle))
      .sort(byName);

    const perPage = Math.min(Math.max(1, options.perPage ?? DEFAULT_PER_PAGE), MAX_PER_PAGE);
    const page = Math.max(1, options.page ?? 1);
    const offset = (page - 1) * perPage;
    return {
      guests: matches.slice(offset, offset + perPage).map(toGuestView),
      pagination: {
        page,
        perPage,
        total: matches.length,
        pages: Math.ceil(matches.length / perPage),
      },
    };
  }

  // ─── Tables ────────────────────────────────────────────────────

  async addTable(
    _cap: AdminCapability,
    eventId: string,
    input: AddTableInput,
  ): Promise<TableView> {
    const label = collapseWhitespace(input.label);
    if (!label) throw rejection("MalformedRow", malformed("table label is empty"));
    const capacity = input.capacity ?? TABLE_CAPACITY_LIMIT;
    if (!Number.isInteger(capacity) || capacity < 1 || capacity > TABLE_CAPACITY_LIMIT) {
      throw rejection("InvalidCapacity", [
        {
          kind: "InvalidCapacity",
          rows: [],
          tableLabel: label,
          capacity,
          detail: `capacity must be an integer between 1 and ${TABLE_CAPACITY_LIMIT}`,
        },
      ]);
    }

    const { value } = await this.mutate(eventId, async (draft) => {
      const ref = normalizeLabel(label);
      const clash = [...draft.tables.values()].find((t) => normalizeLabel(t.label) === ref);
      if (clash) {
        throw rejection("DuplicateTableLabel", [
          {
            kind: "DuplicateTableLabel",
            rows: [],
            tableRef: clash.tableId,
            tableLabel: clash.label,
            detail: `table label "${clash.label}" is already in use`,
          },
        ]);
      }
      const table: TableRecord = { tableId: randomUUID(), label, capacity };
      draft.tables.set(table.tableId, table);
      return toTableView(table, []);
    });
    return value;
  }

  async removeTable(cap: AdminCapability, eventId: string, tableId: string): Promise<void> {
    await this.mutate(eventId, async (draft) => {
      const table = draft.tables.get(tableId);
      if (!table) throw new NotFoundError("Table", tableId);

      const verdict = validateSeating({
        seats: [],
        tables: [
          {
            ref: tableId,
            label: table.label,
            capacity: table.capacity,
            scheduledForRemoval: true,
          },
        ],
        fixed: seatedAt(draft, tableId),
      });
      if (verdict.status === "rejected") throw rejection(verdict.kind, verdict.violations);
      draft.tables.delete(tableId);
    });
    log.info(`Table removed by ${cap.actor}`, { eventId, tableId });
  }

  // ─── Reads ─────────────────────────────────────────────────────

  async lookupByToken(token: string): Promise<GuestLookup> {
    const { state, guest } = await this.resolveToken(token);
    const table = guest.tableId
      ? (state.tables.find((t) => t.tableId === guest.tableId) ?? null)
      : null;
    return {
      event: toEventView(state.event),
      guest: toGuestView(guest),
      table: table ? toTableView(table, state.guests) : null,
      tableMates: table
        ? state.guests
            .filter((g) => g.tableId === table.tableId && g.guestId !== guest.guestId)
            .sort(bySeat)
            .map((g) => ({
              name: g.name,
              seatNo: g.seatNo,
              dietary: g.dietary,
              checkedIn: g.status === "checked_in",
            }))
        : [],
    };
  }

  // Names are only listed for an authorized admin
  async summarize(publicCode: string, cap?: AdminCapability): Promise<SeatingSummary> {
    const event = await this.resolvePublicCode(publicCode);
    const { state } = await this.readCommitted(event.eventId);
    const tables = [...state.tables].sort(byLabel).map((table) => {
      const seated = state.guests.filter((g) => g.tableId === table.tableId).sort(bySeat);
      const checkedIn = seated.filter((g) => g.status === "checked_in").length;
      return {
        tableId: table.tableId,
        label: table.label,
        totalGuests: seated.length,
        checkedIn,
        availableSeats: Math.max(0, table.capacity - seated.length),
        ...(cap
          ? {
              guests: seated.map((g) => ({
                name: g.name,
                seatNo: g.seatNo,
                checkedIn: g.status === "checked_in",
                dietary: g.dietary,
              })),
            }
          : {}),
      };
    });

    return {
      eventName: state.event.name,
      eventDate: state.event.date ? state.event.date.toISOString() : null,
      totalGuests: state.guests.length,
      checkedInGuests: state.guests.filter((g) => g.status === "checked_in").length,
      unassignedGuests: state.guests.filter((g) => g.tableId === null).length,
      totalTables: state.tables.length,
      tables,
    };
  }

  async liveSnapshot(eventId: string): Promise<SeatingSnapshot> {
    const { state, sequence } = await this.readCommitted(eventId);
    return {
      eventId,
      sequence,
      event: toEventView(state.event),
      tables: toTableViews(state.tables, state.guests),
      guests: [...state.guests].sort(byName).map(toGuestView),
    };
  }

  // ─── Live subscriptions ────────────────────────────────────────

  async subscribe(
    publicCode: string,
    sink: DeltaSink,
    checkpoint: { lastSequence?: number; epoch?: string } = {},
  ): Promise<LiveSubscription> {
    const event = await this.resolvePublicCode(publicCode);
    const mode = await this.broadcaster.subscribe(event.eventId, sink, {
      ...checkpoint,
      loadSnapshot: () => this.liveSnapshot(event.eventId),
    });
    return { eventId: event.eventId, mode };
  }

  unsubscribe(eventId: string, sinkId: string): boolean {
    return this.broadcaster.unsubscribe(eventId, sinkId);
  }

  // ─── Internals ─────────────────────────────────────────────────

  private retrying<T>(task: () => Promise<T>): Promise<T> {
    return withStorageRetry(task, this.options.retry, (attempt, error) =>
      log.warn(`Storage unavailable, retry ${attempt}`, error),
    );
  }

  private async resolveToken(
    token: string,
  ): Promise<{ eventId: string; state: StoredEventState; guest: GuestRecord }> {
    if (!this.issuer.verify(token)) throw new TokenNotFoundError();
    const owner = await this.retrying(() => this.store.findTokenOwner(token));
    if (!owner) throw new TokenNotFoundError();

    let committed: Committed;
    try {
      committed = await this.readCommitted(owner.eventId);
    } catch (error) {
      if (error instanceof NotFoundError) throw new TokenNotFoundError();
      throw error;
    }
    const guest = committed.state.guests.find((g) => g.token === token);
    if (!guest) throw new TokenNotFoundError();
    return { eventId: owner.eventId, state: committed.state, guest };
  }

  // Warm reads never wait on writers; a cold load takes the event's slot once
  private async readCommitted(eventId: string): Promise<Committed> {
    const cached = this.committed.get(eventId);
    if (cached) return cached;

    return this.queue.run(eventId, async () => {
      const loaded = this.committed.get(eventId);
      if (loaded) return loaded;
      const state = await this.retrying(() => this.store.loadState(eventId));
      if (!state) throw new NotFoundError("Event", eventId);
      const entry = { state, sequence: this.broadcaster.currentSequence(eventId) };
      this.committed.set(eventId, entry);
      return entry;
    });
  }

  private mutate<T>(
    eventId: string,
    plan: (draft: SeatingDraft) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<Mutation<T>> {
    return this.queue.run(eventId, async () => {
      assertNotCancelled(signal, "before the event was locked");
      try {
        const result = await this.retrying(() =>
          this.store.transact(eventId, async (state) => {
            const draft = toDraft(state);
            const value = await plan(draft);

            const broken = findInvariantViolations(draft.tables.values(), draft.guests.values());
            if (broken.length > 0) {
              log.error(`Draft for ${eventId} breaks invariants`, broken);
              throw new Error(`Seating invariant violated: ${broken[0].detail}`);
            }

            const { changes, deltas } = diffDraft(state, draft);
            assertNotCancelled(signal, "before commit");
            const next: StoredEventState = {
              event: state.event,
              revision: isEmptyChangeSet(changes) ? state.revision : state.revision + 1,
              tables: [...draft.tables.values()],
              guests: [...draft.guests.values()],
            };
            return { changes, value: { value, deltas, next } };
          }),
        );

        let sequence = this.broadcaster.currentSequence(eventId);
        for (const delta of result.deltas) {
          sequence = this.broadcaster.publish(eventId, delta).sequence;
        }
        this.committed.set(eventId, { state: result.next, sequence });
        return { value: result.value, sequence };
      } catch (error) {
        if (error instanceof ConflictError) this.committed.delete(eventId);
        throw error;
      }
    });
  }
}

// ─── Draft helpers ───────────────────────────────────────────────

const requireGuest = (draft: SeatingDraft, guestId: string): GuestRecord => {
  const guest = draft.guests.get(guestId);
  if (!guest) throw new NotFoundError("Guest", guestId);
  return guest;
};

const seatedAt = (draft: SeatingDraft, tableId: string, except?: string): FixedOccupant[] =>
  [...draft.guests.values()]
    .filter((g) => g.tableId === tableId && g.guestId !== except)
    .map((g) => ({ guestId: g.guestId, tableRef: tableId, seatNo: g.seatNo }));

const assertSeatNumber = (seatNo: number | null, tableId: string | null): void => {
  if (seatNo === null) return;
  if (!isSeatNumber(seatNo)) {
    throw rejection("MalformedRow", malformed("seat number must be a positive integer"));
  }
  if (tableId === null) {
    throw rejection("MalformedRow", malformed("seat number given without a table"));
  }
};

// Validates seating one guest at `tableId` against everyone already seated there
const assertSeatable = (
  draft: SeatingDraft,
  guest: GuestRecord,
  tableId: string | null,
  seatNo: number | null,
): void => {
  if (tableId === null) return;
  const table = draft.tables.get(tableId);
  const verdict = validateSeating({
    seats: [{ rowIndex: 0, guestKey: guest.naturalKey, tableRef: tableId, seatNo }],
    tables: table
      ? [
          {
            ref: tableId,
            label: table.label,
            capacity: table.capacity,
            scheduledForRemoval: false,
          },
        ]
      : [],
    fixed: seatedAt(draft, tableId, guest.guestId),
  });
  if (verdict.status === "rejected") throw rejection(verdict.kind, verdict.violations);
};

const assertUniqueKey = (draft: SeatingDraft, key: string, self: string | null): void => {
  const taken = [...draft.guests.values()].find(
    (g) => g.naturalKey === key && g.guestId !== self,
  );
  if (taken) {
    throw rejection("DuplicateGuestKey", [
      { kind: "DuplicateGuestKey", rows: [], guestKey: key, guestIds: [taken.guestId] },
    ]);
  }
};

const exportedFrom = (draft: SeatingDraft, guestId: string): ExportedGuest =>
  toExportedGuest(requireGuest(draft, guestId), draft.tables);
