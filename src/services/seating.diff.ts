// src/services/seating.diff.ts

import type {
  ChangeSet,
  GuestRecord,
  SeatingDelta,
  StoredEventState,
  TableRecord,
} from "../types/seating.type";
import { emptyChangeSet } from "../store/seating.store";
import { toGuestView, toTableView } from "./seating.views";

// Working copy of one event's tables and guests, keyed by id
export interface SeatingDraft {
  tables: Map<string, TableRecord>;
  guests: Map<string, GuestRecord>;
}

export const toDraft = (state: StoredEventState): SeatingDraft => ({
  tables: new Map(state.tables.map((t) => [t.tableId, { ...t }])),
  guests: new Map(state.guests.map((g) => [g.guestId, { ...g }])),
});

const sameTime = (a: Date | null, b: Date | null) =>
  (a?.getTime() ?? null) === (b?.getTime() ?? null);

const sameTable = (a: TableRecord, b: TableRecord) =>
  a.label === b.label && a.capacity === b.capacity;

export const sameGuest = (a: GuestRecord, b: GuestRecord) =>
  a.name === b.name &&
  a.naturalKey === b.naturalKey &&
  a.contact === b.contact &&
  a.dietary === b.dietary &&
  a.tableId === b.tableId &&
  a.seatNo === b.seatNo &&
  a.status === b.status &&
  sameTime(a.checkedInAt, b.checkedInAt) &&
  a.token === b.token;

export interface DraftDiff {
  changes: ChangeSet;
  deltas: SeatingDelta[];
}

/**
 * Minimal change set and the deltas a viewer needs to move from `before` to
 * `draft`. Deltas come out grouped so that every reference a delta makes
 * (a new table, a new guest) was introduced by an earlier one: additions,
 * then updates, then removals.
 */
export function diffDraft(before: StoredEventState, draft: SeatingDraft): DraftDiff {
  const changes = emptyChangeSet();
  const prevTables = new Map(before.tables.map((t) => [t.tableId, t]));
  const prevGuests = new Map(before.guests.map((g) => [g.guestId, g]));

  const tableAdded: SeatingDelta[] = [];
  const guestAdded: SeatingDelta[] = [];
  const guestUpdated: SeatingDelta[] = [];
  const seating: SeatingDelta[] = [];
  const checkIns: SeatingDelta[] = [];
  const guestRemoved: SeatingDelta[] = [];
  const tableRemoved: SeatingDelta[] = [];

  for (const table of draft.tables.values()) {
    const prev = prevTables.get(table.tableId);
    if (prev && sameTable(prev, table)) continue;
    changes.putTables.push(table);
    // occupancy is carried by the guest deltas that follow
    if (!prev) tableAdded.push({ kind: "TableAdded", table: toTableView(table, []) });
  }

  for (const guest of draft.guests.values()) {
    const prev = prevGuests.get(guest.guestId);
    if (!prev) {
      changes.putGuests.push(guest);
      guestAdded.push({ kind: "GuestAdded", guest: toGuestView(guest) });
      continue;
    }
    if (sameGuest(prev, guest)) continue;
    changes.putGuests.push(guest);

    if (
      prev.name !== guest.name ||
      prev.dietary !== guest.dietary ||
      prev.seatNo !== guest.seatNo
    ) {
      guestUpdated.push({ kind: "GuestUpdated", guest: toGuestView(guest) });
    }
    if (prev.tableId !== guest.tableId) {
      seating.push({
        kind: "SeatingChanged",
        guestId: guest.guestId,
        fromTableId: prev.tableId,
        toTableId: guest.tableId,
      });
    }
    if (prev.status !== guest.status) {
      checkIns.push(
        guest.status === "checked_in" && guest.checkedInAt
          ? {
              kind: "CheckedIn",
              guestId: guest.guestId,
              checkedInAt: guest.checkedInAt.toISOString(),
            }
          : { kind: "CheckInReverted", guestId: guest.guestId },
      );
    }
  }

  for (const guestId of prevGuests.keys()) {
    if (draft.guests.has(guestId)) continue;
    changes.deleteGuestIds.push(guestId);
    guestRemoved.push({ kind: "GuestRemoved", guestId });
  }
  for (const tableId of prevTables.keys()) {
    if (draft.tables.has(tableId)) continue;
    changes.deleteTableIds.push(tableId);
    tableRemoved.push({ kind: "TableRemoved", tableId });
  }

  return {
    changes,
    deltas: [
      ...tableAdded,
      ...guestAdded,
      ...guestUpdated,
      ...seating,
      ...checkIns,
      ...guestRemoved,
      ...tableRemoved,
    ],
  };
}
