// src/services/seating.views.ts

import type {
  EventRecord,
  EventView,
  ExportedGuest,
  GuestRecord,
  GuestView,
  TableRecord,
  TableView,
} from "../types/seating.type";

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

export const byName = (a: { name: string }, b: { name: string }) =>
  a.name.localeCompare(b.name);

// Seat order with unnumbered guests last, by name
export const bySeat = (
  a: { name: string; seatNo: number | null },
  b: { name: string; seatNo: number | null },
) => {
  if (a.seatNo !== b.seatNo) {
    if (a.seatNo === null) return 1;
    if (b.seatNo === null) return -1;
    return a.seatNo - b.seatNo;
  }
  return byName(a, b);
};

export const byLabel = (a: { label: string }, b: { label: string }) =>
  a.label.localeCompare(b.label, undefined, { numeric: true });

export const toEventView = (event: EventRecord): EventView => ({
  eventId: event.eventId,
  name: event.name,
  date: iso(event.date),
  organizerEmail: event.organizerEmail,
  publicCode: event.publicCode,
  tableCapacityLimit: event.tableCapacityLimit,
  createdAt: event.createdAt.toISOString(),
});

export const toGuestView = (guest: GuestRecord): GuestView => ({
  guestId: guest.guestId,
  name: guest.name,
  dietary: guest.dietary,
  tableId: guest.tableId,
  seatNo: guest.seatNo,
  status: guest.status,
  checkedInAt: iso(guest.checkedInAt),
});

export const toTableView = (
  table: TableRecord,
  guests: Iterable<GuestRecord>,
): TableView => {
  let occupancy = 0;
  let checkedIn = 0;
  for (const guest of guests) {
    if (guest.tableId !== table.tableId) continue;
    occupancy += 1;
    if (guest.status === "checked_in") checkedIn += 1;
  }
  return {
    tableId: table.tableId,
    label: table.label,
    capacity: table.capacity,
    occupancy,
    checkedIn,
  };
};

export const toTableViews = (
  tables: Iterable<TableRecord>,
  guests: GuestRecord[],
): TableView[] =>
  [...tables].map((table) => toTableView(table, guests)).sort(byLabel);

export const toExportedGuest = (
  guest: GuestRecord,
  tables: Map<string, TableRecord>,
): ExportedGuest => ({
  ...toGuestView(guest),
  contact: guest.contact,
  tableLabel: guest.tableId ? (tables.get(guest.tableId)?.label ?? null) : null,
  token: guest.token,
});
