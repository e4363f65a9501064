// src/types/seating.type.ts

export const TABLE_CAPACITY_LIMIT = 12;

export type CheckInStatus = "not_arrived" | "checked_in";
export type ImportMode = "replace_all" | "upsert";

// ─── Records (owned by the store, mutated only by the engine) ────

export interface EventRecord {
  eventId: string;
  name: string;
  date: Date | null;
  organizerEmail: string | null;
  publicCode: string; // short code for the public portal and live channel
  tableCapacityLimit: number;
  createdAt: Date;
}

export interface TableRecord {
  tableId: string;
  label: string; // "Table A"
  capacity: number;
}

export interface GuestRecord {
  guestId: string;
  name: string;
  naturalKey: string; // normalized name + contact
  contact: string | null;
  dietary: string | null;
  tableId: string | null; // null while unassigned
  seatNo: number | null; // unique per table when set
  status: CheckInStatus;
  checkedInAt: Date | null;
  token: string;
  createdAt: Date;
}

export interface StoredEventState {
  event: EventRecord;
  revision: number;
  tables: TableRecord[];
  guests: GuestRecord[];
}

export interface ChangeSet {
  putTables: TableRecord[];
  deleteTableIds: string[];
  putGuests: GuestRecord[];
  deleteGuestIds: string[];
}

// ─── Views (serialized for clients; tokens never leave admin routes) ──

export interface TableView {
  tableId: string;
  label: string;
  capacity: number;
  occupancy: number;
  checkedIn: number;
}

export interface GuestView {
  guestId: string;
  name: string;
  dietary: string | null;
  tableId: string | null;
  seatNo: number | null;
  status: CheckInStatus;
  checkedInAt: string | null;
}

export interface EventView {
  eventId: string;
  name: string;
  date: string | null;
  organizerEmail: string | null;
  publicCode: string;
  tableCapacityLimit: number;
  createdAt: string;
}

export interface SeatingSnapshot {
  eventId: string;
  sequence: number;
  event: EventView;
  tables: TableView[];
  guests: GuestView[];
}

export interface ExportedGuest extends GuestView {
  contact: string | null;
  tableLabel: string | null;
  token: string;
}

export interface SeatingExport {
  event: EventView;
  tables: TableView[];
  guests: ExportedGuest[];
}

export interface TableMate {
  name: string;
  seatNo: number | null;
  dietary: string | null;
  checkedIn: boolean;
}

export interface GuestLookup {
  event: EventView;
  guest: GuestView;
  table: TableView | null;
  tableMates: TableMate[];
}

export interface CheckInResult {
  guest: GuestView;
  checkedInAt: string;
  wasAlreadyCheckedIn: boolean;
}

export interface TableSummary {
  tableId: string;
  label: string;
  totalGuests: number;
  checkedIn: number;
  availableSeats: number;
  guests?: Array<{
    name: string;
    seatNo: number | null;
    checkedIn: boolean;
    dietary: string | null;
  }>;
}

export interface SeatingSummary {
  eventName: string;
  eventDate: string | null;
  totalGuests: number;
  checkedInGuests: number;
  unassignedGuests: number;
  totalTables: number;
  tables: TableSummary[];
}

// ─── Deltas ──────────────────────────────────────────────────────

export type SeatingDelta =
  | { kind: "TableAdded"; table: TableView }
  | { kind: "GuestAdded"; guest: GuestView }
  | { kind: "GuestUpdated"; guest: GuestView }
  | {
      kind: "SeatingChanged";
      guestId: string;
      fromTableId: string | null;
      toTableId: string | null;
    }
  | { kind: "CheckedIn"; guestId: string; checkedInAt: string }
  | { kind: "CheckInReverted"; guestId: string }
  | { kind: "GuestRemoved"; guestId: string }
  | { kind: "TableRemoved"; tableId: string };

export type DeltaKind = SeatingDelta["kind"];

export interface SequencedDelta {
  eventId: string;
  sequence: number;
  publishedAt: string;
  delta: SeatingDelta;
}

// Wire messages for live subscribers; `epoch` identifies the server process
export type LiveMessage =
  | { type: "snapshot"; epoch: string; sequence: number; payload: SeatingSnapshot }
  | { type: "delta"; epoch: string; sequence: number; payload: SequencedDelta };

// ─── Operation inputs ────────────────────────────────────────────

export interface CreateEventInput {
  name: string;
  date?: Date | null;
  organizerEmail?: string | null;
}

export interface AddGuestInput {
  name: string;
  contact?: string | null;
  dietary?: string | null;
  tableId?: string | null;
  seatNo?: number | null;
}

export interface UpdateGuestInput {
  name?: string;
  contact?: string | null;
  dietary?: string | null;
  seatNo?: number | null;
}

export interface AddTableInput {
  label: string;
  capacity?: number;
}

export interface GuestPage {
  guests: GuestView[];
  pagination: { page: number; perPage: number; total: number; pages: number };
}
