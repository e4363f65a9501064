// src/services/validator.ts

import { ValidationError } from "../lib/errors";
import type {
  RejectionKind,
  ValidationKind,
  Violation,
} from "../types/import.type";
import {
  TABLE_CAPACITY_LIMIT,
  type GuestRecord,
  type TableRecord,
} from "../types/seating.type";

// ─── Proposal shape ──────────────────────────────────────────────

export interface ProposedSeat {
  rowIndex: number;
  guestKey: string;
  tableRef: string | null; // label key for imports, tableId for single edits
  seatNo?: number | null;
}

export interface TableSlot {
  ref: string;
  label: string;
  capacity: number;
  scheduledForRemoval: boolean;
}

export interface FixedOccupant {
  guestId: string;
  tableRef: string;
  seatNo?: number | null;
}

export interface SeatingProposal {
  seats: ProposedSeat[];
  tables: TableSlot[];
  fixed: FixedOccupant[]; // seated guests outside the batch that stay seated
}

export type ValidationResult =
  | { status: "accepted"; occupancy: Map<string, number> }
  | { status: "rejected"; kind: RejectionKind; violations: Violation[] };

const effectiveCapacity = (capacity: number) =>
  Math.min(capacity, TABLE_CAPACITY_LIMIT);

const groupBy = <T>(items: T[], keyOf: (item: T) => string | null) => {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  return groups;
};

const rejected = (
  kind: RejectionKind,
  violations: Violation[],
): ValidationResult => ({ status: "rejected", kind, violations });

// ─── Checks (in order; first failing kind wins) ──────────────────

const duplicateKeys = (proposal: SeatingProposal): Violation[] =>
  [...groupBy(proposal.seats, (s) => s.guestKey)]
    .filter(([, seats]) => seats.length > 1)
    .map(([guestKey, seats]): Violation => ({
      kind: "DuplicateGuestKey",
      guestKey,
      rows: seats.map((s) => s.rowIndex),
    }));

const unknownTables = (
  proposal: SeatingProposal,
  slots: Map<string, TableSlot>,
): Violation[] =>
  [...groupBy(proposal.seats, (s) => s.tableRef)]
    .filter(([ref]) => !slots.has(ref))
    .map(([ref, seats]): Violation => ({
      kind: "UnknownTable",
      tableRef: ref,
      rows: seats.map((s) => s.rowIndex),
    }));

interface SeatClaim {
  ref: string;
  seatNo: number;
  rows: number[];
  guestIds: string[];
}

const duplicateSeats = (
  proposal: SeatingProposal,
  slots: Map<string, TableSlot>,
): Violation[] => {
  const claims = new Map<string, SeatClaim>();
  const claim = (ref: string | null, seatNo: number | null | undefined) => {
    if (ref === null || seatNo === null || seatNo === undefined) return null;
    const key = `${ref}#${seatNo}`;
    let entry = claims.get(key);
    if (!entry) {
      entry = { ref, seatNo, rows: [], guestIds: [] };
      claims.set(key, entry);
    }
    return entry;
  };
  for (const occupant of proposal.fixed) {
    claim(occupant.tableRef, occupant.seatNo)?.guestIds.push(occupant.guestId);
  }
  for (const seat of proposal.seats) {
    claim(seat.tableRef, seat.seatNo)?.rows.push(seat.rowIndex);
  }

  return [...claims.values()]
    .filter((c) => c.rows.length + c.guestIds.length > 1)
    .map((c): Violation => ({
      kind: "DuplicateSeat",
      tableRef: c.ref,
      tableLabel: slots.get(c.ref)?.label ?? c.ref,
      seatNo: c.seatNo,
      rows: c.rows,
      guestIds: c.guestIds,
    }));
};

const projectOccupancy = (proposal: SeatingProposal) => {
  const occupancy = new Map<string, number>();
  const bump = (ref: string) => occupancy.set(ref, (occupancy.get(ref) ?? 0) + 1);
  for (const occupant of proposal.fixed) bump(occupant.tableRef);
  for (const seat of proposal.seats) if (seat.tableRef !== null) bump(seat.tableRef);
  return occupancy;
};

const overCapacity = (
  proposal: SeatingProposal,
  slots: Map<string, TableSlot>,
  occupancy: Map<string, number>,
): Violation[] => {
  const violations: Violation[] = [];
  for (const [ref, projected] of occupancy) {
    const slot = slots.get(ref);
    if (!slot) continue;
    const capacity = effectiveCapacity(slot.capacity);
    if (projected <= capacity) continue;
    violations.push({
      kind: "CapacityExceeded",
      tableRef: ref,
      tableLabel: slot.label,
      projected,
      capacity,
      rows: proposal.seats
        .filter((s) => s.tableRef === ref)
        .map((s) => s.rowIndex),
      guestIds: proposal.fixed
        .filter((o) => o.tableRef === ref)
        .map((o) => o.guestId),
    });
  }
  return violations;
};

const orphanReferences = (
  proposal: SeatingProposal,
  slots: Map<string, TableSlot>,
): Violation[] => {
  const violations: Violation[] = [];
  for (const slot of slots.values()) {
    if (!slot.scheduledForRemoval) continue;
    const rows = proposal.seats
      .filter((s) => s.tableRef === slot.ref)
      .map((s) => s.rowIndex);
    const guestIds = proposal.fixed
      .filter((o) => o.tableRef === slot.ref)
      .map((o) => o.guestId);
    if (rows.length === 0 && guestIds.length === 0) continue;
    violations.push({
      kind: "OrphanTableReference",
      tableRef: slot.ref,
      tableLabel: slot.label,
      rows,
      guestIds,
    });
  }
  return violations;
};

/**
 * Checks a proposed seating as a whole: occupancy is projected for the entire
 * batch before any row is accepted.
 */
export function validateSeating(proposal: SeatingProposal): ValidationResult {
  const slots = new Map(proposal.tables.map((t) => [t.ref, t]));

  const duplicates = duplicateKeys(proposal);
  if (duplicates.length > 0) return rejected("DuplicateGuestKey", duplicates);

  const unknown = unknownTables(proposal, slots);
  if (unknown.length > 0) return rejected("UnknownTable", unknown);

  const seatClashes = duplicateSeats(proposal, slots);
  if (seatClashes.length > 0) return rejected("DuplicateSeat", seatClashes);

  const occupancy = projectOccupancy(proposal);
  const overflow = overCapacity(proposal, slots, occupancy);
  if (overflow.length > 0) return rejected("CapacityExceeded", overflow);

  const orphans = orphanReferences(proposal, slots);
  if (orphans.length > 0) return rejected("OrphanTableReference", orphans);

  return { status: "accepted", occupancy };
}

const rowList = (rows: number[]) =>
  rows.length === 1 ? `row ${rows[0]}` : `rows ${rows.join(", ")}`;

export const describeViolation = (v: Violation): string => {
  switch (v.kind) {
    case "DuplicateGuestKey":
      return `Guest "${v.guestKey ?? "?"}" appears more than once (${rowList(v.rows)})`;
    case "UnknownTable":
      return `Unknown table "${v.tableLabel ?? v.tableRef ?? "?"}" (${rowList(v.rows)})`;
    case "DuplicateSeat":
      return `Seat ${v.seatNo ?? "?"} at table "${v.tableLabel ?? "?"}" is taken more than once${
        v.rows.length > 0 ? ` (${rowList(v.rows)})` : ""
      }`;
    case "CapacityExceeded":
      return `Table "${v.tableLabel ?? "?"}" would seat ${v.projected ?? "?"} guests; capacity is ${v.capacity ?? "?"}`;
    case "OrphanTableReference":
      return `Table "${v.tableLabel ?? "?"}" is being removed but still seats guests`;
    default:
      return v.detail ?? v.kind;
  }
};

export const rejection = (
  kind: ValidationKind,
  violations: Violation[],
): ValidationError =>
  new ValidationError(kind, violations, violations.map(describeViolation).join("; "));

// ─── Whole-state audit ───────────────────────────────────────────

export interface InvariantViolation {
  invariant:
    | "capacity"
    | "table_reference"
    | "check_in_timestamp"
    | "unique_natural_key"
    | "unique_seat"
    | "unique_token";
  detail: string;
}

export function findInvariantViolations(
  tables: Iterable<TableRecord>,
  guests: Iterable<GuestRecord>,
): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  const tableById = new Map([...tables].map((t) => [t.tableId, t]));
  const occupancy = new Map<string, number>();
  const keys = new Set<string>();
  const tokens = new Set<string>();
  const seats = new Set<string>();

  for (const guest of guests) {
    if (guest.tableId !== null) {
      if (!tableById.has(guest.tableId)) {
        violations.push({
          invariant: "table_reference",
          detail: `guest ${guest.guestId} references missing table ${guest.tableId}`,
        });
      }
      occupancy.set(guest.tableId, (occupancy.get(guest.tableId) ?? 0) + 1);
      if (guest.seatNo !== null) {
        const seat = `${guest.tableId}#${guest.seatNo}`;
        if (seats.has(seat)) {
          violations.push({
            invariant: "unique_seat",
            detail: `seat ${guest.seatNo} at table ${guest.tableId} is taken twice`,
          });
        }
        seats.add(seat);
      }
    } else if (guest.seatNo !== null) {
      violations.push({
        invariant: "table_reference",
        detail: `guest ${guest.guestId} has seat ${guest.seatNo} but no table`,
      });
    }
    if ((guest.status === "checked_in") !== (guest.checkedInAt !== null)) {
      violations.push({
        invariant: "check_in_timestamp",
        detail: `guest ${guest.guestId} is ${guest.status} with checkedInAt=${String(guest.checkedInAt)}`,
      });
    }
    if (keys.has(guest.naturalKey)) {
      violations.push({
        invariant: "unique_natural_key",
        detail: `natural key "${guest.naturalKey}" appears more than once`,
      });
    }
    keys.add(guest.naturalKey);
    if (tokens.has(guest.token)) {
      violations.push({
        invariant: "unique_token",
        detail: `token of guest ${guest.guestId} is shared`,
      });
    }
    tokens.add(guest.token);
  }

  for (const [tableId, count] of occupancy) {
    const table = tableById.get(tableId);
    if (table && count > effectiveCapacity(table.capacity)) {
      violations.push({
        invariant: "capacity",
        detail: `table ${table.label} holds ${count} of ${table.capacity}`,
      });
    }
  }
  return violations;
}
