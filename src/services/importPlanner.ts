// src/services/importPlanner.ts

import { assertNotCancelled } from "../lib/errors";
import { collapseWhitespace, guestKey, normalizeLabel } from "../lib/normalize";
import type {
  ImportOptions,
  ImportRow,
  RowOutcome,
  TableSpec,
  Violation,
} from "../types/import.type";
import {
  TABLE_CAPACITY_LIMIT,
  type GuestRecord,
  type TableRecord,
} from "../types/seating.type";
import { sameGuest, type SeatingDraft } from "./seating.diff";
import {
  rejection,
  validateSeating,
  type FixedOccupant,
  type TableSlot,
} from "./validator";

export interface ImportContext {
  mintToken: () => Promise<string>;
  newId: () => string;
  now: Date;
}

export interface ImportPlan {
  outcomes: RowOutcome[];
  removedGuestIds: string[];
  createdTableIds: string[];
  removedTableIds: string[];
}

interface BatchEntry {
  row: ImportRow;
  rowIndex: number;
  name: string;
  contact: string | null;
  key: string;
  label: string | null;
  tableRef: string | null;
  seatNo: number | null;
}

const toEntry = (row: ImportRow, position: number): BatchEntry => {
  const label = row.tableLabel === null ? "" : collapseWhitespace(row.tableLabel);
  const contact = row.contact ? collapseWhitespace(row.contact) : "";
  return {
    row,
    rowIndex: row.sourceRow ?? position,
    name: collapseWhitespace(row.guestName),
    contact: contact || null,
    key: guestKey(row.guestName, row.contact),
    label: label || null,
    tableRef: label ? normalizeLabel(label) : null,
    seatNo: label ? (row.seatNo ?? null) : null,
  };
};

// Rows the engine cannot interpret at all; checked before the event is locked
export function checkRows(rows: ImportRow[]): void {
  const malformed: Violation[] = [];
  rows.forEach((row, position) => {
    const rowIndex = row.sourceRow ?? position;
    if (!collapseWhitespace(row.guestName)) {
      malformed.push({ kind: "MalformedRow", rows: [rowIndex], detail: "guest name is empty" });
    }
    if (row.checkedInAt && Number.isNaN(row.checkedInAt.getTime())) {
      malformed.push({ kind: "MalformedRow", rows: [rowIndex], detail: "check-in time is not a valid date" });
    }
    if (row.seatNo !== undefined && !isSeatNumber(row.seatNo)) {
      malformed.push({ kind: "MalformedRow", rows: [rowIndex], detail: "seat number must be a positive integer" });
    }
    if (row.seatNo !== undefined && !collapseWhitespace(row.tableLabel ?? "")) {
      malformed.push({ kind: "MalformedRow", rows: [rowIndex], detail: "seat number given without a table" });
    }
  });
  if (malformed.length > 0) throw rejection("MalformedRow", malformed);
}

export const isSeatNumber = (value: number): boolean => Number.isInteger(value) && value >= 1;

// Declared tables must carry a usable label and capacity, each label once
export function checkTables(tables: TableSpec[]): void {
  const seen = new Set<string>();
  for (const spec of tables) {
    const label = collapseWhitespace(spec.label);
    if (!label) {
      throw rejection("MalformedRow", [{ kind: "MalformedRow", rows: [], detail: "table label is empty" }]);
    }
    if (!Number.isInteger(spec.capacity) || spec.capacity < 1 || spec.capacity > TABLE_CAPACITY_LIMIT) {
      throw rejection("InvalidCapacity", [
        {
          kind: "InvalidCapacity",
          rows: [],
          tableLabel: label,
          capacity: spec.capacity,
          detail: `capacity of table "${label}" must be an integer between 1 and ${TABLE_CAPACITY_LIMIT}`,
        },
      ]);
    }
    const ref = normalizeLabel(label);
    if (seen.has(ref)) {
      throw rejection("DuplicateTableLabel", [
        {
          kind: "DuplicateTableLabel",
          rows: [],
          tableLabel: label,
          detail: `table label "${label}" is declared twice`,
        },
      ]);
    }
    seen.add(ref);
  }
}

/**
 * Applies an import batch to the draft. The whole batch is validated against
 * the projected seating first; nothing in the draft changes unless every row
 * is accepted.
 */
export async function applyImport(
  draft: SeatingDraft,
  rows: ImportRow[],
  options: ImportOptions,
  ctx: ImportContext,
): Promise<ImportPlan> {
  const replaceAll = options.mode === "replace_all";
  const createTables = options.createTables ?? true;
  const removeKeys = new Set((options.removeTables ?? []).map(normalizeLabel));

  const tablesByRef = new Map<string, TableRecord>(
    [...draft.tables.values()].map((t) => [normalizeLabel(t.label), t]),
  );
  const guestsByKey = new Map<string, GuestRecord>(
    [...draft.guests.values()].map((g) => [g.naturalKey, g]),
  );

  // declared tables are created when missing; existing ones keep their capacity
  const declared = new Map<string, TableSpec>();
  for (const spec of options.tables ?? []) {
    const label = collapseWhitespace(spec.label);
    const ref = normalizeLabel(label);
    if (!removeKeys.has(ref)) declared.set(ref, { label, capacity: spec.capacity });
  }

  const entries = rows.map(toEntry);
  const batchKeys = new Set(entries.map((e) => e.key));
  const referenced = new Set<string>();
  const newTables = new Map<string, TableSpec>();
  const plan = (ref: string, spec: TableSpec) => {
    if (!tablesByRef.has(ref) && !newTables.has(ref)) newTables.set(ref, spec);
  };
  for (const entry of entries) {
    if (!entry.tableRef || !entry.label) continue;
    referenced.add(entry.tableRef);
    const spec = declared.get(entry.tableRef);
    if (spec) plan(entry.tableRef, spec);
    else if (createTables) plan(entry.tableRef, { label: entry.label, capacity: TABLE_CAPACITY_LIMIT });
  }
  for (const [ref, spec] of declared) plan(ref, spec);

  const scheduled = (ref: string) =>
    removeKeys.has(ref) || (replaceAll && !referenced.has(ref) && !declared.has(ref));

  const slots: TableSlot[] = [
    ...[...tablesByRef].map(([ref, table]) => ({
      ref,
      label: table.label,
      capacity: table.capacity,
      scheduledForRemoval: scheduled(ref),
    })),
    ...[...newTables].map(([ref, spec]) => ({
      ref,
      label: spec.label,
      capacity: spec.capacity,
      scheduledForRemoval: removeKeys.has(ref),
    })),
  ];

  // upsert keeps everyone outside the batch where they sit
  const fixed: FixedOccupant[] = [];
  if (!replaceAll) {
    for (const guest of draft.guests.values()) {
      if (guest.tableId === null || batchKeys.has(guest.naturalKey)) continue;
      const table = draft.tables.get(guest.tableId);
      if (table) {
        fixed.push({
          guestId: guest.guestId,
          tableRef: normalizeLabel(table.label),
          seatNo: guest.seatNo,
        });
      }
    }
  }

  const verdict = validateSeating({
    seats: entries.map((e) => ({
      rowIndex: e.rowIndex,
      guestKey: e.key,
      tableRef: e.tableRef,
      seatNo: e.seatNo,
    })),
    tables: slots,
    fixed,
  });
  if (verdict.status === "rejected") throw rejection(verdict.kind, verdict.violations);
  assertNotCancelled(options.signal, "after validation");

  const tableIdByRef = new Map(
    [...tablesByRef].map(([ref, table]) => [ref, table.tableId]),
  );
  const createdTableIds: string[] = [];
  for (const [ref, spec] of newTables) {
    const table: TableRecord = { tableId: ctx.newId(), label: spec.label, capacity: spec.capacity };
    draft.tables.set(table.tableId, table);
    tableIdByRef.set(ref, table.tableId);
    createdTableIds.push(table.tableId);
  }

  const outcomes: RowOutcome[] = [];
  for (const entry of entries) {
    const tableId = entry.tableRef ? (tableIdByRef.get(entry.tableRef) ?? null) : null;
    const dietary = entry.row.dietaryNotes?.trim() || null;
    const restoredAt = entry.row.checkedInAt ?? null;
    const existing = guestsByKey.get(entry.key);

    if (existing) {
      const next: GuestRecord = {
        ...existing,
        name: entry.name,
        contact: entry.contact,
        dietary,
        tableId,
        seatNo: entry.seatNo,
      };
      // imports may restore a check-in, never revert one
      if (restoredAt && next.status !== "checked_in") {
        next.status = "checked_in";
        next.checkedInAt = restoredAt;
      }
      draft.guests.set(next.guestId, next);
      outcomes.push({
        rowIndex: entry.rowIndex,
        status: "accepted",
        guestId: next.guestId,
        action: sameGuest(existing, next) ? "unchanged" : "updated",
      });
      continue;
    }

    const guest: GuestRecord = {
      guestId: ctx.newId(),
      name: entry.name,
      naturalKey: entry.key,
      contact: entry.contact,
      dietary,
      tableId,
      seatNo: entry.seatNo,
      status: restoredAt ? "checked_in" : "not_arrived",
      checkedInAt: restoredAt,
      token: await ctx.mintToken(),
      createdAt: ctx.now,
    };
    draft.guests.set(guest.guestId, guest);
    outcomes.push({
      rowIndex: entry.rowIndex,
      status: "accepted",
      guestId: guest.guestId,
      action: "created",
    });
  }

  const removedGuestIds: string[] = [];
  if (replaceAll) {
    for (const guest of [...draft.guests.values()]) {
      if (batchKeys.has(guest.naturalKey)) continue;
      draft.guests.delete(guest.guestId);
      removedGuestIds.push(guest.guestId);
    }
  }

  const removedTableIds: string[] = [];
  for (const [ref, table] of tablesByRef) {
    if (!scheduled(ref)) continue;
    draft.tables.delete(table.tableId);
    removedTableIds.push(table.tableId);
  }

  return { outcomes, removedGuestIds, createdTableIds, removedTableIds };
}
