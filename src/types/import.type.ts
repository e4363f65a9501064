// src/types/import.type.ts

import type { ImportMode } from "./seating.type";

// Strict row handed to the engine by the spreadsheet adapter
export interface ImportRow {
  guestName: string;
  tableLabel: string | null; // null leaves the guest unassigned
  seatNo?: number;
  dietaryNotes?: string;
  contact?: string;
  checkedInAt?: Date; // restored from an earlier export
  sourceRow?: number; // sheet row the record came from, reported in outcomes
}

// Table declared by a sheet's table list; kept by replace_all even when empty
export interface TableSpec {
  label: string;
  capacity: number;
}

export interface ImportOptions {
  mode: ImportMode;
  tables?: TableSpec[];
  removeTables?: string[]; // labels
  createTables?: boolean;
  signal?: AbortSignal;
}

export type RowAction = "created" | "updated" | "unchanged";

export interface RowOutcome {
  rowIndex: number;
  status: "accepted";
  guestId: string;
  action: RowAction;
}

export interface ImportResult {
  mode: ImportMode;
  outcomes: RowOutcome[];
  removedGuestIds: string[];
  createdTableIds: string[];
  removedTableIds: string[];
  sequence: number;
}

// ─── Rejections ──────────────────────────────────────────────────

// Validator order: first failing kind wins
export type RejectionKind =
  | "DuplicateGuestKey"
  | "UnknownTable"
  | "DuplicateSeat"
  | "CapacityExceeded"
  | "OrphanTableReference";

export type ValidationKind =
  | RejectionKind
  | "MalformedRow"
  | "InvalidCapacity"
  | "DuplicateTableLabel";

export interface Violation {
  kind: ValidationKind;
  rows: number[];
  guestKey?: string;
  guestIds?: string[];
  tableRef?: string;
  tableLabel?: string;
  seatNo?: number;
  projected?: number;
  capacity?: number;
  detail?: string;
}

// ─── Spreadsheet cells ───────────────────────────────────────────

export type SheetCell = string | number | boolean | Date | null | undefined;

export interface SheetGrid {
  header: SheetCell[];
  cells: SheetCell[][];
}

export interface SheetInput extends SheetGrid {
  tables?: SheetGrid; // optional second sheet: label and capacity per table
}

export interface ParsedSheet {
  rows: ImportRow[];
  tables: TableSpec[];
  malformed: Violation[];
  missingColumns: string[];
}

export type OutputCell = string | number | null;

export interface SheetGridOutput {
  header: string[];
  rows: OutputCell[][];
}

export interface SheetOutput extends SheetGridOutput {
  tables: SheetGridOutput;
}
