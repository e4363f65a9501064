// src/services/spreadsheet.adapter.ts

import { collapseWhitespace } from "../lib/normalize";
import type {
  ImportRow,
  ParsedSheet,
  SheetCell,
  SheetGrid,
  SheetInput,
  SheetOutput,
  TableSpec,
  Violation,
} from "../types/import.type";
import { TABLE_CAPACITY_LIMIT, type SeatingExport } from "../types/seating.type";

type Column = "name" | "table" | "seat" | "dietary" | "contact" | "checkedInAt";
type TableColumn = "label" | "capacity";

const REQUIRED: Column[] = ["name", "table"];

const HEADER_ALIASES: Record<string, Column> = {
  name: "name",
  guest: "name",
  "guest name": "name",
  "full name": "name",
  table: "table",
  "table label": "table",
  "table name": "table",
  "table no.": "table",
  seat: "seat",
  "seat no.": "seat",
  "seat no": "seat",
  "seat number": "seat",
  dietary: "dietary",
  "dietary preference": "dietary",
  "dietary notes": "dietary",
  "special requirements": "dietary",
  contact: "contact",
  email: "contact",
  phone: "contact",
  "checked in at": "checkedInAt",
  "check-in time": "checkedInAt",
};

const TABLE_HEADER_ALIASES: Record<string, TableColumn> = {
  table: "label",
  label: "label",
  "table label": "label",
  "table name": "label",
  capacity: "capacity",
  seats: "capacity",
};

export const EXPORT_HEADER = [
  "Name",
  "Table",
  "Seat No.",
  "Contact",
  "Dietary Preference",
  "Checked In",
  "Checked In At",
  "Token",
];

export const TABLES_HEADER = ["Table", "Capacity"];

// Spreadsheet row number of the first data row (row 1 is the header)
const FIRST_DATA_ROW = 2;

const cellText = (cell: SheetCell): string => {
  if (cell === null || cell === undefined) return "";
  if (cell instanceof Date) return cell.toISOString();
  return collapseWhitespace(String(cell));
};

const dietaryOf = (cell: SheetCell): string | undefined => {
  const text = cellText(cell);
  const lowered = text.toLowerCase();
  if (!text || lowered === "none" || lowered === "nan") return undefined;
  if (lowered === "veg") return "vegetarian";
  return text;
};

const checkedInAtOf = (cell: SheetCell): Date | undefined | null => {
  if (cell instanceof Date) return Number.isNaN(cell.getTime()) ? null : cell;
  const text = cellText(cell);
  if (!text) return undefined;
  if (typeof cell !== "string") return null;
  const parsed = new Date(text);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

// Whole numbers only; null for anything else
const wholeNumberOf = (cell: SheetCell): number | undefined | null => {
  const text = cellText(cell);
  if (!text) return undefined;
  if (typeof cell !== "number" && typeof cell !== "string") return null;
  const value = Number(text);
  return Number.isInteger(value) ? value : null;
};

const mapColumns = <C extends string>(
  header: SheetCell[],
  aliases: Record<string, C>,
): Map<C, number> => {
  const columns = new Map<C, number>();
  header.forEach((cell, index) => {
    const column = aliases[cellText(cell).toLowerCase()];
    if (column && !columns.has(column)) columns.set(column, index);
  });
  return columns;
};

export const mapHeader = (header: SheetCell[]): Map<Column, number> =>
  mapColumns(header, HEADER_ALIASES);

const cellReader =
  <C extends string>(columns: Map<C, number>) =>
  (cells: SheetCell[], column: C): SheetCell => {
    const index = columns.get(column);
    return index === undefined ? undefined : cells[index];
  };

// Table sheet: one row per table; a missing capacity means the default
function parseTables(grid: SheetGrid, malformed: Violation[]): TableSpec[] {
  const columns = mapColumns(grid.header, TABLE_HEADER_ALIASES);
  if (!columns.has("label")) {
    malformed.push({ kind: "MalformedRow", rows: [], detail: "table sheet has no Table column" });
    return [];
  }
  const cellAt = cellReader(columns);

  const tables: TableSpec[] = [];
  grid.cells.forEach((cells, index) => {
    const label = cellText(cellAt(cells, "label"));
    if (!label) return;
    const capacity = wholeNumberOf(cellAt(cells, "capacity"));
    if (capacity === null) {
      malformed.push({
        kind: "MalformedRow",
        rows: [],
        detail: `table sheet row ${index + FIRST_DATA_ROW}: unreadable capacity "${cellText(cellAt(cells, "capacity"))}"`,
      });
      return;
    }
    tables.push({ label, capacity: capacity ?? TABLE_CAPACITY_LIMIT });
  });
  return tables;
}

/**
 * Turns loosely typed sheet cells into strict import rows. Rows without a
 * guest name are skipped; rows that cannot be interpreted come back as
 * MalformedRow violations instead of rows.
 */
export function parseSheet(input: SheetInput): ParsedSheet {
  const columns = mapHeader(input.header);
  const missingColumns = REQUIRED.filter((c) => !columns.has(c));
  if (missingColumns.length > 0) return { rows: [], tables: [], malformed: [], missingColumns };

  const cellAt = cellReader(columns);
  const rows: ImportRow[] = [];
  const malformed: Violation[] = [];
  const tables = input.tables ? parseTables(input.tables, malformed) : [];

  input.cells.forEach((cells, index) => {
    const sourceRow = index + FIRST_DATA_ROW;
    const guestName = cellText(cellAt(cells, "name"));
    if (!guestName) return;

    const checkedInAt = checkedInAtOf(cellAt(cells, "checkedInAt"));
    if (checkedInAt === null) {
      malformed.push({
        kind: "MalformedRow",
        rows: [sourceRow],
        detail: `unreadable check-in time "${cellText(cellAt(cells, "checkedInAt"))}"`,
      });
      return;
    }

    const seatNo = wholeNumberOf(cellAt(cells, "seat"));
    if (seatNo === null) {
      malformed.push({
        kind: "MalformedRow",
        rows: [sourceRow],
        detail: `unreadable seat number "${cellText(cellAt(cells, "seat"))}"`,
      });
      return;
    }

    const row: ImportRow = {
      guestName,
      tableLabel: cellText(cellAt(cells, "table")) || null,
      sourceRow,
    };
    if (seatNo !== undefined) row.seatNo = seatNo;
    const dietaryNotes = dietaryOf(cellAt(cells, "dietary"));
    const contact = cellText(cellAt(cells, "contact"));
    if (dietaryNotes) row.dietaryNotes = dietaryNotes;
    if (contact) row.contact = contact;
    if (checkedInAt) row.checkedInAt = checkedInAt;
    rows.push(row);
  });

  return { rows, tables, malformed, missingColumns };
}

// Guest sheet plus a table sheet, so empty tables survive a re-import
export function toSheet(snapshot: SeatingExport): SheetOutput {
  return {
    header: [...EXPORT_HEADER],
    rows: snapshot.guests.map((guest) => [
      guest.name,
      guest.tableLabel,
      guest.seatNo,
      guest.contact,
      guest.dietary,
      guest.status === "checked_in" ? "Yes" : "No",
      guest.checkedInAt,
      guest.token,
    ]),
    tables: {
      header: [...TABLES_HEADER],
      rows: snapshot.tables.map((table) => [table.label, table.capacity]),
    },
  };
}

// Blank import sheet with a few guidance rows
export function templateSheet(): SheetOutput {
  return {
    header: ["Name", "Table", "Seat No.", "Contact", "Dietary Preference"],
    rows: [
      ["Sample Guest 1", "A", 1, null, "none"],
      ["Sample Guest 2", "A", 2, null, "vegetarian"],
      ["Sample Guest 3", "B", 1, "guest3@example.com", "halal"],
    ],
    tables: {
      header: [...TABLES_HEADER],
      rows: [
        ["A", 12],
        ["B", 10],
      ],
    },
  };
}
