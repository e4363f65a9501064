// src/lib/payload.ts

import type { SheetCell, SheetGrid } from "../types/import.type";
import { BadRequestError } from "./errors";

export type Payload = Record<string, unknown>;

export const isRecord = (value: unknown): value is Payload =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const asPayload = (body: unknown): Payload => {
  if (!isRecord(body)) throw new BadRequestError("Request body must be a JSON object");
  return body;
};

export const requireString = (body: Payload, key: string): string => {
  const value = body[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new BadRequestError(`"${key}" is required`);
  }
  return value;
};

export const optionalString = (body: Payload, key: string): string | undefined => {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new BadRequestError(`"${key}" must be a string`);
  return value;
};

// undefined: not sent; null: explicitly cleared
export const nullableString = (
  body: Payload,
  key: string,
): string | null | undefined => {
  const value = body[key];
  if (value === null) return null;
  return optionalString(body, key);
};

export const optionalNumber = (body: Payload, key: string): number | undefined => {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new BadRequestError(`"${key}" must be a number`);
  }
  return value;
};

export const nullableNumber = (
  body: Payload,
  key: string,
): number | null | undefined => {
  const value = body[key];
  if (value === null) return null;
  return optionalNumber(body, key);
};

export const optionalBoolean = (body: Payload, key: string): boolean | undefined => {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new BadRequestError(`"${key}" must be a boolean`);
  return value;
};

export const optionalDate = (body: Payload, key: string): Date | null | undefined => {
  const value = body[key];
  if (value === undefined || value === null) return value;
  if (typeof value !== "string") throw new BadRequestError(`"${key}" must be an ISO date`);
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) throw new BadRequestError(`"${key}" must be an ISO date`);
  return date;
};

export const optionalStringList = (body: Payload, key: string): string[] | undefined => {
  const value = body[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
    throw new BadRequestError(`"${key}" must be a list of strings`);
  }
  return value.filter((item): item is string => typeof item === "string");
};

const isCell = (value: unknown): value is SheetCell =>
  value === null ||
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "boolean";

export const sheetRow = (value: unknown, key: string): SheetCell[] => {
  if (!Array.isArray(value)) throw new BadRequestError(`"${key}" must be a list of cells`);
  return value.map((cell) => {
    if (!isCell(cell)) throw new BadRequestError(`"${key}" may only hold plain cell values`);
    return cell;
  });
};

export const sheetRows = (value: unknown, key: string): SheetCell[][] => {
  if (!Array.isArray(value)) throw new BadRequestError(`"${key}" must be a list of rows`);
  return value.map((row) => sheetRow(row, key));
};

export const sheetGrid = (value: unknown, key: string): SheetGrid => {
  if (!isRecord(value)) throw new BadRequestError(`"${key}" must hold a header and cells`);
  return {
    header: sheetRow(value.header, `${key}.header`),
    cells: sheetRows(value.cells, `${key}.cells`),
  };
};

// Query-string helpers: Express hands back strings, arrays or nested objects
export const queryString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

export const queryInt = (value: unknown): number | undefined => {
  const text = queryString(value);
  if (text === undefined || text === "") return undefined;
  const parsed = Number.parseInt(text, 10);
  if (Number.isNaN(parsed)) throw new BadRequestError(`"${text}" is not a number`);
  return parsed;
};
