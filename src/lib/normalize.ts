// src/lib/normalize.ts

export const collapseWhitespace = (value: string): string =>
  value.trim().replace(/\s+/g, " ");

export const normalizeLabel = (label: string): string =>
  collapseWhitespace(label).toLowerCase();

// Natural identity of a guest within one event
export const guestKey = (name: string, contact?: string | null): string =>
  `${normalizeLabel(name)}|${normalizeLabel(contact ?? "")}`;
