import { describe, expect, it } from "vitest";
import { BadRequestError } from "../errors";
import { guestKey, normalizeLabel } from "../normalize";
import {
  asPayload,
  nullableString,
  optionalDate,
  optionalStringList,
  queryInt,
  requireString,
  sheetRows,
} from "../payload";

describe("request payload helpers", () => {
  it("accepts only JSON objects as bodies", () => {
    expect(asPayload({ name: "x" })).toEqual({ name: "x" });
    expect(() => asPayload([1])).toThrow(BadRequestError);
    expect(() => asPayload(null)).toThrow(BadRequestError);
  });

  it("requires non-blank strings", () => {
    expect(requireString({ name: "Wedding" }, "name")).toBe("Wedding");
    expect(() => requireString({ name: "  " }, "name")).toThrow(`"name" is required`);
    expect(() => requireString({}, "name")).toThrow(BadRequestError);
  });

  it("tells an explicit null from a missing field", () => {
    expect(nullableString({ tableId: null }, "tableId")).toBeNull();
    expect(nullableString({}, "tableId")).toBeUndefined();
    expect(() => nullableString({ tableId: 4 }, "tableId")).toThrow(`"tableId" must be a string`);
  });

  it("parses ISO dates", () => {
    expect(optionalDate({ date: "2025-06-14" }, "date")?.toISOString()).toBe(
      "2025-06-14T00:00:00.000Z",
    );
    expect(() => optionalDate({ date: "someday" }, "date")).toThrow(BadRequestError);
  });

  it("checks string lists and sheet cells", () => {
    expect(optionalStringList({ removeTables: ["A"] }, "removeTables")).toEqual(["A"]);
    expect(() => optionalStringList({ removeTables: ["A", 2] }, "removeTables")).toThrow(
      BadRequestError,
    );
    expect(sheetRows([["Ann", 3, null, true]], "cells")).toEqual([["Ann", 3, null, true]]);
    expect(() => sheetRows([[{ nested: 1 }]], "cells")).toThrow(BadRequestError);
  });

  it("reads integers from the query string", () => {
    expect(queryInt("2")).toBe(2);
    expect(queryInt(undefined)).toBeUndefined();
    expect(queryInt(["2"])).toBeUndefined();
    expect(() => queryInt("two")).toThrow(BadRequestError);
  });
});

describe("normalization", () => {
  it("folds case and whitespace in labels", () => {
    expect(normalizeLabel("  Table \t 7 ")).toBe("table 7");
  });

  it("builds a guest key from name and contact", () => {
    expect(guestKey(" Ann  Lee ", "ANN@Example.com ")).toBe("ann lee|ann@example.com");
    expect(guestKey("Ann Lee", null)).toBe("ann lee|");
  });
});
