// src/routes/admin.routes.ts

import { Router } from "express";
import { BadRequestError, NotFoundError, ValidationError } from "../lib/errors";
import {
  asPayload,
  nullableNumber,
  nullableString,
  optionalBoolean,
  optionalDate,
  optionalNumber,
  optionalString,
  optionalStringList,
  queryInt,
  queryString,
  requireString,
  sheetGrid,
  sheetRow,
  sheetRows,
} from "../lib/payload";
import type { QrService } from "../services/qr.service";
import type { SeatingEngine } from "../services/seating.service";
import { parseSheet, templateSheet, toSheet } from "../services/spreadsheet.adapter";
import type { ImportMode } from "../types/seating.type";
import { adminOf, asyncHandler, ok, requireAdmin } from "./middleware";

export interface AdminRouteDeps {
  engine: SeatingEngine;
  qr: QrService;
  adminToken: string;
}

const importModeOf = (value: unknown): ImportMode => {
  if (value === undefined || value === "replace_all") return "replace_all";
  if (value === "upsert") return "upsert";
  throw new BadRequestError(`"mode" must be "replace_all" or "upsert"`);
};

export function createAdminRouter({ engine, qr, adminToken }: AdminRouteDeps): Router {
  const router = Router();
  router.use(requireAdmin(adminToken));

  // ─── Events ────────────────────────────────────────────────────

  router.post(
    "/events",
    asyncHandler(async (req, res) => {
      const body = asPayload(req.body);
      const event = await engine.createEvent(adminOf(res), {
        name: requireString(body, "name"),
        date: optionalDate(body, "date"),
        organizerEmail: nullableString(body, "organizerEmail"),
      });
      ok(res, "Event created", event, 201);
    }),
  );

  router.get(
    "/events",
    asyncHandler(async (_req, res) => {
      ok(res, "Events", await engine.listEvents(adminOf(res)));
    }),
  );

  router.get(
    "/events/:eventId",
    asyncHandler(async (req, res) => {
      ok(res, "Event", await engine.getEvent(adminOf(res), req.params.eventId));
    }),
  );

  router.delete(
    "/events/:eventId",
    asyncHandler(async (req, res) => {
      await engine.deleteEvent(adminOf(res), req.params.eventId);
      ok(res, "Event deleted", { eventId: req.params.eventId });
    }),
  );

  router.get(
    "/events/:eventId/qr.png",
    asyncHandler(async (req, res) => {
      const event = await engine.getEvent(adminOf(res), req.params.eventId);
      const png = await qr.png(qr.eventPortalUrl(event.publicCode));
      res.type("png").send(png);
    }),
  );

  // ─── Import / export ───────────────────────────────────────────

  router.get(
    "/import/template",
    asyncHandler(async (_req, res) => {
      ok(res, "Import template", templateSheet());
    }),
  );

  router.post(
    "/events/:eventId/import",
    asyncHandler(async (req, res) => {
      const body = asPayload(req.body);
      const sheet = parseSheet({
        header: sheetRow(body.header, "header"),
        cells: sheetRows(body.cells, "cells"),
        tables: body.tables === undefined ? undefined : sheetGrid(body.tables, "tables"),
      });
      if (sheet.missingColumns.length > 0) {
        throw new ValidationError(
          "MalformedRow",
          [{ kind: "MalformedRow", rows: [1], detail: `missing columns: ${sheet.missingColumns.join(", ")}` }],
          `Missing required columns: ${sheet.missingColumns.join(", ")}`,
        );
      }
      if (sheet.malformed.length > 0) {
        throw new ValidationError("MalformedRow", sheet.malformed);
      }

      // abandoning the request cancels an import that has not committed yet
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) controller.abort();
      });

      const result = await engine.importSeating(adminOf(res), req.params.eventId, sheet.rows, {
        mode: importModeOf(body.mode),
        tables: sheet.tables,
        removeTables: optionalStringList(body, "removeTables"),
        createTables: optionalBoolean(body, "createTables"),
        signal: controller.signal,
      });
      ok(res, `Imported ${result.outcomes.length} guests`, result);
    }),
  );

  router.get(
    "/events/:eventId/export",
    asyncHandler(async (req, res) => {
      const snapshot = await engine.exportSeating(adminOf(res), req.params.eventId);
      ok(res, "Seating export", { ...snapshot, sheet: toSheet(snapshot) });
    }),
  );

  // ─── Guests ────────────────────────────────────────────────────

  router.get(
    "/events/:eventId/guests",
    asyncHandler(async (req, res) => {
      const page = await engine.searchGuests(adminOf(res), req.params.eventId, {
        search: queryString(req.query.search),
        page: queryInt(req.query.page),
        perPage: queryInt(req.query.perPage),
      });
      ok(res, "Guests", page);
    }),
  );

  router.post(
    "/events/:eventId/guests",
    asyncHandler(async (req, res) => {
      const body = asPayload(req.body);
      const guest = await engine.addGuest(adminOf(res), req.params.eventId, {
        name: requireString(body, "name"),
        contact: nullableString(body, "contact"),
        dietary: nullableString(body, "dietary"),
        tableId: nullableString(body, "tableId"),
        seatNo: nullableNumber(body, "seatNo"),
      });
      ok(res, "Guest added", guest, 201);
    }),
  );

  router.patch(
    "/events/:eventId/guests/:guestId",
    asyncHandler(async (req, res) => {
      const body = asPayload(req.body);
      const guest = await engine.updateGuest(
        adminOf(res),
        req.params.eventId,
        req.params.guestId,
        {
          name: optionalString(body, "name"),
          contact: nullableString(body, "contact"),
          dietary: nullableString(body, "dietary"),
          seatNo: nullableNumber(body, "seatNo"),
        },
      );
      ok(res, "Guest updated", guest);
    }),
  );

  router.delete(
    "/events/:eventId/guests/:guestId",
    asyncHandler(async (req, res) => {
      await engine.removeGuest(adminOf(res), req.params.eventId, req.params.guestId);
      ok(res, "Guest removed", { guestId: req.params.guestId });
    }),
  );

  router.put(
    "/events/:eventId/guests/:guestId/table",
    asyncHandler(async (req, res) => {
      const body = asPayload(req.body);
      const tableId = nullableString(body, "tableId");
      if (tableId === undefined) throw new BadRequestError(`"tableId" is required (null to unassign)`);
      const guest = await engine.assignGuestToTable(
        adminOf(res),
        req.params.eventId,
        req.params.guestId,
        tableId,
        nullableNumber(body, "seatNo"),
      );
      ok(res, "Seating updated", guest);
    }),
  );

  router.post(
    "/events/:eventId/guests/:guestId/checkin",
    asyncHandler(async (req, res) => {
      ok(res, "Guest checked in", await engine.checkIn(req.params.eventId, req.params.guestId));
    }),
  );

  router.post(
    "/events/:eventId/guests/:guestId/checkin/revert",
    asyncHandler(async (req, res) => {
      const guest = await engine.revertCheckIn(
        adminOf(res),
        req.params.eventId,
        req.params.guestId,
      );
      ok(res, "Check-in reverted", guest);
    }),
  );

  router.get(
    "/events/:eventId/guests/:guestId/qr.png",
    asyncHandler(async (req, res) => {
      const snapshot = await engine.exportSeating(adminOf(res), req.params.eventId);
      const guest = snapshot.guests.find((g) => g.guestId === req.params.guestId);
      if (!guest) throw new NotFoundError("Guest", req.params.guestId);
      res.type("png").send(await qr.png(qr.guestPortalUrl(guest.token)));
    }),
  );

  // ─── Tables ────────────────────────────────────────────────────

  router.post(
    "/events/:eventId/tables",
    asyncHandler(async (req, res) => {
      const body = asPayload(req.body);
      const table = await engine.addTable(adminOf(res), req.params.eventId, {
        label: requireString(body, "label"),
        capacity: optionalNumber(body, "capacity"),
      });
      ok(res, "Table added", table, 201);
    }),
  );

  router.delete(
    "/events/:eventId/tables/:tableId",
    asyncHandler(async (req, res) => {
      await engine.removeTable(adminOf(res), req.params.eventId, req.params.tableId);
      ok(res, "Table removed", { tableId: req.params.tableId });
    }),
  );

  return router;
}
