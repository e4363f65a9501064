// src/routes/guest.routes.ts

import { Router } from "express";
import { BadRequestError } from "../lib/errors";
import { asPayload, queryString, requireString } from "../lib/payload";
import type { QrService } from "../services/qr.service";
import type { SeatingEngine } from "../services/seating.service";
import { asyncHandler, ok, rateLimit } from "./middleware";

export interface GuestRouteDeps {
  engine: SeatingEngine;
  qr: QrService;
  rateLimitPerMinute: number;
}

// Guest portal: the lookup token is the only credential
export function createGuestRouter({ engine, qr, rateLimitPerMinute }: GuestRouteDeps): Router {
  const router = Router();
  router.use(rateLimit({ limit: rateLimitPerMinute, windowMs: 60_000 }));

  router.post(
    "/lookup",
    asyncHandler(async (req, res) => {
      const token = requireString(asPayload(req.body), "token");
      ok(res, "Guest found", await engine.lookupByToken(token));
    }),
  );

  router.post(
    "/checkin",
    asyncHandler(async (req, res) => {
      const token = requireString(asPayload(req.body), "token");
      const result = await engine.checkInByToken(token);
      ok(res, result.wasAlreadyCheckedIn ? "Already checked in" : "Checked in", result);
    }),
  );

  router.get(
    "/portal",
    asyncHandler(async (req, res) => {
      const token = queryString(req.query.token);
      const publicCode = queryString(req.query.event);
      if (token) {
        ok(res, "Guest found", await engine.lookupByToken(token));
      } else if (publicCode) {
        ok(res, "Seating summary", await engine.summarize(publicCode));
      } else {
        throw new BadRequestError(`"token" or "event" is required`);
      }
    }),
  );

  router.get(
    "/qr.png",
    asyncHandler(async (req, res) => {
      const token = queryString(req.query.token);
      if (!token) throw new BadRequestError(`"token" is required`);
      // only tokens that still belong to a guest get a code
      await engine.lookupByToken(token);
      res.type("png").send(await qr.png(qr.guestPortalUrl(token)));
    }),
  );

  return router;
}
