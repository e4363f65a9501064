// src/routes/public.routes.ts

import { Router } from "express";
import type { SeatingEngine } from "../services/seating.service";
import { asyncHandler, maybeAdminOf, ok, optionalAdmin, rateLimit } from "./middleware";

export interface PublicRouteDeps {
  engine: SeatingEngine;
  adminToken: string;
  rateLimitPerMinute: number;
}

export function createPublicRouter({
  engine,
  adminToken,
  rateLimitPerMinute,
}: PublicRouteDeps): Router {
  const router = Router();

  router.get(
    "/events/:publicCode/seating",
    rateLimit({ limit: rateLimitPerMinute, windowMs: 60_000 }),
    optionalAdmin(adminToken),
    asyncHandler(async (req, res) => {
      const summary = await engine.summarize(req.params.publicCode, maybeAdminOf(res));
      ok(res, "Seating summary", summary);
    }),
  );

  return router;
}
