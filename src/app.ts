// src/app.ts

import cors from "cors";
import express, { type Express } from "express";
import type { AppConfig } from "./config/env";
import { createAdminRouter } from "./routes/admin.routes";
import { createGuestRouter } from "./routes/guest.routes";
import { errorHandler, notFound } from "./routes/middleware";
import { createPublicRouter } from "./routes/public.routes";
import type { QrService } from "./services/qr.service";
import type { SeatingEngine } from "./services/seating.service";

export interface AppDeps {
  config: Pick<AppConfig, "allowedOrigins" | "adminToken" | "rateLimitPerMinute" | "store">;
  engine: SeatingEngine;
  qr: QrService;
  connections?: () => Record<string, unknown>;
}

export const corsOptionsFor = (allowedOrigins: string[]) => ({
  origin: allowedOrigins,
  methods: ["GET", "POST", "PUT", "PATCH", "DELETE"],
  credentials: true,
});

export function createApp({ config, engine, qr, connections }: AppDeps): Express {
  const app = express();

  app.use(cors(corsOptionsFor(config.allowedOrigins)));
  app.use(express.json({ limit: "5mb" }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      store: config.store,
      ...(connections ? connections() : {}),
    });
  });

  app.get("/", (_req, res) => {
    res.json({ message: "Seating Server Running", version: "1.0.0" });
  });

  app.use("/admin", createAdminRouter({ engine, qr, adminToken: config.adminToken }));
  app.use(
    "/guest",
    createGuestRouter({ engine, qr, rateLimitPerMinute: config.rateLimitPerMinute }),
  );
  app.use(
    createPublicRouter({
      engine,
      adminToken: config.adminToken,
      rateLimitPerMinute: config.rateLimitPerMinute,
    }),
  );

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
