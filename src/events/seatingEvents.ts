// src/events/seatingEvents.ts

import { Server, Socket } from "socket.io";
import { createLog } from "../lib/logger";
import { isRecord } from "../lib/payload";
import type { DeltaSink, DisconnectReason } from "../services/broadcaster";
import type { SeatingEngine } from "../services/seating.service";
import type { LiveMessage } from "../types/seating.type";

const log = createLog("Live");

export interface SeatingSocketDeps {
  engine: SeatingEngine;
  ackTimeoutMs: number;
}

interface SubscribePayload {
  publicCode: string;
  lastSequence?: number;
  epoch?: string;
}

type SubscribeAck = (
  response:
    | { ok: true; eventId: string; mode: "replay" | "snapshot" }
    | { ok: false; message: string },
) => void;

// A slow or failing connection is dropped; other closes leave the socket open
const DROPS_CONNECTION: ReadonlySet<DisconnectReason> = new Set(["overflow", "transport_error"]);

const parseSubscribe = (data: unknown): SubscribePayload | null => {
  if (!isRecord(data) || typeof data.publicCode !== "string" || !data.publicCode) return null;
  const lastSequence =
    typeof data.lastSequence === "number" && Number.isInteger(data.lastSequence)
      ? data.lastSequence
      : undefined;
  const epoch = typeof data.epoch === "string" ? data.epoch : undefined;
  if (data.lastSequence !== undefined && lastSequence === undefined) return null;
  if (data.epoch !== undefined && epoch === undefined) return null;
  return { publicCode: data.publicCode, lastSequence, epoch };
};

export function registerSeatingHandlers(
  _io: Server,
  socket: Socket,
  { engine, ackTimeoutMs }: SeatingSocketDeps,
): void {
  // publicCode → eventId for this connection's live subscriptions
  const joined = new Map<string, string>();

  const sinkFor = (publicCode: string): DeltaSink => ({
    id: `${socket.id}:${publicCode}`,
    send: async (message: LiveMessage) => {
      await socket.timeout(ackTimeoutMs).emitWithAck("seating:message", message);
    },
    close: (reason) => {
      joined.delete(publicCode);
      socket.emit("seating:closed", { publicCode, reason });
      if (DROPS_CONNECTION.has(reason)) socket.disconnect(true);
    },
  });

  // ─── Subscribe ──────────────────────────────────────────────────
  socket.on("seating:subscribe", async (data: unknown, ack?: SubscribeAck) => {
    const payload = parseSubscribe(data);
    if (!payload) {
      ack?.({ ok: false, message: "publicCode is required; lastSequence must be an integer" });
      return;
    }
    try {
      const { eventId, mode } = await engine.subscribe(
        payload.publicCode,
        sinkFor(payload.publicCode),
        { lastSequence: payload.lastSequence, epoch: payload.epoch },
      );
      // the socket may have left while the snapshot loaded
      if (!socket.connected) {
        engine.unsubscribe(eventId, `${socket.id}:${payload.publicCode}`);
        return;
      }
      joined.set(payload.publicCode, eventId);
      ack?.({ ok: true, eventId, mode });
      log.success(`Subscribed ${socket.id}`, { publicCode: payload.publicCode, mode });
    } catch (error) {
      log.error(`Subscribe failed for ${socket.id}`, error);
      ack?.({ ok: false, message: error instanceof Error ? error.message : "Subscribe failed" });
    }
  });

  // ─── Unsubscribe ────────────────────────────────────────────────
  socket.on("seating:unsubscribe", (data: unknown) => {
    if (!isRecord(data) || typeof data.publicCode !== "string") return;
    const eventId = joined.get(data.publicCode);
    if (!eventId) return;
    joined.delete(data.publicCode);
    engine.unsubscribe(eventId, `${socket.id}:${data.publicCode}`);
    log.info(`Unsubscribed ${socket.id}`, { publicCode: data.publicCode });
  });

  socket.on("disconnect", () => {
    for (const [publicCode, eventId] of joined) {
      engine.unsubscribe(eventId, `${socket.id}:${publicCode}`);
    }
    joined.clear();
  });
}
