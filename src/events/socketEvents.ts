// src/events/socketEvents.ts

import { Server, Socket } from "socket.io";
import { createLog } from "../lib/logger";
import { registerSeatingHandlers, type SeatingSocketDeps } from "./seatingEvents";

const log = createLog("Socket");

// ─── Event Handlers ──────────────────────────────────────────────

const handleConnection = (io: Server, socket: Socket, deps: SeatingSocketDeps) => {
  log.success("Client connected", { socketId: socket.id });

  registerSeatingHandlers(io, socket, deps);

  socket.on("disconnect", (reason) => {
    log.info("Client disconnected", { socketId: socket.id, reason });
  });

  socket.on("error", (error) => {
    log.error("Socket error", { socketId: socket.id, error: String(error) });
  });
};

// ─── Main Export ─────────────────────────────────────────────────

export const handleSocketEvents = (io: Server, deps: SeatingSocketDeps): void => {
  io.on("connection", (socket) => handleConnection(io, socket, deps));
  log.success("Socket event handlers registered");
};
