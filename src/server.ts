import { createServer } from "http";
import { Server } from "socket.io";
import { corsOptionsFor, createApp } from "./app";
import { connectDatabase, disconnectDatabase } from "./config/database";
import { loadConfig } from "./config/env";
import { handleSocketEvents } from "./events/socketEvents";
import { EventBroadcaster } from "./services/broadcaster";
import { QrService } from "./services/qr.service";
import { SeatingEngine } from "./services/seating.service";
import { TokenIssuer } from "./services/tokenIssuer";
import { MemorySeatingStore } from "./store/memory.store";
import { MongoSeatingStore } from "./store/mongo.store";
import type { SeatingStore } from "./store/seating.store";

const config = loadConfig();

const openStore = async (): Promise<SeatingStore> => {
  if (config.store === "memory" || !config.databaseUrl) {
    console.warn("⚠️  Using the in-memory store; data is lost on restart");
    return new MemorySeatingStore();
  }
  await connectDatabase(config.databaseUrl, config.storageCommitTimeoutMs);
  return new MongoSeatingStore({ commitTimeoutMs: config.storageCommitTimeoutMs });
};

const startServer = async () => {
  // 1. Storage first
  const store = await openStore();

  // 2. Engine and its collaborators
  const broadcaster = new EventBroadcaster({
    retention: config.deltaLogRetention,
    queueLimit: config.subscriberQueueLimit,
  });
  const engine = new SeatingEngine(
    store,
    new TokenIssuer(config.tokenSecret, store),
    broadcaster,
    {
      retry: {
        attempts: config.storageRetryAttempts,
        baseDelayMs: config.storageRetryBaseMs,
      },
    },
  );
  const qr = new QrService(config.baseUrl);

  // 3. HTTP + Socket.IO
  const app = createApp({
    config,
    engine,
    qr,
    connections: () => ({
      connections: io.engine.clientsCount,
      subscribers: broadcaster.connectionCounts(),
    }),
  });
  const httpServer = createServer(app);
  const io = new Server(httpServer, {
    cors: corsOptionsFor(config.allowedOrigins),
    pingTimeout: 60000,
    pingInterval: 25000,
  });
  handleSocketEvents(io, { engine, ackTimeoutMs: config.deliveryAckTimeoutMs });

  // 4. Start listening
  httpServer.listen(config.port, () => {
    console.log("━".repeat(50));
    console.log(`🚀 Server running on port ${config.port}`);
    console.log(`🌍 Environment: ${config.nodeEnv}`);
    console.log(`💾 Store: ${config.store}`);
    console.log(`🔗 Allowed origins:`);
    config.allowedOrigins.forEach((o) => console.log(`   • ${o}`));
    console.log("━".repeat(50));
  });

  const gracefulShutdown = async (signal: string) => {
    console.log(`\n📡 ${signal} received, shutting down gracefully...`);
    await new Promise<void>((resolve) => io.close(() => resolve()));
    console.log("✅ Socket.IO and HTTP servers closed");
    await disconnectDatabase();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    gracefulShutdown(signal).catch((error) => {
      console.error("❌ Shutdown failed:", error);
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
};

startServer().catch((error) => {
  console.error("❌ Failed to start server:", error);
  process.exit(1);
});
