import { createServer, type Server } from "http";
import { afterEach, describe, expect, it } from "vitest";
import { createApp } from "../../app";
import { QrService } from "../../services/qr.service";
import { setupEngine } from "../../services/__tests__/fixtures";

const ADMIN_TOKEN = "test-admin-token";

interface Envelope {
  success: boolean;
  message: string;
  data: unknown;
}

const isEnvelope = (value: unknown): value is Envelope =>
  typeof value === "object" && value !== null && "success" in value && "message" in value;

const servers: Server[] = [];

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve) => {
          server.closeAllConnections();
          server.close(() => resolve());
        }),
    ),
  );
});

const start = async (rateLimitPerMinute = 0) => {
  const { engine } = setupEngine();
  const app = createApp({
    config: { allowedOrigins: [], adminToken: ADMIN_TOKEN, rateLimitPerMinute, store: "memory" },
    engine,
    qr: new QrService("http://seating.test"),
  });
  const server = createServer(app);
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  const { port } = address;

  const call = async (
    method: string,
    path: string,
    options: { body?: unknown; rawBody?: string; admin?: boolean; bearer?: string } = {},
  ) => {
    const headers: Record<string, string> = { "content-type": "application/json" };
    const bearer = options.admin ? ADMIN_TOKEN : options.bearer;
    if (bearer) headers.authorization = `Bearer ${bearer}`;
    const response = await fetch(`http://127.0.0.1:${port}${path}`, {
      method,
      headers,
      body: options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body)),
    });
    const json: unknown = await response.json();
    if (!isEnvelope(json)) throw new Error(`unexpected body from ${path}`);
    return { status: response.status, ...json };
  };

  return { call, engine };
};

const field = (value: unknown, key: string): unknown =>
  typeof value === "object" && value !== null && key in value
    ? Object.entries(value).find(([k]) => k === key)?.[1]
    : undefined;

describe("HTTP surface", () => {
  it("keeps admin routes behind the bearer token", async () => {
    const { call } = await start();

    const denied = await call("GET", "/admin/events");
    const wrong = await call("GET", "/admin/events", { bearer: "test-wrong-token" });

    expect(denied).toMatchObject({ status: 401, success: false });
    expect(field(denied.data, "code")).toBe("UNAUTHORIZED");
    expect(wrong.status).toBe(401);
  });

  it("imports a sheet, serves the public summary and runs the guest portal", async () => {
    const { call } = await start();

    const created = await call("POST", "/admin/events", { admin: true, body: { name: "Wedding" } });
    expect(created).toMatchObject({ status: 201, message: "Event created" });
    const eventId = String(field(created.data, "eventId"));
    const publicCode = String(field(created.data, "publicCode"));

    const imported = await call("POST", `/admin/events/${eventId}/import`, {
      admin: true,
      body: {
        header: ["Name", "Table", "Dietary Preference"],
        cells: [
          ["Ann", "A", "veg"],
          ["Ben", "A", null],
        ],
      },
    });
    expect(imported).toMatchObject({ status: 200, message: "Imported 2 guests" });

    const open = await call("GET", `/events/${publicCode}/seating`);
    expect(field(open.data, "tables")).toEqual([
      { tableId: expect.any(String), label: "A", totalGuests: 2, checkedIn: 0, availableSeats: 10 },
    ]);

    const exported = await call("GET", `/admin/events/${eventId}/export`, { admin: true });
    const guests = field(exported.data, "guests");
    const token = Array.isArray(guests) ? String(field(guests[0], "token")) : "";

    const lookup = await call("POST", "/guest/lookup", { body: { token } });
    expect(field(field(lookup.data, "guest"), "name")).toBe("Ann");
    expect(field(field(lookup.data, "guest"), "dietary")).toBe("vegetarian");

    expect((await call("POST", "/guest/checkin", { body: { token } })).message).toBe("Checked in");
    expect((await call("POST", "/guest/checkin", { body: { token } })).message).toBe(
      "Already checked in",
    );

    const full = await call("GET", `/events/${publicCode}/seating`, { admin: true });
    const tables = field(full.data, "tables");
    expect(Array.isArray(tables) && field(tables[0], "guests")).toEqual([
      { name: "Ann", seatNo: null, checkedIn: true, dietary: "vegetarian" },
      { name: "Ben", seatNo: null, checkedIn: false, dietary: null },
    ]);
  });

  it("answers a sheet without the required columns with a validation error", async () => {
    const { call } = await start();
    const created = await call("POST", "/admin/events", { admin: true, body: { name: "Wedding" } });

    const response = await call("POST", `/admin/events/${String(field(created.data, "eventId"))}/import`, {
      admin: true,
      body: { header: ["Name"], cells: [["Ann"]] },
    });

    expect(response).toMatchObject({
      status: 422,
      success: false,
      message: "Missing required columns: table",
    });
    expect(field(response.data, "kind")).toBe("MalformedRow");
  });

  it("maps a capacity rejection to 422 with its violations", async () => {
    const { call } = await start();
    const created = await call("POST", "/admin/events", { admin: true, body: { name: "Wedding" } });
    const cells = Array.from({ length: 13 }, (_, i) => [`Guest ${i + 1}`, "A"]);

    const response = await call("POST", `/admin/events/${String(field(created.data, "eventId"))}/import`, {
      admin: true,
      body: { header: ["Name", "Table"], cells },
    });

    expect(response.status).toBe(422);
    expect(response.message).toBe(`Table "A" would seat 13 guests; capacity is 12`);
    expect(field(response.data, "kind")).toBe("CapacityExceeded");
  });

  it("reports unknown tokens, bad JSON and unknown routes", async () => {
    const { call } = await start();

    const missing = await call("POST", "/guest/lookup", { body: { token: "nope" } });
    const malformed = await call("POST", "/guest/lookup", { rawBody: "{not json" });
    const nowhere = await call("GET", "/nowhere");

    expect(missing.status).toBe(404);
    expect(field(missing.data, "code")).toBe("TOKEN_NOT_FOUND");
    expect(malformed).toMatchObject({ status: 400, message: "Malformed JSON body" });
    expect(nowhere).toMatchObject({ status: 404, message: "No route for GET /nowhere" });
  });

  it("rate limits the guest portal per client", async () => {
    const { call } = await start(2);

    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      statuses.push((await call("POST", "/guest/lookup", { body: { token: "nope" } })).status);
    }

    expect(statuses).toEqual([404, 404, 429]);
  });
});
