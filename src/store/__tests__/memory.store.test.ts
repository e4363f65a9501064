import { describe, expect, it } from "vitest";
import { ConflictError, NotFoundError } from "../../lib/errors";
import type { EventRecord, GuestRecord } from "../../types/seating.type";
import { MemorySeatingStore } from "../memory.store";
import { emptyChangeSet } from "../seating.store";

const event = (eventId: string, publicCode = `code-${eventId}`): EventRecord => ({
  eventId,
  name: "Wedding",
  date: null,
  organizerEmail: null,
  publicCode,
  tableCapacityLimit: 12,
  createdAt: new Date("2025-01-01T00:00:00.000Z"),
});

const guest: GuestRecord = {
  guestId: "g1",
  name: "Ann",
  naturalKey: "ann|",
  contact: null,
  dietary: null,
  tableId: null,
  seatNo: null,
  status: "not_arrived",
  checkedInAt: null,
  token: "tok-1",
  createdAt: new Date("2025-01-01T00:00:00.000Z"),
};

describe("MemorySeatingStore", () => {
  it("refuses a second event with the same public code", async () => {
    const store = new MemorySeatingStore();
    await store.createEvent(event("e1", "same"));
    await expect(store.createEvent(event("e2", "same"))).rejects.toBeInstanceOf(ConflictError);
    expect(await store.findEventByPublicCode("same")).toMatchObject({ eventId: "e1" });
  });

  it("commits a change set and bumps the revision", async () => {
    const store = new MemorySeatingStore();
    await store.createEvent(event("e1"));

    const value = await store.transact("e1", async () => ({
      changes: { ...emptyChangeSet(), putGuests: [guest] },
      value: "done",
    }));

    expect(value).toBe("done");
    expect(await store.loadState("e1")).toMatchObject({ revision: 1, guests: [guest] });
  });

  it("leaves the revision alone for an empty change set", async () => {
    const store = new MemorySeatingStore();
    await store.createEvent(event("e1"));
    await store.transact("e1", async () => ({ changes: emptyChangeSet(), value: null }));
    expect((await store.loadState("e1"))?.revision).toBe(0);
  });

  it("rejects a commit when another writer got there first", async () => {
    const store = new MemorySeatingStore();
    await store.createEvent(event("e1"));

    const stale = store.transact("e1", async () => {
      await store.transact("e1", async () => ({
        changes: { ...emptyChangeSet(), putGuests: [guest] },
        value: null,
      }));
      return { changes: { ...emptyChangeSet(), deleteGuestIds: ["g1"] }, value: null };
    });

    await expect(stale).rejects.toBeInstanceOf(ConflictError);
    expect((await store.loadState("e1"))?.guests).toHaveLength(1);
  });

  it("hands out copies that callers cannot use to edit committed state", async () => {
    const store = new MemorySeatingStore();
    await store.createEvent(event("e1"));
    await store.transact("e1", async () => ({
      changes: { ...emptyChangeSet(), putGuests: [guest] },
      value: null,
    }));

    const state = await store.loadState("e1");
    if (state) state.guests[0].name = "Mallory";

    expect((await store.loadState("e1"))?.guests[0].name).toBe("Ann");
  });

  it("keeps reserved tokens after the event is gone", async () => {
    const store = new MemorySeatingStore();
    await store.createEvent(event("e1"));
    expect(await store.reserveToken("tok-1", "e1")).toBe(true);

    expect(await store.deleteEvent("e1")).toBe(true);

    expect(await store.reserveToken("tok-1", "e2")).toBe(false);
    expect(await store.findTokenOwner("tok-1")).toMatchObject({ eventId: "e1" });
    await expect(
      store.transact("e1", async () => ({ changes: emptyChangeSet(), value: null })),
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
