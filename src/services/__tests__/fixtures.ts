// src/services/__tests__/fixtures.ts

import { AdminCapability } from "../../lib/adminCapability";
import { MemorySeatingStore } from "../../store/memory.store";
import type { SeatingStore } from "../../store/seating.store";
import type { ImportRow } from "../../types/import.type";
import type { LiveMessage } from "../../types/seating.type";
import {
  EventBroadcaster,
  type DeltaSink,
  type DisconnectReason,
} from "../broadcaster";
import { SeatingEngine } from "../seating.service";
import { TokenIssuer } from "../tokenIssuer";

export const TEST_SECRET = "test-secret";
export const TEST_EPOCH = "test-epoch";

export const admin = AdminCapability.grant("test-admin");

export interface EngineSetup {
  store?: SeatingStore;
  retention?: number;
  queueLimit?: number;
  clock?: () => Date;
  retryAttempts?: number;
}

export function setupEngine(setup: EngineSetup = {}) {
  const store = setup.store ?? new MemorySeatingStore();
  const broadcaster = new EventBroadcaster({
    retention: setup.retention ?? 100,
    queueLimit: setup.queueLimit ?? 100,
    epoch: TEST_EPOCH,
  });
  const issuer = new TokenIssuer(TEST_SECRET, store);
  const engine = new SeatingEngine(store, issuer, broadcaster, {
    retry: { attempts: setup.retryAttempts ?? 3, baseDelayMs: 0 },
    clock: setup.clock,
  });
  return { store, broadcaster, issuer, engine };
}

export const row = (
  guestName: string,
  tableLabel: string | null,
  extra: Partial<ImportRow> = {},
): ImportRow => ({ guestName, tableLabel, ...extra });

export class RecordingSink implements DeltaSink {
  readonly messages: LiveMessage[] = [];
  readonly closed: DisconnectReason[] = [];

  constructor(readonly id: string) {}

  send(message: LiveMessage): void {
    this.messages.push(message);
  }

  close(reason: DisconnectReason): void {
    this.closed.push(reason);
  }

  sequences(): number[] {
    return this.messages.map((m) => m.sequence);
  }
}

// Lets queued deliveries and microtasks settle
export const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

export const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};
