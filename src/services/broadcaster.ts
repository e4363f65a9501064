// src/services/broadcaster.ts

import { randomUUID } from "crypto";
import { TransportError } from "../lib/errors";
import { createLog } from "../lib/logger";
import type {
  LiveMessage,
  SeatingDelta,
  SeatingSnapshot,
  SequencedDelta,
} from "../types/seating.type";

const log = createLog("Broadcast");

export type DisconnectReason =
  | "overflow"
  | "transport_error"
  | "snapshot_failed"
  | "event_deleted"
  | "unsubscribed";

export interface DeltaSink {
  readonly id: string;
  send(message: LiveMessage): Promise<void> | void;
  close(reason: DisconnectReason): void;
}

export type SubscriptionMode = "replay" | "snapshot";

export interface SubscribeOptions {
  lastSequence?: number;
  epoch?: string; // sequences restart with every process; a foreign epoch forces a snapshot
  loadSnapshot: () => Promise<SeatingSnapshot>;
}

export interface BroadcasterOptions {
  retention: number; // deltas kept per event for catch-up
  queueLimit: number; // undelivered messages per subscriber
  clock?: () => Date;
  epoch?: string;
}

interface Subscriber {
  sink: DeltaSink;
  queue: LiveMessage[];
  // deltas published while the snapshot loads; null once live
  pending: SequencedDelta[] | null;
  draining: boolean;
  closed: boolean;
}

interface Channel {
  sequence: number;
  log: SequencedDelta[];
  subscribers: Map<string, Subscriber>;
}

/**
 * Per-event ordered delta log with fan-out to live subscribers.
 *
 * Publishing is synchronous and never waits on delivery: each subscriber owns
 * a bounded queue drained one message at a time, so a slow sink only delays
 * itself. A subscriber whose queue overflows, or whose sink throws, is closed
 * and must resubscribe with its last sequence.
 */
export class EventBroadcaster {
  private readonly channels = new Map<string, Channel>();
  private readonly clock: () => Date;
  readonly epoch: string;

  constructor(private readonly options: BroadcasterOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.epoch = options.epoch ?? randomUUID();
  }

  publish(eventId: string, delta: SeatingDelta): SequencedDelta {
    const channel = this.channel(eventId);
    channel.sequence += 1;
    const entry: SequencedDelta = {
      eventId,
      sequence: channel.sequence,
      publishedAt: this.clock().toISOString(),
      delta,
    };

    channel.log.push(entry);
    if (channel.log.length > this.options.retention) {
      channel.log.splice(0, channel.log.length - this.options.retention);
    }

    for (const subscriber of [...channel.subscribers.values()]) {
      if (!subscriber.pending) {
        this.enqueue(eventId, subscriber, this.deltaMessage(entry));
      } else if (subscriber.pending.push(entry) > this.options.queueLimit) {
        this.disconnect(eventId, subscriber, "overflow");
      }
    }
    return entry;
  }

  currentSequence(eventId: string): number {
    return this.channels.get(eventId)?.sequence ?? 0;
  }

  // Deltas still retained after `sequence`, or null when the window no longer reaches back that far
  deltasSince(eventId: string, sequence: number): SequencedDelta[] | null {
    const channel = this.channels.get(eventId);
    const current = channel?.sequence ?? 0;
    const retained = channel?.log.length ?? 0;
    if (sequence > current || sequence < current - retained) return null;
    return (channel?.log ?? []).filter((entry) => entry.sequence > sequence);
  }

  async subscribe(
    eventId: string,
    sink: DeltaSink,
    options: SubscribeOptions,
  ): Promise<SubscriptionMode> {
    const channel = this.channel(eventId);
    this.detach(eventId, sink.id);

    const subscriber: Subscriber = {
      sink,
      queue: [],
      pending: null,
      draining: false,
      closed: false,
    };

    const missed =
      options.lastSequence === undefined ||
      (options.epoch !== undefined && options.epoch !== this.epoch)
        ? null
        : this.deltasSince(eventId, options.lastSequence);

    // gaps wider than the subscriber queue get a snapshot
    if (missed && missed.length <= this.options.queueLimit) {
      channel.subscribers.set(sink.id, subscriber);
      for (const entry of missed) {
        this.enqueue(eventId, subscriber, this.deltaMessage(entry));
      }
      log.info(`${sink.id} resumed ${eventId} after #${options.lastSequence}`, {
        replayed: missed.length,
      });
      return "replay";
    }

    subscriber.pending = [];
    channel.subscribers.set(sink.id, subscriber);

    let snapshot: SeatingSnapshot;
    try {
      snapshot = await options.loadSnapshot();
    } catch (error) {
      log.error(`Snapshot for ${sink.id} failed`, error);
      this.disconnect(eventId, subscriber, "snapshot_failed");
      throw error;
    }
    if (subscriber.closed) return "snapshot";

    const buffered = subscriber.pending;
    subscriber.pending = null;
    this.enqueue(eventId, subscriber, {
      type: "snapshot",
      epoch: this.epoch,
      sequence: snapshot.sequence,
      payload: snapshot,
    });
    for (const entry of buffered) {
      if (entry.sequence > snapshot.sequence) {
        this.enqueue(eventId, subscriber, this.deltaMessage(entry));
      }
    }
    log.info(`${sink.id} joined ${eventId} at snapshot #${snapshot.sequence}`);
    return "snapshot";
  }

  unsubscribe(eventId: string, sinkId: string): boolean {
    return this.detach(eventId, sinkId);
  }

  // Drops the event's log and closes every subscriber
  closeEvent(eventId: string, reason: DisconnectReason = "event_deleted"): void {
    const channel = this.channels.get(eventId);
    if (!channel) return;
    for (const subscriber of [...channel.subscribers.values()]) {
      this.disconnect(eventId, subscriber, reason);
    }
    this.channels.delete(eventId);
  }

  subscriberCount(eventId: string): number {
    return this.channels.get(eventId)?.subscribers.size ?? 0;
  }

  connectionCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const [eventId, channel] of this.channels) {
      if (channel.subscribers.size > 0) counts[eventId] = channel.subscribers.size;
    }
    return counts;
  }

  // ─── Delivery ──────────────────────────────────────────────────

  private channel(eventId: string): Channel {
    let channel = this.channels.get(eventId);
    if (!channel) {
      channel = { sequence: 0, log: [], subscribers: new Map() };
      this.channels.set(eventId, channel);
    }
    return channel;
  }

  private enqueue(eventId: string, subscriber: Subscriber, message: LiveMessage) {
    if (subscriber.closed) return;
    subscriber.queue.push(message);
    if (subscriber.queue.length > this.options.queueLimit) {
      log.warn(`Queue overflow for ${subscriber.sink.id}; disconnecting`, {
        eventId,
        limit: this.options.queueLimit,
      });
      this.disconnect(eventId, subscriber, "overflow");
      return;
    }
    this.drain(eventId, subscriber).catch((error) =>
      log.error(`Drain loop for ${subscriber.sink.id} stopped`, error),
    );
  }

  private async drain(eventId: string, subscriber: Subscriber): Promise<void> {
    if (subscriber.draining) return;
    subscriber.draining = true;
    try {
      while (!subscriber.closed && subscriber.queue.length > 0) {
        const message = subscriber.queue[0];
        try {
          await subscriber.sink.send(message);
        } catch (cause) {
          const error = new TransportError(subscriber.sink.id, cause);
          log.error(error.message, cause);
          this.disconnect(eventId, subscriber, "transport_error");
          return;
        }
        subscriber.queue.shift();
      }
    } finally {
      subscriber.draining = false;
    }
  }

  private deltaMessage(entry: SequencedDelta): LiveMessage {
    return {
      type: "delta",
      epoch: this.epoch,
      sequence: entry.sequence,
      payload: entry,
    };
  }

  private detach(eventId: string, sinkId: string): boolean {
    const subscriber = this.channels.get(eventId)?.subscribers.get(sinkId);
    if (!subscriber) return false;
    subscriber.closed = true;
    subscriber.queue.length = 0;
    this.channels.get(eventId)?.subscribers.delete(sinkId);
    return true;
  }

  private disconnect(
    eventId: string,
    subscriber: Subscriber,
    reason: DisconnectReason,
  ): void {
    if (subscriber.closed) return;
    const channel = this.channels.get(eventId);
    if (channel?.subscribers.get(subscriber.sink.id) === subscriber) {
      channel.subscribers.delete(subscriber.sink.id);
    }
    subscriber.closed = true;
    subscriber.queue.length = 0;
    try {
      subscriber.sink.close(reason);
    } catch (error) {
      log.error(`Closing ${subscriber.sink.id} failed`, error);
    }
    log.info(`${subscriber.sink.id} disconnected from ${eventId}`, { reason });
  }
}
