/**
 * RolloverUpdateHub — Fans rollover walk results out to live subscribers.
 *
 * The engine calls monthUpdated() once per month a walk touched; the hub
 * forwards the event to every subscriber registered for that user (or
 * for all users). A subscriber whose send fails is logged and dropped.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { RolloverNotifier, RolloverUpdateEvent } from "@ledgerline/budget";

export interface RolloverSubscriber {
  readonly id: string;
  /** Only this user's events are delivered; all users when absent */
  readonly userId?: string | undefined;
  send(event: RolloverUpdateEvent): void | Promise<void>;
  /** Called once when the subscriber is dropped or the hub closes */
  close?(): void;
}

export interface RolloverUpdateHubOptions {
  readonly logger?: Logger | undefined;
}

export class RolloverUpdateHub implements RolloverNotifier {
  private readonly _subscribers = new Map<string, RolloverSubscriber>();
  private readonly _logger: Logger;
  private _closed = false;

  constructor(options?: RolloverUpdateHubOptions) {
    this._logger = options?.logger ?? pino({ level: "silent" });
  }

  get size(): number {
    return this._subscribers.size;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Add a subscriber. Registering an id twice replaces the earlier one.
   */
  register(subscriber: RolloverSubscriber): void {
    if (this._closed) {
      throw new Error("Rollover update hub is closed");
    }
    this._subscribers.set(subscriber.id, subscriber);
    this._logger.debug(
      { subscriberId: subscriber.id, userId: subscriber.userId, subscribers: this.size },
      "subscriber registered",
    );
  }

  unregister(id: string): boolean {
    const removed = this._subscribers.delete(id);
    if (removed) {
      this._logger.debug({ subscriberId: id, subscribers: this.size }, "subscriber unregistered");
    }
    return removed;
  }

  /**
   * Deliver an event to every matching subscriber.
   * Returns how many subscribers it was handed to.
   */
  broadcast(event: RolloverUpdateEvent): number {
    let delivered = 0;
    for (const subscriber of [...this._subscribers.values()]) {
      if (subscriber.userId !== undefined && subscriber.userId !== event.userId) {
        continue;
      }
      delivered++;
      try {
        const pending = subscriber.send(event);
        if (pending instanceof Promise) {
          void pending.catch((err: unknown) => this._drop(subscriber, err));
        }
      } catch (err) {
        this._drop(subscriber, err);
      }
    }
    return delivered;
  }

  monthUpdated(event: RolloverUpdateEvent): void {
    this.broadcast(event);
  }

  /**
   * Close every subscriber and refuse new ones.
   */
  close(): void {
    this._closed = true;
    const subscribers = [...this._subscribers.values()];
    this._subscribers.clear();
    for (const subscriber of subscribers) {
      subscriber.close?.();
    }
  }

  private _drop(subscriber: RolloverSubscriber, err: unknown): void {
    if (this._subscribers.get(subscriber.id) !== subscriber) return;
    this._subscribers.delete(subscriber.id);
    this._logger.warn(
      { subscriberId: subscriber.id, err, subscribers: this.size },
      "subscriber send failed, dropped",
    );
    subscriber.close?.();
  }
}
