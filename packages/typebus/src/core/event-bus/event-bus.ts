import { isNil } from "es-toolkit";
import { createConsoleHandler } from "../logger/console-handler";
import { Logger } from "../logger/logger";
import { PublishErrorMode } from "./enums";
import { EventBusError } from "./errors";
import { HandlerEntry } from "./handler";
import { describeEventKey } from "./keys";
import { CriticalSection } from "./lock";
import { Subscription } from "./subscription";
import type {
    EventBusConfig,
    EventHandler,
    EventKey,
    EventPublisher,
    EventSubscriber,
    EventUnsubscriber,
    HandlerFailure,
    HandlerInput,
} from "./types";

/**
 * Type-keyed publish/subscribe registry.
 *
 * Every read or write of the subscriber map happens inside one {@link CriticalSection};
 * handlers always run outside it, on a copy of the list taken when `publish` starts. A handler
 * may therefore subscribe, unsubscribe, release tokens or publish (recursively too) while it runs.
 * A handler added during a publish is not called by that publish; one removed during a publish
 * is not called by any later one.
 */
export class EventBus implements EventPublisher, EventSubscriber, EventUnsubscriber {
    private static _shared: EventBus | undefined;

    /** Process-wide instance, created on first access. */
    static get shared(): EventBus {
        EventBus._shared ??= new EventBus({ name: "shared" });
        return EventBus._shared;
    }

    readonly logger: Logger;
    private readonly name: string;
    private readonly errorMode: PublishErrorMode;
    private readonly lock = new CriticalSection("EventBus");
    // Errors already logged by a nested publish; cleared when the outermost publish returns.
    private readonly reportedFailures = new Set<unknown>();
    private dispatchDepth = 0;
    // Invariant: no key maps to an empty list.
    private readonly handlers: Map<EventKey<unknown>, HandlerEntry<unknown>[]> = new Map();

    constructor(config?: EventBusConfig) {
        this.name = config?.name ?? "event-bus";
        this.errorMode = config?.errorMode ?? PublishErrorMode.PROPAGATE;

        this.logger = new Logger();
        if (config?.logger?.console) {
            this.logger.addHandler(createConsoleHandler());
        }
        for (const handler of config?.logger?.handlers ?? []) {
            this.logger.addHandler(handler);
        }
    }

    // ── Subscription ─────────────────────────────────────────────────────

    /**
     * Register `handler` for `key`. Throws `DUPLICATE_SUBSCRIPTION` when the same
     * `(target, method)` pair is already registered for this event type.
     */
    subscribe<T>(key: EventKey<T>, handler: HandlerInput<T>): Subscription<T> {
        const entry = HandlerEntry.from(handler, "subscribe");
        const subscribers = this.lock.run(() => {
            const list = this.handlers.get(key) ?? [];
            if (list.some((existing) => existing.matches(entry))) return undefined;
            list.push(entry);
            this.handlers.set(key, list);
            return list.length;
        });

        const event = describeEventKey(key);
        if (subscribers === undefined) {
            this.logger.warn(this.name, "duplicate subscription rejected", { event });
            throw EventBusError.duplicate(event);
        }
        const subscription = new Subscription(this, key, handler);
        this.logger.debug(this.name, "subscribed", { event, subscribers });
        return subscription;
    }

    /**
     * Register `handler` for a single delivery. The adapter releases its own token before
     * forwarding, and forwards only if the token was still active, so `handler` runs at most once
     * even when a recursive publish put the adapter in two snapshots.
     */
    subscribeOnce<T>(key: EventKey<T>, handler: HandlerInput<T>): Subscription<T> {
        const target = HandlerEntry.from(handler, "subscribeOnce");
        let subscription: Subscription<T> | undefined;
        const once: EventHandler<T> = (sender, payload) => {
            if (!subscription || subscription.released) return;
            subscription.release();
            target.invoke(sender, payload);
        };
        subscription = this.subscribe(key, once);
        return subscription;
    }

    /** Remove the first entry matching `handler`. Returns `false` when nothing matched. */
    unsubscribe<T>(key: EventKey<T>, handler: HandlerInput<T>): boolean {
        const entry = HandlerEntry.from(handler, "unsubscribe");
        const remaining = this.lock.run(() => {
            const list = this.handlers.get(key);
            if (!list) return undefined;
            const index = list.findIndex((existing) => existing.matches(entry));
            if (index === -1) return undefined;
            list.splice(index, 1);
            if (list.length === 0) {
                this.handlers.delete(key);
            }
            return list.length;
        });

        if (remaining === undefined) return false;
        this.logger.debug(this.name, "unsubscribed", { event: describeEventKey(key), subscribers: remaining });
        return true;
    }

    // ── Dispatch ─────────────────────────────────────────────────────────

    /** Deliver `payload` to every handler registered for `key`, in registration order. */
    publish<T>(key: EventKey<T>, payload: T, sender?: unknown): void {
        if (isNil(payload)) throw EventBusError.nullEvent(describeEventKey(key));

        const snapshot = this.lock.run(() => this.handlers.get(key)?.slice());
        if (!snapshot) return;

        this.dispatchDepth++;
        try {
            if (this.errorMode === PublishErrorMode.COLLECT) {
                this.dispatchCollecting(key, snapshot, sender, payload);
            } else {
                this.dispatch(key, snapshot, sender, payload);
            }
        } finally {
            this.dispatchDepth--;
            if (this.dispatchDepth === 0) {
                this.reportedFailures.clear();
            }
        }
    }

    private dispatch<T>(key: EventKey<T>, snapshot: readonly HandlerEntry<unknown>[], sender: unknown, payload: T): void {
        for (const [index, entry] of snapshot.entries()) {
            try {
                entry.invoke(sender, payload);
            } catch (error) {
                this.logFailure(key, index, error);
                throw error;
            }
        }
    }

    private dispatchCollecting<T>(
        key: EventKey<T>,
        snapshot: readonly HandlerEntry<unknown>[],
        sender: unknown,
        payload: T,
    ): void {
        const failures: HandlerFailure[] = [];
        for (const [index, entry] of snapshot.entries()) {
            try {
                entry.invoke(sender, payload);
            } catch (error) {
                failures.push({ index, error });
                this.logFailure(key, index, error);
            }
        }
        if (failures.length > 0) {
            throw EventBusError.handlerFailed(describeEventKey(key), failures);
        }
    }

    /** A failure rethrown through nested publishes is logged once, by the innermost one. */
    private logFailure(key: EventKey<unknown>, index: number, error: unknown): void {
        if (this.reportedFailures.has(error)) return;
        this.reportedFailures.add(error);
        this.logger.error(this.name, "handler failed", { event: describeEventKey(key), index, error });
    }

    // ── Queries ──────────────────────────────────────────────────────────

    subscriberCount<T>(key: EventKey<T>): number {
        return this.lock.run(() => this.handlers.get(key)?.length ?? 0);
    }

    /** Number of event types with at least one subscriber. */
    get eventTypeCount(): number {
        return this.lock.run(() => this.handlers.size);
    }

    // ── Lifecycle ────────────────────────────────────────────────────────

    /** Drop every subscription. Outstanding tokens stay safe to release. */
    reset(): void {
        const cleared = this.lock.run(() => {
            const size = this.handlers.size;
            this.handlers.clear();
            return size;
        });
        this.logger.debug(this.name, "reset", { eventTypes: cleared });
    }
}
