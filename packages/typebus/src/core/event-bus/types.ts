import type { LogHandler } from "../logger/types";
import type { PublishErrorMode } from "./enums";
import type { Subscription } from "./subscription";

export type EventId = string;

/**
 * Event definition returned by {@link createEvent}. Compared by reference:
 * two definitions with the same `id` are different event types.
 */
export interface CreatedEvent<T> {
    readonly id: EventId;
    /** @internal Phantom field carrying the payload type. Never set. */
    readonly __payload?: T;
}

/** A class whose instances are the payloads. Abstract classes are accepted. */
export type EventClass<T> = abstract new (...args: never[]) => T;

/** Map key identifying one event type. */
export type EventKey<T> = CreatedEvent<T> | EventClass<T>;

/**
 * Handler shape: `(sender, payload) => void`.
 *
 * Declared through a method signature so a handler for a specific payload can be stored
 * next to handlers for other payloads (method parameters are checked bivariantly).
 */
export type EventHandler<T> = {
    bivarianceHack(sender: unknown, payload: T): void;
}["bivarianceHack"];

/** A method paired with its receiver. Identity is the `(target, method)` pair. */
export type BoundHandler<T> = {
    readonly target: object;
    readonly method: EventHandler<T>;
};

export type HandlerInput<T> = EventHandler<T> | BoundHandler<T>;

export type HandlerFailure = {
    /** Position of the failing handler in the publish snapshot. */
    index: number;
    error: unknown;
};

export type EventBusConfig = {
    /** Used as the `code` of every log entry. Defaults to `"event-bus"`. */
    name?: string;
    errorMode?: PublishErrorMode;
    logger?: {
        handlers?: LogHandler[];
        /** Add the built-in console handler. */
        console?: boolean;
    };
};

export interface EventPublisher {
    publish<T>(key: EventKey<T>, payload: T, sender?: unknown): void;
}

export interface EventSubscriber {
    subscribe<T>(key: EventKey<T>, handler: HandlerInput<T>): Subscription<T>;
    subscribeOnce<T>(key: EventKey<T>, handler: HandlerInput<T>): Subscription<T>;
}

export interface EventUnsubscriber {
    unsubscribe<T>(key: EventKey<T>, handler: HandlerInput<T>): boolean;
}
