import { EventBus } from "./event-bus";
import type { CreatedEvent, EventBusConfig, EventId } from "./types";

/**
 * Creates a typed event definition usable as an event key.
 *
 * `createEvent<{ version: string }>("ready")`
 */
export function createEvent<T>(id: EventId): CreatedEvent<T> {
    if (!id || id.trim().length === 0) throw new Error("[typebus] createEvent: id is required");
    return Object.freeze({ id });
}

export function createEventBus(config?: EventBusConfig): EventBus {
    return new EventBus(config);
}
