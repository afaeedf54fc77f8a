import type { EventKey } from "./types";

/** Human-readable name of an event type: the definition id, or the class name. */
export function describeEventKey(key: EventKey<unknown>): string {
    if (typeof key === "function") return key.name || "<anonymous class>";
    return key.id;
}
