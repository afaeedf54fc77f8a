import { isNil } from "es-toolkit";
import { EventBusError } from "./errors";
import type { BoundHandler, EventHandler, HandlerInput } from "./types";

/**
 * Registered handler record.
 *
 * Identity is the `(target, method)` pair: binding the same method to the same receiver twice
 * yields matching entries, while two separately created closures never match.
 */
export class HandlerEntry<T> {
    private constructor(
        readonly method: EventHandler<T>,
        readonly target: object | undefined,
    ) {}

    /** Normalize a handler argument. Throws `NULL_HANDLER` for a missing function. */
    static from<T>(input: HandlerInput<T>, operation: string): HandlerEntry<T> {
        if (isNil(input)) throw EventBusError.nullHandler(operation);
        if (typeof input === "function") return new HandlerEntry(input, undefined);
        if (isNil(input.method)) throw EventBusError.nullHandler(operation);
        return new HandlerEntry(input.method, input.target);
    }

    matches(other: HandlerEntry<unknown>): boolean {
        return this.method === other.method && this.target === other.target;
    }

    invoke(sender: unknown, payload: T): void {
        this.method.call(this.target, sender, payload);
    }
}

/**
 * Pair a method with its receiver so it can be subscribed and later unsubscribed by identity.
 *
 * @example
 * bus.subscribe(PlayerDamaged, bindHandler(hud, hud.onDamaged));
 * bus.unsubscribe(PlayerDamaged, bindHandler(hud, hud.onDamaged)); // true
 */
export function bindHandler<TTarget extends object, T>(
    target: TTarget,
    method: (this: TTarget, sender: unknown, payload: T) => void,
): BoundHandler<T> {
    return { target, method };
}
