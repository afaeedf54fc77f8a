import { EventBusErrorCode } from "./enums";
import type { HandlerFailure } from "./types";

export class EventBusError extends Error {
    readonly code: EventBusErrorCode;
    /** Every handler failure of a collecting publish; empty for other codes. */
    readonly failures: readonly HandlerFailure[];

    constructor(code: EventBusErrorCode, message: string, options?: { cause?: unknown; failures?: HandlerFailure[] }) {
        super(`[typebus] ${message}`, { cause: options?.cause });
        this.name = "EventBusError";
        this.code = code;
        this.failures = options?.failures ?? [];
    }

    static nullHandler(operation: string): EventBusError {
        return new EventBusError(EventBusErrorCode.NULL_HANDLER, `${operation}: handler is required`);
    }

    static nullEvent(eventName: string): EventBusError {
        return new EventBusError(EventBusErrorCode.NULL_EVENT, `publish: payload for "${eventName}" is required`);
    }

    static duplicate(eventName: string): EventBusError {
        return new EventBusError(
            EventBusErrorCode.DUPLICATE_SUBSCRIPTION,
            `Handler is already subscribed for event type "${eventName}"`,
        );
    }

    static handlerFailed(eventName: string, failures: HandlerFailure[]): EventBusError {
        return new EventBusError(
            EventBusErrorCode.HANDLER_FAILED,
            `${failures.length} handler(s) failed while publishing "${eventName}"`,
            { cause: failures[0]?.error, failures },
        );
    }
}
