// ── Events ──────────────────────────────────────────────────────────
export {
    bindHandler,
    CriticalSection,
    createEvent,
    createEventBus,
    describeEventKey,
    EventBus,
    EventBusError,
    EventBusErrorCode,
    HandlerEntry,
    PublishErrorMode,
    Subscription,
    SubscriptionState,
} from "./core/event-bus";
export type {
    BoundHandler,
    CreatedEvent,
    EventBusConfig,
    EventClass,
    EventHandler,
    EventId,
    EventKey,
    EventPublisher,
    EventSubscriber,
    EventUnsubscriber,
    HandlerFailure,
    HandlerInput,
} from "./core/event-bus";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler, formatEntry } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LogHandler, LogLevel } from "./core/logger/types";
export type { LoggerContext } from "./core/types";
// ── State machine ───────────────────────────────────────────────────
export { StateMachine } from "./core/state-machine/state-machine";
export type { StateMachineConfig } from "./core/state-machine/types";
