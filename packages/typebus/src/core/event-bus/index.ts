export { EventBusErrorCode, PublishErrorMode, SubscriptionState } from "./enums";
export { EventBusError } from "./errors";
export { EventBus } from "./event-bus";
export { bindHandler, HandlerEntry } from "./handler";
export { createEvent, createEventBus } from "./helpers";
export { describeEventKey } from "./keys";
export { CriticalSection } from "./lock";
export { Subscription } from "./subscription";
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
} from "./types";
