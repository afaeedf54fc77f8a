export enum SubscriptionState {
    ACTIVE = "active",
    RELEASED = "released",
}

/** What `publish` does when a handler throws. */
export enum PublishErrorMode {
    /** Rethrow the first error immediately; later handlers in that publish do not run. */
    PROPAGATE = "propagate",
    /** Run every handler, then throw one error carrying all failures. */
    COLLECT = "collect",
}

export enum EventBusErrorCode {
    NULL_HANDLER = "null_handler",
    NULL_EVENT = "null_event",
    DUPLICATE_SUBSCRIPTION = "duplicate_subscription",
    HANDLER_FAILED = "handler_failed",
}
