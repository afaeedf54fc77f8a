import { StateMachine } from "../state-machine/state-machine";
import { SubscriptionState } from "./enums";
import type { EventKey, EventUnsubscriber, HandlerInput } from "./types";

const SUBSCRIPTION_TRANSITIONS: Record<SubscriptionState, SubscriptionState[]> = {
    [SubscriptionState.ACTIVE]: [SubscriptionState.RELEASED],
    [SubscriptionState.RELEASED]: [],
};

/**
 * One-shot capability that cancels a single registration.
 *
 * Returned by `subscribe` / `subscribeOnce`. Only the first {@link release} reaches the
 * registry; every later call is a no-op returning `false`, including after `reset()`.
 */
export class Subscription<T> {
    private readonly state = new StateMachine<SubscriptionState>({
        transitions: SUBSCRIPTION_TRANSITIONS,
        initial: SubscriptionState.ACTIVE,
        name: "Subscription",
    });

    constructor(
        private readonly owner: EventUnsubscriber,
        readonly key: EventKey<T>,
        private readonly handler: HandlerInput<T>,
    ) {}

    get released(): boolean {
        return this.state.current === SubscriptionState.RELEASED;
    }

    /** Returns `true` only when this call removed the handler from the registry. */
    release(): boolean {
        if (!this.state.tryTransition(SubscriptionState.RELEASED)) return false;
        return this.owner.unsubscribe(this.key, this.handler);
    }

    dispose(): void {
        this.release();
    }
}
