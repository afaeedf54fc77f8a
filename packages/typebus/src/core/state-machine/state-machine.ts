import type { StateMachineConfig } from "./types";

export class StateMachine<TState extends string> {
    private _current: TState;
    private readonly _transitions: Record<TState, readonly TState[]>;
    private readonly _name: string;

    constructor(config: StateMachineConfig<TState>) {
        this._current = config.initial;
        this._transitions = config.transitions;
        this._name = config.name ?? "StateMachine";
    }

    get current(): TState {
        return this._current;
    }

    canTransition(target: TState): boolean {
        return this._transitions[this._current].includes(target);
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new Error(`Illegal transition: "${this._current}" → "${target}" for "${this._name}"`);
        }
        this._current = target;
    }

    /**
     * Test-and-set: moves to `target` only when the move is legal from the current state.
     * Returns whether this call performed the transition.
     */
    tryTransition(target: TState): boolean {
        if (!this.canTransition(target)) return false;
        this._current = target;
        return true;
    }
}
