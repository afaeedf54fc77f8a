export type StateMachineConfig<TState extends string> = {
    /** Allowed targets per state. A state mapped to `[]` is terminal. */
    transitions: Record<TState, readonly TState[]>;
    initial: TState;
    name?: string;
};
