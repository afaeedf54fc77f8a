/**
 * Registry-wide mutual exclusion.
 *
 * Registry state is only touched inside {@link CriticalSection.run}, whose callback is
 * synchronous and never calls user code, so on a single isolate the section is atomic.
 * Entering a section that is already held means user code ran under the lock and throws.
 */
export class CriticalSection {
    private _held = false;

    constructor(private readonly name = "CriticalSection") {}

    get held(): boolean {
        return this._held;
    }

    run<R>(fn: () => R): R {
        if (this._held) {
            throw new Error(`[typebus] "${this.name}" re-entered while held`);
        }
        this._held = true;
        try {
            return fn();
        } finally {
            this._held = false;
        }
    }
}
