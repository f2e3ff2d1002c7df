/**
 * Counting admission gate.
 * At most `capacity` tasks run at once; further callers wait FIFO for a slot.
 * There is no rejection and no queue limit.
 */
export class AdmissionGate {
    private active = 0;
    private readonly waiters: Array<() => void> = [];

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`AdmissionGate capacity must be a positive integer (got ${capacity})`);
        }
    }

    get inFlight(): number {
        return this.active;
    }

    get waiting(): number {
        return this.waiters.length;
    }

    /**
     * Wait for a slot. The returned release function is idempotent.
     */
    async acquire(): Promise<() => void> {
        if (this.active < this.capacity) {
            this.active++;
        } else {
            // The releasing task hands its slot over directly, so `active` is unchanged.
            await new Promise<void>((resolve) => this.waiters.push(resolve));
        }

        let released = false;
        return () => {
            if (released) return;
            released = true;
            const next = this.waiters.shift();
            if (next) {
                next();
            } else {
                this.active--;
            }
        };
    }

    /**
     * Run `fn` inside a slot; the slot is released when it resolves or rejects.
     */
    async run<T>(fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }
}
