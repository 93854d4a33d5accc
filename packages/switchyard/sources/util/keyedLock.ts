import { AsyncLock } from "./lock.js";

/**
 * One AsyncLock per key; idle keys are dropped so the map stays bounded by active work.
 * Expects: keys are stable identifiers (user id, destination key).
 */
export class KeyedLock {
    private readonly locks = new Map<string, AsyncLock>();

    async inLock<T>(key: string, func: () => Promise<T> | T): Promise<T> {
        let lock = this.locks.get(key);
        if (!lock) {
            lock = new AsyncLock();
            this.locks.set(key, lock);
        }
        const active = lock;
        try {
            return await active.inLock(func);
        } finally {
            if (!active.busy && this.locks.get(key) === active) {
                this.locks.delete(key);
            }
        }
    }

    size(): number {
        return this.locks.size;
    }
}
