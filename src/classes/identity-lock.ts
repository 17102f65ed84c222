import { type PublishIdentity } from '../types/publish.js';

/**
 * Stable string form of an identity; equal identities give equal keys
 * whatever the order of their scope fields.
 */
export function identityKey(identity: PublishIdentity): string {
    const scope = Object.entries(identity.scope ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return JSON.stringify([identity.family, identity.asset, identity.task, identity.name, scope]);
}

/**
 * In-process mutual exclusion keyed by string.
 *
 * Callers with the same key run one at a time in arrival order; different
 * keys never wait on each other.
 */
export class IdentityLock {
    private tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const run = previous.then(fn);
        // the chain only orders callers; `run` still rejects for this one
        const tail = run.then(
            () => undefined,
            () => undefined,
        );
        this.tails.set(key, tail);

        try {
            return await run;
        } finally {
            if (this.tails.get(key) === tail) this.tails.delete(key);
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    get size(): number {
        return this.tails.size;
    }
}
