import type { Guard, GuardResult } from './Guards.js';

interface RegisteredGuard<T> {
    name: string;
    guard: Guard<T>;
}

type GuardTable<P> = { [K in keyof P]?: RegisteredGuard<P[K]>[] };

/**
 * Ordered guards per phase. `P` maps each phase to the context its guards read.
 */
export class GuardRegistry<P extends object> {
    private guards: GuardTable<P> = {};

    public register<K extends keyof P>(phase: K, name: string, guard: Guard<P[K]>): this {
        const existing: RegisteredGuard<P[K]>[] = this.guards[phase] ?? [];
        existing.push({ name, guard });
        this.guards[phase] = existing;
        return this;
    }

    /**
     * Runs the phase in registration order and returns the first failure.
     */
    public evaluate<K extends keyof P>(phase: K, context: P[K]): GuardResult {
        const registered = this.guards[phase];
        if (!registered || registered.length === 0) return { ok: true };

        for (const entry of registered) {
            const result = entry.guard(context);
            if (!result.ok) return result;
        }

        return { ok: true };
    }
}
