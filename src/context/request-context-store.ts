// src/context/request-context-store.ts

import { AsyncLocalStorage } from 'async_hooks';
import { RequestLogs } from './request-logs';

interface ContextFrame {
    readonly requestLogs: RequestLogs | null;
}

export interface ContextToken {
    readonly previous: RequestLogs | null;
}

/**
 * Binds the active RequestLogs to the current async execution context.
 *
 * Frames are never mutated: `setRequest`, `reset` and `clear` enter a new one,
 * which only the current task and what it spawns from then on will see. A
 * background task that sets its own request after its first await (or inside
 * its own `run`) leaves the request that spawned it untouched.
 */
export class RequestContextStore {
    private readonly storage = new AsyncLocalStorage<ContextFrame>();

    run<T>(fn: () => T): T {
        return this.storage.run({ requestLogs: null }, fn);
    }

    setRequest(requestLogs: RequestLogs): ContextToken {
        const token: ContextToken = Object.freeze({ previous: this.getCurrent() });
        this.storage.enterWith({ requestLogs });
        return token;
    }

    getCurrent(): RequestLogs | null {
        return this.storage.getStore()?.requestLogs ?? null;
    }

    reset(token: ContextToken): void {
        this.storage.enterWith({ requestLogs: token.previous });
    }

    clear(): void {
        if (this.storage.getStore()) {
            this.storage.enterWith({ requestLogs: null });
        }
    }
}
