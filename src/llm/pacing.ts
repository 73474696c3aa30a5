import type { LlmBackend } from '../types/index.js';
import { sleep } from '../utils/http-client.js';

/**
 * Time source for pacing. Tests swap in a fake.
 */
export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep,
};

/**
 * Pacing state for one backend, kept for the lifetime of a run.
 */
export interface BackendState {
    lastCallAt: number | null;
    calls: number;
    blockedUntil: number;
}

/**
 * Cooperative pacing across an ordered list of LLM backends.
 *
 * Spaces consecutive calls to the same backend by 60000 / rpm ms, stops
 * selecting a backend once it has used its daily budget, and skips backends
 * that are cooling down after a rate-limit error.
 */
export class BackendPacer {
    private readonly states = new Map<string, BackendState>();

    constructor(
        private readonly backends: readonly LlmBackend[],
        private readonly clock: Clock = systemClock
    ) {
        for (const backend of backends) {
            this.states.set(backend.model, { lastCallAt: null, calls: 0, blockedUntil: 0 });
        }
    }

    /**
     * First backend in priority order that is not excluded, not cooling down
     * and still under its daily budget.
     */
    select(exclude: ReadonlySet<string> = new Set()): LlmBackend | null {
        const now = this.clock.now();
        return (
            this.backends.find((backend) => {
                if (exclude.has(backend.model)) return false;
                const state = this.state(backend);
                return state.blockedUntil <= now && state.calls < backend.rpd;
            }) ?? null
        );
    }

    /**
     * Wait for the backend's per-minute spacing, then record the call.
     */
    async acquire(backend: LlmBackend): Promise<void> {
        const state = this.state(backend);
        if (state.lastCallAt !== null) {
            const waitMs = state.lastCallAt + minIntervalMs(backend) - this.clock.now();
            if (waitMs > 0) {
                await this.clock.sleep(waitMs);
            }
        }
        state.lastCallAt = this.clock.now();
        state.calls += 1;
    }

    /**
     * Leave a backend alone for `ms` after a rate-limit error.
     */
    block(backend: LlmBackend, ms: number): void {
        this.state(backend).blockedUntil = this.clock.now() + ms;
    }

    /**
     * Copy of the current state, for logging and tests.
     */
    snapshot(): Record<string, BackendState> {
        const result: Record<string, BackendState> = {};
        for (const [model, state] of this.states) {
            result[model] = { ...state };
        }
        return result;
    }

    private state(backend: LlmBackend): BackendState {
        let state = this.states.get(backend.model);
        if (!state) {
            state = { lastCallAt: null, calls: 0, blockedUntil: 0 };
            this.states.set(backend.model, state);
        }
        return state;
    }
}

/**
 * Minimum spacing between two calls to the same backend.
 */
export function minIntervalMs(backend: LlmBackend): number {
    return Math.ceil(60_000 / backend.rpm);
}
