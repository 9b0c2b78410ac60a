import { type KeySpec, type Sequence, formatSequence } from "./keys.js";
import type { ActionId, BindingTable } from "./table.js";

/**
 * Default time in milliseconds a pending sequence waits for its next key.
 */
export const DEFAULT_SEQUENCE_TIMEOUT_MS = 1000;

const LOG_PREFIX = "Keymap:";

// --- States and Outcomes ---

export type MatcherState =
    | { readonly type: "idle" }
    | {
        readonly type: "pending";
        readonly buffer: Sequence;
        /** Time of the first key of the buffer. */
        readonly startedAt: number;
        /** Time of the most recent key; the timeout counts from here. */
        readonly lastKeyAt: number;
    };

export interface KeymapMatch<A extends string = ActionId> {
    readonly type: "matched";
    readonly action: A;
    readonly capture: string | undefined;
    readonly captures: readonly string[];
    /** The keys that completed the match. */
    readonly keys: Sequence;
}

export type MatchOutcome<A extends string = ActionId> =
    | { readonly type: "pending"; readonly buffer: Sequence }
    | KeymapMatch<A>
    | { readonly type: "none" };

export const IDLE: MatcherState = Object.freeze({ type: "idle" });

export interface MatcherOptions {
    /**
     * Maximum gap in milliseconds between two keys of a sequence. A pending
     * buffer older than this is discarded when the next key arrives.
     * Zero, a negative number or `Infinity` disables the timeout.
     * @default 1000
     */
    sequenceTimeoutMs?: number;
    /** Log state transitions to the console. */
    debug?: boolean;
}

function isExpired(state: MatcherState, now: number, timeoutMs: number): boolean {
    return state.type === "pending"
        && timeoutMs > 0
        && Number.isFinite(timeoutMs)
        && now - state.lastKeyAt > timeoutMs;
}

function resolve<A extends string>(
    table: BindingTable<A>,
    buffer: Sequence,
    startedAt: number,
    now: number,
): { state: MatcherState; outcome: MatchOutcome<A> } | null {
    const result = table.probe(buffer);
    switch (result.type) {
        case "matched":
            return {
                state: IDLE,
                outcome: { type: "matched", ...result.bound, keys: buffer },
            };
        case "pending":
            return {
                state: { type: "pending", buffer, startedAt, lastKeyAt: now },
                outcome: { type: "pending", buffer },
            };
        case "none":
            return null;
    }
}

/**
 * One matcher step: appends `key` to the pending buffer (or starts a new one),
 * then completes, extends, or restarts the attempt with `key` alone.
 * Pure; the returned state replaces the previous one.
 */
export function advance<A extends string>(
    table: BindingTable<A>,
    state: MatcherState,
    key: KeySpec,
    now: number,
    timeoutMs: number = DEFAULT_SEQUENCE_TIMEOUT_MS,
): { state: MatcherState; outcome: MatchOutcome<A> } {
    const current = isExpired(state, now, timeoutMs) ? IDLE : state;

    if (current.type === "pending") {
        const extended = resolve(table, [...current.buffer, key], current.startedAt, now);
        if (extended) {
            return extended;
        }
    }

    return resolve(table, [key], now, now) ?? { state: IDLE, outcome: { type: "none" } };
}

// --- Sequence Matcher ---

/**
 * Incremental matcher for one input stream. Feed it key presses with the
 * current time; it never starts timers, timeouts are evaluated on the next call.
 *
 * @example
 * ```typescript
 * const matcher = new SequenceMatcher(table, { sequenceTimeoutMs: 500 });
 * matcher.feed(parseKey("g"), 0);   // { type: "pending", ... }
 * matcher.feed(parseKey("g"), 200); // { type: "matched", action: "Top", ... }
 * ```
 */
export class SequenceMatcher<A extends string = ActionId> {
    private current: MatcherState = IDLE;
    private readonly timeoutMs: number;
    private debugMode: boolean;

    constructor(
        private readonly table: BindingTable<A>,
        options: MatcherOptions = {},
    ) {
        this.timeoutMs = options.sequenceTimeoutMs ?? DEFAULT_SEQUENCE_TIMEOUT_MS;
        this.debugMode = options.debug ?? false;
    }

    public get state(): MatcherState {
        return this.current;
    }

    public get isPending(): boolean {
        return this.current.type === "pending";
    }

    public setDebugMode(enable: boolean): void {
        this.debugMode = enable;
    }

    public feed(key: KeySpec, now: number): MatchOutcome<A> {
        const previous = this.current;
        const { state, outcome } = advance(this.table, previous, key, now, this.timeoutMs);
        this.current = state;

        if (this.debugMode) {
            if (isExpired(previous, now, this.timeoutMs) && previous.type === "pending") {
                console.log(`${LOG_PREFIX} Pending sequence "${formatSequence(previous.buffer)}" timed out. Resetting.`);
            }
            switch (outcome.type) {
                case "matched":
                    console.log(`${LOG_PREFIX} Matched "${formatSequence(outcome.keys)}" -> "${outcome.action}"${outcome.capture !== undefined ? ` (captured "${outcome.capture}")` : ""}.`);
                    break;
                case "pending":
                    console.log(`${LOG_PREFIX} Waiting for more keys after "${formatSequence(outcome.buffer)}".`);
                    break;
                case "none":
                    console.log(`${LOG_PREFIX} No binding for "${formatSequence([key])}".`);
                    break;
            }
        }
        return outcome;
    }

    /** Drops any pending buffer. */
    public reset(): void {
        this.current = IDLE;
    }
}
