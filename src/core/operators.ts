import { type Observable, type OperatorFunction, filter, map, scan } from "rxjs";
import type { KeySpec } from "./keys.js";
import {
    type KeymapMatch, type MatchOutcome, type MatcherOptions, type MatcherState,
    DEFAULT_SEQUENCE_TIMEOUT_MS, IDLE, advance,
} from "./matcher.js";
import type { BindingTable } from "./table.js";

export interface MatchKeysOptions extends MatcherOptions {
    /**
     * Time source for the sequence timeout, in milliseconds.
     * @default () => performance.now()
     */
    clock?: () => number;
}

interface ScanState<A extends string> {
    readonly matcher: MatcherState;
    readonly outcome: MatchOutcome<A> | null;
}

function isMatch<A extends string>(outcome: MatchOutcome<A> | null): outcome is KeymapMatch<A> {
    return outcome !== null && outcome.type === "matched";
}

/**
 * Runs the sequence matcher over a stream of key presses and emits completed
 * matches. Each subscription gets its own matcher state.
 *
 * @example
 * ```typescript
 * keys$.pipe(matchKeys(table, { sequenceTimeoutMs: 800 }))
 *     .subscribe(match => console.log(match.action, match.capture));
 * ```
 */
export function matchKeys<A extends string>(
    table: BindingTable<A>,
    options: MatchKeysOptions = {},
): OperatorFunction<KeySpec, KeymapMatch<A>> {
    const { sequenceTimeoutMs = DEFAULT_SEQUENCE_TIMEOUT_MS, clock = () => performance.now(), debug = false } = options;

    return (source$: Observable<KeySpec>) => source$.pipe(
        scan<KeySpec, ScanState<A>, ScanState<A>>(
            (acc, key) => {
                const { state, outcome } = advance(table, acc.matcher, key, clock(), sequenceTimeoutMs);
                if (debug && outcome.type === "matched") {
                    console.log(`Keymap: Stream matched "${outcome.action}".`);
                }
                return { matcher: state, outcome };
            },
            { matcher: IDLE, outcome: null },
        ),
        map(acc => acc.outcome),
        filter(isMatch<A>),
    );
}
