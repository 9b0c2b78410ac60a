import {
    BehaviorSubject, EMPTY, type Observable, Subject,
    catchError, distinctUntilChanged, filter, map, share, takeUntil, tap, withLatestFrom,
} from "rxjs";
import { UnknownModeError } from "./core/errors.js";
import { formatKeySpec } from "./core/keys.js";
import { type KeymapMatch, DEFAULT_SEQUENCE_TIMEOUT_MS, SequenceMatcher } from "./core/matcher.js";
import { type ActionId, BindingTable } from "./core/table.js";
import { type KeyEventType, type KeyPress, keyPresses$ } from "./dom.js";

// --- Interfaces and Types ---

export interface KeymapOptions {
    /**
     * Mode active when the keymap is created. Must be a key of the modes record.
     * @default the first mode
     */
    initialMode?: string;
    /**
     * Element the keyboard listener is attached to.
     * @default document
     */
    target?: EventTarget;
    /**
     * Use "keydown" for actions that should happen immediately upon pressing a key,
     * "keyup" for actions that should happen upon releasing it.
     * @default "keydown"
     */
    event?: KeyEventType;
    /** @default 1000 */
    sequenceTimeoutMs?: number;
    /**
     * Time source for sequence timeouts, in milliseconds.
     * @default () => performance.now()
     */
    clock?: () => number;
    /** Call `preventDefault()` on the event that completes a match. */
    preventDefault?: boolean;
    debug?: boolean;
}

/** A match together with the DOM event that completed it and the mode it matched in. */
export interface KeymapEvent<A extends string = ActionId> extends KeymapMatch<A> {
    readonly event: KeyboardEvent;
    readonly mode: string;
}

export const DEFAULT_MODE = "default";

/**
 * Resolves browser key presses to actions.
 *
 * Each mode is its own immutable {@link BindingTable}; modes form a stack,
 * the top one is active. Switching modes drops any half-typed sequence.
 *
 * @example
 * ```typescript
 * const keymap = new Keymap({
 *     normal: mergeBindings(defaults.bindings, userBindings),
 *     insert: BindingTable.fromBindings({ Leave: { keys: ["esc"] } }),
 * });
 * keymap.action$("Quit").subscribe(() => app.quit());
 * keymap.enterMode("insert");
 * ```
 */
export class Keymap<A extends string = ActionId> {
    private static readonly LOG_PREFIX = "Keymap:";

    private readonly modes: ReadonlyMap<string, BindingTable<A>>;
    private readonly modeStack$: BehaviorSubject<string[]>;
    private readonly matchers = new Map<string, SequenceMatcher<A>>();
    private readonly destroy$ = new Subject<void>();
    private readonly clock: () => number;
    private debugMode: boolean;

    /**
     * Emits every resolved action. Completes when the keymap is destroyed.
     */
    public readonly actions$: Observable<KeymapEvent<A>>;

    /**
     * @param modes - A single table (mode `"default"`) or a record of mode name -> table.
     * @throws {UnknownModeError} if `initialMode` is not one of the modes.
     * @throws Error if no modes are given.
     */
    constructor(modes: BindingTable<A> | Readonly<Record<string, BindingTable<A>>>, options: KeymapOptions = {}) {
        const {
            target = document,
            event = "keydown",
            sequenceTimeoutMs = DEFAULT_SEQUENCE_TIMEOUT_MS,
            clock = () => performance.now(),
            preventDefault = false,
            debug = false,
        } = options;

        this.modes = new Map<string, BindingTable<A>>(modes instanceof BindingTable ? [[DEFAULT_MODE, modes]] : Object.entries(modes));
        if (this.modes.size === 0) {
            throw new Error(`${Keymap.LOG_PREFIX} At least one mode is required.`);
        }
        const initialMode = options.initialMode ?? [...this.modes.keys()][0];
        if (!this.modes.has(initialMode)) {
            throw new UnknownModeError(initialMode);
        }
        for (const [name, table] of this.modes) {
            this.matchers.set(name, new SequenceMatcher(table, { sequenceTimeoutMs, debug }));
        }

        this.clock = clock;
        this.debugMode = debug;
        this.modeStack$ = new BehaviorSubject<string[]>([initialMode]);

        const mode$ = this.onModeChange$;
        this.actions$ = keyPresses$(target, event).pipe(
            withLatestFrom(mode$),
            map(([press, mode]) => this.feed(press, mode)),
            filter((match): match is KeymapEvent<A> => match !== null),
            tap(match => {
                if (preventDefault) match.event.preventDefault();
            }),
            catchError(err => {
                console.error(`${Keymap.LOG_PREFIX} Error in key stream:`, err);
                return EMPTY;
            }),
            takeUntil(this.destroy$),
            share(),
        );

        if (this.debugMode) {
            console.log(`${Keymap.LOG_PREFIX} Keymap initialized. Modes: [${[...this.modes.keys()].join(", ")}], initial mode: "${initialMode}".`);
        }
    }

    private feed(press: KeyPress, mode: string): KeymapEvent<A> | null {
        const matcher = this.matchers.get(mode);
        if (!matcher) {
            return null;
        }
        const outcome = matcher.feed(press.key, this.clock());
        if (this.debugMode) {
            console.log(`${Keymap.LOG_PREFIX} Key "${formatKeySpec(press.key)}" in mode "${mode}": ${outcome.type}.`);
        }
        return outcome.type === "matched" ? { ...outcome, event: press.event, mode } : null;
    }

    /** Emits when the given action is resolved. */
    public action$(action: A): Observable<KeymapEvent<A>> {
        return this.actions$.pipe(filter(match => match.action === action));
    }

    /**
     * An Observable that emits the active mode whenever it changes,
     * starting with the current one.
     */
    public get onModeChange$(): Observable<string> {
        return this.modeStack$.pipe(
            map(stack => stack[stack.length - 1]),
            distinctUntilChanged(),
        );
    }

    public getMode(): string {
        const stack = this.modeStack$.getValue();
        return stack[stack.length - 1];
    }

    public getTable(mode: string = this.getMode()): BindingTable<A> | undefined {
        return this.modes.get(mode);
    }

    /**
     * Pushes a mode onto the stack and makes it active.
     * @throws {UnknownModeError} if the mode was not registered.
     */
    public enterMode(mode: string): void {
        if (!this.modes.has(mode)) {
            throw new UnknownModeError(mode);
        }
        const stack = [...this.modeStack$.getValue(), mode];
        if (this.debugMode) {
            console.log(`${Keymap.LOG_PREFIX} Entering mode: "${mode}". New stack: [${stack.join(", ")}]`);
        }
        this.resetMatchers();
        this.modeStack$.next(stack);
    }

    /**
     * Pops the active mode.
     * @returns The mode that was left, or `undefined` if only the base mode remains.
     */
    public leaveMode(): string | undefined {
        const current = this.modeStack$.getValue();
        if (current.length <= 1) {
            console.warn(`${Keymap.LOG_PREFIX} Attempted to leave the base mode "${current[0]}". No change made.`);
            return undefined;
        }
        const leaving = current[current.length - 1];
        const stack = current.slice(0, -1);
        if (this.debugMode) {
            console.log(`${Keymap.LOG_PREFIX} Leaving mode: "${leaving}". New stack: [${stack.join(", ")}]`);
        }
        this.resetMatchers();
        this.modeStack$.next(stack);
        return leaving;
    }

    public setDebugMode(enable: boolean): void {
        if (this.debugMode === enable) {
            return;
        }
        this.debugMode = enable;
        for (const matcher of this.matchers.values()) {
            matcher.setDebugMode(enable);
        }
        console.log(`${Keymap.LOG_PREFIX} Debug mode ${enable ? "enabled" : "disabled"}.`);
    }

    private resetMatchers(): void {
        for (const matcher of this.matchers.values()) {
            matcher.reset();
        }
    }

    /**
     * Completes `actions$` and every stream derived from it.
     * The instance should not be used afterwards.
     */
    public destroy(): void {
        if (this.debugMode) console.log(`${Keymap.LOG_PREFIX} Destroying keymap.`);
        this.destroy$.next();
        this.destroy$.complete();
        this.modeStack$.complete();
    }
}
