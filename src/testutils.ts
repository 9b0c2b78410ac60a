export interface MockFn<Args extends unknown[]> {
    (...args: Args): void;
    calledCount: number;
    calls: Args[];
    lastArgs: Args | undefined;
    mockClear(): void;
}

export function createMockFn<Args extends unknown[] = unknown[]>(): MockFn<Args> {
    const fn: MockFn<Args> = Object.assign(
        (...args: Args) => {
            fn.calledCount++;
            fn.calls.push(args);
            fn.lastArgs = args;
        },
        {
            calledCount: 0,
            calls: [],
            lastArgs: undefined,
            mockClear: () => {
                fn.calledCount = 0;
                fn.calls = [];
                fn.lastArgs = undefined;
            },
        },
    );
    return fn;
}

/**
 * Dispatches a KeyboardEvent to a specified target element (or document).
 * @param target - The EventTarget to dispatch the event on (e.g., document or an HTMLElement).
 * @param key - The key value, e.g., "a", "Escape", "ArrowUp".
 * @param eventType - The type of event to dispatch, 'keydown' or 'keyup'.
 * @param modifiers - Optional modifier keys for the event.
 * @returns The dispatched KeyboardEvent.
 */
export function dispatchKeyEvent(
    target: EventTarget,
    key: string,
    eventType: "keydown" | "keyup" = "keydown",
    modifiers: Partial<KeyboardEventInit> = {},
): KeyboardEvent {
    const event = new KeyboardEvent(eventType, {
        key,
        bubbles: true,
        cancelable: true,
        ...modifiers,
    });
    target.dispatchEvent(event);
    return event;
}

/** Dispatches each key of a list in order, as separate keydown events. */
export function typeKeys(target: EventTarget, keys: readonly string[]): void {
    for (const key of keys) {
        dispatchKeyEvent(target, key);
    }
}
