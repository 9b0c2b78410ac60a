import { useRef, useCallback } from "react";
import { useIsomorphicLayoutEffect } from "./useIsomorphicLayoutEffect.js";

/**
 * Returns a function with a stable identity that always calls the latest
 * `callback`, so subscriptions need not be re-created when the callback
 * closes over new props or state.
 */
export function useEventCallback<Args extends unknown[], R>(callback: (...args: Args) => R): (...args: Args) => R {
    const callbackRef = useRef(callback);

    // No dependency array: refresh on every render.
    useIsomorphicLayoutEffect(() => {
        callbackRef.current = callback;
    });

    return useCallback((...args: Args): R => callbackRef.current(...args), []);
}
