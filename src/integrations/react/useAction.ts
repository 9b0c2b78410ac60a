import { useEffect } from "react";
import type { ActionId } from "../../core/index.js";
import type { KeymapEvent } from "../../keymap.js";
import { useEventCallback } from "./useEventCallback.js";
import { useKeymapManager } from "./provider.js";

/**
 * React hook that runs `callback` whenever the given action is resolved by the
 * surrounding {@link KeymapProvider}'s keymap.
 *
 * @param action - Action identifier as used in the binding tables.
 * @param callback - Receives the match, including any group capture and the DOM event.
 * @param enabled - Pass `false` to pause the subscription.
 *
 * @example
 * function Editor() {
 *     const [count, setCount] = useState(0);
 *
 *     // The callback always sees the latest `count`; no dependency array needed.
 *     useAction("Increment", () => setCount(count + 1));
 *     useAction("GotoMark", match => jumpTo(match.capture));
 *
 *     return <div>Count: {count}</div>;
 * }
 */
export function useAction(
    action: ActionId,
    callback: (match: KeymapEvent) => void,
    enabled: boolean = true,
): void {
    const manager = useKeymapManager();
    const onAction = useEventCallback(callback);

    useEffect(() => {
        if (!manager || !enabled) {
            return;
        }
        const subscription = manager.action$(action).subscribe(onAction);
        return () => subscription.unsubscribe();
    }, [manager, action, enabled, onAction]);
}
