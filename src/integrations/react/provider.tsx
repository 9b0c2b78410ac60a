import { type ReactNode, createContext, useState, useContext, useEffect } from "react";
import type { BindingTable } from "../../core/index.js";
import type { KeyEventType } from "../../dom.js";
import { Keymap } from "../../keymap.js";

// Context for the Keymap manager instance
const KeymapManagerContext = createContext<Keymap | null>(null);

export interface KeymapProviderProps {
    children: ReactNode;
    /**
     * One table, or a record of mode name -> table. Keep the value stable
     * (module constant or `useMemo`); a new value re-creates the manager.
     */
    modes: BindingTable | Readonly<Record<string, BindingTable>>;
    initialMode?: string;
    target?: EventTarget;
    event?: KeyEventType;
    sequenceTimeoutMs?: number;
    preventDefault?: boolean;
    debugMode?: boolean;
}

/**
 * Provides a Keymap manager to its children. The manager is created after
 * mount, so it is `null` during server-side rendering and the first render,
 * and is destroyed on unmount.
 */
export function KeymapProvider({
    children,
    modes,
    initialMode,
    target,
    event,
    sequenceTimeoutMs,
    preventDefault,
    debugMode = false,
}: KeymapProviderProps) {
    const [manager, setManager] = useState<Keymap | null>(null);

    useEffect(() => {
        const instance = new Keymap(modes, {
            initialMode,
            target,
            event,
            sequenceTimeoutMs,
            preventDefault,
            debug: debugMode,
        });
        setManager(instance);

        if (debugMode) {
            console.log("[KeymapProvider] Keymap manager created. Initial mode:", instance.getMode());
        }

        return () => {
            if (debugMode) {
                console.log("[KeymapProvider] Destroying keymap manager.");
            }
            instance.destroy();
        };
    }, [modes, initialMode, target, event, sequenceTimeoutMs, preventDefault, debugMode]);

    return (
        <KeymapManagerContext.Provider value={manager}>
            {children}
        </KeymapManagerContext.Provider>
    );
}

/**
 * Hook to get the Keymap manager instance.
 * Returns `null` during server-side rendering and initial client render.
 */
export function useKeymapManager(): Keymap | null {
    return useContext(KeymapManagerContext);
}

/**
 * Makes `mode` the active keymap mode while the calling component is mounted.
 * The mode is pushed on mount and popped on unmount.
 *
 * @returns The currently active mode, or `undefined` before the manager exists.
 */
export function useKeymapMode(mode: string, enabled: boolean = true): string | undefined {
    const manager = useKeymapManager();

    useEffect(() => {
        if (!manager || !enabled) {
            return;
        }
        manager.enterMode(mode);
        return () => {
            manager.leaveMode();
        };
    }, [manager, mode, enabled]);

    const [activeMode, setActiveMode] = useState<string | undefined>(() => manager?.getMode());
    useEffect(() => {
        if (!manager) return;
        const sub = manager.onModeChange$.subscribe(setActiveMode);
        return () => sub.unsubscribe();
    }, [manager]);

    return activeMode;
}
