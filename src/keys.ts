import { NamedKey } from "./core/keys.js";

/**
 * `KeyboardEvent.key` values this library understands.
 * These are based on the MDN documentation:
 * https://developer.mozilla.org/en-US/docs/Web/API/UI_Events/Keyboard_event_key_values
 */
export const DomKeys = {
    // Modifier Keys
    Alt: "Alt",
    AltGraph: "AltGraph",
    CapsLock: "CapsLock",
    Control: "Control",
    Fn: "Fn",
    Meta: "Meta", // Command key on Mac, Windows key on Windows
    NumLock: "NumLock",
    ScrollLock: "ScrollLock",
    Shift: "Shift",
    Super: "Super",

    // Whitespace Keys
    Enter: "Enter",
    Tab: "Tab",
    Space: " ", // Standard value for Space Bar

    // Navigation Keys
    ArrowDown: "ArrowDown",
    ArrowLeft: "ArrowLeft",
    ArrowRight: "ArrowRight",
    ArrowUp: "ArrowUp",
    End: "End",
    Home: "Home",
    PageDown: "PageDown",
    PageUp: "PageUp",

    // Editing Keys
    Backspace: "Backspace",
    Delete: "Delete",
    Insert: "Insert",

    // UI Keys
    Escape: "Escape",

    Unidentified: "Unidentified",
    Dead: "Dead",
} as const;

export type DomKey = typeof DomKeys[keyof typeof DomKeys];

/** Keys that only change modifier state; they never start a key press of their own. */
export const MODIFIER_ONLY_KEYS: ReadonlySet<string> = new Set<string>([
    DomKeys.Alt, DomKeys.AltGraph, DomKeys.CapsLock, DomKeys.Control, DomKeys.Fn,
    DomKeys.Meta, DomKeys.NumLock, DomKeys.ScrollLock, DomKeys.Shift, DomKeys.Super,
]);

/** DOM key value -> named key. `BackTab` has no DOM value; it is Tab with Shift. */
export const DOM_TO_NAMED: ReadonlyMap<string, NamedKey> = new Map<string, NamedKey>([
    [DomKeys.Backspace, NamedKey.Backspace],
    [DomKeys.Enter, NamedKey.Enter],
    [DomKeys.Escape, NamedKey.Esc],
    [DomKeys.Tab, NamedKey.Tab],
    [DomKeys.Space, NamedKey.Space],
    [DomKeys.Delete, NamedKey.Delete],
    [DomKeys.Insert, NamedKey.Insert],
    [DomKeys.Home, NamedKey.Home],
    [DomKeys.End, NamedKey.End],
    [DomKeys.PageUp, NamedKey.PageUp],
    [DomKeys.PageDown, NamedKey.PageDown],
    [DomKeys.ArrowUp, NamedKey.Up],
    [DomKeys.ArrowDown, NamedKey.Down],
    [DomKeys.ArrowLeft, NamedKey.Left],
    [DomKeys.ArrowRight, NamedKey.Right],
]);

export const NAMED_TO_DOM: ReadonlyMap<NamedKey, string> = new Map<NamedKey, string>([
    ...[...DOM_TO_NAMED].map(([dom, named]) => [named, dom] as const),
    [NamedKey.BackTab, DomKeys.Tab],
]);
