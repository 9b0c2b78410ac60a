import { type Observable, filter, fromEvent, map, share } from "rxjs";
import { UnsupportedKeyError } from "./core/errors.js";
import { type KeySpec, type ModifierSet, Atom, Modifier, NamedKey, createKeySpec, hasModifier } from "./core/keys.js";
import { DOM_TO_NAMED, DomKeys, MODIFIER_ONLY_KEYS, NAMED_TO_DOM } from "./keys.js";

/** The parts of a `KeyboardEvent` the conversion reads. */
export type KeyboardEventLike = Pick<KeyboardEvent, "key" | "ctrlKey" | "altKey" | "shiftKey" | "metaKey">;

export type KeyEventType = "keydown" | "keyup";

/** A DOM key event paired with its KeySpec. */
export interface KeyPress {
    readonly event: KeyboardEvent;
    readonly key: KeySpec;
}

const FUNCTION_KEY = /^F([0-9]{1,2})$/;
const UPPER_ASCII = /^[A-Z]$/;
const LOWER_ASCII = /^[a-z]$/;

function modifiersOf(event: KeyboardEventLike): ModifierSet {
    let modifiers: ModifierSet = Modifier.None;
    if (event.ctrlKey) modifiers |= Modifier.Ctrl;
    if (event.altKey) modifiers |= Modifier.Alt;
    if (event.shiftKey) modifiers |= Modifier.Shift;
    return modifiers;
}

/**
 * Converts a DOM keyboard event to a normalized KeySpec.
 *
 * - `Shift+Tab` becomes `backtab`.
 * - An uppercase letter becomes `shift-<letter>`, whatever the Shift state
 *   (Caps Lock included).
 * - For other characters Shift is dropped, since it is already reflected in
 *   the character (`Shift+/` arrives as `?` and matches the binding `"?"`).
 *
 * @throws {UnsupportedKeyError} for modifier-only keys, Meta combinations
 * and key names with no KeySpec equivalent.
 */
export function toKeySpec(event: KeyboardEventLike): KeySpec {
    const { key } = event;
    if (event.metaKey) {
        throw new UnsupportedKeyError(key, `Meta key combinations are not supported: "${key}".`);
    }
    if (MODIFIER_ONLY_KEYS.has(key) || key === DomKeys.Unidentified || key === DomKeys.Dead) {
        throw new UnsupportedKeyError(key, `Key "${key}" does not produce a key press.`);
    }

    const modifiers = modifiersOf(event);
    if (key === DomKeys.Tab && hasModifier(modifiers, Modifier.Shift)) {
        return createKeySpec(Atom.named(NamedKey.BackTab), modifiers & ~Modifier.Shift);
    }

    const named = DOM_TO_NAMED.get(key);
    if (named !== undefined) {
        return createKeySpec(Atom.named(named), modifiers);
    }

    const fn = FUNCTION_KEY.exec(key);
    if (fn) {
        return createKeySpec(Atom.fn(Number(fn[1])), modifiers);
    }

    if ([...key].length === 1) {
        if (UPPER_ASCII.test(key)) {
            return createKeySpec(Atom.char(key.toLowerCase()), modifiers | Modifier.Shift);
        }
        if (LOWER_ASCII.test(key)) {
            return createKeySpec(Atom.char(key), modifiers);
        }
        return createKeySpec(Atom.char(key), modifiers & ~Modifier.Shift);
    }

    throw new UnsupportedKeyError(key, `Unsupported KeyboardEvent key: "${key}".`);
}

/** Like {@link toKeySpec}, returning `null` for keys it cannot represent. */
export function tryToKeySpec(event: KeyboardEventLike): KeySpec | null {
    try {
        return toKeySpec(event);
    } catch (err) {
        if (err instanceof UnsupportedKeyError) {
            return null;
        }
        throw err;
    }
}

/**
 * Converts a KeySpec back into `KeyboardEvent` init options, e.g. for
 * synthesizing events. Groups cannot be converted.
 * @throws {UnsupportedKeyError} for group atoms.
 */
export function fromKeySpec(spec: KeySpec): KeyboardEventInit {
    const { atom } = spec;
    let key: string;
    let shiftKey = hasModifier(spec.modifiers, Modifier.Shift);

    switch (atom.kind) {
        case "group":
            throw new UnsupportedKeyError(`@${atom.group}`, `Group "@${atom.group}" has no KeyboardEvent equivalent.`);
        case "char":
            key = shiftKey && LOWER_ASCII.test(atom.char) ? atom.char.toUpperCase() : atom.char;
            break;
        case "function":
            key = `F${atom.n}`;
            break;
        case "named":
            key = NAMED_TO_DOM.get(atom.key) ?? DomKeys.Unidentified;
            if (atom.key === NamedKey.BackTab) {
                shiftKey = true;
            }
            break;
    }

    return {
        key,
        ctrlKey: hasModifier(spec.modifiers, Modifier.Ctrl),
        altKey: hasModifier(spec.modifiers, Modifier.Alt),
        shiftKey,
        metaKey: false,
    };
}

// --- Event streams ---

const streamCaches: Record<KeyEventType, WeakMap<EventTarget, Observable<KeyboardEvent>>> = {
    keydown: new WeakMap(),
    keyup: new WeakMap(),
};

/**
 * Shared stream of keyboard events for a target. Every caller for the same
 * target and event type gets the same listener.
 */
export function keyEvents$(target: EventTarget, eventType: KeyEventType = "keydown"): Observable<KeyboardEvent> {
    const cache = streamCaches[eventType];
    let stream = cache.get(target);
    if (!stream) {
        stream = fromEvent<KeyboardEvent>(target, eventType).pipe(share());
        cache.set(target, stream);
    }
    return stream;
}

/** Key presses on a target, with keys that have no KeySpec dropped. */
export function keyPresses$(target: EventTarget, eventType: KeyEventType = "keydown"): Observable<KeyPress> {
    return keyEvents$(target, eventType).pipe(
        map(event => ({ event, key: tryToKeySpec(event) })),
        filter((press): press is { event: KeyboardEvent; key: KeySpec } => press.key !== null),
    );
}
