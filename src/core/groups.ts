import { type KeySpec, type ModifierSet, GroupKind, Modifier, hasModifier } from "./keys.js";

/**
 * The key as the user typed it: a shifted lowercase letter is viewed as the
 * uppercase letter without Shift, so `shift-g` classifies as `G`.
 */
export interface ConcreteKey {
    readonly char: string | undefined;
    readonly modifiers: ModifierSet;
}

const LOWER = /^[a-z]$/;
const UPPER = /^[A-Z]$/;
const DIGIT = /^[0-9]$/;

export function toConcreteKey(spec: KeySpec): ConcreteKey {
    if (spec.atom.kind !== "char") {
        return { char: undefined, modifiers: spec.modifiers };
    }
    const { char } = spec.atom;
    if (LOWER.test(char) && hasModifier(spec.modifiers, Modifier.Shift)) {
        return { char: char.toUpperCase(), modifiers: spec.modifiers & ~Modifier.Shift };
    }
    return { char, modifiers: spec.modifiers };
}

function charMatches(group: GroupKind, char: string): boolean {
    switch (group) {
        case GroupKind.Upper:
            return UPPER.test(char);
        case GroupKind.Lower:
            return LOWER.test(char);
        case GroupKind.Alpha:
            return UPPER.test(char) || LOWER.test(char);
        case GroupKind.Digit:
            return DIGIT.test(char);
        case GroupKind.Alnum:
            return UPPER.test(char) || LOWER.test(char) || DIGIT.test(char);
        case GroupKind.Any:
            return true;
    }
}

/**
 * Whether a concrete key belongs to a group, ignoring modifiers.
 * Named and function keys only belong to `@any`.
 */
export function matchesGroup(group: GroupKind, key: KeySpec): boolean {
    if (group === GroupKind.Any) {
        return true;
    }
    const { char } = toConcreteKey(key);
    return char !== undefined && charMatches(group, char);
}

/** The character that satisfied the group, when the key is a character. */
export function captureGroup(group: GroupKind, key: KeySpec): string | undefined {
    return matchesGroup(group, key) ? toConcreteKey(key).char : undefined;
}

/**
 * Matches a group pattern (e.g. `ctrl-@alpha`) against a concrete key.
 * The pattern's modifiers must equal the key's; a bare `@any` accepts any modifiers.
 * When the key is an uppercase letter its Shift is already spent on the case,
 * so `shift-@upper` and `@upper` both match `B`.
 * @returns the classification, or `null` when the pattern does not apply.
 */
export function classify(pattern: KeySpec, key: KeySpec): { capture: string | undefined } | null {
    if (pattern.atom.kind !== "group") {
        return null;
    }
    const { group } = pattern.atom;
    const concrete = toConcreteKey(key);
    const expected = concrete.char !== undefined && UPPER.test(concrete.char)
        ? pattern.modifiers & ~Modifier.Shift
        : pattern.modifiers;
    const modifiersOk = (group === GroupKind.Any && pattern.modifiers === Modifier.None)
        || expected === concrete.modifiers;
    if (!modifiersOk || !matchesGroup(group, key)) {
        return null;
    }
    return { capture: concrete.char };
}
