// --- Modifiers ---

/**
 * Modifier flags. A modifier set is the bitwise OR of these values, so
 * `ctrl-alt-x` and `alt-ctrl-x` produce the same number.
 */
export const Modifier = {
    None: 0,
    Alt: 0b001,
    Ctrl: 0b010,
    Shift: 0b100,
} as const;

export type ModifierFlag = typeof Modifier[Exclude<keyof typeof Modifier, "None">];

/** Bit set of {@link Modifier} flags. */
export type ModifierSet = number;

/**
 * Modifier names in canonical output order.
 * Formatting always writes `ctrl-alt-shift-<key>` regardless of input order.
 */
export const MODIFIER_NAMES: ReadonlyArray<readonly [name: string, flag: ModifierFlag]> = [
    ["ctrl", Modifier.Ctrl],
    ["alt", Modifier.Alt],
    ["shift", Modifier.Shift],
];

export function hasModifier(set: ModifierSet, flag: ModifierFlag): boolean {
    return (set & flag) !== 0;
}

// --- Atoms ---

export enum NamedKey {
    Backspace = "backspace",
    Enter = "enter",
    Esc = "esc",
    Tab = "tab",
    BackTab = "backtab",
    Space = "space",
    Delete = "delete",
    Insert = "insert",
    Home = "home",
    End = "end",
    PageUp = "pageup",
    PageDown = "pagedown",
    Up = "up",
    Down = "down",
    Left = "left",
    Right = "right",
}

/**
 * Keywords accepted for named keys (compared lowercased).
 * `del` is an alias; formatting always writes the canonical `delete`.
 */
export const NAMED_KEY_KEYWORDS: ReadonlyMap<string, NamedKey> = new Map<string, NamedKey>([
    ...Object.values(NamedKey).map(k => [k, k] as const),
    ["del", NamedKey.Delete],
]);

export enum GroupKind {
    Upper = "upper",
    Lower = "lower",
    Alpha = "alpha",
    Alnum = "alnum",
    Digit = "digit",
    Any = "any",
}

export const GROUP_KINDS: ReadonlySet<string> = new Set<string>(Object.values(GroupKind));

export function isGroupKind(value: string): value is GroupKind {
    return GROUP_KINDS.has(value);
}

export type KeyAtom =
    | { readonly kind: "char"; readonly char: string }
    | { readonly kind: "named"; readonly key: NamedKey }
    | { readonly kind: "function"; readonly n: number }
    | { readonly kind: "group"; readonly group: GroupKind };

/** One normalized key press: a modifier set plus exactly one atom. */
export interface KeySpec {
    readonly modifiers: ModifierSet;
    readonly atom: KeyAtom;
}

/** Non-empty ordered list of key presses. */
export type Sequence = readonly KeySpec[];

export const Atom = {
    char: (char: string): KeyAtom => ({ kind: "char", char }),
    named: (key: NamedKey): KeyAtom => ({ kind: "named", key }),
    fn: (n: number): KeyAtom => ({ kind: "function", n }),
    group: (group: GroupKind): KeyAtom => ({ kind: "group", group }),
};

// --- Normalization ---

const UPPER_ASCII = /^[A-Z]$/;

/**
 * Rewrites an uppercase ASCII letter to its lowercase letter plus Shift, so
 * `"G"`, `"shift-G"` and `"shift-g"` describe the same key, and `"ctrl-G"`
 * the same key as `"ctrl-shift-g"`. Every other spec is returned as is.
 */
export function normalizeKeySpec(spec: KeySpec): KeySpec {
    if (spec.atom.kind === "char" && UPPER_ASCII.test(spec.atom.char)) {
        return { modifiers: spec.modifiers | Modifier.Shift, atom: Atom.char(spec.atom.char.toLowerCase()) };
    }
    return spec;
}

/**
 * Builds a normalized KeySpec.
 * @example
 * createKeySpec(Atom.char("s"), Modifier.Ctrl) // ctrl-s
 * createKeySpec(Atom.char("G"))                // shift-g
 */
export function createKeySpec(atom: KeyAtom, modifiers: ModifierSet = Modifier.None): KeySpec {
    return normalizeKeySpec({ modifiers, atom });
}

// --- Formatting and equality ---

export function formatAtom(atom: KeyAtom): string {
    switch (atom.kind) {
        case "char":
            return atom.char;
        case "named":
            return atom.key;
        case "function":
            return `f${atom.n}`;
        case "group":
            return `@${atom.group}`;
    }
}

/** Canonical text of a key press, e.g. `ctrl-shift-f1`. Parses back to an equal KeySpec. */
export function formatKeySpec(spec: KeySpec): string {
    let out = "";
    for (const [name, flag] of MODIFIER_NAMES) {
        if (hasModifier(spec.modifiers, flag)) {
            out += `${name}-`;
        }
    }
    return out + formatAtom(spec.atom);
}

/** Canonical text of a sequence, steps separated by a single space. */
export function formatSequence(sequence: Sequence): string {
    return sequence.map(formatKeySpec).join(" ");
}

/**
 * Identity of a KeySpec. Two specs are equal exactly when their ids are equal;
 * used as the map key for literal lookups.
 */
export function keySpecId(spec: KeySpec): string {
    return formatKeySpec(normalizeKeySpec(spec));
}

export function keySpecsEqual(a: KeySpec, b: KeySpec): boolean {
    return keySpecId(a) === keySpecId(b);
}

export function sequencesEqual(a: Sequence, b: Sequence): boolean {
    if (a.length !== b.length) {
        return false;
    }
    for (let i = 0; i < a.length; i++) {
        if (!keySpecsEqual(a[i], b[i])) {
            return false;
        }
    }
    return true;
}

export function isGroupSpec(spec: KeySpec): spec is KeySpec & { readonly atom: { readonly kind: "group"; readonly group: GroupKind } } {
    return spec.atom.kind === "group";
}
