import { ParseError } from "./errors.js";
import {
    type KeyAtom, type KeySpec, type ModifierSet, type Sequence,
    Atom, Modifier, NAMED_KEY_KEYWORDS, createKeySpec, isGroupKind,
} from "./keys.js";

/*
 * Grammar:
 *     sequence  = keyspec (whitespace keyspec)*
 *     keyspec   = (modifier "-")* atom
 *     modifier  = "ctrl" | "alt" | "shift"
 *     atom      = group | fn-key | named-key | char
 *     group     = "@" ("upper" | "lower" | "alpha" | "alnum" | "digit" | "any")
 *     fn-key    = "f" ("1" ("0" | "1" | "2") | digit)
 *     named-key = alpha alpha+
 *     char      = printable ascii
 */

const KEY_SEP = "-";
const GROUP_PREFIX = "@";

const MODIFIERS: ReadonlyMap<string, ModifierSet> = new Map([
    ["ctrl", Modifier.Ctrl],
    ["alt", Modifier.Alt],
    ["shift", Modifier.Shift],
]);

const END_OF_INPUT = "expect key, found end of input";

export type ParseResult<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: ParseError };

function isAlpha(ch: string | undefined): boolean {
    return ch !== undefined && ((ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z"));
}

function isDigit(ch: string | undefined): boolean {
    return ch !== undefined && ch >= "0" && ch <= "9";
}

function isPrintableAscii(ch: string): boolean {
    const code = ch.charCodeAt(0);
    return code > 0x20 && code < 0x7f;
}

function isWhitespace(ch: string): boolean {
    return /\s/.test(ch);
}

/** The whole character at `position`, including both halves of a surrogate pair. */
function charAt(text: string, position: number): string {
    const code = text.codePointAt(position);
    return code === undefined ? "" : String.fromCodePoint(code);
}

/**
 * Cursor over a single whitespace-free token. Positions reported in errors are
 * offsets into the whole input, not the token.
 */
class TokenReader {
    private pos: number;

    constructor(
        private readonly input: string,
        start: number,
        private readonly end: number,
    ) {
        this.pos = start;
    }

    private fail(position: number, message: string): never {
        throw new ParseError(position, message, this.input);
    }

    private peek(offset = 0): string | undefined {
        const at = this.pos + offset;
        return at < this.end ? this.input[at] : undefined;
    }

    /** Length of the run of ASCII letters starting at the cursor. */
    private alphaRun(from: number = this.pos): number {
        let n = 0;
        while (from + n < this.end && isAlpha(this.input[from + n])) {
            n++;
        }
        return n;
    }

    keySpec(): KeySpec {
        let modifiers: ModifierSet = Modifier.None;
        for (;;) {
            const run = this.alphaRun();
            if (run < 2 || this.peek(run) !== KEY_SEP) {
                break;
            }
            const flag = MODIFIERS.get(this.input.slice(this.pos, this.pos + run).toLowerCase());
            if (flag === undefined) {
                break;
            }
            modifiers |= flag;
            this.pos += run + KEY_SEP.length;
        }

        const atom = this.atom();
        if (this.peek() !== undefined) {
            this.fail(this.pos, `expect end of input, found: ${charAt(this.input, this.pos)}`);
        }
        return createKeySpec(atom, modifiers);
    }

    private atom(): KeyAtom {
        const start = this.pos;
        const ch = this.peek();
        if (ch === undefined) {
            return this.fail(start, END_OF_INPUT);
        }

        if (ch === GROUP_PREFIX && isAlpha(this.peek(1))) {
            const run = this.alphaRun(start + 1);
            const name = this.input.slice(start + 1, start + 1 + run);
            if (!isGroupKind(name)) {
                return this.fail(start, `unknown key group: "${GROUP_PREFIX}${name}"`);
            }
            this.pos += 1 + run;
            return Atom.group(name);
        }

        if ((ch === "f" || ch === "F") && isDigit(this.peek(1))) {
            if (this.peek(1) === "1" && ["0", "1", "2"].includes(this.peek(2) ?? "")) {
                const n = 10 + Number(this.peek(2));
                this.pos += 3;
                return Atom.fn(n);
            }
            const n = Number(this.peek(1));
            this.pos += 2;
            return Atom.fn(n);
        }

        const run = this.alphaRun();
        if (run >= 2) {
            const word = this.input.slice(start, start + run);
            const named = NAMED_KEY_KEYWORDS.get(word.toLowerCase());
            if (named === undefined) {
                return this.fail(start, `unknown key: "${word}"`);
            }
            this.pos += run;
            return Atom.named(named);
        }

        if (!isPrintableAscii(ch)) {
            return this.fail(start, `expect printable character, found: ${charAt(this.input, start)}`);
        }
        this.pos += 1;
        return Atom.char(ch);
    }
}

/**
 * Parses a single key press such as `"ctrl-alt-f1"`, `"G"` or `"@digit"`.
 * @throws {ParseError} if the text is not exactly one key.
 */
export function parseKey(text: string): KeySpec {
    let start = 0;
    let end = text.length;
    while (start < end && isWhitespace(text[start])) start++;
    while (end > start && isWhitespace(text[end - 1])) end--;

    for (let i = start; i < end; i++) {
        if (isWhitespace(text[i])) {
            throw new ParseError(i, `expect end of input, found: ${text[i]}`, text);
        }
    }
    if (start === end) {
        throw new ParseError(start, END_OF_INPUT, text);
    }
    return new TokenReader(text, start, end).keySpec();
}

/**
 * Parses a whitespace-separated key sequence.
 *
 * @example
 * ```typescript
 * parse("ctrl-b n");
 * // [{ modifiers: Modifier.Ctrl, atom: { kind: "char", char: "b" } },
 * //  { modifiers: Modifier.None, atom: { kind: "char", char: "n" } }]
 * ```
 * @throws {ParseError} carrying the offset of the first unexpected character.
 */
export function parse(text: string): Sequence {
    const sequence: KeySpec[] = [];
    let pos = 0;
    while (pos < text.length) {
        if (isWhitespace(text[pos])) {
            pos++;
            continue;
        }
        let end = pos;
        while (end < text.length && !isWhitespace(text[end])) {
            end++;
        }
        sequence.push(new TokenReader(text, pos, end).keySpec());
        pos = end;
    }
    if (sequence.length === 0) {
        throw new ParseError(text.length, END_OF_INPUT, text);
    }
    return sequence;
}

/** Like {@link parse}, but reports failure as a value. */
export function tryParse(text: string): ParseResult<Sequence> {
    try {
        return { ok: true, value: parse(text) };
    } catch (error) {
        if (error instanceof ParseError) {
            return { ok: false, error };
        }
        throw error;
    }
}
