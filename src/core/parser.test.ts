import { describe, it } from "node:test";
import assert from "node:assert";
import { ParseError } from "./errors.js";
import { Atom, GroupKind, Modifier, NamedKey } from "./keys.js";
import { parse, parseKey, tryParse } from "./parser.js";

function parseFailure(text: string): ParseError {
    const result = tryParse(text);
    if (result.ok) {
        assert.fail(`expected "${text}" to fail`);
    }
    return result.error;
}

describe("Grammar parser", () => {
    describe("Valid input", () => {
        it("should parse a modifier chord with a function key", () => {
            assert.deepStrictEqual(parse("ctrl-alt-shift-f1"), [
                { modifiers: Modifier.Ctrl | Modifier.Alt | Modifier.Shift, atom: Atom.fn(1) },
            ]);
        });

        it("should parse a two-step sequence", () => {
            assert.deepStrictEqual(parse("ctrl-b n"), [
                { modifiers: Modifier.Ctrl, atom: { kind: "char", char: "b" } },
                { modifiers: Modifier.None, atom: { kind: "char", char: "n" } },
            ]);
        });

        it("should parse the any group", () => {
            assert.deepStrictEqual(parse("@any"), [{ modifiers: Modifier.None, atom: Atom.group(GroupKind.Any) }]);
        });

        it("should treat every uppercase letter as shift plus the lowercase letter", () => {
            for (let code = 65; code <= 90; code++) {
                const upper = String.fromCharCode(code);
                assert.deepStrictEqual(parse(upper), parse(`shift-${upper.toLowerCase()}`), upper);
            }
        });

        it("should be deterministic", () => {
            for (const text of ["ctrl-b n", "@digit", "G g", "alt-esc", "f12"]) {
                assert.deepStrictEqual(parse(text), parse(text));
            }
        });

        it("should accept modifiers and named keys in any case", () => {
            assert.deepStrictEqual(parseKey("CTRL-Alt-ESC"), { modifiers: Modifier.Ctrl | Modifier.Alt, atom: Atom.named(NamedKey.Esc) });
            assert.deepStrictEqual(parseKey("PageUp"), { modifiers: Modifier.None, atom: Atom.named(NamedKey.PageUp) });
        });

        it("should accept del as an alias for delete", () => {
            assert.deepStrictEqual(parseKey("del"), parseKey("delete"));
        });

        it("should read f10 to f12 as two-digit function keys", () => {
            assert.deepStrictEqual(parseKey("f10"), { modifiers: Modifier.None, atom: Atom.fn(10) });
            assert.deepStrictEqual(parseKey("F12"), { modifiers: Modifier.None, atom: Atom.fn(12) });
            assert.deepStrictEqual(parseKey("f0"), { modifiers: Modifier.None, atom: Atom.fn(0) });
        });

        it("should read a lone f or a dash as characters", () => {
            assert.deepStrictEqual(parseKey("f"), { modifiers: Modifier.None, atom: Atom.char("f") });
            assert.deepStrictEqual(parseKey("-"), { modifiers: Modifier.None, atom: Atom.char("-") });
            assert.deepStrictEqual(parseKey("ctrl--"), { modifiers: Modifier.Ctrl, atom: Atom.char("-") });
        });

        it("should keep a single-letter token before a dash out of the modifier list", () => {
            const error = parseFailure("a-b");
            assert.strictEqual(error.position, 1);
            assert.strictEqual(error.message, "expect end of input, found: -");
        });

        it("should ignore surrounding and repeated whitespace", () => {
            assert.strictEqual(parse("  g \t g  ").length, 2);
            assert.deepStrictEqual(parseKey("  q "), { modifiers: Modifier.None, atom: Atom.char("q") });
        });
    });

    describe("Errors", () => {
        it("should report empty input at position 0", () => {
            const error = parseFailure("");
            assert.ok(error instanceof ParseError);
            assert.strictEqual(error.position, 0);
            assert.strictEqual(error.message, "expect key, found end of input");
        });

        it("should report whitespace-only input at its end", () => {
            assert.strictEqual(parseFailure("   ").position, 3);
        });

        it("should report a modifier without a key", () => {
            const error = parseFailure("ctrl-");
            assert.strictEqual(error.position, 5);
            assert.strictEqual(error.message, "expect key, found end of input");
        });

        it("should report trailing characters after a key", () => {
            const error = parseFailure("a2");
            assert.strictEqual(error.position, 1);
            assert.strictEqual(error.message, "expect end of input, found: 2");
        });

        it("should reject function keys above f12", () => {
            const error = parseFailure("f13");
            assert.strictEqual(error.position, 2);
            assert.strictEqual(error.message, "expect end of input, found: 3");
        });

        it("should reject a second key after a dash", () => {
            const error = parseFailure("shift-a-delete");
            assert.strictEqual(error.position, 7);
            assert.strictEqual(error.message, "expect end of input, found: -");
        });

        it("should reject unknown words", () => {
            const error = parseFailure("delta");
            assert.strictEqual(error.position, 0);
            assert.strictEqual(error.message, 'unknown key: "delta"');
        });

        it("should reject unknown groups at the @", () => {
            const error = parseFailure("g @word");
            assert.strictEqual(error.position, 2);
            assert.strictEqual(error.message, 'unknown key group: "@word"');
        });

        it("should treat group names as case-sensitive", () => {
            assert.strictEqual(parseFailure("@Any").message, 'unknown key group: "@Any"');
        });

        it("should reject non-printable characters", () => {
            const error = parseFailure("ctrl-é");
            assert.strictEqual(error.position, 5);
            assert.strictEqual(error.message, "expect printable character, found: é");
        });

        it("should quote a character outside the basic plane whole", () => {
            const trailing = parseFailure("a😀");
            assert.strictEqual(trailing.position, 1);
            assert.strictEqual(trailing.message, "expect end of input, found: 😀");

            const leading = parseFailure("ctrl-😀");
            assert.strictEqual(leading.position, 5);
            assert.strictEqual(leading.message, "expect printable character, found: 😀");
        });

        it("should report positions relative to the whole input", () => {
            const error = parseFailure("ctrl-b nope");
            assert.strictEqual(error.position, 7);
            assert.strictEqual(error.input, "ctrl-b nope");
        });

        it("should reject more than one key in parseKey", () => {
            assert.throws(() => parseKey("g g"), (err: unknown) => {
                assert.ok(err instanceof ParseError);
                assert.strictEqual(err.position, 1);
                assert.strictEqual(err.message, "expect end of input, found:  ");
                return true;
            });
        });
    });
});
