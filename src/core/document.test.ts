import { describe, it } from "node:test";
import assert from "node:assert";
import { loadBindings, parseBindingsDocument } from "./document.js";
import { DeserializeError, InvalidBindingsError } from "./errors.js";

describe("Bindings document", () => {
    it("should load a JSON bindings file", () => {
        const mapping = loadBindings('{ "Quit": { "keys": ["q", "ctrl-c"], "description": "Quit" } }');
        assert.deepStrictEqual(mapping, { Quit: { keys: ["q", "ctrl-c"], description: "Quit" } });
    });

    it("should accept any deserializer", () => {
        const deserialize = (text: string) => Object.fromEntries(
            text.split("\n").map(line => {
                const [action, keys] = line.split("=");
                return [action.trim(), { keys: keys.split(",").map(k => k.trim()) }];
            }),
        );
        assert.deepStrictEqual(loadBindings("Quit = q, esc\nTop = g g", deserialize), {
            Quit: { keys: ["q", "esc"] },
            Top: { keys: ["g g"] },
        });
    });

    it("should wrap deserializer failures", () => {
        const failure = new Error("bad input");
        assert.throws(
            () => loadBindings("whatever", () => { throw failure; }),
            (err: unknown) => {
                assert.ok(err instanceof DeserializeError);
                assert.strictEqual(err.cause, failure);
                assert.strictEqual(err.message, "Failed to deserialize bindings: bad input");
                return true;
            },
        );
    });

    it("should report JSON syntax errors as DeserializeError", () => {
        assert.throws(() => loadBindings("{ not json"), DeserializeError);
    });

    it("should list shape problems with their paths", () => {
        assert.throws(
            () => parseBindingsDocument({ Quit: { keys: [] }, Save: { keys: ["ctrl-s"], extra: true } }),
            (err: unknown) => {
                assert.ok(err instanceof InvalidBindingsError);
                assert.deepStrictEqual(err.issues.map(issue => issue.path), [["Quit", "keys"], ["Save"]]);
                return true;
            },
        );
    });

    it("should reject a document that is not an object", () => {
        assert.throws(
            () => parseBindingsDocument(["q"]),
            (err: unknown) => {
                assert.ok(err instanceof InvalidBindingsError);
                assert.strictEqual(err.issues.length, 1);
                assert.deepStrictEqual(err.issues[0].path, []);
                assert.ok(err.message.startsWith("Invalid bindings document: <root>: "));
                return true;
            },
        );
    });

    it("should leave key texts unparsed", () => {
        assert.deepStrictEqual(parseBindingsDocument({ Quit: { keys: ["ctrl-"] } }), { Quit: { keys: ["ctrl-"] } });
    });
});
