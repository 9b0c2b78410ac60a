import { describe, it } from "node:test";
import assert from "node:assert";
import { Subject, from, toArray, firstValueFrom } from "rxjs";
import type { KeySpec } from "./keys.js";
import type { KeymapMatch } from "./matcher.js";
import { matchKeys } from "./operators.js";
import { parse, parseKey } from "./parser.js";
import { BindingTable } from "./table.js";

const table = BindingTable.fromBindings({
    Top: { keys: ["g g"] },
    Mark: { keys: ["m @lower"] },
    Quit: { keys: ["q"] },
});

describe("matchKeys operator", () => {
    it("should emit only completed matches", async () => {
        const matches = await firstValueFrom(
            from(parse("g g x m k q")).pipe(matchKeys(table, { clock: () => 0 }), toArray()),
        );
        assert.deepStrictEqual(matches.map(m => [m.action, m.capture]), [
            ["Top", undefined],
            ["Mark", "k"],
            ["Quit", undefined],
        ]);
    });

    it("should apply the sequence timeout with the given clock", () => {
        let now = 0;
        const keys$ = new Subject<KeySpec>();
        const seen: KeymapMatch[] = [];
        const subscription = keys$
            .pipe(matchKeys(table, { sequenceTimeoutMs: 300, clock: () => now }))
            .subscribe(match => seen.push(match));

        keys$.next(parseKey("g"));
        now = 301;
        keys$.next(parseKey("g"));
        assert.strictEqual(seen.length, 0);

        now = 400;
        keys$.next(parseKey("g"));
        assert.deepStrictEqual(seen.map(m => m.action), ["Top"]);
        subscription.unsubscribe();
    });

    it("should keep separate state for each subscription", () => {
        const keys$ = new Subject<KeySpec>();
        const first: string[] = [];
        const second: string[] = [];
        const matched$ = keys$.pipe(matchKeys(table, { clock: () => 0 }));

        const a = matched$.subscribe(m => first.push(m.action));
        keys$.next(parseKey("g"));
        const b = matched$.subscribe(m => second.push(m.action));
        keys$.next(parseKey("g"));

        assert.deepStrictEqual(first, ["Top"]);
        assert.deepStrictEqual(second, []);
        a.unsubscribe();
        b.unsubscribe();
    });
});
