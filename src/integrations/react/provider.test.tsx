import "../../testdom.js";
import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { createRoot, type Root } from "react-dom/client";
import { act } from "react-dom/test-utils";
import { BindingTable } from "../../core/table.js";
import type { Keymap, KeymapEvent } from "../../keymap.js";
import { getTestArea } from "../../testdom.js";
import { type MockFn, createMockFn, dispatchKeyEvent } from "../../testutils.js";
import { KeymapProvider, useAction, useKeymapManager, useKeymapMode } from "./index.js";

const modes = {
    normal: BindingTable.fromBindings({ Quit: { keys: ["q"] }, Edit: { keys: ["i"] } }),
    insert: BindingTable.fromBindings({ Leave: { keys: ["esc"] } }),
};

let manager: Keymap | null = null;

function CaptureManager() {
    manager = useKeymapManager();
    return null;
}

function QuitListener({ onQuit }: { onQuit: (match: KeymapEvent) => void }) {
    useAction("Quit", onQuit);
    return null;
}

function InsertMode() {
    const active = useKeymapMode("insert");
    return <span>{active ?? "none"}</span>;
}

describe("React integration", () => {
    let container: HTMLElement;
    let root: Root;
    let target: HTMLElement;
    let onQuit: MockFn<[KeymapEvent]>;

    function render(editing: boolean, listener: (match: KeymapEvent) => void = onQuit) {
        act(() => {
            root.render(
                <KeymapProvider modes={modes} target={target}>
                    <CaptureManager />
                    <QuitListener onQuit={listener} />
                    {editing ? <InsertMode /> : null}
                </KeymapProvider>,
            );
        });
    }

    beforeEach(() => {
        target = getTestArea();
        container = document.createElement("div");
        document.body.appendChild(container);
        root = createRoot(container);
        onQuit = createMockFn<[KeymapEvent]>();
        manager = null;
    });

    afterEach(() => {
        act(() => root.unmount());
        container.remove();
    });

    it("should provide a keymap manager after mount", () => {
        render(false);
        assert.ok(manager);
        assert.strictEqual(manager.getMode(), "normal");
    });

    it("should call useAction callbacks for matched actions", () => {
        render(false);
        act(() => {
            dispatchKeyEvent(target, "q");
            dispatchKeyEvent(target, "i");
        });
        assert.strictEqual(onQuit.calledCount, 1);
        assert.strictEqual(onQuit.lastArgs?.[0].action, "Quit");
    });

    it("should always call the latest callback", () => {
        render(false);
        const latest = createMockFn<[KeymapEvent]>();
        render(false, latest);
        act(() => {
            dispatchKeyEvent(target, "q");
        });
        assert.strictEqual(onQuit.calledCount, 0);
        assert.strictEqual(latest.calledCount, 1);
    });

    it("should push a mode for the lifetime of the component", () => {
        render(true);
        assert.strictEqual(container.textContent, "insert");
        assert.strictEqual(manager?.getMode(), "insert");

        act(() => {
            dispatchKeyEvent(target, "q");
        });
        assert.strictEqual(onQuit.calledCount, 0);

        render(false);
        assert.strictEqual(manager?.getMode(), "normal");
        act(() => {
            dispatchKeyEvent(target, "q");
        });
        assert.strictEqual(onQuit.calledCount, 1);
    });

    it("should destroy the manager on unmount", () => {
        render(false);
        let completed = false;
        manager?.actions$.subscribe({ complete: () => { completed = true; } });
        act(() => root.unmount());
        assert.strictEqual(completed, true);
        root = createRoot(container);
    });
});
