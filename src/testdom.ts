import { JSDOM } from "jsdom";

// Imported for its side effect, before anything that reads DOM globals at load time.
export const dom = new JSDOM(`<!DOCTYPE html><html><body><div id="test-area"></div></body></html>`, {
    url: "http://localhost",
});

const { window } = dom;

Object.assign(globalThis, {
    window,
    document: window.document,
    HTMLElement: window.HTMLElement,
    HTMLIFrameElement: window.HTMLIFrameElement,
    KeyboardEvent: window.KeyboardEvent,
    IS_REACT_ACT_ENVIRONMENT: true,
});

if (typeof globalThis.navigator === "undefined") {
    Object.defineProperty(globalThis, "navigator", {
        value: window.navigator,
        configurable: true,
        writable: true,
    });
}

export function getTestArea(): HTMLElement {
    const area = window.document.getElementById("test-area");
    if (!area) {
        throw new Error("test area missing from the test document");
    }
    return area;
}
