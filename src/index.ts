export * from "./core/index.js";
export { DomKeys, type DomKey } from "./keys.js";
export {
    type KeyboardEventLike,
    type KeyEventType,
    type KeyPress,
    toKeySpec,
    tryToKeySpec,
    fromKeySpec,
    keyEvents$,
    keyPresses$,
} from "./dom.js";
export {
    type KeymapOptions,
    type KeymapEvent,
    DEFAULT_MODE,
    Keymap,
} from "./keymap.js";
