export {
    type KeymapProviderProps,
    KeymapProvider,
    useKeymapManager,
    useKeymapMode,
} from "./provider.js";

export { useAction } from "./useAction.js";
export { useEventCallback } from "./useEventCallback.js";
