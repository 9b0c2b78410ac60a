export * from "./keys.js";
export * from "./errors.js";
export * from "./parser.js";
export * from "./groups.js";
export * from "./table.js";
export * from "./merge.js";
export * from "./matcher.js";
export * from "./operators.js";
export * from "./declare.js";
export * from "./document.js";
