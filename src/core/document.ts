import { z } from "zod";
import { DeserializeError, InvalidBindingsError } from "./errors.js";
import type { BindingsMapping } from "./table.js";

/** Shape of one entry of a user bindings file. */
export const bindingSourceSchema = z.object({
    keys: z.array(z.string()).min(1),
    description: z.string().optional(),
}).strict();

/**
 * Shape of a user bindings file once deserialized:
 *
 * ```json
 * { "Quit": { "keys": ["q", "ctrl-c"], "description": "Quit" } }
 * ```
 */
export const bindingsDocumentSchema = z.record(z.string(), bindingSourceSchema);

export type BindingsDocument = z.infer<typeof bindingsDocumentSchema>;

/**
 * Validates an already deserialized value as a bindings mapping.
 * Key texts are not parsed here; building a table does that.
 * @throws {InvalidBindingsError} listing every shape problem.
 */
export function parseBindingsDocument(raw: unknown): BindingsMapping {
    const result = bindingsDocumentSchema.safeParse(raw);
    if (!result.success) {
        throw new InvalidBindingsError(result.error.issues.map(issue => ({
            path: issue.path,
            message: issue.message,
        })));
    }
    return result.data;
}

/**
 * Deserializes and validates a bindings file. Any exception thrown by the
 * deserializer is wrapped in a {@link DeserializeError} with the original as `cause`.
 *
 * @param text - File contents.
 * @param deserialize - Format parser (TOML, YAML, ...). Defaults to `JSON.parse`.
 */
export function loadBindings(text: string, deserialize: (text: string) => unknown = JSON.parse): BindingsMapping {
    let raw: unknown;
    try {
        raw = deserialize(text);
    } catch (err) {
        throw new DeserializeError(err);
    }
    return parseBindingsDocument(raw);
}
