import { type BindingSource, type BindingSources, BindingTable, bindingEntries } from "./table.js";

/**
 * Combines a derived (default) binding set with a file (user) binding set.
 *
 * - action only in `derived`: kept as is
 * - action only in `file`: added after the derived actions
 * - action in both: the file entry replaces keys and description as a whole
 *
 * The result is a `Map`, so derived order survives integer-like action ids.
 * No validation happens here; see {@link mergeBindings}.
 */
export function mergeBindingSources<A extends string, B extends string = A>(
    derived: BindingSources<A>,
    file?: BindingSources<B> | null,
): Map<A | B, BindingSource> {
    const merged = new Map<A | B, BindingSource>(bindingEntries(derived));
    if (file) {
        for (const [action, source] of bindingEntries(file)) {
            merged.set(action, source);
        }
    }
    return merged;
}

/**
 * Builds a table from defaults overridden by a user binding set.
 * The merged result is validated as one table, so a user key that collides
 * with another action's default fails with `DuplicatePatternError`, naming
 * the derived action first.
 *
 * @example
 * ```typescript
 * const table = mergeBindings(
 *     { Quit: { keys: ["q", "esc"] }, Save: { keys: ["ctrl-s"] } },
 *     { Quit: { keys: ["@any"] } },
 * );
 * table.get("Quit")?.keys; // ["@any"]
 * ```
 */
export function mergeBindings<A extends string, B extends string = A>(
    derived: BindingSources<A>,
    file?: BindingSources<B> | null,
): BindingTable<A | B> {
    return BindingTable.fromBindings<A | B>(mergeBindingSources(derived, file));
}
