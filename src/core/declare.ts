import { KeymapDeclarationError, ParseError } from "./errors.js";
import { parse } from "./parser.js";
import { type BindingSource, type BindingsMapping, BindingTable } from "./table.js";

/**
 * Statically declared default bindings. Every key text has already been
 * parsed and the set forms a valid table on its own.
 */
export interface DerivedBindings<A extends string> {
    readonly actions: readonly A[];
    /** A frozen copy of the declarations; later changes to the input do not show here. */
    readonly bindings: BindingsMapping<A>;
    /** The declarations as a table, for apps that load no user overrides. */
    readonly table: BindingTable<A>;
}

function freezeSource(source: BindingSource): BindingSource {
    return Object.freeze({ ...source, keys: Object.freeze([...source.keys]) });
}

/**
 * Declares an application's default bindings, validating every key text
 * up front. Meant to run at module load (or in a build step) so a typo in a
 * default binding fails immediately with the parser's diagnostic.
 *
 * @example
 * ```typescript
 * export const defaults = declareKeymap({
 *     Quit: { keys: ["q", "esc"], description: "Quit" },
 *     Top: { keys: ["g g"], description: "Go to top" },
 * });
 * const table = mergeBindings(defaults.bindings, userBindings);
 * ```
 * @throws {KeymapDeclarationError} with the parser's position and message.
 */
export function declareKeymap<A extends string>(declarations: BindingsMapping<A>): DerivedBindings<A> {
    const actions: A[] = [];
    for (const action in declarations) {
        if (!Object.hasOwn(declarations, action)) continue;
        for (const pattern of declarations[action].keys) {
            try {
                parse(pattern);
            } catch (err) {
                if (err instanceof ParseError) {
                    throw new KeymapDeclarationError(action, pattern, err);
                }
                throw err;
            }
        }
        actions.push(action);
    }

    const bindings: Record<A, BindingSource> = { ...declarations };
    for (const action of actions) {
        bindings[action] = freezeSource(declarations[action]);
    }
    Object.freeze(bindings);
    return Object.freeze({
        actions: Object.freeze(actions),
        bindings,
        table: BindingTable.fromBindings<A>(bindings),
    });
}
