import { BindingParseError, DuplicatePatternError, EmptyBindingError, ParseError } from "./errors.js";
import { classify } from "./groups.js";
import { type KeySpec, type Sequence, GroupKind, Modifier, formatSequence, isGroupSpec, keySpecId } from "./keys.js";
import { parse } from "./parser.js";

// --- Interfaces and Types ---

/** One entry of a binding source: key texts and an optional description. */
export interface BindingSource {
    readonly keys: readonly string[];
    readonly description?: string;
}

/** Opaque action identifier. */
export type ActionId = string;

/** Action id -> binding source, as read from defaults or a config file. */
export type BindingsMapping<A extends string = ActionId> = Readonly<Record<A, BindingSource>>;

/**
 * Anything a table can be built from: a plain mapping, or ordered
 * `[action, source]` entries such as a `Map`. Entries keep their order even
 * for integer-like action ids, which plain objects would reorder.
 */
export type BindingSources<A extends string = ActionId> =
    | BindingsMapping<A>
    | Iterable<readonly [A, BindingSource]>;

export interface Binding<A extends string = ActionId> {
    readonly action: A;
    /** Key texts as written in the source. */
    readonly keys: readonly string[];
    /** Parsed and normalized alternatives, one per distinct key text. */
    readonly patterns: readonly Sequence[];
    readonly description?: string;
}

/**
 * A resolved action together with what its group patterns captured.
 * `capture` is the first captured character, `captures` all of them in key order.
 */
export interface BoundAction<A extends string = ActionId> {
    readonly action: A;
    readonly capture: string | undefined;
    readonly captures: readonly string[];
}

export type ProbeResult<A extends string = ActionId> =
    | { readonly type: "matched"; readonly bound: BoundAction<A> }
    | { readonly type: "pending" }
    | { readonly type: "none" };

interface TrieNode<A extends string> {
    action: A | undefined;
    readonly exact: Map<string, TrieNode<A>>;
    readonly groups: Array<{ readonly pattern: KeySpec; readonly node: TrieNode<A> }>;
}

interface Hit<A extends string> {
    readonly node: TrieNode<A>;
    readonly captures: readonly string[];
}

function createNode<A extends string>(): TrieNode<A> {
    return { action: undefined, exact: new Map(), groups: [] };
}

function hasChildren<A extends string>(node: TrieNode<A>): boolean {
    return node.exact.size > 0 || node.groups.length > 0;
}

function isEntries<A extends string>(sources: BindingSources<A>): sources is Iterable<readonly [A, BindingSource]> {
    return Symbol.iterator in sources;
}

/** Own entries of a binding source, in its iteration order. */
export function bindingEntries<A extends string>(sources: BindingSources<A>): Array<readonly [A, BindingSource]> {
    if (isEntries(sources)) {
        return [...sources];
    }
    const entries: Array<readonly [A, BindingSource]> = [];
    for (const action in sources) {
        if (Object.hasOwn(sources, action)) entries.push([action, sources[action]]);
    }
    return entries;
}

/**
 * Group search order: specific groups, then `@any` under explicit modifiers
 * (`ctrl-@any`), then bare `@any`.
 */
function groupTier(pattern: KeySpec): number {
    if (pattern.atom.kind !== "group" || pattern.atom.group !== GroupKind.Any) return 0;
    return pattern.modifiers === Modifier.None ? 2 : 1;
}

const GROUP_TIERS = [0, 1, 2] as const;

/**
 * Walks the trie in priority order: literal child first, then group children
 * by tier (see {@link groupTier}) and registration order within a tier.
 * Backtracks when a branch dead-ends.
 * Returns the first node for which `accept` holds once all keys are consumed.
 */
function search<A extends string>(
    node: TrieNode<A>,
    keys: Sequence,
    pos: number,
    captures: readonly string[],
    accept: (node: TrieNode<A>) => boolean,
): Hit<A> | undefined {
    if (pos === keys.length) {
        return accept(node) ? { node, captures } : undefined;
    }
    const input = keys[pos];

    if (isGroupSpec(input)) {
        const id = keySpecId(input);
        const entry = node.groups.find(g => keySpecId(g.pattern) === id);
        return entry ? search(entry.node, keys, pos + 1, captures, accept) : undefined;
    }

    const literal = node.exact.get(keySpecId(input));
    if (literal) {
        const hit = search(literal, keys, pos + 1, captures, accept);
        if (hit) return hit;
    }

    for (const tier of GROUP_TIERS) {
        for (const { pattern, node: child } of node.groups) {
            if (groupTier(pattern) !== tier) continue;
            const classified = classify(pattern, input);
            if (!classified) continue;
            const next = classified.capture === undefined ? captures : [...captures, classified.capture];
            const hit = search(child, keys, pos + 1, next, accept);
            if (hit) return hit;
        }
    }
    return undefined;
}

// --- Binding Table ---

/**
 * Immutable mapping from actions to key patterns, with a reverse index from
 * normalized key sequences to actions.
 *
 * Within one table a literal key always wins over a group (`a` beats `@alpha`),
 * and a normalized sequence belongs to at most one action.
 *
 * @example
 * ```typescript
 * const table = BindingTable.fromBindings({
 *     Quit: { keys: ["q", "ctrl-c"], description: "Quit" },
 *     Jump: { keys: ["@digit"] },
 * });
 * table.lookup(parseKey("q"));      // "Quit", typed as "Quit" | "Jump" | undefined
 * table.lookupBound(parseKey("7")); // { action: "Jump", capture: "7", captures: ["7"] }
 * ```
 */
export class BindingTable<A extends string = ActionId> {
    private readonly entries: ReadonlyMap<string, Binding<A>>;
    private readonly root: TrieNode<A>;

    private constructor(entries: ReadonlyMap<string, Binding<A>>, root: TrieNode<A>) {
        this.entries = entries;
        this.root = root;
    }

    /**
     * Builds a table from a binding source. Actions are registered in the
     * source's iteration order.
     * @throws {BindingParseError} if a key text does not parse.
     * @throws {EmptyBindingError} if an action has no keys.
     * @throws {DuplicatePatternError} if two actions share a normalized sequence.
     */
    public static fromBindings<A extends string>(sources: BindingSources<A>): BindingTable<A> {
        const entries = new Map<string, Binding<A>>();
        const root = createNode<A>();

        for (const [action, source] of bindingEntries(sources)) {
            if (source.keys.length === 0) {
                throw new EmptyBindingError(action);
            }

            const patterns: Sequence[] = [];
            const seen = new Set<string>();
            for (const text of source.keys) {
                let pattern: Sequence;
                try {
                    pattern = parse(text);
                } catch (err) {
                    if (err instanceof ParseError) {
                        throw new BindingParseError(action, text, err);
                    }
                    throw err;
                }
                const canonical = formatSequence(pattern);
                if (seen.has(canonical)) continue;
                seen.add(canonical);
                BindingTable.insert(root, pattern, action);
                patterns.push(pattern);
            }

            entries.set(action, Object.freeze({
                action,
                keys: Object.freeze([...source.keys]),
                patterns: Object.freeze(patterns),
                ...(source.description !== undefined ? { description: source.description } : {}),
            }));
        }
        return new BindingTable(entries, root);
    }

    /**
     * Builds a table from a derived binding set overridden by a file set.
     * An action present in `file` takes the file entry as a whole; actions only
     * in `file` are appended after the derived ones.
     */
    public static merge<A extends string, B extends string = A>(
        derived: BindingSources<A>,
        file?: BindingSources<B> | null,
    ): BindingTable<A | B> {
        const merged = new Map<A | B, BindingSource>(bindingEntries(derived));
        if (file) {
            for (const [action, source] of bindingEntries(file)) merged.set(action, source);
        }
        return BindingTable.fromBindings<A | B>(merged);
    }

    private static insert<A extends string>(root: TrieNode<A>, pattern: Sequence, action: A): void {
        let node = root;
        for (const spec of pattern) {
            const id = keySpecId(spec);
            if (isGroupSpec(spec)) {
                let entry = node.groups.find(g => keySpecId(g.pattern) === id);
                if (!entry) {
                    entry = { pattern: spec, node: createNode<A>() };
                    node.groups.push(entry);
                }
                node = entry.node;
            } else {
                let child = node.exact.get(id);
                if (!child) {
                    child = createNode<A>();
                    node.exact.set(id, child);
                }
                node = child;
            }
        }
        if (node.action !== undefined && node.action !== action) {
            throw new DuplicatePatternError(formatSequence(pattern), node.action, action);
        }
        node.action = action;
    }

    public get size(): number {
        return this.entries.size;
    }

    public has(action: string): action is A {
        return this.entries.has(action);
    }

    public get(action: A): Binding<A> | undefined {
        return this.entries.get(action);
    }

    /** Actions in registration order. */
    public actions(): A[] {
        return this.bindings().map(binding => binding.action);
    }

    public bindings(): Array<Binding<A>> {
        return [...this.entries.values()];
    }

    /** The action bound to a single key press, if any. */
    public lookup(key: KeySpec): A | undefined {
        return this.lookupBoundSequence([key])?.action;
    }

    /** Like {@link lookup}, also returning the character captured by a group pattern. */
    public lookupBound(key: KeySpec): BoundAction<A> | undefined {
        return this.lookupBoundSequence([key]);
    }

    public lookupSequence(keys: Sequence): A | undefined {
        return this.lookupBoundSequence(keys)?.action;
    }

    public lookupBoundSequence(keys: Sequence): BoundAction<A> | undefined {
        if (keys.length === 0) {
            return undefined;
        }
        const hit = search(this.root, keys, 0, [], node => node.action !== undefined);
        return hit ? BindingTable.bound(hit) : undefined;
    }

    /**
     * Resolves key text such as `"g g"` or `"7"`.
     * @throws {ParseError} if the text does not parse.
     */
    public lookupByText(text: string): BoundAction<A> | undefined {
        return this.lookupBoundSequence(parse(text));
    }

    /**
     * Classifies a buffer of key presses for incremental matching.
     * The first trie node reached in priority order that either completes a
     * binding or has continuations decides the result; a completed binding wins
     * over longer sequences that share its prefix.
     */
    public probe(keys: Sequence): ProbeResult<A> {
        if (keys.length === 0) {
            return { type: "none" };
        }
        const hit = search(this.root, keys, 0, [], node => node.action !== undefined || hasChildren(node));
        if (!hit) {
            return { type: "none" };
        }
        return hit.node.action !== undefined
            ? { type: "matched", bound: BindingTable.bound(hit) }
            : { type: "pending" };
    }

    /** The table as ordered binding sources, suitable for merging or serializing. */
    public toMapping(): Map<A, BindingSource> {
        const mapping = new Map<A, BindingSource>();
        for (const binding of this.entries.values()) {
            mapping.set(binding.action, binding.description !== undefined
                ? { keys: binding.keys, description: binding.description }
                : { keys: binding.keys });
        }
        return mapping;
    }

    private static bound<A extends string>(hit: Hit<A>): BoundAction<A> {
        const { node, captures } = hit;
        if (node.action === undefined) {
            throw new Error("Keymap: trie hit without an action.");
        }
        return { action: node.action, capture: captures[0], captures };
    }
}
