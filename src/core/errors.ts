/**
 * Base class of every error thrown by this library.
 */
export class KeymapError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Malformed key text. `position` is the zero-based offset of the first
 * unexpected character in the original input.
 */
export class ParseError extends KeymapError {
    constructor(
        public readonly position: number,
        message: string,
        public readonly input: string,
    ) {
        super(message);
    }
}

/** Two different actions claim the same normalized sequence. */
export class DuplicatePatternError extends KeymapError {
    constructor(
        public readonly pattern: string,
        public readonly actionA: string,
        public readonly actionB: string,
    ) {
        super(`Pattern "${pattern}" is bound to both "${actionA}" and "${actionB}".`);
    }
}

export class EmptyBindingError extends KeymapError {
    constructor(public readonly action: string) {
        super(`Action "${action}" has no key patterns.`);
    }
}

/** A pattern of a binding source failed to parse while building a table. */
export class BindingParseError extends KeymapError {
    declare readonly cause: ParseError;

    constructor(
        public readonly action: string,
        public readonly pattern: string,
        cause: ParseError,
    ) {
        super(`Invalid key "${pattern}" for action "${action}" at position ${cause.position}: ${cause.message}`, { cause });
    }
}

/** Raised by static keymap declarations; carries the parser diagnostic verbatim. */
export class KeymapDeclarationError extends KeymapError {
    public readonly position: number;
    public readonly reason: string;

    constructor(
        public readonly action: string,
        public readonly pattern: string,
        cause: ParseError,
    ) {
        super(`invalid key "${pattern}" for action "${action}" at position ${cause.position}: ${cause.message}`, { cause });
        this.position = cause.position;
        this.reason = cause.message;
    }
}

/**
 * The format deserializer (JSON, TOML, ...) failed. The original error is kept
 * untouched as `cause`.
 */
export class DeserializeError extends KeymapError {
    constructor(cause: unknown) {
        super(`Failed to deserialize bindings: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    }
}

export interface BindingsIssue {
    readonly path: ReadonlyArray<string | number>;
    readonly message: string;
}

/** The deserialized bindings document does not have the expected shape. */
export class InvalidBindingsError extends KeymapError {
    constructor(public readonly issues: readonly BindingsIssue[]) {
        super(`Invalid bindings document: ${issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ")}`);
    }
}

/** A backend key cannot be represented as a KeySpec, or the reverse. */
export class UnsupportedKeyError extends KeymapError {
    constructor(public readonly key: string, detail: string) {
        super(detail);
    }
}

export class UnknownModeError extends KeymapError {
    constructor(public readonly mode: string) {
        super(`Unknown keymap mode "${mode}".`);
    }
}
