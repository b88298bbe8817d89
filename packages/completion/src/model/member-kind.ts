/**
 * Closed tag sets describing a completion proposal: what kind of symbol it
 * refers to, the syntactic context completion was invoked in, and the
 * arity shape of its parameter lists.
 */

/** The kind of symbol a completion proposal refers to. */
export const MemberKind = {
    Class: 'Class',
    Trait: 'Trait',
    Type: 'Type',
    Object: 'Object',
    Package: 'Package',
    PackageObject: 'PackageObject',
    Def: 'Def',
    Val: 'Val',
    Var: 'Var',
} as const;

export type MemberKind = typeof MemberKind[keyof typeof MemberKind];

/** Syntactic context in which completion was requested. */
export const ContextType = {
    /** Plain identifier position. */
    Default: 'Default',
    /** Function application, e.g. `foo.bar(` */
    ApplyContext: 'ApplyContext',
    /** After `new`. */
    New: 'New',
    /** Inside an import clause. */
    Import: 'Import',
} as const;

export type ContextType = typeof ContextType[keyof typeof ContextType];

/**
 * Context related to the invocation of the completion.
 */
export interface CompletionContext {
    readonly contextType: ContextType;
}

export function createCompletionContext(contextType: ContextType = ContextType.Default): CompletionContext {
    return Object.freeze({ contextType });
}

/** Arity shape of a parameter signature. */
export const HasArgs = {
    /** No parameter list at all, e.g. a field. */
    NoArgs: 'NoArgs',
    /** A single empty parameter list, e.g. `def size()`. */
    EmptyArgs: 'EmptyArgs',
    /** At least one parameter list that is not the lone empty one. */
    NonEmptyArgs: 'NonEmptyArgs',
} as const;

export type HasArgs = typeof HasArgs[keyof typeof HasArgs];

/**
 * Classifies parameter sections so callers can decide whether trailing
 * parentheses should be rendered.
 */
export function hasArgsFrom(sections: readonly (readonly unknown[])[]): HasArgs {
    if (sections.length === 0) {
        return HasArgs.NoArgs;
    }
    if (sections.length === 1 && sections[0].length === 0) {
        return HasArgs.EmptyArgs;
    }
    return HasArgs.NonEmptyArgs;
}
