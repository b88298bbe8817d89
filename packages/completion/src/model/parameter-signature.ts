/**
 * One parenthesized group of parameters. Holds either parameter names or
 * type-display strings, depending on where it comes from.
 */
export type ParameterSection = readonly string[];

/**
 * Ordered parameter sections of a (possibly curried) signature, implicit
 * sections excluded.
 */
export type ParameterSignature = readonly ParameterSection[];

export interface ParameterDescriptor {
    readonly name: string;
    readonly type: string;
}

/**
 * True when both signatures have the same number of sections and the same
 * number of entries per section.
 */
export function isCongruent(names: ParameterSignature, types: ParameterSignature): boolean {
    return names.length === types.length
        && names.every((section, i) => section.length === types[i].length);
}

/**
 * Pairs names with types, section by section and entry by entry.
 *
 * Signatures that are not congruent are truncated to the shorter side at
 * both levels; use {@link isCongruent} to detect that case.
 */
export function describeParameters(
    names: ParameterSignature,
    types: ParameterSignature
): ParameterDescriptor[][] {
    const sectionCount = Math.min(names.length, types.length);
    const result: ParameterDescriptor[][] = [];
    for (let s = 0; s < sectionCount; s++) {
        const nameSection = names[s];
        const typeSection = types[s];
        const entryCount = Math.min(nameSection.length, typeSection.length);
        const section: ParameterDescriptor[] = [];
        for (let e = 0; e < entryCount; e++) {
            section.push({ name: nameSection[e], type: typeSection[e] });
        }
        result.push(section);
    }
    return result;
}

/** Renders one section as `(a, b)`. */
export function formatSection(entries: readonly string[]): string {
    return `(${entries.join(', ')})`;
}
