import type { TextBuffer } from './text-buffer.js';

/**
 * Characters that may appear after the first character of an identifier:
 * letters, digits, letter numbers, combining marks, connector punctuation
 * (`_`), currency symbols (`$`), and the ignorable format and control
 * characters (zero-width joiners, C0/C1 controls other than whitespace).
 */
const IDENTIFIER_PART =
    /^[\p{L}\p{Nl}\p{Nd}\p{Mn}\p{Mc}\p{Pc}\p{Sc}\p{Cf}\u0000-\u0008\u000E-\u001B\u007F-\u009F]$/u;

export function isIdentifierPart(ch: string): boolean {
    return IDENTIFIER_PART.test(ch);
}

/**
 * Length of the identifier token starting at `offset`, 0 when the character
 * at `offset` is not an identifier part or `offset` is at the end.
 */
export function identLenAtOffset(buffer: TextBuffer, offset: number): number {
    let end = Math.max(offset, 0);
    while (end < buffer.length && isIdentifierPart(buffer.charAt(end))) {
        end++;
    }
    return end - Math.max(offset, 0);
}
