import type { TextBuffer } from '../text/text-buffer.js';
import { isIdentifierPart } from '../text/word-finder.js';

/** Characters after which an expression is probably terminated or continued. */
const TERMINATES_EXPRESSION = /^[a-zA-Z_;)},.\n]$/;

/**
 * Heuristic that only matters when completion overwrite is enabled: does the
 * expression at `offset` *probably* already have its parameter list?
 *
 * Without it, in a case like
 * ```
 * List(1).map█
 * ```
 * there is no way to tell whether the parameter list should be added.
 *
 * Starting at `offset`, the rest of the identifier is skipped, then spaces and
 * tabs. If the next character looks like the end or continuation of an
 * expression (a letter, `_`, `;`, `)`, `}`, `,`, `.` or a newline) the answer
 * is `false`; for anything else (typically `(`) it is `true`. Running off the
 * end of the buffer answers `false`.
 *
 * This is not a parser; it is only right in the common cases.
 */
export function doParamsProbablyExist(buffer: TextBuffer, offset: number): boolean {
    let pos = Math.max(offset, 0);
    while (pos < buffer.length && isIdentifierPart(buffer.charAt(pos))) {
        pos++;
    }
    while (pos < buffer.length && isBlank(buffer.charAt(pos))) {
        pos++;
    }
    if (pos >= buffer.length) {
        return false;
    }
    return !TERMINATES_EXPRESSION.test(buffer.charAt(pos));
}

function isBlank(ch: string): boolean {
    return ch === ' ' || ch === '\t';
}
