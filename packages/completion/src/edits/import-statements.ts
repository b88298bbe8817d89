import { Position, TextEdit } from 'vscode-languageserver-types';
import type { AnalysisBinding } from '../compilation/compilation-unit.js';

/**
 * Computes the edits that add an import for a fully qualified name.
 */
export interface ImportStatementProvider {
    addImport(binding: AnalysisBinding, fullyQualifiedName: string): TextEdit[];
}

export class InvalidImportNameError extends Error {
    readonly fullyQualifiedName: string;

    constructor(fullyQualifiedName: string) {
        super(`'${fullyQualifiedName}' is not a valid fully qualified name`);
        this.name = 'InvalidImportNameError';
        this.fullyQualifiedName = fullyQualifiedName;
    }
}

const QUALIFIED_NAME = /^[\p{L}_$][\p{L}\p{Nd}_$]*(?:\.[\p{L}_$][\p{L}\p{Nd}_$]*)*$/u;
const IMPORT_LINE = /^import\s+(.+?)\s*;?\s*$/;
const SELECTOR_IMPORT = /^([\w.$]+)\.\{([^}]*)\}$/;

/**
 * Import provider working on the source text of the binding.
 *
 * - Nothing is added when the name is already imported, either directly,
 *   through a wildcard (`pkg._` or `pkg.*`) or a selector (`pkg.{A, B}`).
 * - A new import goes after the last top-level import, otherwise after the
 *   package clause (separated by a blank line), otherwise at the top.
 */
export class TextualImportProvider implements ImportStatementProvider {

    addImport(binding: AnalysisBinding, fullyQualifiedName: string): TextEdit[] {
        if (!QUALIFIED_NAME.test(fullyQualifiedName)) {
            throw new InvalidImportNameError(fullyQualifiedName);
        }
        const lines = binding.document.getText().split('\n').map(line => line.replace(/\r$/, ''));
        if (lines.some(line => importsName(line, fullyQualifiedName))) {
            return [];
        }
        const statement = `import ${fullyQualifiedName}`;

        const lastImport = findLastIndex(lines, line => IMPORT_LINE.test(line));
        if (lastImport >= 0) {
            return [insertAfterLine(lines, lastImport, statement, '')];
        }

        const lastPackage = findLastIndex(lines, line => /^package\s+\S/.test(line));
        if (lastPackage >= 0) {
            return [insertAfterLine(lines, lastPackage, statement, '\n')];
        }

        return [TextEdit.insert(Position.create(0, 0), `${statement}\n\n`)];
    }
}

/**
 * Whether a top-level import line already makes `fqn` visible.
 */
export function importsName(line: string, fqn: string): boolean {
    const match = IMPORT_LINE.exec(line);
    if (!match) {
        return false;
    }
    const imported = match[1];
    if (imported === fqn) {
        return true;
    }

    const lastDot = fqn.lastIndexOf('.');
    if (lastDot < 0) {
        return false;
    }
    const owner = fqn.slice(0, lastDot);
    const simpleName = fqn.slice(lastDot + 1);
    if (imported === `${owner}._` || imported === `${owner}.*`) {
        return true;
    }

    const selectors = SELECTOR_IMPORT.exec(imported);
    if (!selectors || selectors[1] !== owner) {
        return false;
    }
    return selectors[2]
        .split(',')
        .map(selector => selector.split('=>')[0].trim())
        .some(name => name === simpleName || name === '_');
}

function insertAfterLine(lines: readonly string[], index: number, statement: string, separator: string): TextEdit {
    if (index + 1 < lines.length) {
        return TextEdit.insert(Position.create(index + 1, 0), `${separator}${statement}\n`);
    }
    return TextEdit.insert(Position.create(index, lines[index].length), `\n${separator}${statement}`);
}

function findLastIndex<T>(items: readonly T[], predicate: (item: T) => boolean): number {
    for (let i = items.length - 1; i >= 0; i--) {
        if (predicate(items[i])) {
            return i;
        }
    }
    return -1;
}
