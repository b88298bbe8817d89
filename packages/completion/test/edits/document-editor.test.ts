import { describe, test, expect, vi, afterEach } from 'vitest';
import { Position, Range, TextEdit } from 'vscode-languageserver-types';
import {
    EditConflictError,
    mapSelection,
    TextDocumentEditor,
} from '../../src/edits/document-editor.js';
import { makeDocument } from '../test-helpers.js';

function replace(line: number, from: number, to: number, text: string): TextEdit {
    return TextEdit.replace(Range.create(Position.create(line, from), Position.create(line, to)), text);
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('TextDocumentEditor', () => {
    const editor = new TextDocumentEditor();

    test('applies every edit against the original text', () => {
        // Arrange
        const document = makeDocument('abc def\nghi');
        const edits = [
            replace(0, 4, 7, 'xyz'),
            TextEdit.insert(Position.create(0, 0), '// '),
            replace(1, 0, 3, 'G'),
        ];

        // Act
        const selection = editor.applyChanges(document, { offset: 7, length: 0 }, edits);

        // Assert
        expect(document.getText()).toBe('// abc xyz\nG');
        expect(selection).toEqual({ offset: 10, length: 0 });
        expect(document.textDocument.version).toBe(2);
    });

    test('insertions at the same offset keep their order', () => {
        // Arrange
        const document = makeDocument('x');
        const edits = [
            TextEdit.insert(Position.create(0, 0), 'a'),
            TextEdit.insert(Position.create(0, 0), 'b'),
        ];

        // Act
        editor.applyChanges(document, { offset: 1, length: 0 }, edits);

        // Assert
        expect(document.getText()).toBe('abx');
    });

    test('an insertion at the start of a replaced range goes before the replacement', () => {
        // Arrange
        const document = makeDocument('abc');
        const edits = [
            replace(0, 0, 2, 'XY'),
            TextEdit.insert(Position.create(0, 0), '>'),
        ];

        // Act
        const selection = editor.applyChanges(document, { offset: 2, length: 0 }, edits);

        // Assert
        expect(document.getText()).toBe('>XYc');
        expect(selection).toEqual({ offset: 3, length: 0 });
    });

    test('no edits leave the document and selection untouched', () => {
        // Arrange
        const document = makeDocument('abc');

        // Act
        const selection = editor.applyChanges(document, { offset: 2, length: 1 }, []);

        // Assert
        expect(selection).toEqual({ offset: 2, length: 1 });
        expect(document.textDocument.version).toBe(1);
    });

    test('overlapping edits are rejected before anything changes', () => {
        // Arrange
        const document = makeDocument('abcdef');
        const edits = [replace(0, 1, 4, 'X'), replace(0, 3, 5, 'Y')];

        // Act & Assert
        expect(() => editor.applyChanges(document, { offset: 0, length: 0 }, edits))
            .toThrow(EditConflictError);
        expect(document.getText()).toBe('abcdef');
        expect(document.textDocument.version).toBe(1);
    });

    test('reports the conflicting edit and reason', () => {
        // Arrange
        const document = makeDocument('abc');
        const outside = replace(3, 0, 1, 'Z');

        // Act
        let caught: unknown;
        try {
            editor.applyChanges(document, { offset: 0, length: 0 }, [outside]);
        } catch (err) {
            caught = err;
        }

        // Assert
        if (!(caught instanceof EditConflictError)) {
            throw new Error('expected an EditConflictError');
        }
        const conflict = caught;
        expect(conflict.reason).toBe('out-of-bounds');
        expect(conflict.edit).toBe(outside);
        expect(conflict.message).toBe('Cannot apply edit at 3:0-3:1: range lies outside the document');
    });

    test('ranges past the end of a line are out of bounds', () => {
        // Arrange
        const document = makeDocument('ab\ncd');

        // Act & Assert
        expect(() => editor.applyChanges(document, { offset: 0, length: 0 }, [replace(0, 1, 5, 'x')]))
            .toThrow('range lies outside the document');
    });
});

describe('mapSelection', () => {
    test('shifts by edits ending at or before the caret', () => {
        // Arrange
        const edits = [
            { start: 0, end: 0, newText: 'abc' },
            { start: 5, end: 8, newText: 'x' },
        ];

        // Act & Assert
        expect(mapSelection({ offset: 8, length: 2 }, edits)).toEqual({ offset: 9, length: 2 });
    });

    test('ignores edits after the caret', () => {
        expect(mapSelection({ offset: 2, length: 0 }, [{ start: 4, end: 6, newText: '' }]))
            .toEqual({ offset: 2, length: 0 });
    });

    test('moves a caret inside a replaced range to the end of the replacement', () => {
        expect(mapSelection({ offset: 3, length: 2 }, [{ start: 1, end: 5, newText: 'wxyz!' }]))
            .toEqual({ offset: 6, length: 0 });
    });
});
