import { TextDocument } from 'vscode-languageserver-textdocument';
import type { Position, TextEdit } from 'vscode-languageserver-types';
import { createLogger } from '../services/logger.js';

const log = createLogger('DocumentEditor');

/** Caret position plus selected length, as offsets into the document. */
export interface Selection {
    readonly offset: number;
    readonly length: number;
}

export type EditConflictReason = 'out-of-bounds' | 'overlap';

/**
 * Raised when a batch of edits cannot be applied as one change.
 * The document is left untouched.
 */
export class EditConflictError extends Error {
    readonly reason: EditConflictReason;
    /** The edit that could not be placed. */
    readonly edit: TextEdit;

    constructor(reason: EditConflictReason, edit: TextEdit) {
        const { start, end } = edit.range;
        super(
            `Cannot apply edit at ${start.line}:${start.character}-${end.line}:${end.character}: ` +
            (reason === 'overlap' ? 'it overlaps a previous edit' : 'range lies outside the document')
        );
        this.name = 'EditConflictError';
        this.reason = reason;
        this.edit = edit;
    }
}

/**
 * Mutable holder of the current snapshot of an editor buffer.
 * Every change produces a new `TextDocument` with a bumped version.
 */
export class EditableDocument {
    private current: TextDocument;

    constructor(document: TextDocument) {
        this.current = document;
    }

    get textDocument(): TextDocument {
        return this.current;
    }

    get uri(): string {
        return this.current.uri;
    }

    getText(): string {
        return this.current.getText();
    }

    replaceText(text: string): void {
        this.current = TextDocument.create(
            this.current.uri,
            this.current.languageId,
            this.current.version + 1,
            text
        );
    }
}

/**
 * Applies an ordered list of edits to a document as a single change.
 */
export interface DocumentEditor {
    /**
     * Applies all `edits` or none of them and returns `selection` mapped
     * through the change, or `undefined` if the change could not be made.
     */
    applyChanges(document: EditableDocument, selection: Selection, edits: readonly TextEdit[]): Selection | undefined;
}

interface OffsetEdit {
    readonly start: number;
    readonly end: number;
    readonly newText: string;
    readonly source: TextEdit;
}

/**
 * {@link DocumentEditor} over {@link EditableDocument}.
 *
 * All edit ranges refer to the document as it was before the change. They
 * are validated up front; a range outside the document or overlapping
 * another edit raises {@link EditConflictError} before anything is written.
 */
export class TextDocumentEditor implements DocumentEditor {

    applyChanges(document: EditableDocument, selection: Selection, edits: readonly TextEdit[]): Selection | undefined {
        const snapshot = document.textDocument;
        const resolved = this.resolveEdits(snapshot, edits);
        if (resolved.length === 0) {
            return selection;
        }

        // applyEdits orders by start only, so hand it the validated order
        const text = TextDocument.applyEdits(snapshot, resolved.map(edit => edit.source));
        document.replaceText(text);

        const mapped = mapSelection(selection, resolved);
        log.info('applied edits', { uri: document.uri, count: resolved.length, caret: mapped.offset });
        return mapped;
    }

    private resolveEdits(document: TextDocument, edits: readonly TextEdit[]): OffsetEdit[] {
        const resolved = edits.map(edit => {
            const start = this.toOffset(document, edit.range.start, edit);
            const end = this.toOffset(document, edit.range.end, edit);
            if (end < start) {
                throw new EditConflictError('out-of-bounds', edit);
            }
            return { start, end, newText: edit.newText, source: edit };
        });

        // Insertions sort before a replacement starting at the same offset.
        // The sort is stable, so equal ranges keep their order.
        const sorted = [...resolved].sort((a, b) => a.start - b.start || a.end - b.end);
        let lastEnd = 0;
        for (const edit of sorted) {
            if (edit.start < lastEnd) {
                throw new EditConflictError('overlap', edit.source);
            }
            lastEnd = edit.end;
        }
        return sorted;
    }

    private toOffset(document: TextDocument, position: Position, edit: TextEdit): number {
        const offset = document.offsetAt(position);
        const roundTrip = document.positionAt(offset);
        if (roundTrip.line !== position.line || roundTrip.character !== position.character) {
            throw new EditConflictError('out-of-bounds', edit);
        }
        return offset;
    }
}

/**
 * Shifts a selection by the length delta of every edit that ends at or
 * before its start. A caret inside a replaced range moves to the end of the
 * replacement text.
 */
export function mapSelection(selection: Selection, edits: readonly { start: number; end: number; newText: string }[]): Selection {
    let shift = 0;
    for (const edit of edits) {
        if (edit.end <= selection.offset) {
            shift += edit.newText.length - (edit.end - edit.start);
        } else if (edit.start < selection.offset) {
            return { offset: edit.start + shift + edit.newText.length, length: 0 };
        }
    }
    return { offset: selection.offset + shift, length: selection.length };
}
