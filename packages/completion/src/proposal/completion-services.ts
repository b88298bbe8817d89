import { TextDocumentEditor, type DocumentEditor } from '../edits/document-editor.js';
import { TextualImportProvider, type ImportStatementProvider } from '../edits/import-statements.js';
import type { TextBuffer } from '../text/text-buffer.js';
import { identLenAtOffset } from '../text/word-finder.js';

/**
 * Collaborators used when a proposal is applied to a document.
 */
export interface CompletionServices {
    readonly importProvider: ImportStatementProvider;
    readonly editor: DocumentEditor;
    /** Length of the identifier starting at `offset`. */
    readonly identLength: (buffer: TextBuffer, offset: number) => number;
}

export function createCompletionServices(overrides: Partial<CompletionServices> = {}): CompletionServices {
    return {
        importProvider: overrides.importProvider ?? new TextualImportProvider(),
        editor: overrides.editor ?? new TextDocumentEditor(),
        identLength: overrides.identLength ?? identLenAtOffset,
    };
}
