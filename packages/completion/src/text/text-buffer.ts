import type { TextDocument } from 'vscode-languageserver-textdocument';

/**
 * Read-only character access to the text a proposal is applied to.
 */
export interface TextBuffer {
    readonly length: number;
    /** The UTF-16 code unit at `offset`; callers keep `offset` within bounds. */
    charAt(offset: number): string;
}

/**
 * Buffer over an in-memory string.
 */
export function stringBuffer(text: string): TextBuffer {
    return {
        length: text.length,
        charAt: offset => text.charAt(offset),
    };
}

/**
 * Buffer over a snapshot of an LSP text document. The text is captured once,
 * so later updates of the document are not observed.
 */
export function textDocumentBuffer(document: TextDocument): TextBuffer {
    return stringBuffer(document.getText());
}
