/**
 * Renders completion proposals as LSP completion items.
 *
 * Parameter names become snippet placeholders (`${1:a}`), so clients walk
 * the same tab stops {@link CompletionProposal.linkedModeGroups} describes.
 */

import type { TextDocument } from 'vscode-languageserver-textdocument';
import {
    CompletionItemKind,
    InsertTextFormat,
    Range,
    TextEdit,
    type CompletionItem,
} from 'vscode-languageserver-types';
import type { CompilationUnit } from '../compilation/compilation-unit.js';
import type { ImportStatementProvider } from '../edits/import-statements.js';
import { ContextType, HasArgs, MemberKind } from '../model/member-kind.js';
import type { CompletionProposal } from '../proposal/completion-proposal.js';
import { doParamsProbablyExist } from '../proposal/params-heuristic.js';
import { createLogger, errorMessage } from '../services/logger.js';
import { getRuntimeSettings } from '../services/runtime-settings.js';
import { textDocumentBuffer } from '../text/text-buffer.js';
import { identLenAtOffset } from '../text/word-finder.js';
import { Lazy } from '../utils/lazy.js';

const log = createLogger('CompletionItem');

const MAX_RELEVANCE = 999_999;

export interface CompletionItemOptions {
    /** Caret offset the completion was requested at. */
    readonly offset: number;
    /** Defaults to the `completionOverwrite` runtime setting. */
    readonly overwrite?: boolean;
    /** Needed, together with `importProvider`, to emit import edits. */
    readonly compilationUnit?: CompilationUnit;
    readonly importProvider?: ImportStatementProvider;
}

export function completionItemKindFor(kind: MemberKind): CompletionItemKind {
    switch (kind) {
        case MemberKind.Class: return CompletionItemKind.Class;
        case MemberKind.Trait: return CompletionItemKind.Interface;
        case MemberKind.Type: return CompletionItemKind.TypeParameter;
        case MemberKind.Object: return CompletionItemKind.Module;
        case MemberKind.Package: return CompletionItemKind.Folder;
        case MemberKind.PackageObject: return CompletionItemKind.Module;
        case MemberKind.Def: return CompletionItemKind.Method;
        case MemberKind.Val: return CompletionItemKind.Value;
        case MemberKind.Var: return CompletionItemKind.Variable;
        default: {
            const exhaustive: never = kind;
            throw new Error(`Unknown member kind: ${String(exhaustive)}`);
        }
    }
}

/**
 * Sort key placing higher relevance first, ties broken by label.
 */
export function sortTextFor(proposal: CompletionProposal): string {
    const relevance = Math.min(Math.max(Math.trunc(proposal.relevance), 0), MAX_RELEVANCE);
    return `${String(MAX_RELEVANCE - relevance).padStart(6, '0')}_${proposal.display}`;
}

/** Escapes `\`, `$` and `}` in literal snippet text. */
export function escapeSnippetText(text: string): string {
    return text.replace(/[\\$}]/g, ch => `\\${ch}`);
}

/**
 * Turns inserted text into a snippet, making each tab stop a numbered
 * placeholder. Offsets are relative to the start of `text`.
 */
export function toSnippet(text: string, stops: readonly { offset: number; length: number }[]): string {
    let snippet = '';
    let last = 0;
    stops.forEach((stop, i) => {
        snippet += escapeSnippetText(text.slice(last, stop.offset));
        snippet += `\${${i + 1}:${escapeSnippetText(text.slice(stop.offset, stop.offset + stop.length))}}`;
        last = stop.offset + stop.length;
    });
    return snippet + escapeSnippetText(text.slice(last));
}

export function toCompletionItem(
    proposal: CompletionProposal,
    document: TextDocument,
    options: CompletionItemOptions
): CompletionItem {
    const overwrite = options.overwrite ?? getRuntimeSettings().completionOverwrite;
    const buffer = textDocumentBuffer(document);
    const paramsProbablyExist = new Lazy(() => doParamsProbablyExist(buffer, options.offset), 'paramsProbablyExist');
    const text = proposal.completionString(overwrite, () => paramsProbablyExist.get());

    const endPos = overwrite ? options.offset + identLenAtOffset(buffer, options.offset) : options.offset;
    const range = Range.create(document.positionAt(proposal.startPos), document.positionAt(endPos));

    const stops = text.length > proposal.completion.length
        ? proposal.linkedModeGroups()
            .filter(group => group.length > 0)
            .map(group => ({ offset: group.offset - proposal.startPos, length: group.length }))
        : [];
    const snippet = stops.length > 0 && proposal.context.contextType !== ContextType.Import;

    const item: CompletionItem = {
        label: proposal.display,
        labelDetails: {
            detail: proposal.hasArgs() === HasArgs.NoArgs ? undefined : proposal.tooltip(),
            description: proposal.displayDetail || undefined,
        },
        kind: completionItemKindFor(proposal.kind),
        sortText: sortTextFor(proposal),
        filterText: proposal.completion,
        insertTextFormat: snippet ? InsertTextFormat.Snippet : InsertTextFormat.PlainText,
        textEdit: TextEdit.replace(range, snippet ? toSnippet(text, stops) : text),
    };

    const importEdits = importEditsFor(proposal, options);
    if (importEdits.length > 0) {
        item.additionalTextEdits = importEdits;
    }
    return item;
}

function importEditsFor(proposal: CompletionProposal, options: CompletionItemOptions): TextEdit[] {
    const { compilationUnit, importProvider } = options;
    if (!proposal.needImport || !compilationUnit || !importProvider) {
        return [];
    }
    try {
        return compilationUnit.withSourceFile(binding => importProvider.addImport(binding, proposal.fullyQualifiedName)) ?? [];
    } catch (error) {
        log.warn('import edit not computed', {
            uri: compilationUnit.uri,
            fullyQualifiedName: proposal.fullyQualifiedName,
            error: errorMessage(error),
        });
        return [];
    }
}
