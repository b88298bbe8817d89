import { Range, TextEdit } from 'vscode-languageserver-types';
import type { CompilationUnit } from '../compilation/compilation-unit.js';
import type { EditableDocument } from '../edits/document-editor.js';
import {
    ContextType,
    hasArgsFrom,
    type CompletionContext,
    type HasArgs,
    type MemberKind,
} from '../model/member-kind.js';
import {
    describeParameters,
    formatSection,
    isCongruent,
    type ParameterSignature,
} from '../model/parameter-signature.js';
import { createLogger, errorMessage } from '../services/logger.js';
import { textDocumentBuffer } from '../text/text-buffer.js';
import { Lazy } from '../utils/lazy.js';
import { createCompletionServices, type CompletionServices } from './completion-services.js';
import { doParamsProbablyExist } from './params-heuristic.js';

const log = createLogger('Proposal');

/**
 * Data a completion engine supplies for one candidate.
 */
export interface CompletionProposalData {
    readonly kind: MemberKind;
    readonly context: CompletionContext;
    /** Offset where the typed prefix begins and `completion` is inserted. */
    readonly startPos: number;
    /** The bare name inserted into the document. */
    readonly completion: string;
    /** Label shown in the completion list. */
    readonly display: string;
    /** Additional detail shown in the list, like the package of a class. */
    readonly displayDetail: string;
    readonly relevance: number;
    readonly isJava: boolean;
    /**
     * Parameter names, implicit sections excluded. Potentially long-running;
     * invoked at most once per proposal.
     */
    readonly paramNamesProvider: () => ParameterSignature;
    /** Parameter types, structurally matching the parameter names. */
    readonly paramTypes: ParameterSignature;
    /** For classes, traits, types and objects: the fully qualified name. */
    readonly fullyQualifiedName: string;
    /** Whether an import statement has to be added along with the completion. */
    readonly needImport: boolean;
}

/** `(offset, length)` of one tab stop in the inserted text. */
export interface LinkedModeGroup {
    readonly offset: number;
    readonly length: number;
}

export interface ApplyCompletionRequest {
    readonly document: EditableDocument;
    readonly compilationUnit: CompilationUnit;
    /** Caret offset at the time the proposal was accepted. */
    readonly offset: number;
    readonly overwrite: boolean;
}

export interface ApplyCompletionResult {
    /** Caret offset after the change. */
    readonly caretOffset: number;
    /** Whether the editor should enter linked mode over {@link CompletionProposal.linkedModeGroups}. */
    readonly linkedMode: boolean;
}

/**
 * A completion proposal, independent of the engine that produced it and of
 * the UI that displays it.
 *
 * Parameter names are retrieved lazily, since the operation is potentially
 * long-running.
 */
export class CompletionProposal implements Omit<CompletionProposalData, 'paramNamesProvider'> {
    readonly kind: MemberKind;
    readonly context: CompletionContext;
    readonly startPos: number;
    readonly completion: string;
    readonly display: string;
    readonly displayDetail: string;
    readonly relevance: number;
    readonly isJava: boolean;
    readonly paramTypes: ParameterSignature;
    readonly fullyQualifiedName: string;
    readonly needImport: boolean;

    private readonly paramNames: Lazy<ParameterSignature>;

    constructor(data: CompletionProposalData) {
        this.kind = data.kind;
        this.context = data.context;
        this.startPos = data.startPos;
        this.completion = data.completion;
        this.display = data.display;
        this.displayDetail = data.displayDetail;
        this.relevance = data.relevance;
        this.isJava = data.isJava;
        this.paramTypes = data.paramTypes;
        this.fullyQualifiedName = data.fullyQualifiedName;
        this.needImport = data.needImport;
        this.paramNames = new Lazy(data.paramNamesProvider, `${data.completion} parameter names`);
        Object.freeze(this);
    }

    /** Explicit parameter names, computed on first use and kept afterwards. */
    explicitParamNames(): ParameterSignature {
        return this.paramNames.get();
    }

    hasArgs(): HasArgs {
        return hasArgsFrom(this.explicitParamNames());
    }

    /**
     * Tooltip displayed once the completion is activated, e.g.
     * `(a: Int, b: String)(c: Boolean)`.
     *
     * Names and types that do not line up are truncated to the shorter side.
     */
    tooltip(): string {
        const names = this.explicitParamNames();
        if (!isCongruent(names, this.paramTypes)) {
            log.warn('parameter names and types differ in shape', {
                completion: this.completion,
                names: names.map(section => section.length),
                types: this.paramTypes.map(section => section.length),
            });
        }
        return describeParameters(names, this.paramTypes)
            .map(section => formatSection(section.map(p => `${p.name}: ${p.type}`)))
            .join('');
    }

    /**
     * The text inserted into the document if this proposal is chosen: the
     * name followed by every explicit parameter section with its parameter
     * names. Import proposals are inserted as the bare name. In overwrite
     * mode, or for a name without parameter sections, nothing is appended
     * when the call site probably already has its arguments.
     *
     * `paramsProbablyExist` is only called when the decision depends on it.
     */
    completionString(overwrite: boolean, paramsProbablyExist: () => boolean): string {
        if (this.context.contextType === ContextType.Import) {
            return this.completion;
        }
        const names = this.explicitParamNames();
        if ((names.length === 0 || overwrite) && paramsProbablyExist()) {
            return this.completion;
        }
        return this.completion + names.map(formatSection).join('');
    }

    /**
     * Tab stops over the parameter names of {@link completionString}, as
     * absolute offsets assuming the full string was inserted at `startPos`.
     */
    linkedModeGroups(): LinkedModeGroup[] {
        const groups: LinkedModeGroup[] = [];
        let offset = this.startPos + this.completion.length;
        for (const section of this.explicitParamNames()) {
            offset += 1; // open parenthesis
            let idx = 0;
            for (const name of section) {
                // every name before this one is followed by ", "
                groups.push({ offset: offset + 2 * idx, length: name.length });
                offset += name.length;
                idx++;
            }
            offset += 1 + 2 * Math.max(idx - 1, 0); // separators and close parenthesis
        }
        return groups;
    }

    /**
     * Applies the completion, and the import it needs, to the document in one
     * change, honouring completion overwrite.
     *
     * Returns the caret offset after the change and whether linked mode
     * should be entered, or `undefined` when nothing was applied: the
     * analysis binding is unavailable, or a collaborator failed.
     */
    applyCompletionToDocument(
        request: ApplyCompletionRequest,
        services: CompletionServices = createCompletionServices()
    ): ApplyCompletionResult | undefined {
        const { document, compilationUnit, offset, overwrite } = request;
        const snapshot = document.textDocument;
        const buffer = textDocumentBuffer(snapshot);

        // Lazy: often not needed, and must see the text before insertion
        const paramsProbablyExist = new Lazy(() => doParamsProbablyExist(buffer, offset), 'paramsProbablyExist');
        const completionFullString = this.completionString(overwrite, () => paramsProbablyExist.get());

        return compilationUnit.withSourceFile(binding => {
            const endPos = overwrite ? offset + services.identLength(buffer, offset) : offset;
            const completedIdent = TextEdit.replace(
                Range.create(snapshot.positionAt(this.startPos), snapshot.positionAt(endPos)),
                completionFullString
            );

            const applyLinkedMode = this.context.contextType !== ContextType.Import
                && (!overwrite || !paramsProbablyExist.get())
                && this.explicitParamNames().some(section => section.some(name => name.length > 0));

            try {
                const importStmt = this.needImport
                    ? services.importProvider.addImport(binding, this.fullyQualifiedName)
                    : [];

                // Both changes go in one step so the import edit's positions
                // stay valid against the original text.
                const selection = log.timed('applyChanges', () => services.editor.applyChanges(
                    document,
                    { offset: endPos, length: 0 },
                    [completedIdent, ...importStmt]
                ));
                if (!selection) {
                    log.warn('document editor rejected the change', { uri: binding.uri, completion: this.completion });
                    return undefined;
                }

                const caretOffset = applyLinkedMode
                    ? this.startPos + completionFullString.length
                    : selection.offset;
                log.info('completion applied', { uri: binding.uri, completion: completionFullString, caretOffset });
                return { caretOffset, linkedMode: applyLinkedMode };
            } catch (error) {
                log.error('failed to apply completion', {
                    uri: binding.uri,
                    completion: this.completion,
                    error: errorMessage(error),
                });
                return undefined;
            }
        });
    }
}
