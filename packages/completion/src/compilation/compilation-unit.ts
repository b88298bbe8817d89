import type { TextDocument } from 'vscode-languageserver-textdocument';
import { createLogger } from '../services/logger.js';

const log = createLogger('CompilationUnit');

/**
 * Analysis context for a source file, handed out only while it is current.
 */
export interface AnalysisBinding {
    readonly uri: string;
    /** Document snapshot the analysis was computed for. */
    readonly document: TextDocument;
    readonly version: number;
}

/**
 * A source file whose analysis context may be unavailable (not loaded yet,
 * unloaded, or lagging behind the editor).
 */
export interface CompilationUnit {
    readonly uri: string;
    /**
     * Runs `fn` with the analysis binding if one is available.
     * Returns `undefined` without calling `fn` otherwise.
     */
    withSourceFile<T>(fn: (binding: AnalysisBinding) => T): T | undefined;
}

/**
 * Compilation unit backed by an LSP text document.
 *
 * The binding is available while the unit is loaded and its analysis is
 * not stale. {@link markStale} models edits the analysis has not caught up
 * with; {@link refresh} brings it back in sync.
 */
export class DocumentCompilationUnit implements CompilationUnit {
    private document: TextDocument;
    private loaded = true;
    private stale = false;

    constructor(document: TextDocument) {
        this.document = document;
    }

    get uri(): string {
        return this.document.uri;
    }

    get isAvailable(): boolean {
        return this.loaded && !this.stale;
    }

    withSourceFile<T>(fn: (binding: AnalysisBinding) => T): T | undefined {
        if (!this.isAvailable) {
            log.info('analysis binding unavailable', {
                uri: this.uri,
                loaded: this.loaded,
                stale: this.stale,
            });
            return undefined;
        }
        return fn({
            uri: this.document.uri,
            document: this.document,
            version: this.document.version,
        });
    }

    markStale(): void {
        this.stale = true;
    }

    refresh(document: TextDocument): void {
        this.document = document;
        this.loaded = true;
        this.stale = false;
    }

    unload(): void {
        this.loaded = false;
    }
}
