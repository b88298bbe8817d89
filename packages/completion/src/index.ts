export * from './model/member-kind.js';
export * from './model/parameter-signature.js';

export * from './proposal/completion-proposal.js';
export * from './proposal/completion-services.js';
export * from './proposal/params-heuristic.js';

export * from './compilation/compilation-unit.js';
export * from './edits/document-editor.js';
export * from './edits/import-statements.js';

export * from './text/text-buffer.js';
export * from './text/word-finder.js';

// LSP rendering
export * from './lsp/completion-item.js';

export * from './services/logger.js';
export * from './services/runtime-settings.js';
export { Lazy, LazyReentrancyError } from './utils/lazy.js';
