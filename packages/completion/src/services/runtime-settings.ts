/**
 * Runtime settings for completion application, configured by the host editor.
 *
 * Defaults are conservative and can be updated whenever the host's
 * configuration changes.
 */
export interface CompletionRuntimeSettings {
    /** Enables info-level/timing logs. Warnings/errors are always logged. */
    infoLogs: boolean;
    /**
     * Completion overwrite mode: accepting a proposal replaces the identifier
     * under the caret instead of inserting before it.
     */
    completionOverwrite: boolean;
}

const DEFAULT_SETTINGS: CompletionRuntimeSettings = {
    infoLogs: false,
    completionOverwrite: false,
};

let runtimeSettings: CompletionRuntimeSettings = { ...DEFAULT_SETTINGS };

/**
 * Updates runtime settings.
 */
export function setRuntimeSettings(next: Partial<CompletionRuntimeSettings>): void {
    runtimeSettings = {
        ...runtimeSettings,
        ...next,
    };
}

/**
 * Returns current runtime settings.
 */
export function getRuntimeSettings(): CompletionRuntimeSettings {
    return runtimeSettings;
}

/**
 * Restores the defaults. Intended for tests.
 */
export function resetRuntimeSettings(): void {
    runtimeSettings = { ...DEFAULT_SETTINGS };
}
