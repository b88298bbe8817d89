/**
 * Raised when a lazy value is requested again while its factory is still
 * running. The factory is never invoked a second time.
 */
export class LazyReentrancyError extends Error {
    readonly label: string;

    constructor(label: string) {
        super(`Lazy value '${label}' was requested while it was being computed`);
        this.name = 'LazyReentrancyError';
        this.label = label;
    }
}

type LazyState<T> =
    | { readonly status: 'pending' }
    | { readonly status: 'computing' }
    | { readonly status: 'ready'; readonly value: T };

/**
 * Single-assignment cache around a zero-argument factory.
 *
 * The factory runs on the first {@link get} and its result is kept for the
 * lifetime of the instance. There is no invalidation. A factory that throws
 * leaves the cache empty so the next `get()` tries again.
 */
export class Lazy<T> {
    private state: LazyState<T> = { status: 'pending' };

    constructor(
        private readonly factory: () => T,
        private readonly label = 'value'
    ) {}

    get isEvaluated(): boolean {
        return this.state.status === 'ready';
    }

    get(): T {
        switch (this.state.status) {
            case 'ready':
                return this.state.value;
            case 'computing':
                throw new LazyReentrancyError(this.label);
            case 'pending': {
                this.state = { status: 'computing' };
                try {
                    const value = this.factory();
                    this.state = { status: 'ready', value };
                    return value;
                } catch (err) {
                    this.state = { status: 'pending' };
                    throw err;
                }
            }
        }
    }
}
