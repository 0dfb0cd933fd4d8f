/**
 * Structured logging contract shared by the backend modules.
 *
 * Services receive this interface instead of a Pino instance so tests can hand
 * in a mock. Implementations keep child logger support for scoped context.
 */
export interface ILogger {
    fatal(...args: readonly unknown[]): void;

    error(...args: readonly unknown[]): void;

    warn(...args: readonly unknown[]): void;

    info(...args: readonly unknown[]): void;

    debug(...args: readonly unknown[]): void;

    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped child logger with predefined bindings.
     *
     * @param bindings - Key-value pairs merged into every entry of the child
     * @param options - Logger-specific options such as a level override
     */
    child(bindings: Record<string, unknown>, options?: Record<string, unknown>): ILogger;
}
