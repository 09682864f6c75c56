/**
 * Scoped console logging.
 *
 * Every line carries a "[Scope]" prefix. Debug lines (per-artist resolution
 * events, discarded candidates, skipped paths) only print in verbose mode;
 * verbosity never changes what a scan computes.
 */

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
    child(scope: string): Logger;
    /** Same destination and scope, debug lines on or off. */
    withVerbose(verbose: boolean): Logger;
    readonly verbose: boolean;
}

export function createLogger(scope: string, verbose: boolean = false): Logger {
    const prefix = `[${scope}]`;
    return {
        verbose,
        debug: (message, ...details) => {
            if (verbose) console.log(prefix, message, ...details);
        },
        info: (message, ...details) => console.log(prefix, message, ...details),
        warn: (message, ...details) => console.warn(prefix, message, ...details),
        error: (message, ...details) => console.error(prefix, message, ...details),
        child: (childScope) => createLogger(childScope, verbose),
        withVerbose: (enabled) => createLogger(scope, enabled),
    };
}

/**
 * A logger that drops everything. Used by tests and library callers that
 * collect outcomes from the returned report instead.
 */
export const silentLogger: Logger = {
    verbose: false,
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => silentLogger,
    withVerbose: () => silentLogger,
};
