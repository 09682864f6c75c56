/**
 * Error taxonomy for a reconcile run.
 *
 * "Not found" is not an error class: it is a legitimate resolution outcome
 * and travels inside the report. Provider and filesystem problems are caught
 * per artist or per path; only StoreError, ConfigError and an unreadable scan
 * root are allowed to abort a run.
 */

import { AxiosError } from 'axios';

export type ProviderErrorType =
    | 'timeout'            // ECONNABORTED, ETIMEDOUT
    | 'network'            // ECONNRESET, ENOTFOUND, ECONNREFUSED
    | 'rate_limited'       // HTTP 429 or provider quota error
    | 'service_unavailable' // HTTP 5xx
    | 'malformed_response' // payload failed validation
    | 'http_error'         // any other non-2xx
    | 'unknown';

export class ProviderError extends Error {
    readonly kind = 'transient_error' as const;

    constructor(
        message: string,
        public readonly errorType: ProviderErrorType,
        public readonly retryable: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ProviderError';
    }

    static fromAxiosError(error: AxiosError, context: string): ProviderError {
        const code = error.code;
        const status = error.response?.status;

        if (code === 'ECONNABORTED' || code === 'ETIMEDOUT' || code === 'ERR_CANCELED') {
            return new ProviderError(`${context}: request timed out`, 'timeout', true, { cause: error });
        }
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'EAI_AGAIN') {
            return new ProviderError(`${context}: network error (${code})`, 'network', true, { cause: error });
        }
        if (status === 429) {
            return new ProviderError(`${context}: rate limited`, 'rate_limited', true, { cause: error });
        }
        if (status !== undefined && status >= 500) {
            return new ProviderError(`${context}: service unavailable (HTTP ${status})`, 'service_unavailable', true, { cause: error });
        }
        if (status !== undefined) {
            return new ProviderError(`${context}: HTTP ${status}`, 'http_error', false, { cause: error });
        }
        return new ProviderError(`${context}: ${error.message}`, 'unknown', false, { cause: error });
    }

    static from(error: unknown, context: string): ProviderError {
        if (error instanceof ProviderError) return error;
        if (error instanceof AxiosError) return ProviderError.fromAxiosError(error, context);
        const message = error instanceof Error ? error.message : String(error);
        return new ProviderError(`${context}: ${message}`, 'unknown', false, { cause: error });
    }
}

export class StoreError extends Error {
    readonly kind = 'store_error' as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StoreError';
    }

    static from(error: unknown, context: string): StoreError {
        if (error instanceof StoreError) return error;
        const message = error instanceof Error ? error.message : String(error);
        return new StoreError(`${context}: ${message}`, { cause: error });
    }
}

export class FileSystemError extends Error {
    readonly kind = 'filesystem_error' as const;

    constructor(
        message: string,
        public readonly path: string,
        public readonly code?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'FileSystemError';
    }

    static from(error: unknown, path: string): FileSystemError {
        if (error instanceof FileSystemError) return error;
        const code = errorCode(error);
        const message = error instanceof Error ? error.message : String(error);
        return new FileSystemError(`Cannot read ${path}: ${message}`, path, code, { cause: error });
    }
}

export class ConfigError extends Error {
    readonly kind = 'config_error' as const;

    constructor(message: string, public readonly problems: string[] = []) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * The `code` of a Node system error (ENOENT, EACCES, ...), if any.
 */
export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        return typeof error.code === 'string' ? error.code : undefined;
    }
    return undefined;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Errors that must abort a reconcile run instead of degrading one artist.
 */
export function isFatal(error: unknown): boolean {
    return error instanceof StoreError || error instanceof ConfigError || isAbortError(error);
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}
