import axios from 'axios';

export type ScraperErrorCode = 'CONFIG' | 'FATAL' | 'FETCH_TRANSIENT' | 'FETCH_PERMANENT';

export class ScraperError extends Error {
    readonly code: ScraperErrorCode;

    constructor(message: string, code: ScraperErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Invalid settings. Raised before any request is made. */
export class ConfigError extends ScraperError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'CONFIG', options);
    }
}

/** Aborts the run; no output file is written. */
export class FatalScrapeError extends ScraperError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'FATAL', options);
    }
}

interface FetchErrorOptions {
    url: string;
    attempts: number;
    status?: number;
    cause?: unknown;
}

export abstract class FetchError extends ScraperError {
    readonly url: string;
    readonly attempts: number;
    readonly status?: number;
    abstract readonly transient: boolean;

    protected constructor(message: string, code: ScraperErrorCode, options: FetchErrorOptions) {
        super(message, code, { cause: options.cause });
        this.url = options.url;
        this.attempts = options.attempts;
        this.status = options.status;
    }
}

export class TransientFetchError extends FetchError {
    readonly transient = true;

    constructor(message: string, options: FetchErrorOptions) {
        super(message, 'FETCH_TRANSIENT', options);
    }
}

export class PermanentFetchError extends FetchError {
    readonly transient = false;

    constructor(message: string, options: FetchErrorOptions) {
        super(message, 'FETCH_PERMANENT', options);
    }
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export const isRetryableStatus = (status: number): boolean => status >= 500 || status === 408 || status === 429;

/**
 * Maps a failed request to a transient (retry) or permanent (give up) error.
 * Timeouts, connection errors, 5xx, 408 and 429 are transient.
 */
export function classifyFetchError(error: unknown, url: string, attempts: number): FetchError {
    if (error instanceof FetchError) {
        return error;
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status !== undefined) {
            const message = `HTTP ${status}`;
            return isRetryableStatus(status)
                ? new TransientFetchError(message, { url, attempts, status, cause: error })
                : new PermanentFetchError(message, { url, attempts, status, cause: error });
        }
        if (error.code && TIMEOUT_CODES.has(error.code)) {
            return new TransientFetchError('Request timed out', { url, attempts, cause: error });
        }
        if (error.code === axios.AxiosError.ERR_CANCELED) {
            return new PermanentFetchError('Request canceled', { url, attempts, cause: error });
        }
        return new TransientFetchError(`Connection error: ${error.code ?? error.message}`, { url, attempts, cause: error });
    }

    return new PermanentFetchError(errorMessage(error), { url, attempts, cause: error });
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
