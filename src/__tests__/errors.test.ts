import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import {
    classifyFetchError,
    ConfigError,
    errorMessage,
    FatalScrapeError,
    isRetryableStatus,
    PermanentFetchError,
    ScraperError,
    TransientFetchError,
} from '../errors';
import { responseWithStatus } from './helpers/fake-site';

const MEMBER_URL = 'https://site.test/members/1';

function httpError(status: number): AxiosError {
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, null, responseWithStatus(status));
}

describe('isRetryableStatus', () => {
    it.each([500, 502, 503, 504, 408, 429])('retries HTTP %d', (status) => {
        expect(isRetryableStatus(status)).toBe(true);
    });

    it.each([400, 401, 403, 404, 410])('does not retry HTTP %d', (status) => {
        expect(isRetryableStatus(status)).toBe(false);
    });
});

describe('classifyFetchError', () => {
    it('treats 5xx responses as transient and keeps the status', () => {
        const failure = classifyFetchError(httpError(503), MEMBER_URL, 2);

        expect(failure).toBeInstanceOf(TransientFetchError);
        expect(failure.transient).toBe(true);
        expect(failure.status).toBe(503);
        expect(failure.message).toBe('HTTP 503');
        expect(failure.attempts).toBe(2);
        expect(failure.url).toBe(MEMBER_URL);
        expect(failure.code).toBe('FETCH_TRANSIENT');
    });

    it('treats 404 as permanent', () => {
        const failure = classifyFetchError(httpError(404), MEMBER_URL, 1);

        expect(failure).toBeInstanceOf(PermanentFetchError);
        expect(failure.transient).toBe(false);
        expect(failure.code).toBe('FETCH_PERMANENT');
        expect(failure.message).toBe('HTTP 404');
    });

    it('treats 429 as transient', () => {
        expect(classifyFetchError(httpError(429), MEMBER_URL, 1).transient).toBe(true);
    });

    it('treats timeouts as transient', () => {
        const failure = classifyFetchError(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'), MEMBER_URL, 1);

        expect(failure).toBeInstanceOf(TransientFetchError);
        expect(failure.message).toBe('Request timed out');
    });

    it('treats connection errors without a response as transient', () => {
        const failure = classifyFetchError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'), MEMBER_URL, 1);

        expect(failure.transient).toBe(true);
        expect(failure.message).toBe('Connection error: ECONNREFUSED');
    });

    it('treats cancelled requests as permanent', () => {
        const failure = classifyFetchError(new AxiosError('canceled', 'ERR_CANCELED'), MEMBER_URL, 1);

        expect(failure.transient).toBe(false);
    });

    it('passes fetch errors through unchanged', () => {
        const original = new PermanentFetchError('Malformed identifier', { url: MEMBER_URL, attempts: 0 });

        expect(classifyFetchError(original, MEMBER_URL, 3)).toBe(original);
    });

    it('treats anything else as permanent', () => {
        const failure = classifyFetchError(new TypeError('bad input'), MEMBER_URL, 1);

        expect(failure).toBeInstanceOf(PermanentFetchError);
        expect(failure.message).toBe('bad input');
    });
});

describe('error classes', () => {
    it('name themselves after their class and carry a code', () => {
        const config = new ConfigError('bad workers');
        const fatal = new FatalScrapeError('site down');

        expect(config).toBeInstanceOf(ScraperError);
        expect(config.name).toBe('ConfigError');
        expect(config.code).toBe('CONFIG');
        expect(fatal.name).toBe('FatalScrapeError');
        expect(fatal.code).toBe('FATAL');
    });
});

describe('errorMessage', () => {
    it('reads Error messages and stringifies the rest', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('plain')).toBe('plain');
        expect(errorMessage(42)).toBe('42');
    });
});
