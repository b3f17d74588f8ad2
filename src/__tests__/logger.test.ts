import { afterEach, describe, it, expect, vi } from 'vitest';
import { isVerboseMode, logger, setVerboseMode } from '../logger';

describe('logger', () => {
    afterEach(() => {
        setVerboseMode(false);
        vi.restoreAllMocks();
    });

    it('drops debug output unless verbose mode is on', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});

        logger.debug('hidden');
        setVerboseMode(true);
        logger.debug('shown');

        expect(isVerboseMode()).toBe(true);
        expect(log).toHaveBeenCalledTimes(1);
        expect(log).toHaveBeenCalledWith('shown');
    });

    it('routes warnings and errors to their console methods', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});

        logger.warn('careful');
        logger.error('broken', 2);

        expect(warn).toHaveBeenCalledWith('careful');
        expect(error).toHaveBeenCalledWith('broken', 2);
    });
});
