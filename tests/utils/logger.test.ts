import { afterEach, describe, it, expect, vi } from 'vitest';
import { getLogLevel, logger, LogLevel, parseLogLevel, setLogLevel } from '../../src/utils/logger.js';

const initial = getLogLevel();

afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
});

describe('parseLogLevel', () => {
    it('accepts level names in any case', () => {
        expect(parseLogLevel('debug')).toBe(LogLevel.Debug);
        expect(parseLogLevel(' WARN ')).toBe(LogLevel.Warn);
        expect(parseLogLevel('silent')).toBe(LogLevel.Silent);
    });

    it('returns undefined for unknown or missing names', () => {
        expect(parseLogLevel('loud')).toBeUndefined();
        expect(parseLogLevel(undefined)).toBeUndefined();
    });
});

describe('logger', () => {
    it('drops messages below the current level', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        setLogLevel(LogLevel.Warn);

        logger.info('hidden');
        logger.warn('shown');

        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(String(warn.mock.calls[0]?.[0])).toContain('shown');
    });

    it('prints nothing when silent', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        logger.setLogLevel(LogLevel.Silent);

        logger.error('quiet');

        expect(error).not.toHaveBeenCalled();
        expect(logger.getLogLevel()).toBe(LogLevel.Silent);
    });
});
