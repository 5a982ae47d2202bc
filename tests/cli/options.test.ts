import { describe, it, expect } from 'vitest';
import { Command, InvalidArgumentError } from 'commander';
import {
    parseFormat,
    parseInteger,
    parsePositiveNumber,
    parseTimeout,
    toOverrides,
    withRunOptions,
    type RunFlags,
} from '../../src/cli/utils/options.js';

describe('option parsers', () => {
    it('parses non-negative integers', () => {
        expect(parseInteger('0')).toBe(0);
        expect(parseInteger('5')).toBe(5);
        expect(() => parseInteger('-1')).toThrow(InvalidArgumentError);
        expect(() => parseInteger('2.5')).toThrow('Must be a non-negative integer.');
    });

    it('parses positive numbers', () => {
        expect(parsePositiveNumber('0.5')).toBe(0.5);
        expect(() => parsePositiveNumber('0')).toThrow('Must be a positive number.');
        expect(() => parsePositiveNumber('soon')).toThrow(InvalidArgumentError);
    });

    it('parses timeouts up to the timer limit', () => {
        expect(parseTimeout('2147483')).toBe(2_147_483);
        expect(() => parseTimeout('2592000')).toThrow('Must be at most 2147483 seconds.');
        expect(() => parseTimeout('-3')).toThrow('Must be a positive number.');
    });

    it('accepts only known formats', () => {
        expect(parseFormat('json')).toBe('json');
        expect(() => parseFormat('yaml')).toThrow('Must be one of: json, text, pretty.');
    });
});

describe('withRunOptions', () => {
    it('registers the shared run flags', () => {
        const command = withRunOptions(new Command('run').exitOverride());

        command.parse(['-m', 'gpt-4o-mini', '-f', 'text', '-i', '--max-retries', '2', '--timeout', '30'], { from: 'user' });

        expect(command.opts()).toEqual({
            model: 'gpt-4o-mini',
            format: 'text',
            interactive: true,
            maxRetries: 2,
            timeout: 30,
        });
    });
});

describe('toOverrides', () => {
    it('maps flags onto run overrides', () => {
        const flags: RunFlags = { model: 'gpt-4o-mini', maxRetries: 1, timeout: 10, interactive: true, format: 'json' };
        expect(toOverrides(flags)).toEqual({ model: 'gpt-4o-mini', maxRetries: 1, timeoutSeconds: 10, interactive: true });
    });

    it('leaves unset flags undefined', () => {
        expect(toOverrides({})).toEqual({
            model: undefined,
            interactive: undefined,
            maxRetries: undefined,
            timeoutSeconds: undefined,
        });
    });
});
