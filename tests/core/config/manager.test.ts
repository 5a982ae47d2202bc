/**
 * Tests for the config manager (load, save, validate, merge).
 *
 * Uses a temp directory to simulate project configs on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    configExists,
    getCheckpointDir,
    getConfigPath,
    getDefaultConfig,
    loadConfig,
    mergeConfig,
    redactConfig,
    saveConfig,
} from '../../../src/core/config/manager.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULT_CONFIG } from '../../../src/core/config/defaults.js';
import { ConfigError } from '../../../src/core/errors.js';

let testDir: string;

beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'codeloom-config-'));
});

afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
});

function writeConfigFile(content: string): void {
    mkdirSync(join(testDir, CONFIG_DIR_NAME), { recursive: true });
    writeFileSync(getConfigPath(testDir), content, 'utf-8');
}

describe('paths', () => {
    it('places config and checkpoints under the project config directory', () => {
        expect(getConfigPath(testDir)).toBe(join(testDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME));
        expect(getCheckpointDir(testDir)).toBe(join(testDir, CONFIG_DIR_NAME, 'checkpoints'));
    });
});

describe('configExists', () => {
    it('returns false when no config exists', () => {
        expect(configExists(testDir)).toBe(false);
    });

    it('returns true after saving config', () => {
        saveConfig(testDir, DEFAULT_CONFIG);
        expect(configExists(testDir)).toBe(true);
    });
});

describe('loadConfig', () => {
    it('uses the defaults when there is no file and no environment', () => {
        expect(loadConfig(testDir, {})).toEqual(DEFAULT_CONFIG);
    });

    it('merges a partial file over the defaults', () => {
        writeConfigFile(JSON.stringify({ workflow: { maxRetries: 1 }, agents: { reviewer: { model: 'gpt-4o-mini' } } }));

        const config = loadConfig(testDir, {});

        expect(config.workflow.maxRetries).toBe(1);
        expect(config.workflow.maxConcurrency).toBe(4);
        expect(config.agents.reviewer).toEqual({ provider: 'openai', model: 'gpt-4o-mini', temperature: 0.1, maxTokens: 2000 });
    });

    it('lets the environment override the file', () => {
        writeConfigFile(JSON.stringify({ providers: { openai: { apiKey: 'file-key' } }, workflow: { maxRetries: 1 } }));

        const config = loadConfig(testDir, { OPENAI_API_KEY: 'test-secret', CODELOOM_MAX_RETRIES: '2' });

        expect(config.providers.openai?.apiKey).toBe('test-secret');
        expect(config.providers.openai?.baseUrl).toBe('https://api.openai.com');
        expect(config.workflow.maxRetries).toBe(2);
    });

    it('reports every invalid field', () => {
        writeConfigFile(JSON.stringify({ workflow: { maxRetries: -2, classificationFailure: 'retry' } }));

        expect(() => loadConfig(testDir, {})).toThrow(ConfigError);
        try {
            loadConfig(testDir, {});
        } catch (err) {
            expect(err instanceof Error ? err.message : '').toMatch(
                /^Invalid configuration:\n {2}- workflow\.maxRetries: .+\n {2}- workflow\.classificationFailure: .+$/,
            );
        }
    });

    it('rejects an invalid environment value', () => {
        expect(() => loadConfig(testDir, { CODELOOM_MAX_RETRIES: 'many' })).toThrow(/workflow\.maxRetries/);
    });

    it('rejects a file that is not valid JSON', () => {
        writeConfigFile('{ "workflow": ');
        expect(() => loadConfig(testDir, {})).toThrow(ConfigError);
    });

    it('rejects a file that is not a JSON object', () => {
        writeConfigFile('[1, 2]');
        expect(() => loadConfig(testDir, {})).toThrow('Configuration file must contain a JSON object');
    });
});

describe('saveConfig', () => {
    it('writes formatted JSON that loads back identically', () => {
        const config = getDefaultConfig({ workflow: { interactive: true } });
        saveConfig(testDir, config);

        expect(readFileSync(getConfigPath(testDir), 'utf-8')).toBe(JSON.stringify(config, null, 2) + '\n');
        expect(loadConfig(testDir, {})).toEqual(config);
    });

    it('refuses to save an invalid config', () => {
        const invalid = { ...DEFAULT_CONFIG, workflow: { ...DEFAULT_CONFIG.workflow, maxConcurrency: 0 } };
        expect(() => saveConfig(testDir, invalid)).toThrow(ConfigError);
        expect(configExists(testDir)).toBe(false);
    });
});

describe('mergeConfig', () => {
    it('merges nested objects', () => {
        expect(mergeConfig({ a: { x: 1, y: 2 } }, { a: { y: 3 } })).toEqual({ a: { x: 1, y: 3 } });
    });

    it('replaces arrays and ignores undefined', () => {
        expect(mergeConfig({ list: [1, 2], keep: 'yes' }, { list: [3], keep: undefined })).toEqual({
            list: [3],
            keep: 'yes',
        });
    });

    it('does not modify its inputs', () => {
        const target = { a: { x: 1 } };
        mergeConfig(target, { a: { x: 2 } });
        expect(target).toEqual({ a: { x: 1 } });
    });
});

describe('getDefaultConfig', () => {
    it('returns a fresh copy each time', () => {
        const config = getDefaultConfig();
        config.workflow.maxRetries = 9;
        expect(getDefaultConfig().workflow.maxRetries).toBe(3);
    });

    it('rejects invalid overrides', () => {
        expect(() => getDefaultConfig({ workflow: { checkpoints: 'redis' } })).toThrow(ConfigError);
    });
});

describe('redactConfig', () => {
    it('masks the API key and leaves the original intact', () => {
        const config = getDefaultConfig({ providers: { openai: { apiKey: 'test-secret-value' } } });

        expect(redactConfig(config).providers.openai?.apiKey).toBe('test…alue');
        expect(config.providers.openai?.apiKey).toBe('test-secret-value');
    });

    it('fully masks short keys', () => {
        const config = getDefaultConfig({ providers: { openai: { apiKey: 'short' } } });
        expect(redactConfig(config).providers.openai?.apiKey).toBe('****');
    });
});
