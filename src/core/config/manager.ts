/**
 * Configuration manager — load, save, validate, and merge configs.
 *
 * Resolution order: defaults → `.codeloom/config.json` (optional) →
 * environment. CLI flags are applied later, per run.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, env.ts, utils/fs.ts, errors.ts
 * Used by: CLI commands, workflow runner
 */

import { join, resolve } from 'node:path';
import type { z } from 'zod';
import { appConfigSchema } from './schema.js';
import {
    CHECKPOINTS_DIR_NAME,
    CONFIG_DIR_NAME,
    CONFIG_FILE_NAME,
    DEFAULT_CONFIG,
} from './defaults.js';
import { configFromEnv } from './env.js';
import type { AppConfig } from './types.js';
import { fileExists, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

type PlainObject = Record<string, unknown>;

/**
 * Resolve the config directory path for a given project root.
 */
export function getConfigDir(projectRoot: string): string {
    return join(resolve(projectRoot), CONFIG_DIR_NAME);
}

/**
 * Resolve the full config file path for a given project root.
 */
export function getConfigPath(projectRoot: string): string {
    return join(getConfigDir(projectRoot), CONFIG_FILE_NAME);
}

/** Directory holding run checkpoints for a project. */
export function getCheckpointDir(projectRoot: string): string {
    return join(getConfigDir(projectRoot), CHECKPOINTS_DIR_NAME);
}

/**
 * Check whether a config file exists in the given project root.
 */
export function configExists(projectRoot: string): boolean {
    return fileExists(getConfigPath(projectRoot));
}

/**
 * Load, merge and validate the configuration.
 *
 * A missing config file is fine: defaults plus environment are used.
 *
 * @throws {ConfigError} if the file is unreadable or the merged result fails validation
 */
export function loadConfig(
    projectRoot: string,
    env: Readonly<Record<string, string | undefined>> = process.env,
): AppConfig {
    const configPath = getConfigPath(projectRoot);
    let merged: PlainObject = toPlainObject(DEFAULT_CONFIG);

    if (fileExists(configPath)) {
        logger.debug(`Loading config from ${configPath}`);
        const raw = readJsonFile<unknown>(configPath);
        if (!isPlainObject(raw)) {
            throw new ConfigError('Configuration file must contain a JSON object', { configPath });
        }
        merged = mergeConfig(merged, raw);
    } else {
        logger.debug('No config file found, using defaults');
    }

    merged = mergeConfig(merged, configFromEnv(env));
    return validateConfig(merged, 'Invalid configuration', { configPath });
}

/**
 * Save configuration to disk, validating before write.
 *
 * @throws {ConfigError} if validation fails or write fails
 */
export function saveConfig(projectRoot: string, config: AppConfig): void {
    const valid = validateConfig(config, 'Cannot save invalid configuration');
    const configPath = getConfigPath(projectRoot);

    writeJsonFile(configPath, valid);
    logger.debug(`Config saved to ${configPath}`);
}

/**
 * Deep merge two plain objects. Source values override target values.
 * Arrays are replaced, not concatenated; undefined source values are ignored.
 */
export function mergeConfig(target: PlainObject, source: PlainObject): PlainObject {
    const result: PlainObject = { ...target };

    for (const [key, sourceVal] of Object.entries(source)) {
        const targetVal = result[key];

        if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
            result[key] = mergeConfig(targetVal, sourceVal);
        } else if (sourceVal !== undefined) {
            result[key] = sourceVal;
        }
    }

    return result;
}

/**
 * Get the default configuration with optional partial overrides merged in.
 * @throws {ConfigError} if the overrides make the config invalid
 */
export function getDefaultConfig(overrides?: PlainObject): AppConfig {
    const base = toPlainObject(DEFAULT_CONFIG);
    return validateConfig(overrides ? mergeConfig(base, overrides) : base, 'Invalid configuration overrides');
}

/** Copy of a config with credentials masked, for display. */
export function redactConfig(config: AppConfig): AppConfig {
    const copy = structuredClone(config);
    if (copy.providers.openai) {
        copy.providers.openai.apiKey = maskSecret(copy.providers.openai.apiKey);
    }
    return copy;
}

function maskSecret(secret: string): string {
    return secret.length <= 8 ? '****' : `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}

function validateConfig(raw: unknown, heading: string, context?: PlainObject): AppConfig {
    const result = appConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`${heading}:\n${formatIssues(result.error.issues)}`, {
            ...context,
            issues: result.error.issues,
        });
    }
    return result.data;
}

function formatIssues(issues: readonly z.ZodIssue[]): string {
    return issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
}

function isPlainObject(value: unknown): value is PlainObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPlainObject(config: AppConfig): PlainObject {
    return { ...structuredClone(config) };
}
