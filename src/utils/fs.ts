/**
 * File system helpers with consistent error handling.
 *
 * Dependency direction: fs.ts → node:fs, node:path, errors.ts
 * Used by: config manager, checkpoint store, CLI commands
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { ConfigError } from '../core/errors.js';

/**
 * Read a JSON file and parse it.
 * @throws {ConfigError} if the file doesn't exist or contains invalid JSON.
 */
export function readJsonFile<T>(filePath: string): T {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    try {
        const content = readFileSync(absolutePath, 'utf-8');
        return JSON.parse(content) as T;
    } catch (err) {
        throw new ConfigError(`Failed to parse JSON file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: err instanceof Error ? err.message : String(err),
        });
    }
}

/**
 * Write data to a JSON file, creating parent directories if needed.
 * @throws {ConfigError} if the write fails.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
    const absolutePath = resolve(filePath);

    try {
        mkdirSync(dirname(absolutePath), { recursive: true });
        writeFileSync(absolutePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    } catch (err) {
        throw new ConfigError(`Failed to write file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: err instanceof Error ? err.message : String(err),
        });
    }
}

/**
 * Write JSON through a temp file and a rename, so readers never see a half-written file.
 */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
    const absolutePath = resolve(filePath);
    const tempPath = `${absolutePath}.${process.pid}.tmp`;

    await mkdir(dirname(absolutePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    await rename(tempPath, absolutePath);
}

/**
 * Read and parse a JSON file, or return null when it does not exist.
 * Parse failures propagate.
 */
export async function readJsonFileIfExists(filePath: string): Promise<unknown> {
    let content: string;
    try {
        content = await readFile(resolve(filePath), 'utf-8');
    } catch (err) {
        if (isNotFound(err)) return null;
        throw err;
    }
    const parsed: unknown = JSON.parse(content);
    return parsed;
}

/** List the `.json` files of a directory (full paths). A missing directory lists nothing. */
export async function listJsonFiles(dirPath: string): Promise<string[]> {
    const absolutePath = resolve(dirPath);
    try {
        const entries = await readdir(absolutePath);
        return entries.filter((f) => f.endsWith('.json')).map((f) => join(absolutePath, f));
    } catch (err) {
        if (isNotFound(err)) return [];
        throw err;
    }
}

/** Delete a file; a missing file is not an error. */
export async function removeFile(filePath: string): Promise<void> {
    await rm(resolve(filePath), { force: true });
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export function ensureDir(dirPath: string): void {
    mkdirSync(resolve(dirPath), { recursive: true });
}

/**
 * Check if a file exists at the given path.
 */
export function fileExists(filePath: string): boolean {
    return existsSync(resolve(filePath));
}

/**
 * Read a text file and return its contents.
 * @throws {ConfigError} if the file doesn't exist.
 */
export function readTextFile(filePath: string): string {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    return readFileSync(absolutePath, 'utf-8');
}

/**
 * Write a text file, creating parent directories if needed.
 */
export function writeTextFile(filePath: string, content: string): void {
    const absolutePath = resolve(filePath);
    mkdirSync(dirname(absolutePath), { recursive: true });
    writeFileSync(absolutePath, content, 'utf-8');
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
