/**
 * Source files handed to the review and document commands.
 *
 * Dependency direction: source.ts → utils/fs, utils/logger
 * Used by: review and document commands
 */

import { extname } from 'node:path';
import { fileExists, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface SourceFile {
    readonly path: string;
    readonly content: string;
    /** Fence language taken from the extension; empty when there is none. */
    readonly language: string;
}

/** Read a source file, logging why when it cannot be used. */
export function readSourceFile(path: string): SourceFile | undefined {
    if (!fileExists(path)) {
        logger.error(`File not found: ${path}`);
        return undefined;
    }
    const content = readTextFile(path);
    if (!content.trim()) {
        logger.error(`File is empty: ${path}`);
        return undefined;
    }
    return { path, content, language: extname(path).slice(1).toLowerCase() };
}

/** Task text that opens with `instruction` and carries the code in a fenced block. */
export function fencedTask(instruction: string, source: SourceFile): string {
    const body = source.content.endsWith('\n') ? source.content : `${source.content}\n`;
    return `${instruction}\n\n\`\`\`${source.language}\n${body}\`\`\``;
}
