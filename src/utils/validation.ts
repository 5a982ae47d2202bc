/**
 * Common validators for user input and data.
 *
 * Dependency direction: validation.ts → zod
 * Used by: CLI commands, config module, workflow state
 */

import { z } from 'zod';

/** Validate that a string is a non-empty trimmed string. */
export const nonEmptyString = z.string().trim().min(1, 'Value cannot be empty');

/** Validate a URL string. */
export const urlString = z.string().url('Must be a valid URL');

/**
 * Validate a model name string (alphanumeric, hyphens, colons, dots, slashes).
 * Examples: "gpt-4o", "llama3.2:latest", "org/model-7b"
 */
export const modelName = z
    .string()
    .trim()
    .min(1, 'Model name cannot be empty')
    .regex(
        /^[a-zA-Z0-9][a-zA-Z0-9\-_.:/]*$/,
        'Model name must start with alphanumeric and contain only alphanumeric, hyphens, underscores, dots, colons, or slashes',
    );

/** Validate a run identifier usable as a file name. */
export const runIdString = z
    .string()
    .min(1, 'Run ID cannot be empty')
    .max(128, 'Run ID is too long')
    .regex(/^[a-zA-Z0-9][a-zA-Z0-9\-_]*$/, 'Run ID may only contain letters, digits, hyphens and underscores');
