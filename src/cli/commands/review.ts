/**
 * `codeloom review` — Review the code in a file.
 *
 * Dependency direction: review.ts → commander, cli/utils
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { executeTask } from '../utils/execute.js';
import { readSourceFile, fencedTask } from '../utils/source.js';
import { withRunOptions, type RunFlags } from '../utils/options.js';

export const reviewCommand = withRunOptions(
    new Command('review')
        .description('Review the code in a file for errors, inefficiencies and security flaws')
        .argument('<file>', 'Source file to review'),
).action(async (file: string, flags: RunFlags) => {
    const source = readSourceFile(file);
    if (!source) process.exit(1);

    const task = fencedTask('Please review this code for improvements:', source);
    process.exit(await executeTask(task, { flags }));
});
