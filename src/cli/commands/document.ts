/**
 * `codeloom document` — Add comments and documentation to the code in a file.
 *
 * With `--output`, only the documented code is written to the file.
 *
 * Dependency direction: document.ts → commander, cli/utils
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { executeTask } from '../utils/execute.js';
import { readSourceFile, fencedTask } from '../utils/source.js';
import { withRunOptions, type RunFlags } from '../utils/options.js';

export const documentCommand = withRunOptions(
    new Command('document')
        .description('Add documentation to the code in a file')
        .argument('<file>', 'Source file to document'),
).action(async (file: string, flags: RunFlags) => {
    const source = readSourceFile(file);
    if (!source) process.exit(1);

    const task = fencedTask('Add comprehensive documentation to this code:', source);
    process.exit(await executeTask(task, { flags, outputContent: 'documentedArtifact' }));
});
