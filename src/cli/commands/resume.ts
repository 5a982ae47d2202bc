/**
 * `codeloom resume` — Continue an interrupted or failed run from its last checkpoint.
 *
 * Dependency direction: resume.ts → commander, cli/utils
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { executeResume } from '../utils/execute.js';
import { withRunOptions, type RunFlags } from '../utils/options.js';

export const resumeCommand = withRunOptions(
    new Command('resume')
        .description('Continue a run from its last checkpoint')
        .argument('<runId>', 'Run ID printed by an earlier run (see "codeloom status")'),
).action(async (runId: string, flags: RunFlags) => {
    process.exit(await executeResume(runId, { flags }));
});
