#!/usr/bin/env node

/**
 * CLI entry point — registers all commands with Commander.js.
 *
 * Dependency direction: cli/index.ts → commander, all command files
 * Used by: package.json bin entry ("codeloom" binary)
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { reviewCommand } from './commands/review.js';
import { documentCommand } from './commands/document.js';
import { resumeCommand } from './commands/resume.js';
import { statusCommand } from './commands/status.js';
import { configCommand } from './commands/config.js';
import { LogLevel, setLogLevel } from '../utils/logger.js';

const program = new Command();

program
    .name('codeloom')
    .description('Multi-agent code generation, review and documentation workflow')
    .version('0.1.0')
    .option('-v, --verbose', 'Show debug logging')
    .option('-q, --quiet', 'Only show warnings and errors')
    .hook('preAction', (command) => {
        const { verbose, quiet } = command.opts<{ verbose?: boolean; quiet?: boolean }>();
        if (verbose) setLogLevel(LogLevel.Debug);
        else if (quiet) setLogLevel(LogLevel.Warn);
    });

// Register commands
program.addCommand(generateCommand);
program.addCommand(reviewCommand);
program.addCommand(documentCommand);
program.addCommand(resumeCommand);
program.addCommand(statusCommand);
program.addCommand(configCommand);

await program.parseAsync();
