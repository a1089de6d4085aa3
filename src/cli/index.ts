#!/usr/bin/env node

/**
 * CLI entry point — registers all commands with Commander.js.
 *
 * Dependency direction: cli/index.ts → commander, all command files
 * Used by: package.json bin entry ("stepwise" binary)
 */

import { Command } from 'commander';
import { AppError } from '../core/errors.js';
import { LogLevel, logger } from '../utils/logger.js';
import { chatCommand } from './commands/chat.js';
import { configCommand } from './commands/config.js';
import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
    .name('stepwise')
    .description('Interactive agent workflows — analyse, plan, execute and review with a human in the loop')
    .version('0.1.0')
    .option('-v, --verbose', 'Show debug logging')
    .option('-q, --quiet', 'Only show warnings and errors')
    .hook('preAction', (command) => {
        const { verbose, quiet } = command.opts<{ verbose?: boolean; quiet?: boolean }>();
        const fromEnv = logger.parseLogLevel(process.env.STEPWISE_LOG_LEVEL);

        if (verbose) logger.setLogLevel(LogLevel.Debug);
        else if (quiet) logger.setLogLevel(LogLevel.Warn);
        else if (fromEnv !== undefined) logger.setLogLevel(fromEnv);
    });

program.addCommand(initCommand);
program.addCommand(chatCommand);
program.addCommand(configCommand);
program.addCommand(doctorCommand);

program.parseAsync().catch((err: unknown) => {
    if (err instanceof AppError) {
        logger.error(`${err.message} [${err.code}]`);
    } else {
        logger.error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exitCode = 1;
});
