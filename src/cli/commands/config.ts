/**
 * `stepwise config` — show the active configuration.
 *
 * Dependency direction: config.ts → commander, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { configExists, loadConfig, getConfigPath } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import { logger } from '../../utils/logger.js';

/** Copy of the config that is safe to print: API keys are masked. */
export function redactConfig(config: AppConfig): AppConfig {
    const copy = structuredClone(config);
    if (copy.providers.anthropic) {
        const key = copy.providers.anthropic.apiKey;
        copy.providers.anthropic.apiKey = key.length > 8 ? `${key.slice(0, 4)}…${key.slice(-4)}` : '****';
    }
    return copy;
}

export const configCommand = new Command('config')
    .description('Show the current configuration')
    .option('-p, --path', 'Show config file path only')
    .action((options: { path?: boolean }) => {
        const projectRoot = process.cwd();

        if (!configExists(projectRoot)) {
            logger.error('No configuration found. Run "stepwise init" first.');
            process.exitCode = 1;
            return;
        }

        if (options.path) {
            console.log(getConfigPath(projectRoot));
            return;
        }

        const config = loadConfig(projectRoot);

        logger.header('Current Configuration');
        console.log(chalk.gray(`File: ${getConfigPath(projectRoot)}`));
        console.log();
        console.log(JSON.stringify(redactConfig(config), null, 2));
    });
