/**
 * `stepwise doctor` — health check for configuration, prompts and providers.
 *
 * Dependency direction: doctor.ts → commander, ora, chalk, config module, registry
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, loadConfig } from '../../core/config/manager.js';
import { loadIntentLexicon } from '../../core/workflow/intent.js';
import { ALL_PROMPT_KINDS, getPromptsDir } from '../../prompts/library.js';
import { createProvider, validateAllProviders } from '../../providers/registry.js';
import { fileExists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { join } from 'node:path';

function pass(message: string): void {
    console.log(chalk.green(`  ✔ ${message}`));
}

function fail(message: string): void {
    console.log(chalk.red(`  ✘ ${message}`));
}

function skip(message: string): void {
    console.log(chalk.gray(`  - ${message}`));
}

export const doctorCommand = new Command('doctor')
    .description('Check project setup and provider health')
    .action(async () => {
        const projectRoot = process.cwd();
        let healthy = true;

        logger.header('stepwise — Health Check');

        if (!configExists(projectRoot)) {
            fail('No configuration file — run "stepwise init"');
            process.exitCode = 1;
            return;
        }
        pass('Configuration file found');

        const config = loadConfig(projectRoot);
        pass('Configuration is valid');

        try {
            loadIntentLexicon();
            pass('Intent lexicon loaded');
        } catch (err) {
            fail(`Intent lexicon: ${err instanceof Error ? err.message : String(err)}`);
            healthy = false;
        }

        const promptsDir = getPromptsDir(projectRoot);
        const missing = ALL_PROMPT_KINDS.filter((kind) => !fileExists(join(promptsDir, `${kind}.md`)));
        if (missing.length === 0) {
            pass('Prompt templates present');
        } else {
            skip(`Using built-in prompts for: ${missing.join(', ')}`);
        }

        console.log();
        logger.info('Checking provider connections...');

        const spinner = ora('Testing providers...').start();
        const results = await validateAllProviders(config.providers);
        spinner.stop();

        for (const [name, ok] of Object.entries(results)) {
            const configured = name === 'anthropic' ? Boolean(config.providers.anthropic) : Boolean(config.providers.ollama);
            if (ok) {
                pass(`${name} — connected`);
            } else if (configured) {
                fail(`${name} — connection failed`);
                healthy = false;
            } else {
                skip(`${name} — not configured (skipped)`);
            }
        }

        const { provider, model } = config.agent;
        if (!results[provider]) {
            fail(`Agent provider "${provider}" is not reachable`);
            healthy = false;
        } else if (provider === 'ollama') {
            const models = await createProvider(provider, config.providers).listModels();
            if (models.some((m) => m.id === model)) {
                pass(`Model ${model} is available`);
            } else {
                fail(`Model ${model} not found in Ollama — run "ollama pull ${model}"`);
                healthy = false;
            }
        }

        console.log();
        if (healthy) {
            logger.success('All checks passed! You\'re ready to go.');
        } else {
            logger.warn('Some checks failed. Review the output above.');
            process.exitCode = 1;
        }
    });
