/**
 * `stepwise init` — interactive setup wizard.
 *
 * Walks the user through provider, model and workflow settings, then writes
 * `.stepwise/config.json` and the editable prompt templates.
 *
 * Dependency direction: init.ts → commander, prompts, ora, chalk, config module, prompts/library
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, saveConfig, getDefaultConfig, getConfigPath } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import { getAvailableWorkflows } from '../../core/workflow/registry.js';
import { PROVIDER_DESCRIPTIONS, PROVIDER_LABELS } from '../../providers/metadata.js';
import { getSupportedProviders, isSupportedProvider } from '../../providers/registry.js';
import type { LLMProviderName } from '../../providers/types.js';
import { generateDefaultPrompts, getPromptsDir } from '../../prompts/library.js';
import { logger } from '../../utils/logger.js';
import { pickModel } from '../utils/model-picker.js';

const TOTAL_STEPS = 4;

function writeProject(projectRoot: string, config: AppConfig): void {
    const spinner = ora('Saving configuration...').start();
    saveConfig(projectRoot, config);
    const created = generateDefaultPrompts(projectRoot);
    spinner.succeed(`Configuration saved to ${getConfigPath(projectRoot)}`);
    if (created.length > 0) {
        logger.info(`Wrote ${created.length} prompt template(s) to ${getPromptsDir(projectRoot)}`);
    }
}

export const initCommand = new Command('init')
    .description('Set up stepwise in the current project')
    .option('-f, --force', 'Overwrite existing configuration')
    .option('-y, --yes', 'Accept defaults without prompting')
    .action(async (options: { force?: boolean; yes?: boolean }) => {
        const projectRoot = process.cwd();

        logger.header('stepwise — Project Setup');

        if (configExists(projectRoot) && !options.force) {
            const { overwrite } = await prompts({
                type: 'confirm',
                name: 'overwrite',
                message: 'Configuration already exists. Overwrite?',
                initial: false,
            });

            if (overwrite !== true) {
                logger.info('Setup cancelled.');
                return;
            }
        }

        if (options.yes) {
            writeProject(projectRoot, getDefaultConfig());
            logger.success('Setup complete! Run "stepwise doctor" to verify your setup.');
            return;
        }

        const config = await runWizard();

        if (!config) {
            logger.info('Setup cancelled.');
            return;
        }

        writeProject(projectRoot, config);

        console.log();
        logger.success('Setup complete!');
        console.log(chalk.gray('  Next steps:'));
        console.log(chalk.gray('  1. Run "stepwise doctor" to verify providers'));
        console.log(chalk.gray('  2. Edit .stepwise/prompts/*.md to tune each stage'));
        console.log(chalk.gray('  3. Run "stepwise chat" to start a workflow'));
        console.log();
    });

/**
 * Run the interactive setup wizard. Returns null if the user cancels.
 */
async function runWizard(): Promise<AppConfig | null> {
    const config = getDefaultConfig();

    // ── Step 1: Provider Selection ──
    logger.step(1, TOTAL_STEPS, 'LLM Providers');
    const { providers: picked } = await prompts({
        type: 'multiselect',
        name: 'providers',
        message: 'Select LLM providers to configure (space to toggle, enter to confirm):',
        choices: getSupportedProviders().map((p) => ({
            title: PROVIDER_DESCRIPTIONS[p],
            value: p,
            selected: p === 'ollama',
        })),
        min: 1,
    });

    const selectedProviders: LLMProviderName[] = Array.isArray(picked)
        ? picked.filter((p): p is LLMProviderName => typeof p === 'string' && isSupportedProvider(p))
        : [];
    if (selectedProviders.length === 0) return null;

    // ── Step 2: Provider Configuration ──
    logger.step(2, TOTAL_STEPS, 'Provider Settings');
    config.providers = {};

    if (selectedProviders.includes('anthropic')) {
        const { apiKey } = await prompts({
            type: 'password',
            name: 'apiKey',
            message: 'Anthropic API key:',
            validate: (val: string) => val.length >= 8 || 'API key seems too short',
        });

        if (typeof apiKey !== 'string' || !apiKey) return null;

        config.providers.anthropic = {
            apiKey,
            baseUrl: 'https://api.anthropic.com',
            apiVersion: '2023-06-01',
        };
    }

    if (selectedProviders.includes('ollama')) {
        const { baseUrl } = await prompts({
            type: 'text',
            name: 'baseUrl',
            message: 'Ollama base URL:',
            initial: 'http://localhost:11434',
        });

        config.providers.ollama = {
            baseUrl: typeof baseUrl === 'string' && baseUrl ? baseUrl : 'http://localhost:11434',
        };
    }

    // ── Step 3: Agent Model ──
    logger.step(3, TOTAL_STEPS, 'Agent Model');

    let provider = selectedProviders[0] ?? 'ollama';
    if (selectedProviders.length > 1) {
        const { preferred } = await prompts({
            type: 'select',
            name: 'preferred',
            message: 'Which provider should the agent use?',
            choices: selectedProviders.map((p) => ({ title: PROVIDER_LABELS[p], value: p })),
        });

        if (typeof preferred !== 'string' || !isSupportedProvider(preferred)) return null;
        provider = preferred;
    }

    const model = await pickModel(provider, config.providers, `${PROVIDER_LABELS[provider]} model:`);
    if (!model) return null;

    config.agent = { ...config.agent, provider, model };
    console.log(chalk.gray(`  Agent: ${provider} / ${model}`));

    // ── Step 4: Workflow Settings ──
    logger.step(4, TOTAL_STEPS, 'Workflow Settings');
    const answers = await prompts([
        {
            type: 'select',
            name: 'name',
            message: 'Workflow to run in chat:',
            choices: getAvailableWorkflows().map((w) => ({
                title: w === 'agent' ? 'agent — analyse, plan, execute, review with approval' : `${w} — plain conversation`,
                value: w,
            })),
            initial: 0,
        },
        {
            type: 'confirm',
            name: 'streaming',
            message: 'Stream model output as it is generated?',
            initial: true,
        },
        {
            type: 'number',
            name: 'feedbackWindow',
            message: 'Feedback messages kept as context:',
            initial: config.workflow.feedbackWindow,
            min: 1,
            max: 200,
        },
    ]);

    if (answers.name === 'agent' || answers.name === 'basic') {
        config.workflow.name = answers.name;
    }
    if (typeof answers.streaming === 'boolean') {
        config.workflow.streaming = answers.streaming;
    }
    if (typeof answers.feedbackWindow === 'number') {
        config.workflow.feedbackWindow = answers.feedbackWindow;
    }

    return config;
}
