/**
 * `stepwise chat` — drive the configured workflow from the terminal.
 *
 * Each line the user types is one turn. Lines starting with "/" are meta
 * commands handled here and never reach the workflow.
 *
 * Dependency direction: chat.ts → commander, prompts, ora, chalk, agents/factory, workflow sessions
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import ora from 'ora';
import { createWorkflowAgent } from '../../agents/factory.js';
import { configExists, loadConfig } from '../../core/config/manager.js';
import { AgentWorkflow } from '../../core/workflow/engine.js';
import { ALL_STAGES, STAGE_LABELS } from '../../core/workflow/stages.js';
import { WorkflowSessions } from '../../core/workflow/sessions.js';
import { TokenTracker } from '../../core/workflow/token-tracker.js';
import type { Workflow, WorkflowAgent } from '../../core/workflow/types.js';
import { loadPromptSet } from '../../prompts/library.js';
import { logger } from '../../utils/logger.js';
import { createStreamRenderer } from '../utils/stream-renderer.js';

export type MetaCommandResult = { kind: 'exit' } | { kind: 'reply'; text: string };

const HELP_TEXT = [
    'Commands:',
    '  /status  show the workflow and its current stage',
    '  /reset   abandon the current request',
    '  /exit    leave the chat',
].join('\n');

/** Describe where a workflow stands, for `/status`. */
export function describeStatus(workflow: Workflow): string {
    const info = workflow.describe();
    const lines = [`Workflow: ${info.name} (${info.mode})`];

    if (workflow instanceof AgentWorkflow) {
        const state = workflow.state;
        if (state) {
            lines.push(`Request: ${state.originalRequest}`);
            lines.push(`Stage: ${STAGE_LABELS[state.stage]} (${ALL_STAGES.indexOf(state.stage) + 1}/${ALL_STAGES.length})`);
            lines.push(`Turns: ${state.iterationCount}`);
            lines.push(`Execution passes: ${state.executionResults.length}`);
        } else {
            lines.push('No request in progress.');
        }
    }

    return lines.join('\n');
}

/**
 * Handle a "/" command. Returns null when the input is not a meta command.
 */
export function handleMetaCommand(
    input: string,
    sessions: WorkflowSessions,
    sessionId: string,
): MetaCommandResult | null {
    const command = input.trim().toLowerCase();
    if (!command.startsWith('/')) return null;

    switch (command) {
        case '/exit':
        case '/quit':
            return { kind: 'exit' };
        case '/status':
            return { kind: 'reply', text: describeStatus(sessions.get(sessionId)) };
        case '/reset':
            sessions.end(sessionId);
            return { kind: 'reply', text: 'Workflow reset. Describe a new request to begin.' };
        case '/help':
            return { kind: 'reply', text: HELP_TEXT };
        default:
            return { kind: 'reply', text: `Unknown command: ${command}\n${HELP_TEXT}` };
    }
}

function turnLabel(workflow: Workflow): string {
    if (workflow instanceof AgentWorkflow) {
        const state = workflow.state;
        return state ? STAGE_LABELS[state.stage] : STAGE_LABELS.context_gathering;
    }
    return '💬 Reply';
}

async function runTurn(
    sessions: WorkflowSessions,
    sessionId: string,
    agent: WorkflowAgent,
    message: string,
    streaming: boolean,
): Promise<string> {
    const workflow = sessions.get(sessionId);

    if (streaming) {
        const renderer = createStreamRenderer(turnLabel(workflow));
        try {
            return await sessions.run(sessionId, agent, message, renderer.onToken);
        } finally {
            renderer.finish();
        }
    }

    const spinner = ora(`${turnLabel(workflow)}...`).start();
    try {
        return await sessions.run(sessionId, agent, message);
    } finally {
        spinner.stop();
    }
}

async function ask(): Promise<string | null> {
    const { message } = await prompts({
        type: 'text',
        name: 'message',
        message: chalk.cyan('you'),
    });
    return typeof message === 'string' ? message : null;
}

export const chatCommand = new Command('chat')
    .description('Start an interactive workflow session')
    .argument('[message]', 'First message to send')
    .option('-w, --workflow <name>', 'Workflow to run (overrides config)')
    .option('-s, --session <id>', 'Session id', 'default')
    .option('--no-stream', 'Show a spinner instead of streaming model output')
    .action(async (first: string | undefined, options: { workflow?: string; session: string; stream: boolean }) => {
        const projectRoot = process.cwd();

        if (!configExists(projectRoot)) {
            logger.error('No configuration found. Run "stepwise init" first.');
            process.exitCode = 1;
            return;
        }

        const config = loadConfig(projectRoot);
        const tokens = new TokenTracker();
        const sessions = new WorkflowSessions(options.workflow ?? config.workflow.name, {
            prompts: loadPromptSet(projectRoot),
            feedbackWindow: config.workflow.feedbackWindow,
            resultPreviewLength: config.workflow.resultPreviewLength,
            tokenTracker: tokens,
        });
        const agent = createWorkflowAgent(config);
        const streaming = options.stream && config.workflow.streaming;
        const sessionId = options.session;

        const info = sessions.get(sessionId).describe();
        logger.header(`stepwise — ${info.name} workflow`);
        console.log(chalk.gray(`  ${info.description}`));
        console.log(chalk.gray(`  Model: ${agent.providerName} / ${agent.model} — type /help for commands`));
        console.log();

        let input: string | null = first ?? (await ask());

        while (input !== null) {
            const meta = handleMetaCommand(input, sessions, sessionId);

            if (meta?.kind === 'exit') break;

            if (meta) {
                console.log(chalk.gray(meta.text));
            } else {
                const reply = await runTurn(sessions, sessionId, agent, input, streaming);
                console.log();
                console.log(reply);
            }

            console.log();
            input = await ask();
        }

        tokens.printSummary();
    });
