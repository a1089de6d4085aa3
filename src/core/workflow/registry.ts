/**
 * Workflow registry — maps workflow names to factories.
 *
 * New workflows are added by calling `registerWorkflow()` with a factory;
 * consumers only ever go through `createWorkflow()`.
 *
 * Dependency direction: registry.ts → engine, basic-chat, core/errors
 * Used by: session manager, chat command
 */

import type { PromptSet } from '../../prompts/library.js';
import { logger } from '../../utils/logger.js';
import { WorkflowError } from '../errors.js';
import { BasicChatWorkflow } from './basic-chat.js';
import { AgentWorkflow } from './engine.js';
import type { TokenTracker } from './token-tracker.js';
import type { Workflow } from './types.js';

/** Settings every factory receives; each workflow reads what applies to it. */
export interface WorkflowFactoryOptions {
    prompts?: Partial<PromptSet>;
    /** Feedback (agent) or conversation (basic) entries kept as context. */
    feedbackWindow?: number;
    resultPreviewLength?: number;
    tokenTracker?: TokenTracker;
}

export type WorkflowFactory = (options: WorkflowFactoryOptions) => Workflow;

const WORKFLOW_FACTORIES = new Map<string, WorkflowFactory>([
    ['agent', (options) => new AgentWorkflow(options)],
    [
        'basic',
        (options) =>
            new BasicChatWorkflow({
                systemPrompt: options.prompts?.chat,
                historyWindow: options.feedbackWindow,
                tokenTracker: options.tokenTracker,
            }),
    ],
]);

/**
 * Look up a workflow factory by name (case-insensitive).
 * @throws {WorkflowError} if no workflow is registered under that name.
 */
export function getWorkflow(name: string): WorkflowFactory {
    const key = name.toLowerCase();
    const factory = WORKFLOW_FACTORIES.get(key);

    if (!factory) {
        throw new WorkflowError(
            `Unknown workflow: "${name}". Available: ${getAvailableWorkflows().join(', ')}`,
            { workflow: name, available: getAvailableWorkflows() },
        );
    }

    return factory;
}

/** Create a fresh workflow instance by name. */
export function createWorkflow(name: string, options: WorkflowFactoryOptions = {}): Workflow {
    logger.debug(`Creating workflow: ${name}`);
    return getWorkflow(name)(options);
}

/** Register (or replace) a workflow under a name. */
export function registerWorkflow(name: string, factory: WorkflowFactory): void {
    WORKFLOW_FACTORIES.set(name.toLowerCase(), factory);
    logger.debug(`Registered workflow: ${name}`);
}

/** All registered workflow names. */
export function getAvailableWorkflows(): string[] {
    return [...WORKFLOW_FACTORIES.keys()];
}
