/**
 * Workflow engine — the interactive, multi-turn agent workflow.
 *
 * Drives one request through the stage pipeline, one stage per `run()`
 * call, pausing for human feedback between turns:
 *
 *   context_gathering → planning → execution ⇄ review → completed
 *
 * The engine owns at most one workflow state. Each turn the matching stage
 * handler works on a draft copy; the draft replaces the committed state only
 * when the handler succeeds, so a failing turn leaves the workflow exactly
 * where it was and can be retried.
 *
 * Callers must not overlap `run()` calls on one engine; use one engine per
 * conversation (see sessions.ts).
 *
 * Dependency direction: engine.ts → handlers, state, stages, token-tracker, prompts/library
 * Used by: workflow registry, session manager, chat command
 */

import { DEFAULT_PROMPTS, type PromptSet } from '../../prompts/library.js';
import { logger } from '../../utils/logger.js';
import { StageExecutionError } from '../errors.js';
import { STAGE_HANDLERS, type HandlerOptions, type StageOutcome } from './handlers.js';
import { STAGE_LABELS, WorkflowStage } from './stages.js';
import { cloneState, createWorkflowState, type WorkflowState } from './state.js';
import { DEFAULT_FEEDBACK_WINDOW } from './summary.js';
import { TokenTracker } from './token-tracker.js';
import type { StreamingCallback, Workflow, WorkflowAgent, WorkflowInfo } from './types.js';

const log = logger.scoped('workflow');

export interface AgentWorkflowOptions {
    /** Prompt overrides; missing kinds use the built-in defaults. */
    prompts?: Partial<PromptSet>;
    /** Feedback entries included in the planning context. */
    feedbackWindow?: number;
    /** Max characters of model output echoed back in a reply. */
    resultPreviewLength?: number;
    /** Shared tracker, e.g. one per CLI session. */
    tokenTracker?: TokenTracker;
}

const DEFAULT_RESULT_PREVIEW = 500;

export class AgentWorkflow implements Workflow {
    public readonly name = 'agent';
    public readonly tokens: TokenTracker;
    private readonly options: HandlerOptions;
    private current: WorkflowState | null = null;
    private running = false;

    constructor(options: AgentWorkflowOptions = {}) {
        this.tokens = options.tokenTracker ?? new TokenTracker();
        this.options = {
            prompts: { ...DEFAULT_PROMPTS, ...options.prompts },
            feedbackWindow: options.feedbackWindow ?? DEFAULT_FEEDBACK_WINDOW,
            resultPreviewLength: options.resultPreviewLength ?? DEFAULT_RESULT_PREVIEW,
        };
    }

    /** Snapshot of the in-flight workflow, or null when idle. */
    get state(): WorkflowState | null {
        return this.current ? cloneState(this.current) : null;
    }

    /** Turns processed since the workflow began; 0 when idle. */
    get iterationCount(): number {
        return this.current?.iterationCount ?? 0;
    }

    get isActive(): boolean {
        return this.current !== null;
    }

    /** Abandon the in-flight workflow, if any. */
    reset(): void {
        if (this.current) {
            log.debug(`Workflow reset at stage ${this.current.stage}`);
        }
        this.current = null;
    }

    describe(): WorkflowInfo {
        return {
            name: this.name,
            description:
                'Interactive staged workflow: analyse the request, gather context, plan, execute and review, pausing for feedback at every step',
            mode: 'collaborative',
            supportsStreaming: true,
        };
    }

    /**
     * Process one human message and return the reply. Never rejects.
     *
     * With no workflow in flight the message becomes the request and context
     * gathering runs. Otherwise the message is recorded as feedback (unless
     * empty) and the handler for the current stage runs.
     */
    async run(agent: WorkflowAgent, message: string, streamingCallback?: StreamingCallback): Promise<string> {
        if (this.running) {
            log.warn('Ignoring message: the previous turn is still running');
            return '⏳ Still working on the previous message. Please wait for it to finish.';
        }

        const previous = this.current;
        if (!previous && !message.trim()) {
            return 'Describe what you would like me to do to start a new workflow.';
        }

        this.running = true;
        let stage: WorkflowStage = previous?.stage ?? WorkflowStage.ContextGathering;

        try {
            const draft = previous ? cloneState(previous) : createWorkflowState(message);
            if (previous) {
                if (message.trim()) {
                    draft.userFeedback.push(message);
                }
                draft.iterationCount += 1;
            }
            stage = draft.stage;

            log.debug(`Turn ${draft.iterationCount}: dispatching to ${stage}`);

            const outcome = await STAGE_HANDLERS[stage]({
                state: draft,
                agent,
                message: previous ? message : '',
                onToken: streamingCallback,
                tokens: this.tokens,
                options: this.options,
            });

            return await this.commit(draft, outcome, agent, streamingCallback);
        } catch (err) {
            const failure = StageExecutionError.from(stage, err);
            log.error(`${STAGE_LABELS[stage]} failed: ${failure.message}`);
            return [
                `⚠️  An error occurred while running the workflow (${stage}): ${failure.message}`,
                'Your progress has been kept. Send the same reply again to retry this step.',
            ].join('\n');
        } finally {
            this.running = false;
        }
    }

    private async commit(
        draft: WorkflowState,
        outcome: StageOutcome,
        agent: WorkflowAgent,
        streamingCallback?: StreamingCallback,
    ): Promise<string> {
        if (outcome.restartWith !== undefined) {
            if (!outcome.restartWith) {
                this.current = null;
                return outcome.reply;
            }

            log.info(`Starting a new request: ${outcome.restartWith}`);
            const seeded = createWorkflowState(outcome.restartWith);
            const first = await STAGE_HANDLERS[seeded.stage]({
                state: seeded,
                agent,
                message: '',
                onToken: streamingCallback,
                tokens: this.tokens,
                options: this.options,
            });
            this.current = seeded;
            return `🆕 Starting a new request: ${outcome.restartWith}\n\n${first.reply}`;
        }

        if (draft.stage === WorkflowStage.Completed) {
            log.success(`Workflow complete after ${draft.iterationCount} turn(s)`);
            this.current = null;
            return outcome.reply;
        }

        this.current = draft;
        return outcome.reply;
    }
}
