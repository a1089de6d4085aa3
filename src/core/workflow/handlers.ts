/**
 * Stage handlers — one per workflow stage.
 *
 * Each handler works on the draft state it is given, makes at most two
 * collaborator calls, may advance the stage, and returns the reply for the
 * human. Handlers throw freely: the engine discards the draft on failure.
 *
 * Dependency direction: handlers.ts → state, stages, intent, summary, plan-parser, prompts/library
 * Used by: core/workflow/engine.ts
 */

import type { ChatMessage } from '../../providers/types.js';
import type { PromptKind, PromptSet } from '../../prompts/library.js';
import { StageExecutionError } from '../errors.js';
import { classifyReviewFeedback, extractNewRequest, isPlanApproved, stripSelector } from './intent.js';
import { formatPlanForExecution, parsePlan } from './plan-parser.js';
import { WorkflowStage } from './stages.js';
import {
    advanceStage,
    ContextKey,
    latestFeedback,
    type WorkflowPlan,
    type WorkflowState,
} from './state.js';
import {
    buildFullContext,
    createFinalSummary,
    renderPlan,
    renderReviewMenu,
    summarizeExecutionResults,
} from './summary.js';
import type { TokenTracker } from './token-tracker.js';
import type { StreamingCallback, WorkflowAgent } from './types.js';

/** Context key holding the follow-up request for an additional execution pass. */
export const FOLLOW_UP_KEY = 'follow_up';

/** Engine settings the handlers read. */
export interface HandlerOptions {
    prompts: PromptSet;
    feedbackWindow: number;
    /** Max characters of an execution result echoed back in the reply. */
    resultPreviewLength: number;
}

/** Everything a handler needs for one turn. */
export interface StageContext {
    /** Draft state; committed by the engine only if the handler returns. */
    state: WorkflowState;
    agent: WorkflowAgent;
    /** The raw message of this turn (empty on the first turn and on "continue"). */
    message: string;
    onToken?: StreamingCallback;
    tokens: TokenTracker;
    options: HandlerOptions;
}

export interface StageOutcome {
    reply: string;
    /**
     * Set when the human asked for a different request: the engine drops
     * the state and, when non-empty, seeds a new workflow from this text.
     */
    restartWith?: string;
}

export type StageHandler = (ctx: StageContext) => Promise<StageOutcome>;

const APPROVAL_PROMPT = 'Approve this plan? Reply "1" or "approve" to execute it, or describe what should change.';

// ── Collaborator helpers ──

async function complete(ctx: StageContext, kind: PromptKind, userContent: string): Promise<string> {
    const messages: ChatMessage[] = [
        { role: 'system', content: ctx.options.prompts[kind] },
        { role: 'user', content: userContent },
    ];

    const response = await ctx.agent.generateResponse(messages, ctx.onToken);
    ctx.tokens.record(ctx.state.stage, response.model, response.usage);

    const text = response.text.trim();
    if (!text) {
        throw new StageExecutionError(ctx.state.stage, `The model returned an empty response for the ${kind} step`);
    }
    return text;
}

async function draftPlan(ctx: StageContext): Promise<WorkflowPlan> {
    const { state } = ctx;
    const planText = await complete(
        ctx,
        'planning',
        `## Request\n\n${state.originalRequest}\n\n## Context\n\n${buildFullContext(state, {
            feedbackWindow: ctx.options.feedbackWindow,
        })}`,
    );

    const plan = parsePlan(planText);
    if (!plan) {
        throw new StageExecutionError(state.stage, 'The planning step produced an empty plan');
    }
    return plan;
}

/** Feedback that arrived with this turn; an empty turn carries none. */
function turnFeedback(ctx: StageContext): string {
    return ctx.message.trim() ? latestFeedback(ctx.state) : '';
}

function preview(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}\n… (truncated)` : text;
}

// ── Handlers ──

export const handleContextGathering: StageHandler = async (ctx) => {
    const { state } = ctx;

    const analysis = await complete(ctx, 'analysis', `## Request\n\n${state.originalRequest}`);
    state.context[ContextKey.Analysis] = analysis;

    const gathered = await complete(
        ctx,
        'gathering',
        `## Request\n\n${state.originalRequest}\n\n## Analysis\n\n${analysis}`,
    );
    state.context[ContextKey.GatheredInfo] = gathered;

    advanceStage(state, WorkflowStage.Planning, 'context_ready');

    return {
        reply: [
            '📋 Request analysis complete — context gathered.',
            '',
            'Analysis:',
            preview(analysis, ctx.options.resultPreviewLength),
            '',
            'Add any details I should know, or send an empty message to continue to planning.',
        ].join('\n'),
    };
};

export const handlePlanning: StageHandler = async (ctx) => {
    const plan = await draftPlan(ctx);
    ctx.state.currentPlan = plan;
    advanceStage(ctx.state, WorkflowStage.Execution, 'plan_ready');

    return {
        reply: ['🧭 Execution plan ready.', '', renderPlan(plan), '', APPROVAL_PROMPT].join('\n'),
    };
};

export const handleExecution: StageHandler = async (ctx) => {
    const { state } = ctx;
    const feedback = turnFeedback(ctx);

    if (!isPlanApproved(feedback)) {
        if (!feedback) {
            const current = state.currentPlan ? renderPlan(state.currentPlan) : '(no plan yet)';
            return { reply: ['⏸️  Waiting for plan approval.', '', current, '', APPROVAL_PROMPT].join('\n') };
        }

        const revised = await draftPlan(ctx);
        state.currentPlan = revised;
        return {
            reply: ['✏️  Plan revision requested — here is the updated plan.', '', renderPlan(revised), '', APPROVAL_PROMPT].join('\n'),
        };
    }

    const plan = state.currentPlan;
    if (!plan) {
        throw new StageExecutionError(state.stage, 'There is no plan to execute');
    }

    const outcome = await ctx.agent.executeTask(buildExecutionTask(ctx, plan), ctx.onToken);
    ctx.tokens.record(state.stage, outcome.model, outcome.usage);

    const result = outcome.response.trim();
    state.executionResults.push({ result, success: result.length > 0, usedTools: outcome.usedTools });
    advanceStage(state, WorkflowStage.Review, 'plan_executed');

    const lines = [`⚙️  Plan execution complete (pass ${state.executionResults.length}).`, ''];
    if (outcome.usedTools.length > 0) {
        lines.push(`Tools used: ${outcome.usedTools.join(', ')}`, '');
    }
    lines.push(result ? preview(result, ctx.options.resultPreviewLength) : '(the execution produced no output)');
    lines.push('', renderReviewMenu());

    return { reply: lines.join('\n') };
};

function buildExecutionTask(ctx: StageContext, plan: WorkflowPlan): string {
    const { state } = ctx;
    const parts = [
        ctx.options.prompts.execution.trim(),
        `## Request\n\n${state.originalRequest}`,
        `## Approved Plan\n\n${formatPlanForExecution(plan)}`,
    ];

    if (state.executionResults.length > 0) {
        parts.push(`## Previous Results\n\n${summarizeExecutionResults(state)}`);
    }

    const followUp = state.context[FOLLOW_UP_KEY];
    if (followUp) {
        parts.push(`## Follow-up Request\n\n${followUp}`);
    }

    return parts.join('\n\n');
}

export const handleReview: StageHandler = async (ctx) => {
    const { state } = ctx;
    state.context[ContextKey.Review] = summarizeExecutionResults(state);

    const feedback = turnFeedback(ctx);

    switch (classifyReviewFeedback(feedback)) {
        case 'complete':
            advanceStage(state, WorkflowStage.Completed, 'result_accepted');
            return { reply: createFinalSummary(state) };

        case 'additional_work': {
            const followUp = stripSelector(feedback);
            if (followUp) {
                state.context[FOLLOW_UP_KEY] = followUp;
            } else {
                delete state.context[FOLLOW_UP_KEY];
            }
            advanceStage(state, WorkflowStage.Execution, 'additional_work');

            const lines = ['🔁 Follow-up request noted.', ''];
            if (followUp) lines.push(`"${followUp}"`, '');
            lines.push('Reply "1" or "approve" to run another execution pass, or describe what should change in the plan.');
            return { reply: lines.join('\n') };
        }

        case 'new_request':
            return {
                reply: '🆕 Closing this workflow. What would you like to do next?',
                restartWith: extractNewRequest(feedback),
            };

        case 'unrecognized':
            return {
                reply: ['🔍 Result review', '', state.context[ContextKey.Review] ?? '', '', renderReviewMenu()].join('\n'),
            };
    }
};

/**
 * Only reachable if a completed state was ever committed; the engine clears
 * state as soon as it observes the completed stage.
 */
export const handleCompleted: StageHandler = async (ctx) => ({
    reply: createFinalSummary(ctx.state),
});

/** Dispatch table; typed as a full record so every stage has a handler. */
export const STAGE_HANDLERS: Record<WorkflowStage, StageHandler> = {
    context_gathering: handleContextGathering,
    planning: handlePlanning,
    execution: handleExecution,
    review: handleReview,
    completed: handleCompleted,
};
