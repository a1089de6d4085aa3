/**
 * Summary builders — render workflow state as human-readable text.
 *
 * Pure functions with no side effects; the stage handlers compose their
 * replies from these.
 *
 * Dependency direction: summary.ts → workflow/state, workflow/plan-parser
 * Used by: stage handlers
 */

import { isStepLine } from './plan-parser.js';
import { ContextKey, type WorkflowPlan, type WorkflowState } from './state.js';

/** Number of feedback entries kept in the planning context by default. */
export const DEFAULT_FEEDBACK_WINDOW = 20;

/**
 * Concatenate context entries and user feedback into one block for the
 * planning prompt. Only the most recent `feedbackWindow` feedback entries
 * are kept.
 */
export function buildFullContext(
    state: WorkflowState,
    options: { feedbackWindow?: number } = {},
): string {
    const window = options.feedbackWindow ?? DEFAULT_FEEDBACK_WINDOW;
    const parts: string[] = [];

    for (const [key, value] of Object.entries(state.context)) {
        parts.push(`## ${key}\n${value}`);
    }

    const feedback = window > 0 ? state.userFeedback.slice(-window) : [];
    if (feedback.length > 0) {
        parts.push(`## user_feedback\n${feedback.map((f) => `- ${f}`).join('\n')}`);
    }

    return parts.join('\n\n');
}

/** One "Execution N: <result>" line per recorded execution pass. */
export function summarizeExecutionResults(state: WorkflowState): string {
    if (state.executionResults.length === 0) {
        return 'No execution results yet.';
    }

    return state.executionResults
        .map((entry, i) => {
            const marker = entry.success ? '' : ' (failed)';
            return `Execution ${i + 1}${marker}: ${entry.result}`;
        })
        .join('\n');
}

/**
 * Render a plan as a numbered step list under the first line of its
 * description. A plan that opens straight with a step gets no header.
 */
export function renderPlan(plan: WorkflowPlan): string {
    if (plan.steps.length === 0) return plan.description;

    const steps = `Steps:\n${plan.steps.map((step, i) => `${i + 1}. ${step}`).join('\n')}`;
    const header = plan.description.split('\n')[0] ?? '';
    return isStepLine(header) ? steps : `${header}\n\n${steps}`;
}

/** The three-way menu shown after each execution pass. */
export function renderReviewMenu(): string {
    return [
        'What would you like to do next?',
        '1. Complete — accept the result and finish',
        '2. Additional work — refine or extend the result',
        '3. New request — start a different task',
    ].join('\n');
}

function excerpt(text: string | undefined, max = 200): string {
    if (!text) return '(none)';
    const flat = text.replace(/\s+/g, ' ').trim();
    return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

/**
 * Fixed five-point recap shown when the workflow concludes:
 * request understood → context gathered → plan produced → execution
 * performed → review completed.
 */
export function createFinalSummary(state: WorkflowState): string {
    const passes = state.executionResults.length;
    const succeeded = state.executionResults.filter((r) => r.success).length;
    const plan = state.currentPlan ? excerpt(state.currentPlan.description) : '(no plan)';

    return [
        '🎉 Agent workflow complete',
        '',
        `Request: ${state.originalRequest}`,
        '',
        `1. Request understood — ${excerpt(state.context[ContextKey.Analysis])}`,
        `2. Context gathered — ${excerpt(state.context[ContextKey.GatheredInfo])}`,
        `3. Plan produced — ${plan}`,
        `4. Execution performed — ${succeeded}/${passes} pass(es) succeeded`,
        `5. Review completed — ${excerpt(state.context[ContextKey.Review])}`,
    ].join('\n');
}
