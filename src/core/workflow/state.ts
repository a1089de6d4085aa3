/**
 * Workflow state — the record describing one in-flight workflow.
 *
 * A single instance is owned by one engine. Stage handlers receive a draft
 * copy of it; the engine commits the draft only when the handler succeeds.
 *
 * Dependency direction: state.ts → stages
 * Used by: stage handlers, summary builders, engine
 */

import { assertTransition, WorkflowStage } from './stages.js';

/** The structured plan produced by the planning stage. */
export interface WorkflowPlan {
    /** Full plan text as produced by the model. */
    description: string;
    /** Individual steps extracted from the description. */
    steps: string[];
}

/** Outcome of one execution pass. */
export interface ExecutionResult {
    result: string;
    success: boolean;
    /** Tools the collaborator reported using, if any. */
    usedTools: string[];
}

/** One recorded stage change. */
export interface StageTransition {
    from: WorkflowStage;
    to: WorkflowStage;
    /** What caused the move (e.g. "context_ready", "plan_approved"). */
    trigger: string;
    at: number;
}

export interface WorkflowState {
    stage: WorkflowStage;
    readonly originalRequest: string;
    /** Accumulated knowledge; insertion order is preserved, keys are reused to update. */
    context: Record<string, string>;
    currentPlan: WorkflowPlan | null;
    userFeedback: string[];
    executionResults: ExecutionResult[];
    iterationCount: number;
    history: StageTransition[];
    readonly createdAt: number;
}

/** Well-known context keys written by the stage handlers. */
export const ContextKey = {
    Analysis: 'analysis',
    GatheredInfo: 'gathered_info',
    Review: 'review',
} as const;

/** Create a fresh state for a new request. */
export function createWorkflowState(originalRequest: string): WorkflowState {
    return {
        stage: WorkflowStage.ContextGathering,
        originalRequest,
        context: {},
        currentPlan: null,
        userFeedback: [],
        executionResults: [],
        iterationCount: 0,
        history: [],
        createdAt: Date.now(),
    };
}

/** Deep copy a state so a handler can work on it without touching the committed one. */
export function cloneState(state: WorkflowState): WorkflowState {
    return structuredClone(state);
}

/**
 * Move the state to the next stage, recording the transition.
 * @throws {WorkflowError} if the transition is not allowed.
 */
export function advanceStage(state: WorkflowState, to: WorkflowStage, trigger: string): void {
    assertTransition(state.stage, to);
    state.history.push({ from: state.stage, to, trigger, at: Date.now() });
    state.stage = to;
}

/** The most recent feedback message, or an empty string when there is none. */
export function latestFeedback(state: WorkflowState): string {
    return state.userFeedback.at(-1) ?? '';
}
