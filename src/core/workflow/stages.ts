/**
 * Workflow stages and the transitions allowed between them.
 *
 * The pipeline only moves forward, with a single loop from review back to
 * execution for follow-up work:
 *
 *   context_gathering → planning → execution ⇄ review → completed
 *
 * Dependency direction: stages.ts → core/errors
 * Used by: workflow state, stage handlers, engine
 */

import { WorkflowError } from '../errors.js';

export const WorkflowStage = {
    ContextGathering: 'context_gathering',
    Planning: 'planning',
    Execution: 'execution',
    Review: 'review',
    Completed: 'completed',
} as const;

export type WorkflowStage = (typeof WorkflowStage)[keyof typeof WorkflowStage];

/** Display-friendly labels for each stage. */
export const STAGE_LABELS: Record<WorkflowStage, string> = {
    context_gathering: '🔎 Context gathering',
    planning: '🧭 Planning',
    execution: '⚙️  Execution',
    review: '🔍 Review',
    completed: '✅ Completed',
};

/** Every stage in pipeline order. */
export const ALL_STAGES: readonly WorkflowStage[] = [
    'context_gathering',
    'planning',
    'execution',
    'review',
    'completed',
] as const;

const ALLOWED_TRANSITIONS: Record<WorkflowStage, readonly WorkflowStage[]> = {
    context_gathering: ['planning'],
    planning: ['execution'],
    execution: ['review'],
    review: ['execution', 'completed'],
    completed: [],
};

/** Check whether moving from one stage to another is legal. */
export function canTransition(from: WorkflowStage, to: WorkflowStage): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Guard a transition.
 * @throws {WorkflowError} if the move is not in the transition table.
 */
export function assertTransition(from: WorkflowStage, to: WorkflowStage): void {
    if (!canTransition(from, to)) {
        throw new WorkflowError(`Invalid stage transition: ${from} → ${to}`, {
            from,
            to,
            allowed: ALLOWED_TRANSITIONS[from],
        });
    }
}
