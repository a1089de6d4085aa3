/**
 * Plan parser — extracts the step list from the planning model's output.
 *
 * Numbered ("1." / "2)") and bulleted ("-" / "*") lines are steps. When the
 * model produced neither, every non-heading line counts as a step.
 *
 * Dependency direction: plan-parser.ts → workflow/state
 * Used by: planning and execution handlers
 */

import type { WorkflowPlan } from './state.js';

const STEP_LINE = /^\s*(?:\d+[.)]|[-*•])\s+(.+)$/;
const HEADING_LINE = /^\s*#{1,6}\s/;

/** True for a numbered or bulleted line. */
export function isStepLine(line: string): boolean {
    return STEP_LINE.test(line);
}

/** Parse model output into a plan. Returns null when the text is blank. */
export function parsePlan(text: string): WorkflowPlan | null {
    const description = text.trim();
    if (!description) return null;

    const lines = description.split('\n');
    const steps: string[] = [];

    for (const line of lines) {
        const match = STEP_LINE.exec(line);
        if (match?.[1]) {
            steps.push(stripEmphasis(match[1]));
        }
    }

    if (steps.length === 0) {
        for (const line of lines) {
            const trimmed = line.trim();
            if (trimmed && !HEADING_LINE.test(trimmed)) {
                steps.push(stripEmphasis(trimmed));
            }
        }
    }

    return { description, steps };
}

function stripEmphasis(step: string): string {
    return step.replace(/\*\*(.+?)\*\*/g, '$1').trim();
}

/** Format a plan as a task description for the execution collaborator. */
export function formatPlanForExecution(plan: WorkflowPlan): string {
    if (plan.steps.length === 0) return plan.description;
    return plan.steps.map((step, i) => `${i + 1}. ${step}`).join('\n');
}
