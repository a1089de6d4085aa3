/**
 * Prompt library — manages the per-stage prompt templates.
 *
 * When `stepwise init` runs, default prompt files are generated in
 * `.stepwise/prompts/`. Users can edit these to change how each stage
 * instructs the model. Missing files fall back to the built-in defaults.
 *
 * Dependency direction: library.ts → utils/fs, core/config/defaults
 * Used by: stage handlers (defaults), chat command, init command
 */

import { join } from 'node:path';
import { CONFIG_DIR_NAME } from '../core/config/defaults.js';
import { ensureDir, fileExists, readTextFile, writeTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

const PROMPTS_DIR = 'prompts';

/** Every prompt the workflows use. */
export type PromptKind = 'analysis' | 'gathering' | 'planning' | 'execution' | 'chat';

export const ALL_PROMPT_KINDS: readonly PromptKind[] = [
    'analysis',
    'gathering',
    'planning',
    'execution',
    'chat',
] as const;

export type PromptSet = Record<PromptKind, string>;

// ── Default Prompts ──

export const DEFAULT_PROMPTS: PromptSet = {
    analysis: `# Request Analysis

You are a senior engineer reading a new request from a user.

## What you do:
- Restate the goal in one or two sentences
- List the explicit requirements
- Call out anything ambiguous or missing
- Note constraints (language, environment, files) the user mentioned

Be concise. Do not propose a solution yet.
`,

    gathering: `# Context Gathering

You are preparing to plan a task. You receive the user's request and an
analysis of it.

## What you do:
- List the information, files, or facts needed to complete the task
- State reasonable assumptions for anything the user did not specify
- Identify risks and edge cases worth planning for

Output a short structured list. Do not write the solution yet.
`,

    planning: `# Planning

You turn a request and its gathered context into an execution plan.

## Output format:
1. A one-paragraph summary of the approach
2. A numbered list of concrete steps, one action per line

Every step must be directly actionable. Take any user feedback into account.
`,

    execution: `# Execution

Carry out the approved plan below step by step. Use the tools available to
you when a step needs them. Report what you did and the final result.
`,

    chat: `You are a helpful assistant. Answer clearly and concisely.
`,
};

// ── Public API ──

/** Get the prompts directory path. */
export function getPromptsDir(projectRoot: string): string {
    return join(projectRoot, CONFIG_DIR_NAME, PROMPTS_DIR);
}

/**
 * Write the default prompt files into `.stepwise/prompts/`.
 * Only creates files that don't already exist, so user edits survive.
 * Returns the paths that were created.
 */
export function generateDefaultPrompts(projectRoot: string): string[] {
    const promptsDir = getPromptsDir(projectRoot);
    ensureDir(promptsDir);

    const created: string[] = [];
    for (const kind of ALL_PROMPT_KINDS) {
        const filePath = join(promptsDir, `${kind}.md`);
        if (!fileExists(filePath)) {
            writeTextFile(filePath, DEFAULT_PROMPTS[kind]);
            logger.debug(`Created prompt: ${filePath}`);
            created.push(filePath);
        }
    }

    return created;
}

/** Load one prompt, falling back to the built-in default. */
export function loadPrompt(projectRoot: string, kind: PromptKind): string {
    const filePath = join(getPromptsDir(projectRoot), `${kind}.md`);
    return fileExists(filePath) ? readTextFile(filePath) : DEFAULT_PROMPTS[kind];
}

/** Load the full prompt set for a project. */
export function loadPromptSet(projectRoot: string): PromptSet {
    const prompts = { ...DEFAULT_PROMPTS };
    for (const kind of ALL_PROMPT_KINDS) {
        prompts[kind] = loadPrompt(projectRoot, kind);
    }
    return prompts;
}
