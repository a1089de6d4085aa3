/**
 * Question typing for the basic chat workflow.
 *
 * Each message is sorted into a coarse kind (code help, explanation,
 * comparison, troubleshooting, general) by keyword, and the prompt sent to
 * the model asks for an answer shaped for that kind. Rules are tried in file
 * order and the first hit wins, so a message mentioning both "error" and
 * "why" is code help.
 *
 * The keyword rules live in data/question-types.json.
 *
 * Dependency direction: question-type.ts → zod, intent (keyword matching), utils/fs, core/errors
 * Used by: basic chat workflow
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { readJsonFile } from '../../utils/fs.js';
import { ValidationError } from '../errors.js';
import { containsKeyword, normalizeText } from './intent.js';

const RULE_TYPES = ['code_help', 'explanation', 'comparison', 'troubleshooting'] as const;

/** Kinds with a keyword rule, plus the `general` fallback. */
export type QuestionType = (typeof RULE_TYPES)[number] | 'general';

export const questionTypeRulesSchema = z.object({
    rules: z
        .array(
            z.object({
                type: z.enum(RULE_TYPES),
                keywords: z.array(z.string().trim().min(1)).min(1),
            }),
        )
        .min(1),
});

export type QuestionTypeRules = z.infer<typeof questionTypeRulesSchema>;

const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../../data/question-types.json', import.meta.url));

let defaultRules: QuestionTypeRules | undefined;

/**
 * Load and validate a question-type rules file.
 * @throws {ValidationError} if the file does not match the rules schema.
 */
export function loadQuestionTypeRules(filePath: string = DEFAULT_RULES_PATH): QuestionTypeRules {
    const result = questionTypeRulesSchema.safeParse(readJsonFile(filePath));

    if (!result.success) {
        const issues = result.error.issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
        throw new ValidationError(`Invalid question-type rules:\n${issues}`, { filePath });
    }

    return result.data;
}

function getDefaultRules(): QuestionTypeRules {
    defaultRules ??= loadQuestionTypeRules();
    return defaultRules;
}

export function detectQuestionType(message: string, rules: QuestionTypeRules = getDefaultRules()): QuestionType {
    const text = normalizeText(message);
    if (!text) return 'general';

    const hit = rules.rules.find((rule) => rule.keywords.some((k) => containsKeyword(text, k)));
    return hit?.type ?? 'general';
}

const TEMPLATES: Record<QuestionType, (question: string) => string> = {
    code_help: (q) =>
        [
            'Answer the following programming question clearly and practically.',
            '',
            `Question: ${q}`,
            '',
            'Include:',
            '- the core solution',
            '- a short code example where it helps',
            '- caveats or tips',
            '',
            'Keep the answer concise.',
        ].join('\n'),
    explanation: (q) =>
        [
            'Explain the following in a way that is easy to understand.',
            '',
            `Question: ${q}`,
            '',
            'In your answer:',
            '- state the key concepts plainly',
            '- give a concrete example',
            '- go step by step',
        ].join('\n'),
    comparison: (q) =>
        [
            'Give an objective, structured answer to the following comparison.',
            '',
            `Question: ${q}`,
            '',
            'In your answer:',
            '- the main differences and what they share',
            '- strengths and weaknesses of each',
            '- which to choose in which situation',
        ].join('\n'),
    troubleshooting: (q) =>
        [
            'Help solve the following problem step by step.',
            '',
            `Problem: ${q}`,
            '',
            'In your answer:',
            '- the likely causes',
            '- how to fix it, one step at a time',
            '- how to keep it from happening again',
        ].join('\n'),
    general: (q) =>
        [
            'Give a helpful answer to the following question.',
            '',
            `Question: ${q}`,
            '',
            'Keep it accurate, friendly and easy to follow.',
        ].join('\n'),
};

/** Wrap a message in the prompt template for its question type. */
export function shapeQuestion(message: string, type: QuestionType = detectQuestionType(message)): string {
    return TEMPLATES[type](message.trim());
}
