/**
 * Intent classifier — maps free-text feedback to workflow control intents.
 *
 * A bounded keyword heuristic, not language understanding. Each stage only
 * asks about the menu it just presented, so a shared shorthand like "1"
 * means "approve" at execution and "complete" at review.
 *
 * Matching rules:
 * - a leading positional selector ("1", "2.", "3)") picks a menu entry
 * - Latin keywords match on word boundaries ("ok" does not match "token")
 * - Hangul keywords match as substrings, since Korean attaches endings
 * - approval and completion are vetoed by a negation word, and a selector
 *   followed by more text needs that text to confirm too
 *
 * The lexicon lives in data/intent-lexicon.json.
 *
 * Dependency direction: intent.ts → zod, utils/fs, core/errors
 * Used by: stage handlers
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { readJsonFile } from '../../utils/fs.js';
import { ValidationError } from '../errors.js';

const intentEntrySchema = z.object({
    selector: z.string().regex(/^\d$/, 'Selector must be a single digit'),
    keywords: z.array(z.string().trim().min(1)).min(1),
});

export const intentLexiconSchema = z.object({
    approvePlan: intentEntrySchema,
    completeWorkflow: intentEntrySchema,
    additionalWork: intentEntrySchema,
    newRequest: intentEntrySchema,
    negations: z.array(z.string().trim().min(1)),
});

export type IntentLexicon = z.infer<typeof intentLexiconSchema>;
type IntentEntry = z.infer<typeof intentEntrySchema>;

/** Verdict for feedback given at the review menu. */
export type ReviewDecision = 'complete' | 'additional_work' | 'new_request' | 'unrecognized';

const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('../../../data/intent-lexicon.json', import.meta.url));

let defaultLexicon: IntentLexicon | undefined;

/**
 * Load and validate a lexicon file.
 * @throws {ValidationError} if the file does not match the lexicon schema.
 */
export function loadIntentLexicon(filePath: string = DEFAULT_LEXICON_PATH): IntentLexicon {
    const raw = readJsonFile(filePath);
    const result = intentLexiconSchema.safeParse(raw);

    if (!result.success) {
        const issues = result.error.issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
        throw new ValidationError(`Invalid intent lexicon:\n${issues}`, { filePath });
    }

    return result.data;
}

function getDefaultLexicon(): IntentLexicon {
    defaultLexicon ??= loadIntentLexicon();
    return defaultLexicon;
}

/** Lowercase, unify apostrophes and collapse whitespace. */
export function normalizeText(text: string): string {
    return text.trim().toLowerCase().replace(/[‘’]/g, "'").replace(/\s+/g, ' ');
}

const HANGUL = /[ᄀ-ᇿ㄰-㆏가-힯]/;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Match a keyword in lowercased text; see the matching rules above. */
export function containsKeyword(text: string, keyword: string): boolean {
    const needle = keyword.toLowerCase();
    if (HANGUL.test(needle)) {
        return text.includes(needle);
    }
    const pattern = new RegExp(`(?:^|[^\\p{L}\\p{N}'])${escapeRegExp(needle)}(?=$|[^\\p{L}\\p{N}'])`, 'u');
    return pattern.test(text);
}

function matchesSelector(text: string, selector: string): boolean {
    return new RegExp(`^[(\\[]?${selector}(?!\\d)`).test(text);
}

function matchesEntry(text: string, entry: IntentEntry): boolean {
    return matchesSelector(text, entry.selector) || entry.keywords.some((k) => containsKeyword(text, k));
}

function isNegated(text: string, lexicon: IntentLexicon): boolean {
    return lexicon.negations.some((n) => containsKeyword(text, n));
}

/**
 * Approval-style check: a bare selector, or a non-negated keyword. A selector
 * followed by more text only counts when that text confirms on its own, so
 * "1 is wrong, don't run it" is not an approval.
 */
function confirms(text: string, entry: IntentEntry, lexicon: IntentLexicon): boolean {
    if (!text) return false;

    const rest = matchesSelector(text, entry.selector) ? stripSelector(text) : text;
    if (!rest) return true;

    return entry.keywords.some((k) => containsKeyword(rest, k)) && !isNegated(rest, lexicon);
}

/** True when the feedback approves the proposed plan. */
export function isPlanApproved(text: string, lexicon: IntentLexicon = getDefaultLexicon()): boolean {
    return confirms(normalizeText(text), lexicon.approvePlan, lexicon);
}

/** True when the feedback accepts the result and closes the workflow. */
export function shouldCompleteWorkflow(text: string, lexicon: IntentLexicon = getDefaultLexicon()): boolean {
    return confirms(normalizeText(text), lexicon.completeWorkflow, lexicon);
}

/** True when the feedback asks for another execution pass. */
export function shouldDoAdditionalWork(text: string, lexicon: IntentLexicon = getDefaultLexicon()): boolean {
    const normalized = normalizeText(text);
    return normalized.length > 0 && matchesEntry(normalized, lexicon.additionalWork);
}

/** True when the feedback abandons this workflow for a different request. */
export function shouldStartNewRequest(text: string, lexicon: IntentLexicon = getDefaultLexicon()): boolean {
    const normalized = normalizeText(text);
    return normalized.length > 0 && matchesEntry(normalized, lexicon.newRequest);
}

/**
 * Classify feedback given at the review menu. Checked in menu order;
 * anything that matches none of the three is `unrecognized`.
 */
export function classifyReviewFeedback(text: string, lexicon: IntentLexicon = getDefaultLexicon()): ReviewDecision {
    if (shouldCompleteWorkflow(text, lexicon)) return 'complete';
    if (shouldDoAdditionalWork(text, lexicon)) return 'additional_work';
    if (shouldStartNewRequest(text, lexicon)) return 'new_request';
    return 'unrecognized';
}

/**
 * Strip a leading menu selector from feedback, e.g. "3. build a CLI" → "build a CLI".
 * Returns an empty string when the feedback was only the selector.
 */
export function stripSelector(text: string): string {
    return text.trim().replace(/^[(\[]?\d(?!\d)[)\].:]?\s*/, '').trim();
}

/**
 * Pull the new request out of "start something else" feedback by dropping the
 * menu selector and a leading new-request phrase:
 * "3. new task: write a parser" → "write a parser". Returns an empty string
 * when nothing but the menu choice was given.
 */
export function extractNewRequest(text: string, lexicon: IntentLexicon = getDefaultLexicon()): string {
    let rest = stripSelector(text).replace(/^(?:a|an|the)\s+/i, '');
    const lower = rest.toLowerCase();

    const phrase = [...lexicon.newRequest.keywords]
        .sort((a, b) => b.length - a.length)
        .find((k) => lower.startsWith(k.toLowerCase()));
    if (phrase) {
        rest = rest.slice(phrase.length).replace(/^\s*(?:task|request|one|작업|요청)(?=$|[\s:,.])/i, '');
    }

    return rest.replace(/^[\s:,.\-–—]+/, '').trim();
}
