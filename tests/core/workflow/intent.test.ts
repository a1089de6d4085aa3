/**
 * Tests for the feedback intent classifier.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    classifyReviewFeedback,
    extractNewRequest,
    isPlanApproved,
    loadIntentLexicon,
    shouldCompleteWorkflow,
    shouldDoAdditionalWork,
    shouldStartNewRequest,
    stripSelector,
} from '../../../src/core/workflow/intent.js';
import { ConfigError, ValidationError } from '../../../src/core/errors.js';

describe('isPlanApproved', () => {
    it.each([
        '1',
        'approve',
        'go ahead',
        'Looks good to me',
        'Proceed.',
        'ok',
        '1) looks good',
        '승인합니다',
        '실행해주세요',
        '좋습니다',
    ])('approves "%s"', (text) => {
        expect(isPlanApproved(text)).toBe(true);
    });

    it.each([
        '',
        '   ',
        'please revise',
        'a different approach',
        'token limit',
        '12 changes',
        'I don\'t approve',
        '승인하지 않습니다',
        '수정해주세요',
        '다른 방법으로',
    ])('does not approve "%s"', (text) => {
        expect(isPlanApproved(text)).toBe(false);
    });

    it.each([
        '1 is wrong, don\'t run it',
        '1. is wrong, don\'t execute yet - use TypeScript',
        '1 needs a test first',
    ])('reads "%s" as feedback about step 1, not the menu choice', (text) => {
        expect(isPlanApproved(text)).toBe(false);
    });
});

describe('shouldCompleteWorkflow', () => {
    it.each(['1', 'done', 'Accept', 'accept result', 'I am satisfied', '1. done', '완료', '결과 수락', '만족합니다'])(
        'completes on "%s"',
        (text) => {
            expect(shouldCompleteWorkflow(text)).toBe(true);
        },
    );

    it.each([
        '2',
        'not done yet',
        'additional work',
        'needs improvement',
        '1 more thing: not done, add tests',
        'hmm',
        '',
        '추가 작업',
        '개선 필요',
    ])('does not complete on "%s"', (text) => {
        expect(shouldCompleteWorkflow(text)).toBe(false);
    });
});

describe('shouldDoAdditionalWork', () => {
    it.each([
        '2',
        'please fix the header',
        'improve the error messages',
        'additional improvement',
        'needs supplementing',
        '추가 작업 부탁해요',
        '추가 개선',
        '수정해주세요',
        '보완 필요',
    ])('asks for more work on "%s"', (text) => {
        expect(shouldDoAdditionalWork(text)).toBe(true);
    });

    it.each(['1', '', 'prefix', 'new request', '완료', '새로운 요청'])('does not ask for more work on "%s"', (text) => {
        expect(shouldDoAdditionalWork(text)).toBe(false);
    });
});

describe('shouldStartNewRequest', () => {
    it.each(['3', 'new task: write a parser', 'a different request', 'let\'s start over', '새로운 작업', '다른 요청'])(
        'starts over on "%s"',
        (text) => {
            expect(shouldStartNewRequest(text)).toBe(true);
        },
    );

    it.each(['done', '2', '', 'additional work', '완료', '추가 작업'])('does not start over on "%s"', (text) => {
        expect(shouldStartNewRequest(text)).toBe(false);
    });
});

describe('classifyReviewFeedback', () => {
    it.each([
        ['1', 'complete'],
        ['done', 'complete'],
        ['2. add tests', 'additional_work'],
        ['not done, fix the tests', 'additional_work'],
        ['3 build a cli instead', 'new_request'],
        ['new request: summarize logs', 'new_request'],
        ['1 more thing: not done, add tests', 'unrecognized'],
        ['hmm', 'unrecognized'],
        ['', 'unrecognized'],
    ])('classifies "%s" as %s', (text, expected) => {
        expect(classifyReviewFeedback(text)).toBe(expected);
    });
});

describe('stripSelector', () => {
    it.each([
        ['3. build a CLI', 'build a CLI'],
        ['(2) more tests', 'more tests'],
        ['2', ''],
        ['12 apples', '12 apples'],
        ['  approve  ', 'approve'],
    ])('"%s" → "%s"', (text, expected) => {
        expect(stripSelector(text)).toBe(expected);
    });
});

describe('extractNewRequest', () => {
    it.each([
        ['3. new task: write a parser', 'write a parser'],
        ['3', ''],
        ['a different request: summarize the logs', 'summarize the logs'],
        ['start a new task - translate the README', 'translate the README'],
        ['새로운 작업: 로그 요약', '로그 요약'],
        ['3 write a parser', 'write a parser'],
    ])('"%s" → "%s"', (text, expected) => {
        expect(extractNewRequest(text)).toBe(expected);
    });
});

describe('loadIntentLexicon', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'stepwise-lexicon-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('loads the bundled lexicon', () => {
        const lexicon = loadIntentLexicon();
        expect(lexicon.approvePlan.selector).toBe('1');
        expect(lexicon.additionalWork.selector).toBe('2');
        expect(lexicon.newRequest.selector).toBe('3');
    });

    it('classifies with a custom lexicon', () => {
        const file = join(dir, 'lexicon.json');
        writeFileSync(file, JSON.stringify({
            approvePlan: { selector: '1', keywords: ['ship it'] },
            completeWorkflow: { selector: '1', keywords: ['wrap'] },
            additionalWork: { selector: '2', keywords: ['again'] },
            newRequest: { selector: '3', keywords: ['other'] },
            negations: ['nope'],
        }));

        const lexicon = loadIntentLexicon(file);
        expect(isPlanApproved('ship it', lexicon)).toBe(true);
        expect(isPlanApproved('approve', lexicon)).toBe(false);
        expect(isPlanApproved('nope, ship it later', lexicon)).toBe(false);
    });

    it('rejects a lexicon that fails validation', () => {
        const file = join(dir, 'bad.json');
        writeFileSync(file, JSON.stringify({ approvePlan: { selector: 'one', keywords: [] } }));

        expect(() => loadIntentLexicon(file)).toThrow(ValidationError);
    });

    it('reports a missing file as a ConfigError', () => {
        expect(() => loadIntentLexicon(join(dir, 'missing.json'))).toThrow(ConfigError);
    });
});
