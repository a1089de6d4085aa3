/**
 * Tests for the interactive agent workflow engine.
 *
 * Each turn runs the handler of the stage the workflow is in, then the
 * stage advances; the state after a turn shows the next stage to run.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AgentWorkflow } from '../../../src/core/workflow/engine.js';
import { FOLLOW_UP_KEY } from '../../../src/core/workflow/handlers.js';
import { TokenTracker } from '../../../src/core/workflow/token-tracker.js';
import { createFakeAgent, lastUserMessageOf, TEST_PROMPTS } from '../../helpers/fake-agent.js';

let workflow: AgentWorkflow;

beforeEach(() => {
    workflow = new AgentWorkflow({ prompts: TEST_PROMPTS });
});

describe('AgentWorkflow — first turn', () => {
    it('asks for a request when the first message is blank', async () => {
        const { agent, generateResponse } = createFakeAgent();

        const reply = await workflow.run(agent, '   ');

        expect(reply).toBe('Describe what you would like me to do to start a new workflow.');
        expect(workflow.isActive).toBe(false);
        expect(generateResponse).not.toHaveBeenCalled();
    });

    it('creates the state and gathers context', async () => {
        const { agent, generateResponse } = createFakeAgent();

        const reply = await workflow.run(agent, 'write hello.js');

        expect(reply.split('\n')[0]).toBe('📋 Request analysis complete — context gathered.');
        expect(generateResponse).toHaveBeenCalledTimes(2);

        const state = workflow.state;
        expect(state?.originalRequest).toBe('write hello.js');
        expect(state?.stage).toBe('planning');
        expect(state?.context).toEqual({
            analysis: 'The user wants a hello world script',
            gathered_info: 'Node.js 20 is available',
        });
        expect(state?.userFeedback).toEqual([]);
        expect(state?.iterationCount).toBe(0);
        expect(state?.history.map((t) => `${t.from}→${t.to}`)).toEqual(['context_gathering→planning']);
    });

    it('passes the streaming callback to the model', async () => {
        const { agent, generateResponse } = createFakeAgent();
        const onToken = (_token: string) => undefined;

        await workflow.run(agent, 'write hello.js', onToken);

        expect(generateResponse.mock.calls[0]?.[1]).toBe(onToken);
    });
});

describe('AgentWorkflow — full run', () => {
    it('walks a request from analysis to the final summary', async () => {
        const { agent, executeTask } = createFakeAgent();

        await workflow.run(agent, 'write hello.js');

        const planReply = await workflow.run(agent, '');
        expect(planReply).toBe([
            '🧭 Execution plan ready.',
            '',
            'Plan for hello.js',
            '',
            'Steps:',
            '1. Create hello.js',
            '2. Print Hello, World!',
            '',
            'Approve this plan? Reply "1" or "approve" to execute it, or describe what should change.',
        ].join('\n'));
        expect(workflow.state?.stage).toBe('execution');
        expect(workflow.state?.iterationCount).toBe(1);

        const execReply = await workflow.run(agent, 'approve');
        expect(execReply.split('\n').slice(0, 5)).toEqual([
            '⚙️  Plan execution complete (pass 1).',
            '',
            'Tools used: write_file',
            '',
            'Created hello.js',
        ]);
        expect(executeTask).toHaveBeenCalledTimes(1);
        expect(workflow.state?.stage).toBe('review');
        expect(workflow.state?.executionResults).toEqual([
            { result: 'Created hello.js', success: true, usedTools: ['write_file'] },
        ]);

        const finalReply = await workflow.run(agent, 'done');
        expect(finalReply.split('\n')).toEqual([
            '🎉 Agent workflow complete',
            '',
            'Request: write hello.js',
            '',
            '1. Request understood — The user wants a hello world script',
            '2. Context gathered — Node.js 20 is available',
            '3. Plan produced — Plan for hello.js 1. Create hello.js 2. Print Hello, World!',
            '4. Execution performed — 1/1 pass(es) succeeded',
            '5. Review completed — Execution 1: Created hello.js',
        ]);
        expect(workflow.state).toBeNull();
        expect(workflow.isActive).toBe(false);
        expect(workflow.iterationCount).toBe(0);
    });

    it('starts a fresh workflow after completion', async () => {
        const { agent } = createFakeAgent();

        await workflow.run(agent, 'write hello.js');
        await workflow.run(agent, '');
        await workflow.run(agent, '1');
        await workflow.run(agent, '1');
        expect(workflow.isActive).toBe(false);

        await workflow.run(agent, 'write goodbye.js');
        expect(workflow.state?.originalRequest).toBe('write goodbye.js');
        expect(workflow.state?.userFeedback).toEqual([]);
    });

    it('records token usage per stage', async () => {
        const tokens = new TokenTracker();
        const tracked = new AgentWorkflow({ prompts: TEST_PROMPTS, tokenTracker: tokens });
        const { agent } = createFakeAgent();

        await tracked.run(agent, 'write hello.js');
        await tracked.run(agent, '');
        await tracked.run(agent, 'approve');

        expect(tokens.getTokensBySource()).toEqual(new Map([
            ['context_gathering', 30],
            ['planning', 15],
            ['execution', 15],
        ]));
        expect(tracked.tokens).toBe(tokens);
    });
});

describe('AgentWorkflow — plan approval', () => {
    it('re-prompts without calling the model on an empty reply', async () => {
        const { agent, generateResponse, executeTask } = createFakeAgent();
        await workflow.run(agent, 'write hello.js');
        await workflow.run(agent, '');
        generateResponse.mockClear();

        const reply = await workflow.run(agent, '');

        expect(reply.split('\n')[0]).toBe('⏸️  Waiting for plan approval.');
        expect(generateResponse).not.toHaveBeenCalled();
        expect(executeTask).not.toHaveBeenCalled();
        expect(workflow.state?.stage).toBe('execution');
    });

    it('revises the plan from feedback and stays at execution', async () => {
        const { agent, generateResponse, executeTask } = createFakeAgent();
        await workflow.run(agent, 'write hello.js');
        await workflow.run(agent, '');
        generateResponse.mockClear();

        const reply = await workflow.run(agent, 'use console.log with process.argv');

        expect(reply.split('\n')[0]).toBe('✏️  Plan revision requested — here is the updated plan.');
        expect(generateResponse).toHaveBeenCalledTimes(1);
        const input = generateResponse.mock.calls[0]?.[0] ?? '';
        expect(lastUserMessageOf(input)).toContain('## user_feedback\n- use console.log with process.argv');
        expect(executeTask).not.toHaveBeenCalled();
        expect(workflow.state?.stage).toBe('execution');
    });

    it('does not execute on a negated approval', async () => {
        const { agent, executeTask } = createFakeAgent();
        await workflow.run(agent, 'write hello.js');
        await workflow.run(agent, '');

        await workflow.run(agent, "don't approve yet");

        expect(executeTask).not.toHaveBeenCalled();
        expect(workflow.state?.stage).toBe('execution');
    });

    it('revises instead of executing when feedback about step 1 says not to run it', async () => {
        const { agent, executeTask } = createFakeAgent();
        await workflow.run(agent, 'write hello.js');
        await workflow.run(agent, '');

        const reply = await workflow.run(agent, "1. is wrong, don't execute yet - use TypeScript");

        expect(reply.split('\n')[0]).toBe('✏️  Plan revision requested — here is the updated plan.');
        expect(executeTask).not.toHaveBeenCalled();
        expect(workflow.state?.stage).toBe('execution');
    });
});

describe('AgentWorkflow — review', () => {
    async function reachReview(agent: ReturnType<typeof createFakeAgent>['agent']): Promise<void> {
        await workflow.run(agent, 'write hello.js');
        await workflow.run(agent, '');
        await workflow.run(agent, 'approve');
    }

    it('re-prompts on unrecognised feedback without changing anything else', async () => {
        const { agent, executeTask } = createFakeAgent();
        await reachReview(agent);

        const first = await workflow.run(agent, 'hmm');
        const second = await workflow.run(agent, 'hmm');

        expect(first.split('\n')[0]).toBe('🔍 Result review');
        expect(second).toBe(first);
        expect(workflow.state?.stage).toBe('review');
        expect(workflow.state?.executionResults).toHaveLength(1);
        expect(workflow.state?.userFeedback).toEqual(['approve', 'hmm', 'hmm']);
        expect(executeTask).toHaveBeenCalledTimes(1);
    });

    it('treats an empty message as a fixed point', async () => {
        const { agent, generateResponse, executeTask } = createFakeAgent();
        await reachReview(agent);
        const before = workflow.state;
        generateResponse.mockClear();

        const reply = await workflow.run(agent, '');

        expect(reply.split('\n')).toEqual([
            '🔍 Result review',
            '',
            'Execution 1: Created hello.js',
            '',
            'What would you like to do next?',
            '1. Complete — accept the result and finish',
            '2. Additional work — refine or extend the result',
            '3. New request — start a different task',
        ]);
        expect(workflow.state?.stage).toBe('review');
        expect(workflow.state?.userFeedback).toEqual(before?.userFeedback);
        expect(workflow.state?.executionResults).toEqual(before?.executionResults);
        expect(generateResponse).not.toHaveBeenCalled();
        expect(executeTask).toHaveBeenCalledTimes(1);
    });

    it('loops back to execution for additional work', async () => {
        const { agent, executeTask } = createFakeAgent();
        await reachReview(agent);

        const noted = await workflow.run(agent, '2. add a docstring');
        expect(noted).toBe([
            '🔁 Follow-up request noted.',
            '',
            '"add a docstring"',
            '',
            'Reply "1" or "approve" to run another execution pass, or describe what should change in the plan.',
        ].join('\n'));
        expect(workflow.state?.stage).toBe('execution');
        expect(workflow.state?.context[FOLLOW_UP_KEY]).toBe('add a docstring');

        const reply = await workflow.run(agent, '1');
        expect(reply.split('\n')[0]).toBe('⚙️  Plan execution complete (pass 2).');

        const task = executeTask.mock.calls[1]?.[0] ?? '';
        expect(task).toContain('## Previous Results\n\nExecution 1: Created hello.js');
        expect(task).toContain('## Follow-up Request\n\nadd a docstring');
        expect(workflow.state?.stage).toBe('review');
        expect(workflow.state?.executionResults).toHaveLength(2);
    });

    it('starts the new request in the same turn when one is given', async () => {
        const { agent } = createFakeAgent();
        await reachReview(agent);

        const reply = await workflow.run(agent, '3. new task: write goodbye.js');

        expect(reply.split('\n')[0]).toBe('🆕 Starting a new request: write goodbye.js');
        expect(reply.split('\n')[2]).toBe('📋 Request analysis complete — context gathered.');
        const state = workflow.state;
        expect(state?.originalRequest).toBe('write goodbye.js');
        expect(state?.stage).toBe('planning');
        expect(state?.userFeedback).toEqual([]);
        expect(state?.executionResults).toEqual([]);
    });

    it('clears the workflow and asks for the request when only the choice is given', async () => {
        const { agent } = createFakeAgent();
        await reachReview(agent);

        const reply = await workflow.run(agent, '3');

        expect(reply).toBe('🆕 Closing this workflow. What would you like to do next?');
        expect(workflow.isActive).toBe(false);

        await workflow.run(agent, 'write goodbye.js');
        expect(workflow.state?.originalRequest).toBe('write goodbye.js');
    });
});

describe('AgentWorkflow — failures', () => {
    it('keeps the state when execution fails and succeeds on retry', async () => {
        const { agent, executeTask } = createFakeAgent();
        await workflow.run(agent, 'write hello.js');
        await workflow.run(agent, '');
        const before = workflow.state;

        executeTask.mockRejectedValueOnce(new Error('tool crashed'));
        const failed = await workflow.run(agent, 'approve');

        expect(failed).toBe(
            '⚠️  An error occurred while running the workflow (execution): tool crashed\n' +
                'Your progress has been kept. Send the same reply again to retry this step.',
        );
        expect(workflow.state).toEqual(before);

        const retried = await workflow.run(agent, 'approve');
        expect(retried.split('\n')[0]).toBe('⚙️  Plan execution complete (pass 1).');
        expect(workflow.state?.stage).toBe('review');
        expect(workflow.state?.userFeedback).toEqual(['approve']);
        expect(workflow.state?.iterationCount).toBe(2);
    });

    it('reports an empty model response and creates no state on the first turn', async () => {
        const { agent } = createFakeAgent({});

        const reply = await workflow.run(agent, 'write hello.js');

        expect(reply.split('\n')[0]).toBe(
            '⚠️  An error occurred while running the workflow (context_gathering): The model returned an empty response for the analysis step',
        );
        expect(workflow.isActive).toBe(false);
    });

    it('never rejects, even for non-Error throws', async () => {
        const { agent, generateResponse } = createFakeAgent();
        generateResponse.mockRejectedValueOnce('socket hang up');

        await expect(workflow.run(agent, 'write hello.js')).resolves.toContain('socket hang up');
    });

    it('refuses an overlapping turn', async () => {
        const { agent, generateResponse } = createFakeAgent();
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        generateResponse.mockImplementationOnce(async () => {
            await gate;
            return { text: 'The user wants a hello world script' };
        });

        const first = workflow.run(agent, 'write hello.js');
        const second = await workflow.run(agent, 'approve');
        release();

        expect(second).toBe('⏳ Still working on the previous message. Please wait for it to finish.');
        expect((await first).split('\n')[0]).toBe('📋 Request analysis complete — context gathered.');
        expect(workflow.state?.userFeedback).toEqual([]);
    });
});

describe('AgentWorkflow — housekeeping', () => {
    it('reset drops the in-flight workflow', async () => {
        const { agent } = createFakeAgent();
        await workflow.run(agent, 'write hello.js');

        workflow.reset();

        expect(workflow.isActive).toBe(false);
        expect(workflow.state).toBeNull();
    });

    it('hands out copies of the state', async () => {
        const { agent } = createFakeAgent();
        await workflow.run(agent, 'write hello.js');

        const snapshot = workflow.state;
        snapshot?.userFeedback.push('tampered');

        expect(workflow.state?.userFeedback).toEqual([]);
    });

    it('describes itself as a collaborative workflow', () => {
        expect(workflow.describe()).toMatchObject({ name: 'agent', mode: 'collaborative', supportsStreaming: true });
    });
});
