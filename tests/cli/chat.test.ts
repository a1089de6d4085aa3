import { describe, it, expect } from 'vitest';
import { describeStatus, handleMetaCommand } from '../../src/cli/commands/chat.js';
import { WorkflowSessions } from '../../src/core/workflow/sessions.js';
import { createFakeAgent, TEST_PROMPTS } from '../helpers/fake-agent.js';

describe('handleMetaCommand', () => {
    it('ignores ordinary messages', () => {
        const sessions = new WorkflowSessions('agent', { prompts: TEST_PROMPTS });
        expect(handleMetaCommand('approve', sessions, 'default')).toBeNull();
    });

    it('exits on /exit and /quit', () => {
        const sessions = new WorkflowSessions('agent', { prompts: TEST_PROMPTS });
        expect(handleMetaCommand('/exit', sessions, 'default')).toEqual({ kind: 'exit' });
        expect(handleMetaCommand(' /QUIT ', sessions, 'default')).toEqual({ kind: 'exit' });
    });

    it('reports the stage of the current request', async () => {
        const sessions = new WorkflowSessions('agent', { prompts: TEST_PROMPTS });
        const { agent } = createFakeAgent();
        await sessions.run('default', agent, 'write hello.js');

        const result = handleMetaCommand('/status', sessions, 'default');

        expect(result).toEqual({
            kind: 'reply',
            text: [
                'Workflow: agent (collaborative)',
                'Request: write hello.js',
                'Stage: 🧭 Planning (2/5)',
                'Turns: 0',
                'Execution passes: 0',
            ].join('\n'),
        });
    });

    it('resets the session', async () => {
        const sessions = new WorkflowSessions('agent', { prompts: TEST_PROMPTS });
        const { agent } = createFakeAgent();
        await sessions.run('default', agent, 'write hello.js');

        handleMetaCommand('/reset', sessions, 'default');

        expect(sessions.has('default')).toBe(false);
        expect(describeStatus(sessions.get('default'))).toBe('Workflow: agent (collaborative)\nNo request in progress.');
    });

    it('answers unknown commands with the help text', () => {
        const sessions = new WorkflowSessions('agent', { prompts: TEST_PROMPTS });
        const result = handleMetaCommand('/frobnicate', sessions, 'default');
        expect(result?.kind === 'reply' && result.text.split('\n')[0]).toBe('Unknown command: /frobnicate');
    });
});

describe('describeStatus', () => {
    it('shows only the header for the basic workflow', () => {
        const sessions = new WorkflowSessions('basic');
        expect(describeStatus(sessions.get('x'))).toBe('Workflow: basic (single_pass)');
    });
});
