import { describe, it, expect } from 'vitest';
import { WorkflowError } from '../../../src/core/errors.js';
import { BasicChatWorkflow } from '../../../src/core/workflow/basic-chat.js';
import { AgentWorkflow } from '../../../src/core/workflow/engine.js';
import {
    createWorkflow,
    getAvailableWorkflows,
    getWorkflow,
    registerWorkflow,
} from '../../../src/core/workflow/registry.js';

describe('workflow registry', () => {
    it('lists the built-in workflows', () => {
        expect(getAvailableWorkflows()).toEqual(['agent', 'basic']);
    });

    it('creates workflows by name, ignoring case', () => {
        expect(createWorkflow('agent')).toBeInstanceOf(AgentWorkflow);
        expect(createWorkflow('BASIC')).toBeInstanceOf(BasicChatWorkflow);
    });

    it('returns a fresh instance per call', () => {
        expect(createWorkflow('agent')).not.toBe(createWorkflow('agent'));
    });

    it('rejects unknown names with the available list', () => {
        expect(() => getWorkflow('swarm')).toThrow(WorkflowError);
        expect(() => getWorkflow('swarm')).toThrow('Unknown workflow: "swarm". Available: agent, basic');
    });

    it('passes the shared options to the basic workflow', () => {
        const workflow = createWorkflow('basic', { prompts: { chat: 'Be brief.' } });
        expect(workflow.describe().mode).toBe('single_pass');
    });

    it('accepts new registrations', () => {
        const echo = new BasicChatWorkflow({ systemPrompt: 'echo' });
        registerWorkflow('Echo', () => echo);

        expect(getAvailableWorkflows()).toContain('echo');
        expect(createWorkflow('echo')).toBe(echo);
    });
});
