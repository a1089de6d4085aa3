/**
 * Session manager — one workflow instance per conversation.
 *
 * A workflow engine tracks a single in-flight request, so concurrent
 * conversations each get their own engine, keyed by session id. The stage
 * logic is untouched; only ownership is multiplied.
 *
 * State stays in memory for the lifetime of this object.
 *
 * Dependency direction: sessions.ts → registry, workflow/types
 * Used by: chat command
 */

import { logger } from '../../utils/logger.js';
import { createWorkflow, type WorkflowFactoryOptions } from './registry.js';
import type { StreamingCallback, Workflow, WorkflowAgent } from './types.js';

const log = logger.scoped('sessions');

export class WorkflowSessions {
    private readonly sessions = new Map<string, Workflow>();
    private readonly workflowName: string;
    private readonly options: WorkflowFactoryOptions;

    constructor(workflowName = 'agent', options: WorkflowFactoryOptions = {}) {
        this.workflowName = workflowName;
        this.options = options;
    }

    /** Get the workflow for a session, creating it on first use. */
    get(sessionId: string): Workflow {
        let workflow = this.sessions.get(sessionId);
        if (!workflow) {
            workflow = createWorkflow(this.workflowName, this.options);
            this.sessions.set(sessionId, workflow);
            log.debug(`Session opened: ${sessionId} (${this.workflowName})`);
        }
        return workflow;
    }

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    /** Run one turn in the given session. */
    run(
        sessionId: string,
        agent: WorkflowAgent,
        message: string,
        streamingCallback?: StreamingCallback,
    ): Promise<string> {
        return this.get(sessionId).run(agent, message, streamingCallback);
    }

    /** Drop a session and whatever it had in flight. Returns false if it did not exist. */
    end(sessionId: string): boolean {
        const workflow = this.sessions.get(sessionId);
        if (!workflow) return false;

        workflow.reset();
        this.sessions.delete(sessionId);
        log.debug(`Session closed: ${sessionId}`);
        return true;
    }

    get size(): number {
        return this.sessions.size;
    }

    sessionIds(): string[] {
        return [...this.sessions.keys()];
    }
}
