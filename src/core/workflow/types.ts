/**
 * Contracts between the workflow engine and its collaborators.
 *
 * The engine never talks to a provider directly: it receives an agent that
 * exposes a completion capability and a task-execution capability, and
 * treats both as stateless request/response services.
 *
 * Dependency direction: workflow/types.ts → providers/types
 * Used by: engine, stage handlers, agents/provider-agent, workflow registry
 */

import type { ChatMessage, TokenUsage } from '../../providers/types.js';

/** Receives partial tokens while a collaborator is producing output. */
export type StreamingCallback = (token: string) => void;

/** Result of a language-model completion. */
export interface CompletionResult {
    text: string;
    /** Model that produced the text, when the collaborator knows it. */
    model?: string;
    usage?: TokenUsage;
}

/** Result of carrying out a task with the tool-invocation collaborator. */
export interface TaskExecutionResult {
    response: string;
    usedTools: string[];
    model?: string;
    usage?: TokenUsage;
}

/** The agent handed to every `run()` call. */
export interface WorkflowAgent {
    /** Ask the language model for a completion; streams tokens when `onToken` is given. */
    generateResponse(input: string | ChatMessage[], onToken?: StreamingCallback): Promise<CompletionResult>;
    /** Carry out a task description, possibly using tools. */
    executeTask(task: string, onToken?: StreamingCallback): Promise<TaskExecutionResult>;
}

/** Static description of a workflow implementation. */
export interface WorkflowInfo {
    name: string;
    description: string;
    mode: 'collaborative' | 'single_pass';
    supportsStreaming: boolean;
}

/** Anything the CLI or a session manager can drive turn by turn. */
export interface Workflow {
    readonly name: string;
    /** Process one human message. Never rejects; failures come back as text. */
    run(agent: WorkflowAgent, message: string, streamingCallback?: StreamingCallback): Promise<string>;
    /** Drop any in-flight state. */
    reset(): void;
    describe(): WorkflowInfo;
}
