/**
 * Basic chat workflow — a single model reply per message, no stages.
 *
 * Keeps a rolling window of the conversation so follow-up questions have
 * context. The current message is wrapped in a prompt template picked by its
 * question type (see question-type.ts).
 *
 * Registered as "basic" next to the staged "agent" workflow.
 *
 * Dependency direction: basic-chat.ts → workflow/types, question-type, token-tracker, prompts/library
 * Used by: workflow registry
 */

import type { ChatMessage } from '../../providers/types.js';
import { DEFAULT_PROMPTS } from '../../prompts/library.js';
import { logger } from '../../utils/logger.js';
import { detectQuestionType, shapeQuestion } from './question-type.js';
import { TokenTracker } from './token-tracker.js';
import type { StreamingCallback, Workflow, WorkflowAgent, WorkflowInfo } from './types.js';

const log = logger.scoped('chat');

export interface BasicChatWorkflowOptions {
    systemPrompt?: string;
    /** Number of past messages (user and assistant) sent with each request. */
    historyWindow?: number;
    tokenTracker?: TokenTracker;
}

export class BasicChatWorkflow implements Workflow {
    public readonly name = 'basic';
    public readonly tokens: TokenTracker;
    private readonly systemPrompt: string;
    private readonly historyWindow: number;
    private history: ChatMessage[] = [];

    constructor(options: BasicChatWorkflowOptions = {}) {
        this.systemPrompt = options.systemPrompt ?? DEFAULT_PROMPTS.chat;
        this.historyWindow = options.historyWindow ?? 20;
        this.tokens = options.tokenTracker ?? new TokenTracker();
    }

    get messages(): readonly ChatMessage[] {
        return this.history;
    }

    reset(): void {
        this.history = [];
    }

    describe(): WorkflowInfo {
        return {
            name: this.name,
            description: 'Plain conversation: one model reply per message, no planning or tools',
            mode: 'single_pass',
            supportsStreaming: true,
        };
    }

    async run(agent: WorkflowAgent, message: string, streamingCallback?: StreamingCallback): Promise<string> {
        if (!message.trim()) {
            return 'Please enter a message.';
        }

        const window = [...this.history, { role: 'user' as const, content: message }].slice(-this.historyWindow);

        try {
            const questionType = detectQuestionType(message);
            log.debug(`Question type: ${questionType}`);

            // history keeps the raw message; only the current turn is sent shaped
            const prompt: ChatMessage[] = [
                { role: 'system', content: this.systemPrompt },
                ...window.slice(0, -1),
                { role: 'user', content: shapeQuestion(message, questionType) },
            ];

            const response = await agent.generateResponse(prompt, streamingCallback);
            this.tokens.record('chat', response.model, response.usage);

            this.history = [...window, { role: 'assistant', content: response.text }];
            return response.text;
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            log.error(`Chat reply failed: ${reason}`);
            return `⚠️  An error occurred while generating a reply: ${reason}`;
        }
    }
}
