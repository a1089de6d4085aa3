/**
 * Provider agent — adapts an LLM provider into the workflow's agent contract.
 *
 * Both collaborator capabilities are served by the same model. Task
 * execution has no tool layer, so it reports an empty `usedTools` list.
 *
 * Dependency direction: agents/provider-agent.ts → providers/types, core/workflow/types, core/errors
 * Used by: agents/factory.ts, chat command
 */

import { toUsage, type ChatMessage, type ChatOptions, type LLMProvider } from '../providers/types.js';
import type {
    CompletionResult,
    StreamingCallback,
    TaskExecutionResult,
    WorkflowAgent,
} from '../core/workflow/types.js';
import { ProviderError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.scoped('agent');

export interface ProviderAgentOptions {
    model: string;
    temperature?: number;
    maxTokens?: number;
}

/** Rough token estimate (~4 chars per token) for streamed replies, which carry no usage report. */
export function estimateTokens(text: string): number {
    return Math.ceil(text.length / 4);
}

export class ProviderAgent implements WorkflowAgent {
    private readonly provider: LLMProvider;
    private readonly options: Required<ProviderAgentOptions>;

    constructor(provider: LLMProvider, options: ProviderAgentOptions) {
        this.provider = provider;
        this.options = {
            model: options.model,
            temperature: options.temperature ?? 0.7,
            maxTokens: options.maxTokens ?? 4096,
        };
    }

    get providerName(): string {
        return this.provider.name;
    }

    get model(): string {
        return this.options.model;
    }

    async generateResponse(input: string | ChatMessage[], onToken?: StreamingCallback): Promise<CompletionResult> {
        const messages: ChatMessage[] = typeof input === 'string' ? [{ role: 'user', content: input }] : input;
        return onToken ? this.streamCompletion(messages, onToken) : this.completion(messages);
    }

    async executeTask(task: string, onToken?: StreamingCallback): Promise<TaskExecutionResult> {
        const result = await this.generateResponse(task, onToken);
        return { response: result.text, usedTools: [], model: result.model, usage: result.usage };
    }

    // ── Private helpers ──

    private chatOptions(): ChatOptions {
        return {
            model: this.options.model,
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens,
        };
    }

    private async completion(messages: ChatMessage[]): Promise<CompletionResult> {
        try {
            const response = await this.provider.chat(messages, this.chatOptions());
            log.debug(`${this.provider.name} reply: ${response.usage.totalTokens} tokens (${response.finishReason})`);
            return { text: response.content, model: response.model, usage: response.usage };
        } catch (err) {
            if (err instanceof ProviderError) throw err;
            throw new ProviderError(
                `Completion failed: ${err instanceof Error ? err.message : String(err)}`,
                { provider: this.provider.name, model: this.options.model },
            );
        }
    }

    /**
     * Stream a completion. If the stream fails before any token arrives,
     * falls back to a plain completion; after that the error propagates,
     * since the caller has already shown partial output.
     */
    private async streamCompletion(messages: ChatMessage[], onToken: StreamingCallback): Promise<CompletionResult> {
        let accumulated = '';

        try {
            for await (const chunk of this.provider.stream(messages, this.chatOptions())) {
                if (chunk.content) {
                    accumulated += chunk.content;
                    onToken(chunk.content);
                }
            }
        } catch (err) {
            if (accumulated) {
                throw err instanceof ProviderError
                    ? err
                    : new ProviderError(`Stream interrupted: ${err instanceof Error ? err.message : String(err)}`, {
                          provider: this.provider.name,
                      });
            }
            log.warn(`${this.provider.name} streaming failed, falling back to non-streaming`);
            log.debug(`Stream error: ${err instanceof Error ? err.message : String(err)}`);
            return this.completion(messages);
        }

        const usage = toUsage(estimateTokens(messages.map((m) => m.content).join('\n')), estimateTokens(accumulated));
        return { text: accumulated, model: this.options.model, usage };
    }
}
