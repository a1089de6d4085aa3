/**
 * Token tracker — accumulates token usage across collaborator calls.
 *
 * Usage is attributed to the stage that made the call ("chat" for the
 * single-pass workflow), for visibility and cost estimation.
 *
 * Dependency direction: token-tracker.ts → workflow/stages, providers/types, utils
 * Used by: stage handlers, basic chat workflow, chat command
 */

import chalk from 'chalk';
import type { TokenUsage } from '../../providers/types.js';
import { STAGE_LABELS, type WorkflowStage } from './stages.js';
import { logger } from '../../utils/logger.js';

/** Who consumed the tokens. */
export type UsageSource = WorkflowStage | 'chat';

/** Token usage for a single collaborator call. */
export interface TokenUsageEntry {
    source: UsageSource;
    model: string;
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
    timestamp: number;
}

/** Estimated cost per 1M tokens for known models. */
const COST_PER_1M_TOKENS: Record<string, { input: number; output: number }> = {
    'claude-sonnet-4-20250514': { input: 3.0, output: 15.0 },
    'claude-3-5-haiku-20241022': { input: 0.8, output: 4.0 },
};

export class TokenTracker {
    private readonly entries: TokenUsageEntry[] = [];

    /** Record usage. Calls that report no usage are ignored. */
    record(source: UsageSource, model: string | undefined, usage: TokenUsage | undefined): void {
        if (!usage) return;
        this.entries.push({
            source,
            model: model ?? 'unknown',
            promptTokens: usage.promptTokens,
            completionTokens: usage.completionTokens,
            totalTokens: usage.totalTokens,
            timestamp: Date.now(),
        });
    }

    getTotalTokens(): number {
        return this.entries.reduce((sum, e) => sum + e.totalTokens, 0);
    }

    getTokensBySource(): Map<UsageSource, number> {
        const bySource = new Map<UsageSource, number>();
        for (const entry of this.entries) {
            bySource.set(entry.source, (bySource.get(entry.source) ?? 0) + entry.totalTokens);
        }
        return bySource;
    }

    /** Estimate total cost in USD from known model pricing; unknown models count as free. */
    estimateCost(): number {
        let totalCost = 0;
        for (const entry of this.entries) {
            const pricing = COST_PER_1M_TOKENS[entry.model];
            if (pricing) {
                totalCost += (entry.promptTokens / 1_000_000) * pricing.input;
                totalCost += (entry.completionTokens / 1_000_000) * pricing.output;
            }
        }
        return totalCost;
    }

    getEntries(): readonly TokenUsageEntry[] {
        return this.entries;
    }

    /** Print a summary of token usage to the console. */
    printSummary(): void {
        if (this.entries.length === 0) return;

        logger.header('Token Usage');

        for (const [source, tokens] of this.getTokensBySource()) {
            const label = source === 'chat' ? '💬 Chat' : STAGE_LABELS[source];
            console.log(chalk.gray(`  ${label}: ${tokens.toLocaleString()} tokens`));
        }

        console.log(chalk.bold(`  Total: ${this.getTotalTokens().toLocaleString()} tokens`));

        const cost = this.estimateCost();
        if (cost > 0) {
            console.log(chalk.yellow(`  Estimated cost: $${cost.toFixed(4)}`));
        }
    }
}
