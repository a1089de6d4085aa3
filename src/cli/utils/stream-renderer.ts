/**
 * Streaming UI renderer — shows live model output in the terminal.
 *
 * Prints a label, streams gray text as a single-line preview (truncated to
 * 80 chars), and ends the line when the turn finishes. The full reply is
 * printed separately once the workflow returns it.
 *
 * Dependency direction: stream-renderer.ts → chalk
 * Used by: cli/commands/chat.ts
 */

import chalk from 'chalk';
import type { StreamingCallback } from '../../core/workflow/types.js';

/** Max characters to show on the streaming preview line. */
const PREVIEW_MAX = 80;

export interface StreamRenderer {
    onToken: StreamingCallback;
    /** Close the preview line, if one was started. */
    finish(): void;
}

/**
 * @param write - sink for terminal output; defaults to stdout
 */
export function createStreamRenderer(
    label: string,
    write: (text: string) => void = (text) => process.stdout.write(text),
): StreamRenderer {
    let lineLength = 0;
    let headerPrinted = false;

    return {
        onToken(token: string) {
            if (!headerPrinted) {
                write(chalk.bold(`  ${label}: `));
                headerPrinted = true;
            }

            for (const char of token) {
                if (char === '\n' || char === '\r') continue;
                if (lineLength >= PREVIEW_MAX) break;
                write(chalk.gray(char));
                lineLength++;
            }
        },
        finish() {
            if (!headerPrinted) return;
            if (lineLength >= PREVIEW_MAX) {
                write(chalk.gray('…'));
            }
            write('\n');
            headerPrinted = false;
            lineLength = 0;
        },
    };
}
