import { createInterface, type Interface } from 'node:readline';

/**
 * Asks a question and resolves with the trimmed, lower-cased answer.
 */
export type Ask = (question: string) => Promise<string>;

export interface Prompter {
    ask: Ask;
    close(): void;
}

/**
 * Line-based prompter on stdin/stdout.
 *
 * @returns null when stdin is not a TTY
 */
export function createPrompter(): Prompter | null {
    if (!process.stdin.isTTY) {
        return null;
    }
    const rl: Interface = createInterface({ input: process.stdin, output: process.stdout });
    return {
        ask: (question) => new Promise((resolve) => {
            rl.question(question, (answer) => resolve(answer.trim().toLowerCase()));
        }),
        close: () => rl.close(),
    };
}
