/**
 * @fileoverview Interactive prompts
 *
 * @module cli/prompt
 */

import { createInterface } from "readline/promises";

export interface Prompter {
    ask(question: string): Promise<string>;
    close(): void;
}

/**
 * Prompter over stdin/stdout.
 */
export function createPrompter(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): Prompter {
    const rl = createInterface({ input, output });

    return {
        ask  : question => rl.question(question),
        close: () => rl.close(),
    };
}

/**
 * Ask a yes/no question. Only "y" and "yes" count as yes.
 */
export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
    const answer = (await prompter.ask(`${question} (y/n): `)).trim().toLowerCase();
    return answer === "y" || answer === "yes";
}
