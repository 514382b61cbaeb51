/**
 * @registrar/cli — Terminal input and output.
 */

import * as readline from "readline";

/** Anything text can be written to: process.stdout, a file stream, a test buffer. */
export interface Output {
	write(chunk: string): unknown;
}

/**
 * Line-oriented question/answer source for the interactive menu.
 */
export interface Prompter {
	/**
	 * Show `question` and wait for the next line of input.
	 * Resolves to null once the input has ended.
	 */
	ask(question: string): Promise<string | null>;
	close(): void;
}

/**
 * Prompter over a readable stream. Lines that arrive before they are asked
 * for (piped input) are buffered, not dropped.
 */
export function createPrompter(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Prompter {
	const rl = readline.createInterface({ input, output });
	const lines = rl[Symbol.asyncIterator]();
	let closed = false;
	rl.on("close", () => {
		closed = true;
	});

	return {
		async ask(question: string): Promise<string | null> {
			if (!closed) {
				rl.setPrompt(question);
				rl.prompt();
			}
			const next = await lines.next();
			return next.done ? null : next.value;
		},

		close(): void {
			rl.close();
		},
	};
}
