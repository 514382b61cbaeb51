/**
 * Shared fixtures for CLI tests: a temporary student database, a text
 * buffer standing in for stdout/stderr, and a scripted prompter.
 */

import fs from "fs";
import os from "os";
import path from "path";
import { RosterDatabase, StudentStore, ensureSchema } from "@registrar/roster";
import type { Output, Prompter } from "../src/io.js";

export interface TempRoster {
	dir: string;
	database: RosterDatabase;
	store: StudentStore;
	cleanup(): void;
}

export function createTempRoster(): TempRoster {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), "registrar-cli-test-"));
	const database = new RosterDatabase(path.join(dir, "students.db"));
	ensureSchema(database);
	return {
		dir,
		database,
		store: new StudentStore(database),
		cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
	};
}

export interface BufferOutput extends Output {
	text(): string;
	lines(): string[];
}

export function bufferOutput(): BufferOutput {
	let buffer = "";
	return {
		write(chunk: string) {
			buffer += chunk;
			return true;
		},
		text: () => buffer,
		lines: () => buffer.split("\n"),
	};
}

export interface ScriptedPrompter extends Prompter {
	/** Every question asked, in order. */
	questions: string[];
	closed: boolean;
}

/** Answers the given lines in order, then reports end of input. */
export function scriptedPrompter(answers: string[]): ScriptedPrompter {
	const queue = [...answers];
	const prompter: ScriptedPrompter = {
		questions: [],
		closed: false,
		async ask(question: string) {
			prompter.questions.push(question);
			return queue.shift() ?? null;
		},
		close() {
			prompter.closed = true;
		},
	};
	return prompter;
}
