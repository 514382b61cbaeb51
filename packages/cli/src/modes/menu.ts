/**
 * @registrar/cli — Interactive menu mode.
 *
 * The numbered menu loop: add, view, update, delete, exit. Ids are asked
 * for again until they parse, required fields are asked for again until
 * non-empty, and deletion waits for a "y". Storage failures are reported
 * and the loop carries on. The loop ends on "5" or when input runs out.
 */

import { InvalidIdError, RegistrarError, StorageUnavailableError, createLogger } from "@registrar/core";
import { parseStudentId } from "@registrar/roster";
import type { StudentFields, StudentStore } from "@registrar/roster";
import { createPalette } from "@registrar/ui";
import type { Palette } from "@registrar/ui";
import type { Output, Prompter } from "../io.js";
import {
	FIELD_LABELS,
	FIELD_ORDER,
	INVALID_ID_MESSAGE,
	describeStudent,
	formatStudentTable,
	noSuchStudent,
} from "../render.js";

const log = createLogger("cli:menu");

export interface MenuOptions {
	store: StudentStore;
	prompter: Prompter;
	output: Output;
	palette?: Palette;
}

/** Outcome of one menu action: keep looping, or stop (exit chosen or input ended). */
type Step = "continue" | "stop";

const MENU_LINES = [
	"--- Student Database Menu ---",
	"1) Add student",
	"2) View students",
	"3) Update student",
	"4) Delete student",
	"5) Exit",
];

export async function runMenu(opts: MenuOptions): Promise<void> {
	const menu = new MenuSession(opts);
	await menu.run();
}

class MenuSession {
	private readonly store: StudentStore;
	private readonly prompter: Prompter;
	private readonly output: Output;
	private readonly palette: Palette;

	constructor(opts: MenuOptions) {
		this.store = opts.store;
		this.prompter = opts.prompter;
		this.output = opts.output;
		this.palette = opts.palette ?? createPalette(false);
	}

	async run(): Promise<void> {
		log.debug("menu started");
		let step: Step = "continue";
		while (step === "continue") {
			this.line("");
			this.line(this.palette.bold(MENU_LINES[0]));
			for (const entry of MENU_LINES.slice(1)) this.line(entry);

			const choice = await this.prompter.ask("Choose an option (1-5): ");
			if (choice === null) {
				this.line("");
				break;
			}
			step = await this.dispatch(choice.trim());
		}
		log.debug("menu finished");
	}

	private async dispatch(choice: string): Promise<Step> {
		try {
			switch (choice) {
				case "1":
					return await this.add();
				case "2":
					return this.view();
				case "3":
					return await this.update();
				case "4":
					return await this.remove();
				case "5":
					this.line("Exiting...");
					return "stop";
				default:
					this.line(this.palette.warning("Invalid option, try again."));
					return "continue";
			}
		} catch (err) {
			if (err instanceof StorageUnavailableError) {
				log.error("storage failure during menu action", err, { choice });
				this.line(this.palette.error(`Storage error: ${err.message}`));
				return "continue";
			}
			if (err instanceof RegistrarError) {
				this.line(this.palette.error(`Error: ${err.message}`));
				return "continue";
			}
			throw err;
		}
	}

	// ─── Actions ─────────────────────────────────────────────────────────

	private async add(): Promise<Step> {
		const fields = await this.askFields("");
		if (!fields) return "stop";
		const id = this.store.create(fields);
		this.line(this.palette.success(`Student added with ID ${id}.`));
		return "continue";
	}

	private view(): Step {
		for (const row of formatStudentTable(this.store.list(), this.palette)) this.line(row);
		return "continue";
	}

	private async update(): Promise<Step> {
		const id = await this.askId("Student ID to update: ");
		if (id === null) return "stop";
		const current = this.store.get(id);
		if (!current) {
			this.line(this.palette.warning(noSuchStudent(id)));
			return "continue";
		}
		this.line(this.palette.muted(`Current: ${describeStudent(current)}`));

		const fields = await this.askFields("New ");
		if (!fields) return "stop";
		const updated = this.store.update(id, fields);
		this.line(updated ? this.palette.success("Student updated.") : this.palette.warning(noSuchStudent(id)));
		return "continue";
	}

	private async remove(): Promise<Step> {
		const id = await this.askId("Student ID to delete: ");
		if (id === null) return "stop";
		const current = this.store.get(id);
		if (!current) {
			this.line(this.palette.warning(noSuchStudent(id)));
			return "continue";
		}

		const answer = await this.prompter.ask(`Delete student ${id} (${current.name})? (y/n): `);
		if (answer === null) return "stop";
		if (!isYes(answer)) {
			this.line("Delete canceled.");
			return "continue";
		}

		const removed = this.store.remove(id);
		this.line(removed ? this.palette.success("Student deleted.") : this.palette.warning(noSuchStudent(id)));
		return "continue";
	}

	// ─── Prompts ─────────────────────────────────────────────────────────

	/** Ask until the answer parses as an id. Null when input ends. */
	private async askId(question: string): Promise<number | null> {
		for (;;) {
			const answer = await this.prompter.ask(question);
			if (answer === null) return null;
			try {
				return parseStudentId(answer);
			} catch (err) {
				if (!(err instanceof InvalidIdError)) throw err;
				this.line(this.palette.error(INVALID_ID_MESSAGE));
			}
		}
	}

	/** Ask for name, grade and email, each until non-empty. Null when input ends. */
	private async askFields(prefix: string): Promise<StudentFields | null> {
		const values: Partial<StudentFields> = {};
		for (const key of FIELD_ORDER) {
			const label = FIELD_LABELS[key];
			const question = prefix ? `${prefix}${label.toLowerCase()}: ` : `${label}: `;
			const value = await this.askRequired(question, label);
			if (value === null) return null;
			values[key] = value;
		}
		const { name = "", grade = "", email = "" } = values;
		return { name, grade, email };
	}

	private async askRequired(question: string, label: string): Promise<string | null> {
		for (;;) {
			const answer = await this.prompter.ask(question);
			if (answer === null) return null;
			const value = answer.trim();
			if (value) return value;
			this.line(this.palette.error(`${label} is required.`));
		}
	}

	private line(text: string): void {
		this.output.write(text + "\n");
	}
}

/** Only "y" (any case) confirms; every other answer cancels. */
function isYes(answer: string): boolean {
	return answer.trim().toLowerCase() === "y";
}
