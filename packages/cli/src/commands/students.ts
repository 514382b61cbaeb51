/**
 * @registrar/cli — Scriptable student commands.
 *
 * One store operation per invocation: `list`, `add`, `update`, `delete`.
 * Each handler returns the process exit code. Storage and id errors are
 * left to the caller so they are reported the same way for every command.
 */

import { parseStudentId } from "@registrar/roster";
import type { StudentFields, StudentStore } from "@registrar/roster";
import type { Palette } from "@registrar/ui";
import { UsageError } from "../args.js";
import type { Output } from "../io.js";
import { FIELD_LABELS, FIELD_ORDER, formatStudentTable, noSuchStudent } from "../render.js";

export interface CommandContext {
	store: StudentStore;
	stdout: Output;
	stderr: Output;
	palette: Palette;
}

/**
 * `registrar list [--json]`
 */
export function list(ctx: CommandContext, rest: string[], opts: { json?: boolean } = {}): number {
	expectArgs("list", rest, 0);
	const records = ctx.store.list();
	if (opts.json) {
		ctx.stdout.write(JSON.stringify(records, null, "\t") + "\n");
	} else {
		for (const row of formatStudentTable(records, ctx.palette)) ctx.stdout.write(row + "\n");
	}
	return 0;
}

/**
 * `registrar add <name> <grade> <email>`
 */
export function add(ctx: CommandContext, rest: string[]): number {
	expectArgs("add <name> <grade> <email>", rest, 3);
	const id = ctx.store.create(fieldsFrom(rest));
	ctx.stdout.write(ctx.palette.success(`Student added with ID ${id}.`) + "\n");
	return 0;
}

/**
 * `registrar update <id> <name> <grade> <email>`
 */
export function update(ctx: CommandContext, rest: string[]): number {
	expectArgs("update <id> <name> <grade> <email>", rest, 4);
	const [rawId, ...values] = rest;
	const id = parseStudentId(rawId);
	if (!ctx.store.update(id, fieldsFrom(values))) {
		ctx.stderr.write(ctx.palette.warning(noSuchStudent(id)) + "\n");
		return 1;
	}
	ctx.stdout.write(ctx.palette.success(`Student ${id} updated.`) + "\n");
	return 0;
}

/**
 * `registrar delete <id> --yes`
 *
 * Without `--yes` nothing is deleted: there is no terminal to confirm on.
 */
export function remove(ctx: CommandContext, rest: string[], opts: { yes?: boolean } = {}): number {
	expectArgs("delete <id> --yes", rest, 1);
	const id = parseStudentId(rest[0]);
	if (!opts.yes) {
		throw new UsageError(`Refusing to delete student ${id} without --yes`);
	}
	if (!ctx.store.remove(id)) {
		ctx.stderr.write(ctx.palette.warning(noSuchStudent(id)) + "\n");
		return 1;
	}
	ctx.stdout.write(ctx.palette.success(`Student ${id} deleted.`) + "\n");
	return 0;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function expectArgs(usage: string, rest: string[], count: number): void {
	if (rest.length !== count) {
		throw new UsageError(`Expected ${count} argument${count === 1 ? "" : "s"}, got ${rest.length}. Usage: registrar ${usage}`);
	}
}

/**
 * Trimmed name, grade and email from positional arguments; none may be empty.
 */
function fieldsFrom(values: string[]): StudentFields {
	const fields: StudentFields = { name: "", grade: "", email: "" };
	FIELD_ORDER.forEach((key, index) => {
		const value = (values[index] ?? "").trim();
		if (!value) {
			throw new UsageError(`${FIELD_LABELS[key]} is required.`);
		}
		fields[key] = value;
	});
	return fields;
}
