/**
 * @registrar/cli — Argument parser.
 *
 * Simple CLI argument parser with no external dependencies.
 * Parses flags, the command name, and positional arguments from argv.
 */

import { RegistrarError } from "@registrar/core";
import type { Output } from "./io.js";

export interface ParsedArgs {
	/** `list`, `add`, `update` or `delete`; absent for the interactive menu. */
	command?: string;
	/** Database file override (--db). */
	db?: string;
	/** Machine-readable output for `list` (--json). */
	json?: boolean;
	/** Skip the delete confirmation (-y, --yes). */
	yes?: boolean;
	/** Disable ANSI colors (--no-color). */
	noColor?: boolean;
	version?: boolean;
	help?: boolean;
	/** Positional arguments after the command. */
	rest: string[];
}

/**
 * Bad command line: unknown flag or command, missing or extra arguments.
 */
export class UsageError extends RegistrarError {
	constructor(message: string) {
		super(message, "USAGE_ERROR");
		this.name = "UsageError";
	}
}

export const COMMANDS = new Set(["list", "add", "update", "delete"]);

/**
 * Parse process.argv (or a custom argv array) into structured arguments.
 *
 * Expects argv WITHOUT the leading `node` and script path entries,
 * i.e., pass `process.argv.slice(2)`. Flags may appear anywhere; a bare
 * `--` ends flag parsing so values starting with "-" can be passed.
 *
 * @throws {UsageError} On an unknown flag, a flag missing its value, or an unknown command.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = {
		rest: [],
	};
	const positional: string[] = [];

	let i = 0;
	let flagsDone = false;

	while (i < argv.length) {
		const arg = argv[i];

		if (flagsDone || !arg.startsWith("-") || arg === "-") {
			positional.push(arg);
			i++;
			continue;
		}

		if (arg === "--") {
			flagsDone = true;
			i++;
			continue;
		}

		// ─── Flags with values ──────────────────────────────────────────
		if (arg === "--db") {
			i++;
			if (i >= argv.length) {
				throw new UsageError("--db requires a file path");
			}
			result.db = argv[i];
			i++;
			continue;
		}

		if (arg.startsWith("--db=")) {
			result.db = arg.slice("--db=".length);
			if (!result.db) throw new UsageError("--db requires a file path");
			i++;
			continue;
		}

		// ─── Boolean flags ──────────────────────────────────────────────
		switch (arg) {
			case "--json":
				result.json = true;
				break;
			case "-y":
			case "--yes":
				result.yes = true;
				break;
			case "--no-color":
				result.noColor = true;
				break;
			case "-v":
			case "--version":
				result.version = true;
				break;
			case "-h":
			case "--help":
				result.help = true;
				break;
			default:
				throw new UsageError(`Unknown option: ${arg}`);
		}
		i++;
	}

	const [command, ...rest] = positional;
	if (command !== undefined) {
		if (command === "help") {
			result.help = true;
		} else if (!COMMANDS.has(command)) {
			throw new UsageError(`Unknown command: ${command}`);
		} else {
			result.command = command;
		}
	}
	result.rest = rest;

	return result;
}

/**
 * Print the CLI help text.
 */
export function printHelp(out: Output): void {
	const help = `
Registrar — student records on the command line

Usage:
  registrar                                  Interactive menu (default)
  registrar list [--json]                    List all students
  registrar add <name> <grade> <email>       Add a student
  registrar update <id> <name> <grade> <email>
                                             Replace a student's name, grade and email
  registrar delete <id> --yes                Delete a student

Options:
  --db <path>         Use this database file instead of the configured one
  --json              Print the list as JSON
  -y, --yes           Confirm deletion without prompting
  --no-color          Disable colored output
  -v, --version       Show version
  -h, --help          Show this help

Environment:
  REGISTRAR_HOME      Settings, logs and default database (default ~/.registrar)
  REGISTRAR_DB        Database file (overridden by --db)
  LOG_LEVEL           debug | info | warn | error | fatal
`;
	out.write(help.trimStart());
}
