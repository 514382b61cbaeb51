/**
 * @registrar/cli — Main orchestration.
 *
 * The `main()` function:
 *   1. Parses arguments
 *   2. Loads settings from the Registrar home
 *   3. Configures logging (log file, or stderr)
 *   4. Ensures the students table exists (fatal on failure)
 *   5. Runs a single command, or the interactive menu
 *
 * Returns the process exit code instead of exiting, so tests can call it.
 */

import {
	ConfigError,
	ConsoleTransport,
	FileTransport,
	InvalidIdError,
	LogLevel,
	StorageUnavailableError,
	configureLogging,
	createLogger,
	getLogFilePath,
	loadSettings,
	parseLogLevel,
	resolveDatabasePath,
	toError,
} from "@registrar/core";
import type { LogTransport, RegistrarSettings } from "@registrar/core";
import { RosterDatabase, StudentStore, ensureSchema } from "@registrar/roster";
import { createPalette } from "@registrar/ui";
import { UsageError, parseArgs, printHelp } from "./args.js";
import type { ParsedArgs } from "./args.js";
import * as students from "./commands/students.js";
import type { CommandContext } from "./commands/students.js";
import { createPrompter } from "./io.js";
import type { Output } from "./io.js";
import { runMenu } from "./modes/menu.js";
import { INVALID_ID_MESSAGE } from "./render.js";

export const VERSION = "0.1.0";

const log = createLogger("cli");

export interface MainIO {
	stdin: NodeJS.ReadableStream;
	stdout: Output & { isTTY?: boolean };
	stderr: Output;
	/** Writable the interactive prompter echoes to; defaults to process.stdout. */
	promptOutput?: NodeJS.WritableStream;
}

const PROCESS_IO: MainIO = {
	stdin: process.stdin,
	stdout: process.stdout,
	stderr: process.stderr,
	promptOutput: process.stdout,
};

export async function main(argv: string[], io: MainIO = PROCESS_IO): Promise<number> {
	let args: ParsedArgs;
	try {
		args = parseArgs(argv);
	} catch (err) {
		if (err instanceof UsageError) return usageFailure(io, err);
		throw err;
	}

	if (args.help) {
		printHelp(io.stdout);
		return 0;
	}
	if (args.version) {
		io.stdout.write(`registrar ${VERSION}\n`);
		return 0;
	}

	let settings: RegistrarSettings;
	try {
		settings = loadSettings();
	} catch (err) {
		if (err instanceof ConfigError) {
			io.stderr.write(`Error: ${err.message}\n`);
			return 1;
		}
		throw err;
	}
	configureCliLogging(settings, io);

	const database = new RosterDatabase(resolveDatabasePath(settings, args.db));
	try {
		ensureSchema(database);
	} catch (err) {
		if (err instanceof StorageUnavailableError) {
			log.fatal("cannot prepare student database", err, { path: err.path });
			io.stderr.write(`Error: ${err.message}\n`);
			return 1;
		}
		throw err;
	}

	const ctx: CommandContext = {
		store: new StudentStore(database),
		stdout: io.stdout,
		stderr: io.stderr,
		palette: createPalette(!args.noColor && io.stdout.isTTY === true),
	};
	log.info("registrar started", { command: args.command ?? "menu", path: database.getPath() });

	try {
		return await runCommand(args, ctx, io);
	} catch (err) {
		if (err instanceof UsageError) return usageFailure(io, err);
		if (err instanceof InvalidIdError) {
			io.stderr.write(`${INVALID_ID_MESSAGE}\n`);
			return 1;
		}
		if (err instanceof StorageUnavailableError) {
			log.error("command failed", err, { command: args.command });
			io.stderr.write(`Error: ${err.message}\n`);
			return 1;
		}
		throw err;
	}
}

async function runCommand(args: ParsedArgs, ctx: CommandContext, io: MainIO): Promise<number> {
	switch (args.command) {
		case "list":
			return students.list(ctx, args.rest, { json: args.json });
		case "add":
			return students.add(ctx, args.rest);
		case "update":
			return students.update(ctx, args.rest);
		case "delete":
			return students.remove(ctx, args.rest, { yes: args.yes });
		case undefined: {
			const prompter = createPrompter(io.stdin, io.promptOutput ?? process.stdout);
			try {
				await runMenu({ store: ctx.store, prompter, output: ctx.stdout, palette: ctx.palette });
			} finally {
				prompter.close();
			}
			return 0;
		}
		default:
			throw new UsageError(`Unknown command: ${args.command}`);
	}
}

/**
 * Send logs to `<home>/logs/registrar.log`, or to stderr when file logging is
 * off or the log directory cannot be created.
 */
function configureCliLogging(settings: RegistrarSettings, io: MainIO): void {
	const level = parseLogLevel(settings.logLevel) ?? LogLevel.INFO;
	let transport: LogTransport | undefined;

	if (settings.logToFile) {
		try {
			transport = new FileTransport({ filePath: getLogFilePath() });
		} catch (err) {
			io.stderr.write(`Warning: cannot write log file (${toError(err).message}); logging to stderr\n`);
		}
	}

	configureLogging({
		level,
		transports: [transport ?? new ConsoleTransport({ stream: process.stderr })],
	});
}

function usageFailure(io: MainIO, err: UsageError): number {
	io.stderr.write(`Error: ${err.message}\nRun 'registrar --help' for usage.\n`);
	return 1;
}
