/**
 * Structured, pluggable logging for Registrar.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Loggers that were not given explicit transports or a level
 * resolve them from the global configuration on every call, so module-level
 * loggers follow a later {@link configureLogging}.
 */

import { writeFileSync, appendFileSync, statSync, renameSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { LogLevelName } from "../types.js";

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.FATAL]: "FATAL",
};

const LOG_LEVEL_PARSE: Record<LogLevelName, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	fatal: LogLevel.FATAL,
};

/**
 * Parse a level name (case-insensitive). Returns undefined for unknown names.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
	if (!name) return undefined;
	const key = name.trim().toLowerCase();
	for (const [levelName, level] of Object.entries(LOG_LEVEL_PARSE)) {
		if (levelName === key) return level;
	}
	return undefined;
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	error?: { name: string; message: string; code?: string; stack?: string };
	/** Duration in milliseconds for timed operations */
	duration?: number;
	/** Logger name, e.g. "roster:store" */
	logger: string;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. Entries below this level are discarded. */
	level?: LogLevel;
	/** Output transports. Defaults to the global transports, then [ConsoleTransport]. */
	transports?: LogTransport[];
	/** Context merged into every log entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};
let fallbackTransports: LogTransport[] | undefined;

/**
 * Configure global logging defaults. Applies to every logger that has not
 * overridden the corresponding setting, including loggers created earlier.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

// ─── ANSI Colors ─────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";
const ANSI_BOLD = "\x1b[1m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",
	[LogLevel.INFO]: "\x1b[32m",
	[LogLevel.WARN]: "\x1b[33m",
	[LogLevel.ERROR]: "\x1b[31m",
	[LogLevel.FATAL]: "\x1b[35;1m",
};

function serializeEntry(entry: LogEntry): string {
	return JSON.stringify({
		timestamp: entry.timestamp,
		level: entry.levelName,
		logger: entry.logger,
		message: entry.message,
		...(Object.keys(entry.context).length > 0 ? { context: entry.context } : {}),
		...(entry.error ? { error: entry.error } : {}),
		...(entry.duration !== undefined ? { duration: entry.duration } : {}),
	});
}

// ─── Transports ──────────────────────────────────────────────────────────────

/**
 * Human-readable output with timestamps. Without a fixed `stream`, ERROR
 * and above go to stderr and everything else to stdout.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;
	private readonly stream: { write(chunk: string): unknown } | undefined;

	constructor(opts?: { colors?: boolean; stream?: { write(chunk: string): unknown } }) {
		this.useColors = opts?.colors ?? (process.stderr.isTTY ?? false);
		this.stream = opts?.stream;
	}

	format(entry: LogEntry): string {
		const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
		const lvl = entry.levelName.padEnd(5);
		const name = ` [${entry.logger}]`;

		let line: string;
		if (this.useColors) {
			const color = LEVEL_COLORS[entry.level];
			line = `${ANSI_DIM}${ts}${ANSI_RESET} ${color}${lvl}${ANSI_RESET}${ANSI_BOLD}${name}${ANSI_RESET} ${entry.message}`;
		} else {
			line = `${ts} ${lvl}${name} ${entry.message}`;
		}

		const ctxKeys = Object.keys(entry.context);
		if (ctxKeys.length > 0) {
			const ctxStr = ctxKeys
				.map((k) => `${k}=${JSON.stringify(entry.context[k])}`)
				.join(" ");
			line += ` ${this.useColors ? ANSI_DIM : ""}${ctxStr}${this.useColors ? ANSI_RESET : ""}`;
		}
		if (entry.duration !== undefined) {
			line += ` duration=${entry.duration}ms`;
		}
		if (entry.error) {
			line += `\n  ${entry.error.name}: ${entry.error.message}`;
		}
		return line;
	}

	write(entry: LogEntry): void {
		const stream = this.stream ?? (entry.level >= LogLevel.ERROR ? process.stderr : process.stdout);
		stream.write(this.format(entry) + "\n");
	}
}

/**
 * One JSON object per line on stdout (stderr for ERROR and above).
 */
export class JsonTransport implements LogTransport {
	write(entry: LogEntry): void {
		const stream = entry.level >= LogLevel.ERROR ? process.stderr : process.stdout;
		stream.write(serializeEntry(entry) + "\n");
	}
}

/**
 * Appends JSON lines to a file, rotating by size (`registrar.log.1`, `.2`, ...).
 */
export class FileTransport implements LogTransport {
	private readonly filePath: string;
	private readonly maxSizeBytes: number;
	private readonly maxFiles: number;
	private currentSize: number;

	constructor(opts: {
		filePath: string;
		/** Default: 5 MiB. */
		maxSizeBytes?: number;
		/** Rotated files to keep. Default: 3. */
		maxFiles?: number;
	}) {
		this.filePath = opts.filePath;
		this.maxSizeBytes = opts.maxSizeBytes ?? 5 * 1024 * 1024;
		this.maxFiles = opts.maxFiles ?? 3;
		mkdirSync(dirname(this.filePath), { recursive: true });

		try {
			this.currentSize = statSync(this.filePath).size;
		} catch {
			// Not created yet
			this.currentSize = 0;
		}
	}

	getPath(): string {
		return this.filePath;
	}

	write(entry: LogEntry): void {
		const line = serializeEntry(entry) + "\n";
		const bytes = Buffer.byteLength(line, "utf-8");

		if (this.currentSize > 0 && this.currentSize + bytes > this.maxSizeBytes) {
			this.rotate();
		}

		appendFileSync(this.filePath, line, "utf-8");
		this.currentSize += bytes;
	}

	private rotate(): void {
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			try {
				renameSync(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
			} catch {
				// Gap in the rotation sequence
			}
		}
		renameSync(this.filePath, `${this.filePath}.1`);
		writeFileSync(this.filePath, "", "utf-8");
		this.currentSize = 0;
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Effective level: `LOG_LEVEL` env, then the logger's own level, then the
 * global level, then INFO.
 */
function resolveLevel(own?: LogLevel): LogLevel {
	const envLevel = parseLogLevel(process.env.LOG_LEVEL);
	if (envLevel !== undefined) return envLevel;
	if (own !== undefined) return own;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return LogLevel.INFO;
}

function resolveTransports(own?: LogTransport[]): LogTransport[] {
	if (own) return own;
	if (globalConfig.transports) return globalConfig.transports;
	fallbackTransports ??= [new ConsoleTransport()];
	return fallbackTransports;
}

export class Logger {
	private readonly name: string;
	private readonly level: LogLevel | undefined;
	private readonly transports: LogTransport[] | undefined;
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = config?.level;
		this.transports = config?.transports;
		this.context = { ...(config?.defaultContext ?? {}) };
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	fatal(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.FATAL, message, error, ctx);
	}

	/**
	 * Child logger named `<parent>:<child>`, sharing level, transports and context.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	/**
	 * New logger with additional context merged in. Does not mutate this one.
	 */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	/**
	 * Run `fn` and log `message` at DEBUG with its duration. Errors are
	 * rethrown after being logged at ERROR.
	 */
	time<T>(message: string, fn: () => T, ctx?: Record<string, unknown>): T {
		const start = performance.now();
		try {
			const result = fn();
			this.emit(LogLevel.DEBUG, message, undefined, { ...ctx, duration: elapsed(start) });
			return result;
		} catch (err) {
			this.emit(LogLevel.ERROR, `${message} failed`, err, { ...ctx, duration: elapsed(start) });
			throw err;
		}
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private emit(level: LogLevel, message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		if (level < resolveLevel(this.level)) return;

		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context: { ...(globalConfig.defaultContext ?? {}), ...this.context, ...(ctx ?? {}) },
			logger: this.name,
		};

		if (entry.context.duration !== undefined) {
			entry.duration = Number(entry.context.duration);
			delete entry.context.duration;
		}

		if (error !== undefined) {
			entry.error = serializeError(error);
		}

		for (const transport of resolveTransports(this.transports)) {
			try {
				transport.write(entry);
			} catch (err) {
				// Transport failures never propagate to the caller
				process.stderr.write(`[registrar] log transport failed: ${err instanceof Error ? err.message : String(err)}\n`);
			}
		}
	}
}

function elapsed(start: number): number {
	return Math.round((performance.now() - start) * 100) / 100;
}

function serializeError(error: unknown): NonNullable<LogEntry["error"]> {
	if (error instanceof Error) {
		const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
		return {
			name: error.name,
			message: error.message,
			...(code ? { code } : {}),
			stack: error.stack,
		};
	}
	return { name: "Error", message: String(error) };
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger that follows the global configuration.
 *
 * @param name - Package or module identifier (e.g. "roster:store", "cli")
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
