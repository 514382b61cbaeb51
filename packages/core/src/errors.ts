/**
 * Typed error hierarchy for Registrar.
 *
 * All Registrar errors extend {@link RegistrarError} with a machine-readable
 * `code` string for programmatic error handling.
 */

/**
 * Base error class for all Registrar errors.
 *
 * Carries a machine-readable `code` field (e.g. `"INVALID_ID"`) in addition
 * to the human-readable `message`.
 */
export class RegistrarError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "RegistrarError";
		this.code = code;
	}
}

/**
 * The backing database file cannot be opened, read, or written
 * (permissions, full disk, corruption, missing directory).
 */
export class StorageUnavailableError extends RegistrarError {
	readonly path: string;

	constructor(message: string, path: string, cause?: Error) {
		super(message, "STORAGE_UNAVAILABLE", cause);
		this.name = "StorageUnavailableError";
		this.path = path;
	}
}

/**
 * A student identifier is not a well-formed positive integer.
 */
export class InvalidIdError extends RegistrarError {
	readonly received: unknown;

	constructor(received: unknown) {
		const shown = typeof received === "string" ? JSON.stringify(received) : String(received);
		super(`Invalid student ID: ${shown}`, "INVALID_ID");
		this.name = "InvalidIdError";
		this.received = received;
	}
}

/**
 * Configuration error (unreadable settings file, invalid JSON, bad value).
 */
export class ConfigError extends RegistrarError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
