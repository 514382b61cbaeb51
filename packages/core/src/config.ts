import fs from "fs";
import path from "path";
import { ConfigError, toError } from "./errors.js";
import type { LogLevelName, RegistrarSettings } from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";
import { v, validate, formatValidationErrors } from "./validation.js";

const SETTINGS_FILE = "settings.json";

const logLevelV = v.union<LogLevelName>(
	v.literal("debug").validate,
	v.literal("info").validate,
	v.literal("warn").validate,
	v.literal("error").validate,
	v.literal("fatal").validate,
).validate;

const settingsV = v.object({
	databaseFile: v.optional(v.string().min(1).validate).validate,
	logLevel: v.optional(logLevelV).validate,
	logToFile: v.optional(v.boolean().validate).validate,
}).strict().validate;

/**
 * Get the Registrar home directory path (~/.registrar).
 *
 * Honors `REGISTRAR_HOME` when set, otherwise falls back to
 * `$HOME/.registrar` (`$USERPROFILE` on Windows).
 */
export function getRegistrarHome(): string {
	const override = process.env.REGISTRAR_HOME?.trim();
	if (override) return path.resolve(override);
	return path.join(process.env.HOME || process.env.USERPROFILE || "~", ".registrar");
}

/**
 * Path of the settings file, `<home>/settings.json`.
 */
export function getSettingsPath(): string {
	return path.join(getRegistrarHome(), SETTINGS_FILE);
}

/**
 * Load settings from `<home>/settings.json`, merged over {@link DEFAULT_SETTINGS}.
 *
 * A missing file yields pure defaults.
 *
 * @throws {ConfigError} If the file cannot be read, is not valid JSON, or
 * holds an unknown key or a value of the wrong type.
 */
export function loadSettings(): RegistrarSettings {
	const settingsPath = getSettingsPath();
	if (!fs.existsSync(settingsPath)) {
		return { ...DEFAULT_SETTINGS };
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(settingsPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${settingsPath}`, toError(err));
	}

	const result = validate(parsed, settingsV);
	if (!result.valid || !result.value) {
		throw new ConfigError(`Invalid settings in ${settingsPath}: ${formatValidationErrors(result.errors)}`);
	}

	const { databaseFile, logLevel, logToFile } = result.value;
	return {
		databaseFile: databaseFile ?? DEFAULT_SETTINGS.databaseFile,
		logLevel: logLevel ?? DEFAULT_SETTINGS.logLevel,
		logToFile: logToFile ?? DEFAULT_SETTINGS.logToFile,
	};
}

/**
 * Resolve the database file location.
 *
 * Precedence: explicit override (the `--db` flag), `REGISTRAR_DB`, then
 * `settings.databaseFile`. Relative paths from the settings file resolve
 * against the home directory; the flag and env var resolve against the
 * current working directory.
 */
export function resolveDatabasePath(settings: RegistrarSettings, override?: string): string {
	const explicit = override?.trim() || process.env.REGISTRAR_DB?.trim();
	if (explicit) return path.resolve(explicit);
	return path.resolve(getRegistrarHome(), settings.databaseFile);
}

/**
 * Path of the CLI log file, `<home>/logs/registrar.log`.
 */
export function getLogFilePath(): string {
	return path.join(getRegistrarHome(), "logs", "registrar.log");
}
