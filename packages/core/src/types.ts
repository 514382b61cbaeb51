// ─── Settings ───────────────────────────────────────────────────────────────

export type LogLevelName = "debug" | "info" | "warn" | "error" | "fatal";

export interface RegistrarSettings {
	/** Database file. Relative paths resolve against the Registrar home. */
	databaseFile: string;
	/** Minimum level written by the logger. */
	logLevel: LogLevelName;
	/** Write logs to `<home>/logs/registrar.log` instead of the terminal. */
	logToFile: boolean;
}

export const DEFAULT_SETTINGS: RegistrarSettings = {
	databaseFile: "students.db",
	logLevel: "info",
	logToFile: true,
};
