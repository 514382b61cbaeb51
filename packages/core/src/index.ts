// @registrar/core — Foundation
export * from "./types.js";
export * from "./errors.js";
export {
	getRegistrarHome,
	getSettingsPath,
	getLogFilePath,
	loadSettings,
	resolveDatabasePath,
} from "./config.js";

// Validation
export { v, validate, assertValid, formatValidationErrors } from "./validation.js";
export type { ValidatorFn, ValidationError, ValidationResult } from "./validation.js";

// Observability
export * from "./observability/index.js";
