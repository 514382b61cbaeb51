/**
 * Runtime validation utilities.
 *
 * Lightweight validators for settings files and values that arrive from
 * outside the type system (parsed JSON, user input, plain JS callers).
 * Uses a fluent builder pattern.
 */

import { RegistrarError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorFn<T = unknown> = (value: unknown) => { valid: boolean; error?: string; value?: T };

export interface ValidationError {
	path: string;
	message: string;
	received: unknown;
}

export interface ValidationResult<T = unknown> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

// ─── Validator Classes ───────────────────────────────────────────────────────

class StringValidator {
	private minLen?: number;

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	validate: ValidatorFn<string> = (value: unknown) => {
		if (typeof value !== "string") {
			return { valid: false, error: `Expected string, received ${describe(value)}` };
		}
		if (this.minLen !== undefined && value.length < this.minLen) {
			return { valid: false, error: `String length ${value.length} is below minimum ${this.minLen}` };
		}
		return { valid: true, value };
	};
}

class NumberValidator {
	private minVal?: number;
	private intOnly = false;

	min(n: number): this {
		this.minVal = n;
		return this;
	}

	integer(): this {
		this.intOnly = true;
		return this;
	}

	validate: ValidatorFn<number> = (value: unknown) => {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return { valid: false, error: `Expected number, received ${describe(value)}` };
		}
		if (this.intOnly && !Number.isSafeInteger(value)) {
			return { valid: false, error: `Expected integer, received ${value}` };
		}
		if (this.minVal !== undefined && value < this.minVal) {
			return { valid: false, error: `Number ${value} is below minimum ${this.minVal}` };
		}
		return { valid: true, value };
	};
}

class BooleanValidator {
	validate: ValidatorFn<boolean> = (value: unknown) => {
		if (typeof value !== "boolean") {
			return { valid: false, error: `Expected boolean, received ${describe(value)}` };
		}
		return { valid: true, value };
	};
}

type InferSchema<T extends Record<string, ValidatorFn>> = {
	[K in keyof T]: T[K] extends ValidatorFn<infer U> ? U : unknown;
};

class ObjectValidator<T extends Record<string, ValidatorFn>> {
	private rejectUnknown = false;

	constructor(private schema: T) {}

	/** Fail on keys the schema does not name. */
	strict(): this {
		this.rejectUnknown = true;
		return this;
	}

	validate: ValidatorFn<InferSchema<T>> = (value: unknown) => {
		if (!isRecord(value)) {
			return { valid: false, error: `Expected object, received ${describe(value)}` };
		}
		const result: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const [key, validator] of Object.entries(this.schema)) {
			const fieldResult = validator(value[key]);
			if (!fieldResult.valid) {
				errors.push(`${key}: ${fieldResult.error}`);
			} else {
				result[key] = fieldResult.value;
			}
		}

		if (this.rejectUnknown) {
			for (const key of Object.keys(value)) {
				if (!(key in this.schema)) errors.push(`${key}: Unknown key`);
			}
		}

		if (errors.length > 0) {
			return { valid: false, error: errors.join("; ") };
		}
		return { valid: true, value: result as InferSchema<T> };
	};
}

class OptionalValidator<T> {
	constructor(private inner: ValidatorFn<T>) {}

	validate: ValidatorFn<T | undefined> = (value: unknown) => {
		if (value === undefined || value === null) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

class UnionValidator<T> {
	constructor(private validators: ValidatorFn<T>[]) {}

	validate: ValidatorFn<T> = (value: unknown) => {
		const errors: string[] = [];
		for (const validator of this.validators) {
			const result = validator(value);
			if (result.valid) {
				return result;
			}
			if (result.error) {
				errors.push(result.error);
			}
		}
		return {
			valid: false,
			error: `Value did not match any variant: ${errors.join(" | ")}`,
		};
	};
}

class LiteralValidator<T extends string | number | boolean> {
	constructor(private expected: T) {}

	validate: ValidatorFn<T> = (value: unknown) => {
		if (value !== this.expected) {
			return { valid: false, error: `Expected literal ${JSON.stringify(this.expected)}, received ${JSON.stringify(value)}` };
		}
		return { valid: true, value: this.expected };
	};
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * Usage:
 * ```ts
 * const idV = v.number().integer().min(1).validate;
 * const settingsV = v.object({
 *   databaseFile: v.optional(v.string().min(1).validate).validate,
 *   logToFile: v.optional(v.boolean().validate).validate,
 * }).strict().validate;
 * ```
 */
export const v = {
	string: () => new StringValidator(),
	number: () => new NumberValidator(),
	boolean: () => new BooleanValidator(),
	object: <T extends Record<string, ValidatorFn>>(schema: T) => new ObjectValidator<T>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
	union: <T>(...validators: ValidatorFn<T>[]) => new UnionValidator<T>(validators),
	literal: <T extends string | number | boolean>(value: T) => new LiteralValidator<T>(value),
};

// ─── Utility Functions ───────────────────────────────────────────────────────

/**
 * Validate a value against a validator function.
 */
export function validate<T>(value: unknown, validator: ValidatorFn<T>): ValidationResult<T> {
	const result = validator(value);
	if (result.valid) {
		return { valid: true, errors: [], value: result.value };
	}
	return {
		valid: false,
		errors: [{
			path: "$",
			message: result.error ?? "Validation failed",
			received: value,
		}],
	};
}

/**
 * Format validation errors as a single line, e.g. `"$ — logLevel: ..."`.
 */
export function formatValidationErrors(errors: ValidationError[]): string {
	return errors.map((e) => `${e.path} — ${e.message}`).join("; ");
}

/**
 * Assert that validation passes; throw a {@link RegistrarError} on failure.
 *
 * @param label - Optional prefix for the error message (e.g. "student.name").
 * @throws RegistrarError with code `"VALIDATION_ERROR"` if validation fails.
 */
export function assertValid<T>(value: unknown, validator: ValidatorFn<T>, label?: string): T {
	const result = validator(value);
	if (!result.valid) {
		const prefix = label ? `${label}: ` : "";
		throw new RegistrarError(`${prefix}${result.error ?? "Validation failed"}`, "VALIDATION_ERROR");
	}
	return result.value as T;
}
