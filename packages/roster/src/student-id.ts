/**
 * @registrar/roster — Student identifier checks.
 *
 * Ids are positive integers assigned by SQLite. Text from the terminal goes
 * through {@link parseStudentId}; numbers reaching the store go through
 * {@link assertStudentId}.
 */

import { InvalidIdError, v } from "@registrar/core";

const DIGITS = /^\d+$/;

const studentIdV = v.number().integer().min(1).validate;

/**
 * Check that a value is a positive safe integer.
 *
 * @throws {InvalidIdError} Otherwise.
 */
export function assertStudentId(value: unknown): number {
	const result = studentIdV(value);
	if (!result.valid || result.value === undefined) {
		throw new InvalidIdError(value);
	}
	return result.value;
}

/**
 * Parse user-entered text as a student id. Surrounding whitespace is
 * ignored; signs, decimals and exponents are rejected.
 *
 * @throws {InvalidIdError} If the text is not a positive whole number.
 */
export function parseStudentId(raw: string): number {
	const text = raw.trim();
	if (!DIGITS.test(text) || !studentIdV(Number(text)).valid) {
		throw new InvalidIdError(raw);
	}
	return Number(text);
}
