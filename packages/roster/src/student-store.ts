/**
 * @registrar/roster — Student record store.
 *
 * CRUD over the `students` table. Each call opens its own connection,
 * runs a single statement (autocommitted by SQLite) and closes the
 * connection, so every write is durable as soon as the call returns and no
 * transaction spans two calls.
 *
 * Update and remove report whether a row was affected instead of throwing
 * for an absent id.
 */

import { assertValid, createLogger, v } from "@registrar/core";
import type { Logger } from "@registrar/core";
import type { RosterDatabase } from "./db/database.js";
import { STUDENTS_TABLE } from "./db/schema.js";
import { assertStudentId } from "./student-id.js";
import type { StudentFields, StudentRecord } from "./types.js";

const SQL = {
	insert: `INSERT INTO ${STUDENTS_TABLE} (name, grade, email) VALUES (?, ?, ?)`,
	selectAll: `SELECT id, name, grade, email FROM ${STUDENTS_TABLE} ORDER BY id ASC`,
	selectOne: `SELECT id, name, grade, email FROM ${STUDENTS_TABLE} WHERE id = ?`,
	update: `UPDATE ${STUDENTS_TABLE} SET name = ?, grade = ?, email = ? WHERE id = ?`,
	delete: `DELETE FROM ${STUDENTS_TABLE} WHERE id = ?`,
} as const;

// Strings only; empty values are the caller's concern.
const studentFieldsV = v.object({
	name: v.string().validate,
	grade: v.string().validate,
	email: v.string().validate,
}).validate;

export class StudentStore {
	private readonly log: Logger;

	constructor(private readonly database: RosterDatabase, logger?: Logger) {
		this.log = (logger ?? createLogger("roster")).child("store");
	}

	/**
	 * Insert a student and return the id SQLite assigned to it.
	 *
	 * @throws {StorageUnavailableError} On I/O failure.
	 */
	create(fields: StudentFields): number {
		const { name, grade, email } = assertValid(fields, studentFieldsV, "student");
		return this.log.time("create", () =>
			this.database.withConnection((db) => {
				const result = db.prepare<[string, string, string]>(SQL.insert).run(name, grade, email);
				return Number(result.lastInsertRowid);
			}),
		);
	}

	/**
	 * All students in ascending id order. Empty when there are none.
	 */
	list(): StudentRecord[] {
		return this.log.time("list", () =>
			this.database.withConnection((db) => db.prepare<[], StudentRecord>(SQL.selectAll).all()),
		);
	}

	/**
	 * A single student, or undefined when no row has this id.
	 */
	get(id: number): StudentRecord | undefined {
		const studentId = assertStudentId(id);
		return this.log.time("get", () =>
			this.database.withConnection((db) => db.prepare<[number], StudentRecord>(SQL.selectOne).get(studentId)),
			{ id: studentId },
		);
	}

	/**
	 * Overwrite name, grade and email of a student together.
	 *
	 * @returns `false` if no student has this id (nothing is written).
	 * @throws {InvalidIdError} If `id` is not a positive integer.
	 * @throws {StorageUnavailableError} On I/O failure.
	 */
	update(id: number, fields: StudentFields): boolean {
		const studentId = assertStudentId(id);
		const { name, grade, email } = assertValid(fields, studentFieldsV, "student");
		const changes = this.log.time("update", () =>
			this.database.withConnection((db) =>
				db.prepare<[string, string, string, number]>(SQL.update).run(name, grade, email, studentId).changes,
			),
			{ id: studentId },
		);
		if (changes === 0) this.log.debug("update matched no student", { id: studentId });
		return changes > 0;
	}

	/**
	 * Delete a student permanently.
	 *
	 * @returns `false` if no student has this id.
	 * @throws {InvalidIdError} If `id` is not a positive integer.
	 * @throws {StorageUnavailableError} On I/O failure.
	 */
	remove(id: number): boolean {
		const studentId = assertStudentId(id);
		const changes = this.log.time("remove", () =>
			this.database.withConnection((db) => db.prepare<[number]>(SQL.delete).run(studentId).changes),
			{ id: studentId },
		);
		if (changes === 0) this.log.debug("remove matched no student", { id: studentId });
		return changes > 0;
	}
}
