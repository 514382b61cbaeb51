/**
 * Schema — DDL for the student records table.
 *
 * The table is created idempotently (IF NOT EXISTS). An existing table is
 * never altered, so files written by earlier runs keep their rows as-is.
 *
 * `AUTOINCREMENT` makes SQLite track the highest id ever handed out in
 * `sqlite_sequence`, so ids of deleted rows (including the newest one) are
 * never assigned again. A pre-existing table declared without it reuses the
 * id of a deleted newest row; {@link ensureSchema} logs a warning for it.
 */

import type BetterSqlite3 from "better-sqlite3";
import { createLogger } from "@registrar/core";
import type { RosterDatabase } from "./database.js";

const log = createLogger("roster:schema");

export const STUDENTS_TABLE = "students";

const STUDENTS_DDL = `
	CREATE TABLE IF NOT EXISTS ${STUDENTS_TABLE} (
		id    INTEGER PRIMARY KEY AUTOINCREMENT,
		name  TEXT NOT NULL,
		grade TEXT NOT NULL,
		email TEXT NOT NULL
	)
`;

export interface ColumnInfo {
	name: string;
	type: string;
	notNull: boolean;
	primaryKey: boolean;
}

interface TableInfoRow {
	cid: number;
	name: string;
	type: string;
	notnull: number;
	dflt_value: unknown;
	pk: number;
}

/**
 * Make sure the students table exists. Safe to call any number of times.
 *
 * @returns `true` if the table was created by this call.
 * @throws {StorageUnavailableError} If the file cannot be opened or written.
 */
export function ensureSchema(database: RosterDatabase): boolean {
	const existingSql = database.withConnection((db) => {
		const sql = tableSql(db, STUDENTS_TABLE);
		if (sql === undefined) db.exec(STUDENTS_DDL);
		return sql;
	});

	const path = database.getPath();
	if (existingSql === undefined) {
		log.info("Created students table", { path });
		return true;
	}
	if (!/\bAUTOINCREMENT\b/i.test(existingSql)) {
		log.warn("Students table lacks AUTOINCREMENT; ids of deleted students may be reused", { path });
	} else {
		log.debug("Students table already present", { path });
	}
	return false;
}

/**
 * Column layout of the students table, in declaration order.
 * Empty when the table does not exist.
 */
export function describeSchema(database: RosterDatabase): ColumnInfo[] {
	return database.withConnection((db) =>
		db
			.prepare<[], TableInfoRow>(`PRAGMA table_info(${STUDENTS_TABLE})`)
			.all()
			.map((row) => ({
				name: row.name,
				type: row.type,
				notNull: row.notnull === 1,
				primaryKey: row.pk > 0,
			})),
	);
}

/** The CREATE statement SQLite stored for a table, or undefined if there is none. */
function tableSql(db: BetterSqlite3.Database, name: string): string | undefined {
	const row = db
		.prepare<[string], { sql: string }>("SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?")
		.get(name);
	return row?.sql;
}
