/**
 * RosterDatabase — scoped SQLite connections for the student records file.
 *
 * Every operation opens its own connection, runs, and closes it again on
 * every exit path. No connection outlives the call that opened it, so the
 * file is only held while a statement is executing.
 */

import Database from "better-sqlite3";
import type BetterSqlite3 from "better-sqlite3";
import fs from "fs";
import path from "path";
import { RegistrarError, StorageUnavailableError, createLogger, toError } from "@registrar/core";

const log = createLogger("roster:db");

/** Pragmas applied to every connection on open. */
const PRAGMAS: Record<string, string | number> = {
	synchronous: "FULL",
	foreign_keys: 1,
	busy_timeout: 5000, // wait on another process holding the write lock
};

/**
 * Owns the backing file location and hands out one connection per call.
 *
 * Usage:
 *   const db = new RosterDatabase("/home/me/.registrar/students.db");
 *   const rows = db.withConnection((conn) => conn.prepare("SELECT ...").all());
 */
export class RosterDatabase {
	private readonly _path: string;

	constructor(filePath: string) {
		this._path = path.resolve(filePath);
	}

	/**
	 * Get the backing file path.
	 */
	getPath(): string {
		return this._path;
	}

	/**
	 * Run `fn` against a freshly opened connection and close it afterwards.
	 *
	 * Driver and filesystem failures surface as {@link StorageUnavailableError}
	 * with the original error as `cause`. Registrar errors thrown by `fn`
	 * pass through unchanged.
	 */
	withConnection<T>(fn: (db: BetterSqlite3.Database) => T): T {
		let db: BetterSqlite3.Database | undefined;
		try {
			db = this._open();
			return fn(db);
		} catch (err) {
			if (err instanceof RegistrarError) throw err;
			throw this._storageError(err);
		} finally {
			if (db?.open) {
				try {
					db.close();
				} catch (err) {
					log.warn("Failed to close connection", { path: this._path, error: toError(err).message });
				}
			}
		}
	}

	/**
	 * Check database integrity. Returns "ok" for a healthy file.
	 */
	integrityCheck(): string {
		return this.withConnection((db) => {
			const result = db.pragma("integrity_check", { simple: true });
			return typeof result === "string" ? result : "unknown";
		});
	}

	/**
	 * Create the parent directory, open the file and apply pragmas.
	 */
	private _open(): BetterSqlite3.Database {
		fs.mkdirSync(path.dirname(this._path), { recursive: true });

		const db = new Database(this._path);
		try {
			for (const [key, value] of Object.entries(PRAGMAS)) {
				db.pragma(`${key} = ${value}`);
			}
		} catch (err) {
			db.close();
			throw err;
		}
		return db;
	}

	private _storageError(err: unknown): StorageUnavailableError {
		const cause = toError(err);
		return new StorageUnavailableError(
			`Student database unavailable at ${this._path}: ${cause.message}`,
			this._path,
			cause,
		);
	}
}
