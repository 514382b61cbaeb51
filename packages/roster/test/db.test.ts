/**
 * Tests for the SQLite database layer (RosterDatabase + schema).
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import type BetterSqlite3 from "better-sqlite3";
import { InvalidIdError, StorageUnavailableError, configureLogging } from "@registrar/core";
import type { LogEntry } from "@registrar/core";
import { RosterDatabase, ensureSchema, describeSchema, StudentStore } from "@registrar/roster";

describe("RosterDatabase", () => {
	let tmpDir: string;
	let dbPath: string;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "registrar-db-test-"));
		dbPath = path.join(tmpDir, "students.db");
	});

	afterEach(() => {
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	describe("connection scope", () => {
		it("should create the file and missing parent directories", () => {
			const nested = path.join(tmpDir, "a", "b", "students.db");
			const db = new RosterDatabase(nested);
			db.withConnection((conn) => conn.prepare("SELECT 1").get());
			expect(fs.existsSync(nested)).toBe(true);
		});

		it("should return the callback's result", () => {
			const db = new RosterDatabase(dbPath);
			expect(db.withConnection((conn) => conn.prepare("SELECT 1 AS v").get())).toEqual({ v: 1 });
		});

		it("should close the connection after the call", () => {
			const db = new RosterDatabase(dbPath);
			let seen: BetterSqlite3.Database | undefined;
			db.withConnection((conn) => {
				seen = conn;
			});
			expect(seen?.open).toBe(false);
		});

		it("should open a fresh connection for every call", () => {
			const db = new RosterDatabase(dbPath);
			const first = db.withConnection((conn) => conn);
			const second = db.withConnection((conn) => conn);
			expect(first).not.toBe(second);
		});

		it("should close the connection when the callback throws", () => {
			const db = new RosterDatabase(dbPath);
			let seen: BetterSqlite3.Database | undefined;
			expect(() =>
				db.withConnection((conn) => {
					seen = conn;
					throw new Error("boom");
				}),
			).toThrow(StorageUnavailableError);
			expect(seen?.open).toBe(false);
		});

		it("should apply the connection pragmas", () => {
			const db = new RosterDatabase(dbPath);
			expect(db.withConnection((conn) => conn.pragma("busy_timeout", { simple: true }))).toBe(5000);
			expect(db.withConnection((conn) => conn.pragma("foreign_keys", { simple: true }))).toBe(1);
		});
	});

	describe("error mapping", () => {
		it("should wrap driver errors in StorageUnavailableError with the cause", () => {
			const db = new RosterDatabase(dbPath);
			try {
				db.withConnection((conn) => conn.prepare("SELECT * FROM missing_table").all());
				expect.unreachable();
			} catch (err) {
				expect(err).toBeInstanceOf(StorageUnavailableError);
				const storageErr = err as StorageUnavailableError;
				expect(storageErr.code).toBe("STORAGE_UNAVAILABLE");
				expect(storageErr.path).toBe(dbPath);
				expect(storageErr.cause).toBeInstanceOf(Error);
				expect(storageErr.message).toContain("no such table: missing_table");
			}
		});

		it("should pass registrar errors through unchanged", () => {
			const db = new RosterDatabase(dbPath);
			const invalid = new InvalidIdError(0);
			expect(() =>
				db.withConnection(() => {
					throw invalid;
				}),
			).toThrow(invalid);
		});

		it("should report an unusable directory as StorageUnavailableError", () => {
			const blocker = path.join(tmpDir, "blocker");
			fs.writeFileSync(blocker, "not a directory");
			const db = new RosterDatabase(path.join(blocker, "students.db"));
			expect(() => ensureSchema(db)).toThrow(StorageUnavailableError);
		});

		it("should report a corrupt file as StorageUnavailableError", () => {
			fs.writeFileSync(dbPath, Buffer.alloc(4096, "x"));
			const db = new RosterDatabase(dbPath);
			expect(() => ensureSchema(db)).toThrow(/not a database/);
		});
	});

	describe("utility methods", () => {
		it("should resolve and return the path", () => {
			expect(new RosterDatabase(dbPath).getPath()).toBe(dbPath);
		});

		it("should pass integrity check on a fresh database", () => {
			const db = new RosterDatabase(dbPath);
			ensureSchema(db);
			expect(db.integrityCheck()).toBe("ok");
		});
	});
});

describe("Schema", () => {
	let tmpDir: string;
	let db: RosterDatabase;

	beforeEach(() => {
		tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "registrar-schema-test-"));
		db = new RosterDatabase(path.join(tmpDir, "students.db"));
	});

	afterEach(() => {
		configureLogging({ transports: [] });
		fs.rmSync(tmpDir, { recursive: true, force: true });
	});

	function captureLogs(): LogEntry[] {
		const entries: LogEntry[] = [];
		configureLogging({ transports: [{ write: (entry) => entries.push(entry) }] });
		return entries;
	}

	it("should create the students table on first call", () => {
		expect(describeSchema(db)).toEqual([]);
		expect(ensureSchema(db)).toBe(true);
		expect(describeSchema(db)).toEqual([
			{ name: "id", type: "INTEGER", notNull: false, primaryKey: true },
			{ name: "name", type: "TEXT", notNull: true, primaryKey: false },
			{ name: "grade", type: "TEXT", notNull: true, primaryKey: false },
			{ name: "email", type: "TEXT", notNull: true, primaryKey: false },
		]);
	});

	it("should be idempotent and keep existing rows", () => {
		ensureSchema(db);
		const store = new StudentStore(db);
		store.create({ name: "Ann", grade: "A", email: "ann@x.com" });
		const shape = describeSchema(db);

		for (let i = 0; i < 3; i++) {
			expect(ensureSchema(db)).toBe(false);
		}

		expect(describeSchema(db)).toEqual(shape);
		expect(store.list()).toEqual([{ id: 1, name: "Ann", grade: "A", email: "ann@x.com" }]);
	});

	it("should survive a new RosterDatabase on the same file", () => {
		ensureSchema(db);
		new StudentStore(db).create({ name: "Ann", grade: "A", email: "ann@x.com" });

		const reopened = new RosterDatabase(db.getPath());
		expect(ensureSchema(reopened)).toBe(false);
		expect(new StudentStore(reopened).list()).toHaveLength(1);
	});

	it("should leave a table created by an older layout alone", () => {
		db.withConnection((conn) => {
			conn.exec("CREATE TABLE students (id INTEGER PRIMARY KEY, name TEXT NOT NULL, grade TEXT NOT NULL, email TEXT NOT NULL)");
			conn.prepare("INSERT INTO students (name, grade, email) VALUES (?, ?, ?)").run("Old", "C", "old@x.com");
		});
		expect(ensureSchema(db)).toBe(false);
		expect(new StudentStore(db).list()).toEqual([{ id: 1, name: "Old", grade: "C", email: "old@x.com" }]);
	});

	it("should warn when an existing table can reuse ids", () => {
		db.withConnection((conn) => {
			conn.exec("CREATE TABLE students (id INTEGER PRIMARY KEY, name TEXT NOT NULL, grade TEXT NOT NULL, email TEXT NOT NULL)");
		});
		const entries = captureLogs();
		ensureSchema(db);

		const warnings = entries.filter((e) => e.levelName === "WARN");
		expect(warnings.map((e) => [e.logger, e.message, e.context])).toEqual([
			[
				"roster:schema",
				"Students table lacks AUTOINCREMENT; ids of deleted students may be reused",
				{ path: db.getPath() },
			],
		]);
	});

	it("should not warn for a table it created itself", () => {
		ensureSchema(db);
		const entries = captureLogs();
		expect(ensureSchema(db)).toBe(false);
		expect(entries.filter((e) => e.levelName === "WARN")).toEqual([]);
	});
});
