/**
 * @registrar/cli — Tests for main CLI orchestration (main.ts).
 *
 * Runs main() end to end against a temporary Registrar home and database
 * file, with in-memory stand-ins for the terminal streams.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { PassThrough } from "stream";
import { configureLogging } from "@registrar/core";
import { main, VERSION } from "../src/main.js";
import type { MainIO } from "../src/main.js";
import { bufferOutput } from "./helpers.js";
import type { BufferOutput } from "./helpers.js";

describe("main", () => {
	let home: string;
	let dbPath: string;
	let stdin: PassThrough;
	let stdout: BufferOutput;
	let stderr: BufferOutput;
	let io: MainIO;
	const saved = { home: process.env.REGISTRAR_HOME, db: process.env.REGISTRAR_DB };

	beforeEach(() => {
		home = fs.mkdtempSync(path.join(os.tmpdir(), "registrar-main-test-"));
		dbPath = path.join(home, "class.db");
		process.env.REGISTRAR_HOME = home;
		delete process.env.REGISTRAR_DB;
		stdin = new PassThrough();
		stdout = bufferOutput();
		stderr = bufferOutput();
		io = { stdin, stdout, stderr, promptOutput: new PassThrough() };
	});

	afterEach(() => {
		configureLogging({ transports: [] });
		restoreEnv("REGISTRAR_HOME", saved.home);
		restoreEnv("REGISTRAR_DB", saved.db);
		fs.rmSync(home, { recursive: true, force: true });
	});

	function restoreEnv(key: string, value: string | undefined): void {
		if (value === undefined) delete process.env[key];
		else process.env[key] = value;
	}

	// ─── Help, version, usage ────────────────────────────────────────────

	describe("help and usage", () => {
		it("should print help and exit 0", async () => {
			expect(await main(["--help"], io)).toBe(0);
			expect(stdout.text().startsWith("Registrar — student records on the command line\n")).toBe(true);
		});

		it("should print the version", async () => {
			expect(await main(["--version"], io)).toBe(0);
			expect(stdout.text()).toBe(`registrar ${VERSION}\n`);
		});

		it("should report unknown options with a usage hint", async () => {
			expect(await main(["--bogus"], io)).toBe(1);
			expect(stderr.text()).toBe("Error: Unknown option: --bogus\nRun 'registrar --help' for usage.\n");
		});

		it("should not touch the database for --help", async () => {
			await main(["--db", dbPath, "--help"], io);
			expect(fs.existsSync(dbPath)).toBe(false);
		});
	});

	// ─── Commands ────────────────────────────────────────────────────────

	describe("commands", () => {
		it("should create the schema on first use", async () => {
			expect(await main(["--db", dbPath, "list"], io)).toBe(0);
			expect(fs.existsSync(dbPath)).toBe(true);
			expect(stdout.text()).toBe("No students found.\n");
		});

		it("should add and list students across invocations", async () => {
			expect(await main(["--db", dbPath, "add", "Ann", "A", "ann@x.com"], io)).toBe(0);
			expect(await main(["--db", dbPath, "add", "Ben", "B", "ben@x.com"], io)).toBe(0);
			expect(await main(["--db", dbPath, "delete", "2", "--yes"], io)).toBe(0);
			expect(await main(["--db", dbPath, "add", "Cal", "C", "cal@x.com"], io)).toBe(0);

			const before = stdout.text();
			expect(await main(["--db", dbPath, "list", "--json"], io)).toBe(0);
			expect(JSON.parse(stdout.text().slice(before.length))).toEqual([
				{ id: 1, name: "Ann", grade: "A", email: "ann@x.com" },
				{ id: 3, name: "Cal", grade: "C", email: "cal@x.com" },
			]);
		});

		it("should use REGISTRAR_DB when --db is absent", async () => {
			process.env.REGISTRAR_DB = dbPath;
			expect(await main(["add", "Ann", "A", "ann@x.com"], io)).toBe(0);
			expect(fs.existsSync(dbPath)).toBe(true);
		});

		it("should default to students.db in the Registrar home", async () => {
			expect(await main(["list"], io)).toBe(0);
			expect(fs.existsSync(path.join(home, "students.db"))).toBe(true);
		});

		it("should print the invalid id message for a malformed id", async () => {
			expect(await main(["--db", dbPath, "update", "abc", "Bea", "B", "bea@x.com"], io)).toBe(1);
			expect(stderr.text()).toBe("Invalid ID. Must be a positive whole number.\n");
		});

		it("should refuse to delete without --yes", async () => {
			expect(await main(["--db", dbPath, "delete", "1"], io)).toBe(1);
			expect(stderr.text()).toBe("Error: Refusing to delete student 1 without --yes\nRun 'registrar --help' for usage.\n");
		});

		it("should exit 1 when updating an absent student", async () => {
			expect(await main(["--db", dbPath, "update", "5", "Bea", "B", "bea@x.com"], io)).toBe(1);
			expect(stderr.text()).toBe("No student with ID 5.\n");
		});
	});

	// ─── Interactive menu ────────────────────────────────────────────────

	describe("menu", () => {
		it("should run the menu when no command is given", async () => {
			stdin.end("1\nAnn\nA\nann@x.com\n2\n5\n");
			expect(await main(["--db", dbPath], io)).toBe(0);

			const lines = stdout.lines();
			expect(lines).toContain("Student added with ID 1.");
			expect(lines).toContain("  1   Ann   A      ann@x.com");
			expect(lines[lines.length - 2]).toBe("Exiting...");
		});

		it("should end cleanly when stdin closes", async () => {
			stdin.end("");
			expect(await main(["--db", dbPath], io)).toBe(0);
		});

		it("should reject unknown commands before opening the database", async () => {
			expect(await main(["--db", dbPath, "export"], io)).toBe(1);
			expect(stderr.text()).toBe("Error: Unknown command: export\nRun 'registrar --help' for usage.\n");
			expect(fs.existsSync(dbPath)).toBe(false);
		});
	});

	// ─── Failures ────────────────────────────────────────────────────────

	describe("failures", () => {
		it("should exit 1 when the database cannot be opened", async () => {
			const blocker = path.join(home, "blocker");
			fs.writeFileSync(blocker, "not a directory");
			const target = path.join(blocker, "students.db");

			expect(await main(["--db", target, "list"], io)).toBe(1);
			expect(stderr.text().startsWith(`Error: Student database unavailable at ${target}: `)).toBe(true);
		});

		it("should exit 1 on unreadable settings", async () => {
			fs.writeFileSync(path.join(home, "settings.json"), "{ not json");
			expect(await main(["list"], io)).toBe(1);
			expect(stderr.text()).toBe(`Error: Failed to parse ${path.join(home, "settings.json")}\n`);
		});

		it("should exit 1 on invalid settings", async () => {
			fs.writeFileSync(path.join(home, "settings.json"), JSON.stringify({ logLevel: "loud" }));
			expect(await main(["list"], io)).toBe(1);
			expect(stderr.text().startsWith(`Error: Invalid settings in ${path.join(home, "settings.json")}: `)).toBe(true);
		});
	});

	// ─── Logging ─────────────────────────────────────────────────────────

	describe("logging", () => {
		it("should append JSON lines to the log file", async () => {
			await main(["--db", dbPath, "list"], io);
			const logFile = path.join(home, "logs", "registrar.log");
			const entries = fs
				.readFileSync(logFile, "utf-8")
				.trim()
				.split("\n")
				.map((line): { logger: string; message: string } => JSON.parse(line));

			expect(entries.some((e) => e.logger === "cli" && e.message === "registrar started")).toBe(true);
		});

		it("should not create a log file when file logging is off", async () => {
			fs.writeFileSync(path.join(home, "settings.json"), JSON.stringify({ logToFile: false, logLevel: "fatal" }));
			await main(["--db", dbPath, "list"], io);
			expect(fs.existsSync(path.join(home, "logs"))).toBe(false);
		});
	});
});
