#!/usr/bin/env node

/**
 * @registrar/cli — Entry point.
 *
 * The `registrar` binary. Runs `main()` and turns its result into the
 * process exit code.
 */

import { toError } from "@registrar/core";
import { main } from "./main.js";

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		const error = toError(err);
		process.stderr.write(`Fatal: ${error.stack ?? error.message}\n`);
		process.exitCode = 1;
	},
);
