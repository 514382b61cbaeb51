import fs from "node:fs";
import path from "node:path";
import { configureLogging } from "@registrar/core";

// Keep test settings, logs and databases inside the workspace so tests are
// hermetic and never touch ~/.registrar.
const testHome = path.resolve(process.cwd(), ".tmp", "registrar-test-home");
fs.mkdirSync(testHome, { recursive: true });
process.env.REGISTRAR_HOME = testHome;
delete process.env.REGISTRAR_DB;

// Tests that inspect log output install their own transports.
configureLogging({ transports: [] });
