/**
 * @registrar/cli — Public API re-exports.
 *
 * The CLI package primarily serves as the `registrar` binary entry point.
 * These re-exports let other code drive the menu or commands directly.
 */

export { parseArgs, printHelp, UsageError, COMMANDS } from "./args.js";
export type { ParsedArgs } from "./args.js";
export { main, VERSION } from "./main.js";
export type { MainIO } from "./main.js";
export { createPrompter } from "./io.js";
export type { Output, Prompter } from "./io.js";
export { runMenu } from "./modes/menu.js";
export type { MenuOptions } from "./modes/menu.js";
export { formatStudentTable, describeStudent } from "./render.js";
