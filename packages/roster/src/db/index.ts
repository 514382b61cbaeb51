/**
 * @registrar/roster/db — SQLite database layer.
 */

export { RosterDatabase } from "./database.js";
export { ensureSchema, describeSchema, STUDENTS_TABLE } from "./schema.js";
export type { ColumnInfo } from "./schema.js";
