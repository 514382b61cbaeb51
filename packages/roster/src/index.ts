// @registrar/roster — Student records store
export * from "./db/index.js";
export { StudentStore } from "./student-store.js";
export { parseStudentId, assertStudentId } from "./student-id.js";
export type { StudentFields, StudentRecord } from "./types.js";
