/**
 * @registrar/cli — Text rendering for student records.
 */

import type { StudentFields, StudentRecord } from "@registrar/roster";
import { createPalette, renderTable } from "@registrar/ui";
import type { Palette } from "@registrar/ui";

export const FIELD_ORDER: ReadonlyArray<keyof StudentFields> = ["name", "grade", "email"];

export const FIELD_LABELS: Record<keyof StudentFields, string> = {
	name: "Name",
	grade: "Grade",
	email: "Email",
};

export const INVALID_ID_MESSAGE = "Invalid ID. Must be a positive whole number.";

export function noSuchStudent(id: number): string {
	return `No student with ID ${id}.`;
}

/**
 * Students as an aligned table (ID, Name, Grade, Email), or a single
 * "No students found." line when the list is empty.
 */
export function formatStudentTable(records: StudentRecord[], palette: Palette = createPalette(false)): string[] {
	if (records.length === 0) {
		return [palette.muted("No students found.")];
	}
	return renderTable(
		["ID", "Name", "Grade", "Email"],
		records.map((r) => [String(r.id), r.name, r.grade, r.email]),
		{ indent: "  ", headerStyle: palette.bold },
	);
}

/**
 * One-line description used in confirmations, e.g. `Ann (grade A, ann@x.com)`.
 */
export function describeStudent(record: StudentRecord): string {
	return `${record.name} (grade ${record.grade}, ${record.email})`;
}
