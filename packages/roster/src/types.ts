/**
 * @registrar/roster — Student record types.
 */

/** The three editable attributes of a student. */
export interface StudentFields {
	name: string;
	grade: string;
	email: string;
}

/** A persisted student; `id` is assigned by the store and never changes. */
export interface StudentRecord extends StudentFields {
	id: number;
}
