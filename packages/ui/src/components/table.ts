/**
 * @registrar/ui — Plain text table.
 *
 * Left-aligned columns separated by two spaces, sized to the widest cell
 * (by visible length, so styled cells line up). Trailing whitespace is
 * trimmed from every line.
 */

import { padVisible, visibleLength } from "../ansi.js";

export interface TableOptions {
	/** Style applied to the header row after padding. */
	headerStyle?: (s: string) => string;
	/** Indent prefixed to every line. Default: "". */
	indent?: string;
}

/**
 * Render rows under a header row. Every row must have as many cells as
 * there are headers; missing cells render empty.
 */
export function renderTable(headers: string[], rows: string[][], opts: TableOptions = {}): string[] {
	const indent = opts.indent ?? "";
	const widths = headers.map((h, col) =>
		Math.max(visibleLength(h), ...rows.map((row) => visibleLength(row[col] ?? ""))),
	);

	const renderRow = (cells: string[]): string =>
		(indent + widths.map((w, col) => padVisible(cells[col] ?? "", w)).join("  ")).trimEnd();

	const header = renderRow(headers);
	return [opts.headerStyle ? opts.headerStyle(header) : header, ...rows.map(renderRow)];
}
