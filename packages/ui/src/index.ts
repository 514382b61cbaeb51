// @registrar/ui — Terminal output helpers

// ─── ANSI Utilities ─────────────────────────────────────────────────────────
export {
	reset,
	bold,
	red,
	green,
	yellow,
	gray,
	stripAnsi,
	visibleLength,
	padVisible,
	createPalette,
} from "./ansi.js";
export type { Palette, StyleFn } from "./ansi.js";

// ─── Components ─────────────────────────────────────────────────────────────
export { renderTable } from "./components/table.js";
export type { TableOptions } from "./components/table.js";
