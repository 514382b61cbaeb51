/**
 * @registrar/ui — ANSI escape code utilities for terminal rendering.
 *
 * Styles and colors as plain string wrappers, plus helpers for measuring
 * styled text.
 */

const ESC = "\x1b[";

/** ANSI reset escape sequence -- clears all styles. */
export const reset = `${ESC}0m`;

// ─── Style Wrappers ─────────────────────────────────────────────────────────

/**
 * Wrap text in bold ANSI style.
 * @param s - Text to make bold.
 * @returns Bold-styled string with proper reset.
 */
export function bold(s: string): string {
	return `${ESC}1m${s}${ESC}22m`;
}

// ─── Named Color Presets ────────────────────────────────────────────────────

/** Wrap text in red foreground color. @param s - Text to colorize. */
export function red(s: string): string {
	return `${ESC}31m${s}${reset}`;
}

/** Wrap text in green foreground color. @param s - Text to colorize. */
export function green(s: string): string {
	return `${ESC}32m${s}${reset}`;
}

/** Wrap text in yellow foreground color. @param s - Text to colorize. */
export function yellow(s: string): string {
	return `${ESC}33m${s}${reset}`;
}

/** Wrap text in gray (bright black) foreground color. @param s - Text to colorize. */
export function gray(s: string): string {
	return `${ESC}90m${s}${reset}`;
}

// ─── ANSI Stripping ─────────────────────────────────────────────────────────

const ANSI_RE = /\x1b\[[0-9;]*[a-zA-Z]/g;

/** Remove all ANSI escape sequences from a string */
export function stripAnsi(s: string): string {
	return s.replace(ANSI_RE, "");
}

/** Get visible length of a string (excluding ANSI codes) */
export function visibleLength(s: string): number {
	return stripAnsi(s).length;
}

/** Pad styled text on the right to a visible width. */
export function padVisible(s: string, width: number): string {
	const gap = width - visibleLength(s);
	return gap > 0 ? s + " ".repeat(gap) : s;
}

// ─── Palette ────────────────────────────────────────────────────────────────

export type StyleFn = (s: string) => string;

export interface Palette {
	bold: StyleFn;
	success: StyleFn;
	error: StyleFn;
	warning: StyleFn;
	muted: StyleFn;
}

const plain: StyleFn = (s) => s;

/**
 * Semantic styles for terminal output. With `enabled` false every style is
 * the identity, so output stays free of escape codes (pipes, tests).
 */
export function createPalette(enabled: boolean): Palette {
	if (!enabled) {
		return { bold: plain, success: plain, error: plain, warning: plain, muted: plain };
	}
	return { bold, success: green, error: red, warning: yellow, muted: gray };
}
