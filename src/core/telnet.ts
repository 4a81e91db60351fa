/**
 * Core telnet module.
 *
 * Byte-level constants for the telnet protocol, the ANSI escape sequences used
 * for color output, and small helpers for line-ending normalization and
 * escape stripping.
 *
 * @module core/telnet
 */

/** ANSI escape sequence prefix */
const ESC = "\x1B[";

/** Telnet line break (CR+LF) */
export const LINEBREAK = "\r\n";

/** Sequence that erases the character left of the cursor. */
export const ERASE_SEQUENCE = "\b \b";

/**
 * Telnet foreground color codes
 */
export const FG = {
	// Standard colors
	BLACK: `${ESC}0;30m`,
	MAROON: `${ESC}0;31m`,
	DARK_GREEN: `${ESC}0;32m`,
	OLIVE: `${ESC}0;33m`,
	DARK_BLUE: `${ESC}0;34m`,
	PURPLE: `${ESC}0;35m`,
	TEAL: `${ESC}0;36m`,
	SILVER: `${ESC}0;37m`,

	// Bright colors
	GREY: `${ESC}1;30m`,
	CRIMSON: `${ESC}1;31m`,
	LIME: `${ESC}1;32m`,
	YELLOW: `${ESC}1;33m`,
	LIGHT_BLUE: `${ESC}1;34m`,
	PINK: `${ESC}1;35m`,
	CYAN: `${ESC}1;36m`,
	WHITE: `${ESC}1;37m`,
} as const;

/**
 * Text styling codes
 */
export const STYLE = {
	RESET: `${ESC}0m`,
	BOLD: `${ESC}1m`,
	DIM: `${ESC}2m`,
	UNDERLINE: `${ESC}4m`,
} as const;

export enum IAC {
	IAC = 255,
	WILL = 251,
	WONT = 252,
	DO = 253,
	DONT = 254,
	GA = 249,
	SB = 250, // Subnegotiation Begin
	SE = 240, // Subnegotiation End
}

export enum TELNET_OPTION {
	ECHO = 1,
	SGA = 3, // Suppress Go Ahead
	TTYPE = 24,
	NAWS = 31,
	LINEMODE = 34,
}

/**
 * Single-byte control codes recognized while assembling a line.
 */
export enum CONTROL {
	NUL = 0x00,
	/** Ctrl-C, cancels the pending read */
	ETX = 0x03,
	BS = 0x08,
	LF = 0x0a,
	CR = 0x0d,
	DEL = 0x7f,
	/** First byte that is appended to the line buffer */
	PRINTABLE = 0x20,
}

/**
 * Matches rendered ANSI SGR sequences. Anything that processes outgoing text
 * (logs, automated clients) can strip color with this pattern.
 */
// eslint-disable-next-line no-control-regex
export const ANSI_ESCAPE_PATTERN = /\x1B\[[0-9;]*m/g;

/**
 * Strip all ANSI color codes from text
 */
export function stripAnsi(text: string): string {
	return text.replace(ANSI_ESCAPE_PATTERN, "");
}

/**
 * Convert bare `\n` to `\r\n`. Existing `\r\n` pairs are left untouched so
 * already-normalized text is not translated twice.
 *
 * @example
 * normalizeLineEndings("a\nb\r\nc") // "a\r\nb\r\nc"
 */
export function normalizeLineEndings(text: string): string {
	return text.replace(/\r?\n/g, LINEBREAK);
}

export function buildIACCommand(iac: IAC, option: number): Buffer {
	return Buffer.from([IAC.IAC, iac, option]);
}
