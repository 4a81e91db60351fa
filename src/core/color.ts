/**
 * Core color module.
 *
 * Color encoding for MUD text. Text carries `{letter}` tags, where `{{`
 * escapes to a literal `{`. Tags are rendered to ANSI escape sequences by the
 * connection right before the bytes hit the wire.
 *
 * @module core/color
 */
import { FG, STYLE } from "./telnet.js";

/**
 * The escape character used for color codes.
 */
export const COLOR_ESCAPE = "{";

/**
 * Available foreground colors for text styling.
 */
export enum COLOR {
	// Dark colors (lowercase tags)
	BLACK,
	MAROON,
	DARK_GREEN,
	OLIVE,
	DARK_BLUE,
	PURPLE,
	TEAL,
	SILVER,

	// Bright colors (uppercase tags)
	GREY,
	CRIMSON,
	LIME,
	YELLOW,
	LIGHT_BLUE,
	PINK,
	CYAN,
	WHITE,
}

/**
 * Color tag letter codes for foreground colors.
 */
export const COLOR_TAG: Record<COLOR, string> = {
	[COLOR.BLACK]: "k",
	[COLOR.MAROON]: "r",
	[COLOR.DARK_GREEN]: "g",
	[COLOR.OLIVE]: "y",
	[COLOR.DARK_BLUE]: "b",
	[COLOR.PURPLE]: "m",
	[COLOR.TEAL]: "c",
	[COLOR.SILVER]: "w",

	[COLOR.GREY]: "K",
	[COLOR.CRIMSON]: "R",
	[COLOR.LIME]: "G",
	[COLOR.YELLOW]: "Y",
	[COLOR.LIGHT_BLUE]: "B",
	[COLOR.PINK]: "M",
	[COLOR.CYAN]: "C",
	[COLOR.WHITE]: "W",
};

/** Tag that resets all styling. `{X` is accepted as well. */
export const RESET_TAG = `${COLOR_ESCAPE}x`;

/**
 * Letter → ANSI code.
 */
const COLOR_MAP: Record<string, string> = {
	[COLOR_TAG[COLOR.BLACK]]: FG.BLACK,
	[COLOR_TAG[COLOR.MAROON]]: FG.MAROON,
	[COLOR_TAG[COLOR.DARK_GREEN]]: FG.DARK_GREEN,
	[COLOR_TAG[COLOR.OLIVE]]: FG.OLIVE,
	[COLOR_TAG[COLOR.DARK_BLUE]]: FG.DARK_BLUE,
	[COLOR_TAG[COLOR.PURPLE]]: FG.PURPLE,
	[COLOR_TAG[COLOR.TEAL]]: FG.TEAL,
	[COLOR_TAG[COLOR.SILVER]]: FG.SILVER,
	[COLOR_TAG[COLOR.GREY]]: FG.GREY,
	[COLOR_TAG[COLOR.CRIMSON]]: FG.CRIMSON,
	[COLOR_TAG[COLOR.LIME]]: FG.LIME,
	[COLOR_TAG[COLOR.YELLOW]]: FG.YELLOW,
	[COLOR_TAG[COLOR.LIGHT_BLUE]]: FG.LIGHT_BLUE,
	[COLOR_TAG[COLOR.PINK]]: FG.PINK,
	[COLOR_TAG[COLOR.CYAN]]: FG.CYAN,
	[COLOR_TAG[COLOR.WHITE]]: FG.WHITE,
	d: STYLE.BOLD,
	u: STYLE.UNDERLINE,
	x: STYLE.RESET,
	X: STYLE.RESET,
};

const TAG_PATTERN = /\{(\{|.)/g;

/**
 * Wrap text in a color tag and a trailing reset.
 *
 * @example
 * color("Hello world", COLOR.CRIMSON) // "{RHello world{x"
 */
export function color(text: string, color: COLOR): string {
	return `${COLOR_ESCAPE}${COLOR_TAG[color]}${text}${RESET_TAG}`;
}

/**
 * Render `{letter}` tags to ANSI escape sequences. `{{` becomes `{` and
 * unknown tags are dropped. A reset is appended only when the text rendered
 * at least one escape, so plain text goes out unchanged.
 *
 * @example
 * colorize("{Rred{x") // "\x1B[1;31mred\x1B[0m\x1B[0m"
 * colorize("plain") // "plain"
 */
export function colorize(text: string): string {
	let rendered = false;
	const output = text.replace(TAG_PATTERN, (_match, code: string) => {
		if (code === COLOR_ESCAPE) return COLOR_ESCAPE;
		const ansi = COLOR_MAP[code];
		if (ansi === undefined) return "";
		rendered = true;
		return ansi;
	});
	return rendered ? output + STYLE.RESET : output;
}

/**
 * Remove all color tags from a string, leaving only the plain text.
 *
 * @example
 * stripColors("{rRed{x and {{braces}") // "Red and {braces}"
 */
export function stripColors(text: string): string {
	return text.replace(TAG_PATTERN, (_match, code: string) =>
		code === COLOR_ESCAPE ? COLOR_ESCAPE : ""
	);
}

/**
 * Visible width of a string once its tags are rendered.
 */
export function visibleLength(text: string): number {
	return stripColors(text).length;
}
