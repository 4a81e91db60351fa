/**
 * Text layout helpers for fixed-width terminal output. Widths are measured
 * on visible characters, so color tags do not count.
 */
import { visibleLength } from "../core/color.js";

export enum ALIGN {
	LEFT,
	RIGHT,
	CENTER,
}

/**
 * Pad text to a visible width. Text that is already wider is returned as is.
 *
 * @example
 * pad("{Gok{x", 4) // "{Gok{x  "
 * pad("ok", 6, ALIGN.CENTER) // "  ok  "
 */
export function pad(text: string, width: number, align = ALIGN.LEFT): string {
	const missing = width - visibleLength(text);
	if (missing <= 0) return text;
	switch (align) {
		case ALIGN.RIGHT:
			return " ".repeat(missing) + text;
		case ALIGN.CENTER: {
			const left = Math.floor(missing / 2);
			return " ".repeat(left) + text + " ".repeat(missing - left);
		}
		default:
			return text + " ".repeat(missing);
	}
}

/**
 * Greedy word wrap. Whitespace runs collapse to single spaces; a word longer
 * than the width gets a line of its own.
 *
 * @example
 * wrap("the quick brown fox", 9) // ["the quick", "brown fox"]
 */
export function wrap(text: string, width: number): string[] {
	const words = text.trim().split(/\s+/).filter((word) => word.length > 0);
	const lines: string[] = [];
	let current = "";
	for (const word of words) {
		if (!current) {
			current = word;
		} else if (visibleLength(current) + 1 + visibleLength(word) <= width) {
			current += ` ${word}`;
		} else {
			lines.push(current);
			current = word;
		}
	}
	if (current) lines.push(current);
	return lines;
}

/**
 * True when `input` is a non-empty prefix of `word` (case-insensitive).
 *
 * @example
 * autocomplete("no", "north") // true
 * autocomplete("", "north") // false
 */
export function autocomplete(input: string, word: string): boolean {
	if (!input) return false;
	return word.toLowerCase().startsWith(input.toLowerCase());
}
