import { stripVTControlCharacters } from "node:util";

/**
 * Rendered frame split into lines, without colour codes, trailing padding or
 * trailing blank lines
 */
export function frameLines(frame: string | undefined): string[] {
	const lines = stripVTControlCharacters(frame ?? "")
		.split("\n")
		.map((line) => line.trimEnd());
	while (lines.length > 0 && lines[lines.length - 1] === "") {
		lines.pop();
	}
	return lines;
}

/**
 * Rendered frame as one line, undoing Ink's wrapping of long text
 */
export function frameText(frame: string | undefined): string {
	return frameLines(frame)
		.map((line) => line.trim())
		.join(" ")
		.replace(/\s+/g, " ");
}
