import { TreeInputError, type TreeInput } from "@treeloom/core";
import zod from "zod";

const sequenceSchema = zod.array(zod.number().int().safe().nullable());
const integerToken = /^-?\d+$/;

/**
 * Turn command-line text into core input.
 *
 * - `[3,1,2,-1,null]` is read as JSON
 * - `3,1,2,-1` or `3 1 2 -1` (with optional `null` tokens) is a sequence
 * - anything else, parenthesized expressions included, stays text
 */
export function parseInputText(raw: string): TreeInput {
	const text = raw.trim();
	if (text.length === 0) return text;

	if (text.startsWith("[")) {
		let decoded: unknown;
		try {
			decoded = JSON.parse(text);
		} catch (err) {
			throw new TreeInputError(
				`Input is not a valid JSON array: ${err instanceof Error ? err.message : String(err)}`,
				"input",
			);
		}
		const parsed = sequenceSchema.safeParse(decoded);
		if (!parsed.success) {
			throw new TreeInputError(
				"Input array must contain only integers and null",
				"input",
			);
		}
		return parsed.data;
	}

	if (text.includes("(") || text.includes(")")) return text;

	const tokens = text.split(/[\s,]+/).filter((token) => token.length > 0);
	if (tokens.every((token) => token === "null" || integerToken.test(token))) {
		return tokens.map((token) =>
			token === "null" ? null : Number.parseInt(token, 10),
		);
	}

	return text;
}

/**
 * Parse a `--null-markers` value such as `-1,0`
 */
export function parseMarkerList(raw: string | undefined): number[] | undefined {
	if (raw === undefined) return undefined;

	const tokens = raw
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	const invalid = tokens.find((token) => !integerToken.test(token));
	if (invalid !== undefined || tokens.length === 0) {
		throw new TreeInputError(
			`Invalid null markers "${raw}" (expected comma-separated integers)`,
			"input",
		);
	}
	return tokens.map((token) => Number.parseInt(token, 10));
}
