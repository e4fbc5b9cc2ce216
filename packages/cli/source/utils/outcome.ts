import {
	DEFAULT_SERIALIZED_NULL_MARKER,
	analyzeTree,
	buildTree,
	cfg,
	detectInputFormat,
	extractErrorDetails,
	inOrderValues,
	postOrderValues,
	preOrderValues,
	toLevelOrder,
	toParenthesis,
	type BinaryTree,
	type TreeMetrics,
} from "@treeloom/core";
import { parseInputText, parseMarkerList } from "./input.js";

export type ErrorDetails = ReturnType<typeof extractErrorDetails>;

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: ErrorDetails };

function attempt<T>(run: () => T): Outcome<T> {
	try {
		return { ok: true, value: run() };
	} catch (err) {
		return { ok: false, error: extractErrorDetails(err) };
	}
}

export interface BuildRequest {
	input: string;
	format?: string | undefined;
	nullMarkers?: string | undefined;
	strict?: boolean | undefined;
}

export interface BuildResult {
	format: string;
	root: BinaryTree;
	metrics: TreeMetrics;
}

export function runBuild(request: BuildRequest): Outcome<BuildResult> {
	return attempt(() => {
		const input = parseInputText(request.input);
		const nullMarkers = parseMarkerList(request.nullMarkers);
		const format =
			request.format ??
			detectInputFormat(input, nullMarkers ? { nullMarkers } : {}) ??
			"empty";
		const root = buildTree(input, {
			format: request.format,
			nullMarkers,
			strict: request.strict,
		});
		return { format, root, metrics: analyzeTree(root) };
	});
}

export function runDetect(input: string): Outcome<string> {
	return attempt(() => detectInputFormat(parseInputText(input)) ?? "empty");
}

export const CONVERT_TARGETS = [
	"level_order",
	"parenthesis",
	"pre_order",
	"in_order",
	"post_order",
] as const;

export type ConvertTarget = (typeof CONVERT_TARGETS)[number];

function serialize(
	root: BinaryTree,
	target: ConvertTarget,
	markers: readonly number[],
): string {
	switch (target) {
		case "level_order": {
			// Written with the markers it will be read back with
			const [marker = DEFAULT_SERIALIZED_NULL_MARKER] = markers;
			return JSON.stringify(toLevelOrder(root, marker, markers));
		}
		case "parenthesis":
			return toParenthesis(root);
		case "pre_order":
			return JSON.stringify(preOrderValues(root));
		case "in_order":
			return JSON.stringify(inOrderValues(root));
		case "post_order":
			return JSON.stringify(postOrderValues(root));
	}
}

export function runConvert(
	request: BuildRequest & { to: ConvertTarget },
): Outcome<string> {
	const built = runBuild(request);
	if (!built.ok) return built;
	return attempt(() =>
		serialize(
			built.value.root,
			request.to,
			parseMarkerList(request.nullMarkers) ?? cfg.TREE_NULL_MARKERS,
		),
	);
}
