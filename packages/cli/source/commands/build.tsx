import { Box, Text } from "ink";
import { argument } from "pastel";
import { useMemo } from "react";
import zod from "zod";
import ErrorMessage from "../ui/components/ErrorMessage.js";
import MetricsPanel from "../ui/components/MetricsPanel.js";
import TreeDiagram from "../ui/components/TreeDiagram.js";
import { runBuild } from "../utils/outcome.js";

export const description =
	"Build a binary tree from level-order, pre-order, post-order or parenthesized input and report its depth, balance and diameter.";

export const args = zod.tuple([
	zod.string().describe(
		argument({
			name: "input",
			description:
				'Tree input, e.g. "[3,1,2,-1,-1,-1,-1]", "5,3,8" or "1(2)(3)"',
		}),
	),
]);

export const options = zod.object({
	format: zod
		.string()
		.optional()
		.describe(
			"Input format: level_order, pre_order, post_order or parenthesis (detected when omitted)",
		),
	nullMarkers: zod
		.string()
		.optional()
		.describe("Comma-separated level-order null markers (default: -1,-999)"),
	strict: zod
		.boolean()
		.optional()
		.describe("Fail unless every input value becomes a node"),
});

type Props = {
	args: zod.infer<typeof args>;
	options: zod.infer<typeof options>;
};

export default function Build({ args, options }: Props) {
	const [input] = args;
	const outcome = useMemo(
		() =>
			runBuild({
				input,
				format: options.format,
				nullMarkers: options.nullMarkers,
				strict: options.strict,
			}),
		[input, options.format, options.nullMarkers, options.strict],
	);

	if (!outcome.ok) {
		return <ErrorMessage error={outcome.error} />;
	}

	return (
		<Box flexDirection="column">
			<Text bold>Format: {outcome.value.format}</Text>
			<TreeDiagram root={outcome.value.root} />
			<MetricsPanel metrics={outcome.value.metrics} />
		</Box>
	);
}
