import { Text } from "ink";
import { argument } from "pastel";
import { useMemo } from "react";
import zod from "zod";
import ErrorMessage from "../ui/components/ErrorMessage.js";
import { CONVERT_TARGETS, runConvert } from "../utils/outcome.js";

export const description =
	"Rebuild the input as a tree and write it out in another format.";

export const args = zod.tuple([
	zod.string().describe(
		argument({ name: "input", description: "Tree input to convert" }),
	),
]);

export const options = zod.object({
	to: zod.enum(CONVERT_TARGETS).describe("Output format"),
	format: zod
		.string()
		.optional()
		.describe("Input format (detected when omitted)"),
	nullMarkers: zod
		.string()
		.optional()
		.describe("Comma-separated level-order null markers for the input"),
});

type Props = {
	args: zod.infer<typeof args>;
	options: zod.infer<typeof options>;
};

export default function Convert({ args, options }: Props) {
	const [input] = args;
	const outcome = useMemo(
		() =>
			runConvert({
				input,
				to: options.to,
				format: options.format,
				nullMarkers: options.nullMarkers,
			}),
		[input, options.to, options.format, options.nullMarkers],
	);

	if (!outcome.ok) {
		return <ErrorMessage error={outcome.error} />;
	}

	return <Text>{outcome.value}</Text>;
}
