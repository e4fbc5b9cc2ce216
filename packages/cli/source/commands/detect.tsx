import { Text } from "ink";
import { argument } from "pastel";
import zod from "zod";
import ErrorMessage from "../ui/components/ErrorMessage.js";
import { runDetect } from "../utils/outcome.js";

export const description =
	"Guess the serialization format of the input. Marker-free sequences are assumed to be pre-order.";

export const args = zod.tuple([
	zod.string().describe(
		argument({ name: "input", description: "Tree input to inspect" }),
	),
]);

type Props = {
	args: zod.infer<typeof args>;
};

export default function Detect({ args }: Props) {
	const outcome = runDetect(args[0]);

	if (!outcome.ok) {
		return <ErrorMessage error={outcome.error} />;
	}

	return <Text>Detected format: {outcome.value}</Text>;
}
