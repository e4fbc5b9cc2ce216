import { Box, Text } from "ink";
import { useEffect } from "react";
import type { ErrorDetails } from "../../utils/outcome.js";

interface ErrorMessageProps {
	error: ErrorDetails;
}

export default function ErrorMessage({ error }: ErrorMessageProps) {
	useEffect(() => {
		process.exitCode = 1;
	}, []);

	return (
		<Box flexDirection="column">
			<Text color="red">✖ {error.message}</Text>
			{error.module && <Text dimColor>module: {error.module}</Text>}
		</Box>
	);
}
