import type { BinaryTree } from "@treeloom/core";
import { Box, Text } from "ink";
import { useMemo } from "react";
import { renderTreeLines } from "../../utils/tree-diagram.js";

interface TreeDiagramProps {
	root: BinaryTree;
}

export default function TreeDiagram({ root }: TreeDiagramProps) {
	const lines = useMemo(() => renderTreeLines(root), [root]);

	if (lines.length === 0) {
		return <Text dimColor>(empty tree)</Text>;
	}

	return (
		<Box flexDirection="column">
			{lines.map((line, index) => (
				<Text key={index}>{line}</Text>
			))}
		</Box>
	);
}
