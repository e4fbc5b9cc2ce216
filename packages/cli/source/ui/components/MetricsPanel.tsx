import type { TreeMetrics } from "@treeloom/core";
import { Box, Text } from "ink";

interface MetricsPanelProps {
	metrics: TreeMetrics;
}

export default function MetricsPanel({ metrics }: MetricsPanelProps) {
	return (
		<Box flexDirection="column" marginTop={1}>
			<Text>Nodes: {metrics.nodeCount}</Text>
			<Text>Leaves: {metrics.leafCount}</Text>
			<Text>Depth: {metrics.depth}</Text>
			<Text>
				Balanced:{" "}
				<Text color={metrics.balanced ? "green" : "yellow"}>
					{metrics.balanced ? "yes" : "no"}
				</Text>
			</Text>
			<Text>Diameter: {metrics.diameter}</Text>
		</Box>
	);
}
