#!/usr/bin/env node

// Set CLI mode before the commands load the core, so logging stays quiet
process.env["CLI_MODE"] = "true";

import Pastel from "pastel";

const app = new Pastel({
	importMeta: import.meta,
	name: "treeloom",
	version: "0.1.0",
	description:
		"Rebuild binary trees from serialized traversals and measure them",
});

await app.run();
