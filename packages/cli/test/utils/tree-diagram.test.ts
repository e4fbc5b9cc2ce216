import { buildTree } from "@treeloom/core";
import { describe, expect, it } from "vitest";
import { renderTreeLines } from "../../source/utils/tree-diagram.js";

describe("renderTreeLines", () => {
	it("draws children with side labels", () => {
		expect(renderTreeLines(buildTree("1(2(4)(5))(3)"))).toEqual([
			"1",
			"├─ L: 2",
			"│  ├─ L: 4",
			"│  └─ R: 5",
			"└─ R: 3",
		]);
	});

	it("draws a lone right child as the last branch", () => {
		expect(renderTreeLines(buildTree("1()(3(6))"))).toEqual([
			"1",
			"└─ R: 3",
			"   └─ L: 6",
		]);
	});

	it("draws nothing for the empty tree", () => {
		expect(renderTreeLines(null)).toEqual([]);
	});
});
