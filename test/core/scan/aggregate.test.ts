import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	aggregate,
	buildLineReport,
	computeRatios,
	ratio,
} from "../../../src/core/scan/aggregate.js";
import { makeStat } from "../../utils/builders.js";

describe("ratio", () => {
	it("divides part by total", () => {
		expect(ratio(1, 4)).toBe(0.25);
	});

	it("is zero for an empty total", () => {
		expect(ratio(0, 0)).toBe(0);
	});
});

describe("aggregate groups by extension", () => {
	const stats = [
		makeStat("b.py", ".py", 4, 1, 1),
		makeStat("a.c", ".c", 2, 2, 0),
		makeStat("lib/c.py", ".py", 2, 0, 2),
	];

	it("sums each group and sorts groups by extension", () => {
		const { groups } = aggregate(stats);
		expect(groups.map((group) => group.extension)).toEqual([".c", ".py"]);
		expect(groups[1]).toEqual({
			extension: ".py",
			fileCount: 2,
			totalLines: 10,
			codeLines: 6,
			commentLines: 1,
			blankLines: 3,
			codeRatio: 0.6,
			commentRatio: 0.1,
			blankRatio: 0.3,
		});
	});

	it("sums the grand total across groups", () => {
		const { total } = aggregate(stats);
		expect(total).toEqual({
			fileCount: 3,
			totalLines: 14,
			codeLines: 8,
			commentLines: 3,
			blankLines: 3,
			codeRatio: 8 / 14,
			commentRatio: 3 / 14,
			blankRatio: 3 / 14,
		});
	});

	it("defines every ratio as zero for a group of empty files", () => {
		const { groups } = aggregate([makeStat("empty.c", ".c", 0, 0, 0)]);
		expect(groups[0]).toMatchObject({
			fileCount: 1,
			totalLines: 0,
			codeRatio: 0,
			commentRatio: 0,
			blankRatio: 0,
		});
	});

	it("returns an empty grand total for no files", () => {
		const { groups, total } = aggregate([]);
		expect(groups).toEqual([]);
		expect(total).toEqual({
			fileCount: 0,
			totalLines: 0,
			codeLines: 0,
			commentLines: 0,
			blankLines: 0,
			codeRatio: 0,
			commentRatio: 0,
			blankRatio: 0,
		});
	});
});

describe("buildLineReport", () => {
	it("carries the skip list next to the aggregates", () => {
		const report = buildLineReport({
			files: [makeStat("a.c", ".c", 1, 0, 0)],
			skipped: [{ path: "bin.c", reason: "binary content" }],
		});
		expect(report.total.fileCount).toBe(1);
		expect(report.skipped).toEqual([
			{ path: "bin.c", reason: "binary content" },
		]);
	});
});

describe("aggregation invariants", () => {
	const statArbitrary = fc
		.tuple(
			fc.constantFrom(".c", ".py", ".ts"),
			fc.nat(50),
			fc.nat(50),
			fc.nat(50),
		)
		.map(([extension, code, comment, blank]) =>
			makeStat(`f${extension}`, extension, code, comment, blank),
		);

	it("group fields equal elementwise sums and counts of their members", () => {
		fc.assert(
			fc.property(fc.array(statArbitrary, { maxLength: 40 }), (stats) => {
				const { groups } = aggregate(stats);
				for (const group of groups) {
					const members = stats.filter((s) => s.extension === group.extension);
					expect(group.fileCount).toBe(members.length);
					expect(group.totalLines).toBe(
						members.reduce((sum, s) => sum + s.totalLines, 0),
					);
					expect(group.codeLines).toBe(
						members.reduce((sum, s) => sum + s.codeLines, 0),
					);
					expect(group).toEqual({ ...group, ...computeRatios(group) });
				}
			}),
		);
	});

	it("is independent of input order", () => {
		fc.assert(
			fc.property(fc.array(statArbitrary, { maxLength: 20 }), (stats) => {
				expect(aggregate([...stats].reverse())).toEqual(aggregate(stats));
			}),
		);
	});
});
