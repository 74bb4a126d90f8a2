import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { MESSAGE_KEYS } from "../../../src/core/report/messages.js";
import {
	loadLanguageRegistryEffect,
	parseLanguageDefinition,
	parseLanguageTable,
} from "../../../src/shell/resources/languages.js";
import {
	loadMessagesEffect,
	parseMessages,
} from "../../../src/shell/resources/locales.js";

describe("bundled language table", () => {
	it("loads and covers the common comment syntaxes", async () => {
		const registry = await Effect.runPromise(loadLanguageRegistryEffect());
		expect(registry.lookup(".ts")?.lineCommentMarkers).toEqual(new Set(["//"]));
		expect(registry.lookup(".JAVA")?.blockCommentPairs).toEqual([
			{ open: "/*", close: "*/" },
		]);
		expect(registry.lookup(".py")?.blockCommentPairs).toEqual([
			{ open: '"""', close: '"""' },
			{ open: "'''", close: "'''" },
		]);
		expect(registry.lookup(".sh")?.lineCommentMarkers).toEqual(new Set(["#"]));
		expect(registry.lookup(".html")?.blockCommentPairs).toEqual([
			{ open: "<!--", close: "-->" },
		]);
		expect(registry.lookup(".css")?.lineCommentMarkers.size).toBe(0);
		expect(registry.lookup(".unknownext")).toBeUndefined();
		expect(registry.lookup(".cmd")?.ignoreCase).toBe(true);
		expect(registry.lookup(".bat")?.lineCommentMarkers.has("rem ")).toBe(true);
	});
});

describe("parseLanguageDefinition", () => {
	it("accepts a complete definition", () => {
		expect(
			parseLanguageDefinition({
				name: "sql",
				extensions: [".sql"],
				lineComment: ["--"],
				blockComment: [{ open: "/*", close: "*/" }],
			}),
		).toEqual({
			name: "sql",
			extensions: [".sql"],
			lineComment: ["--"],
			blockComment: [{ open: "/*", close: "*/" }],
		});
	});

	it("keeps the ignoreCase flag when set", () => {
		expect(
			parseLanguageDefinition({
				name: "batch",
				extensions: [".bat"],
				lineComment: ["rem "],
				blockComment: [],
				ignoreCase: true,
			}),
		).toEqual({
			name: "batch",
			extensions: [".bat"],
			lineComment: ["rem "],
			blockComment: [],
			ignoreCase: true,
		});
	});

	it("rejects missing extensions, empty markers and incomplete pairs", () => {
		const base = {
			name: "x",
			extensions: [".x"],
			lineComment: ["#"],
			blockComment: [],
		};
		expect(parseLanguageDefinition({ ...base, extensions: [] })).toBeNull();
		expect(parseLanguageDefinition({ ...base, lineComment: [""] })).toBeNull();
		expect(
			parseLanguageDefinition({ ...base, blockComment: [{ open: "/*" }] }),
		).toBeNull();
		expect(parseLanguageDefinition({ ...base, name: 3 })).toBeNull();
		expect(parseLanguageDefinition({ ...base, ignoreCase: "yes" })).toBeNull();
	});
});

describe("parseLanguageTable", () => {
	it("names the index of the first malformed entry", () => {
		const result = parseLanguageTable({
			languages: [
				{ name: "ok", extensions: [".ok"], lineComment: [], blockComment: [] },
				{ name: "bad" },
			],
		});
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.detail).toBe("malformed language entry at index 1");
		}
	});

	it("requires a languages array", () => {
		const result = parseLanguageTable({ rules: [] });
		expect(Either.isLeft(result)).toBe(true);
	});
});

describe("bundled locales", () => {
	it.each(["en", "chs", "cht", "ja"] as const)(
		"%s defines every message key",
		async (language) => {
			const messages = await Effect.runPromise(loadMessagesEffect(language));
			for (const key of MESSAGE_KEYS) {
				expect(messages[key].length).toBeGreaterThan(0);
			}
		},
	);

	it("loads localized labels", async () => {
		const ja = await Effect.runPromise(loadMessagesEffect("ja"));
		expect(ja.total).toBe("合計");
		const chs = await Effect.runPromise(loadMessagesEffect("chs"));
		expect(chs.codeLines).toBe("代码行");
	});
});

describe("parseMessages", () => {
	it("lists missing keys", () => {
		const result = parseMessages({ title: "T", total: "" }, "locales/xx.json");
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.resource).toBe("locales/xx.json");
			expect(result.left.detail.startsWith("missing keys: results, total,")).toBe(
				true,
			);
		}
	});
});
