import { describe, expect, it } from "vitest";
import { parseCsv, parseCsvRows } from "../../src/migrations/csv.js";

describe("parseCsvRows", () => {
	it("splits plain fields and lines", () => {
		expect(parseCsvRows("a,b\n1,2\n")).toEqual([
			["a", "b"],
			["1", "2"],
		]);
	});

	it("handles quoted delimiters, doubled quotes and embedded newlines", () => {
		expect(parseCsvRows('"x,y","say ""hi""","two\nlines"')).toEqual([
			["x,y", 'say "hi"', "two\nlines"],
		]);
	});

	it("handles CRLF and a missing trailing newline", () => {
		expect(parseCsvRows("a,b\r\n1,2")).toEqual([
			["a", "b"],
			["1", "2"],
		]);
	});

	it("keeps empty fields", () => {
		expect(parseCsvRows("a,,c\n")).toEqual([["a", "", "c"]]);
	});

	it("strips a byte order mark", () => {
		expect(parseCsvRows("\uFEFFname\nx\n")).toEqual([["name"], ["x"]]);
	});

	it("supports multi-character delimiters", () => {
		expect(parseCsvRows("a||b\n", "||")).toEqual([["a", "b"]]);
	});

	it("rejects an empty delimiter", () => {
		expect(() => parseCsvRows("a,b\n", "")).toThrow(
			"CSV delimiter must not be empty",
		);
	});
});

describe("parseCsv", () => {
	it("keys rows by header and fills short rows", () => {
		expect(parseCsv("slug,name,district\nkathmandu,Kathmandu\n")).toEqual([
			{ slug: "kathmandu", name: "Kathmandu", district: "" },
		]);
	});

	it("skips blank lines", () => {
		expect(parseCsv("slug\n\nlalitpur\n\n")).toEqual([{ slug: "lalitpur" }]);
	});

	it("returns no records for empty input", () => {
		expect(parseCsv("")).toEqual([]);
	});
});
