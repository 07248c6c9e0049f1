import { describe, expect, it } from "vitest"
import {
	CsvParseStream,
	type CsvParseStreamOptions,
	collectRows,
	parseCsvText,
} from "../src/csv-parse-stream"

async function parseCsv(
	chunks: string[],
	opts: CsvParseStreamOptions = {},
): Promise<Record<string, string>[]> {
	const source = new ReadableStream<string>({
		start(controller) {
			for (const chunk of chunks) controller.enqueue(chunk)
			controller.close()
		},
	})

	return collectRows(source.pipeThrough(new CsvParseStream(opts)))
}

describe("CsvParseStream", () => {
	it("parses basic header + rows", async () => {
		const rows = await parseCsv(["id,name_en\n1,Lyon\n2,Nice\n"])
		expect(rows).toEqual([
			{ id: "1", name_en: "Lyon" },
			{ id: "2", name_en: "Nice" },
		])
	})

	it("handles quoted fields with commas and escaped quotes", async () => {
		const rows = await parseCsv([
			'id,name_en,notes\n1,"Lyon, Rhone","the ""capital"" of gastronomy"\n',
		])

		expect(rows).toEqual([
			{ id: "1", name_en: "Lyon, Rhone", notes: 'the "capital" of gastronomy' },
		])
	})

	it("handles fields and CRLF line endings split across chunks", async () => {
		const rows = await parseCsv([
			"id,name_en,notes\r",
			"\n1,Lyon,",
			'"line one',
			' and two"\r\n2,Nice,ok\r\n',
		])

		expect(rows).toEqual([
			{ id: "1", name_en: "Lyon", notes: "line one and two" },
			{ id: "2", name_en: "Nice", notes: "ok" },
		])
	})

	it("keeps an escaped quote split across chunks", async () => {
		const rows = await parseCsv(['id,name\n1,"a"', '"b"\n'])
		expect(rows).toEqual([{ id: "1", name: 'a"b' }])
	})

	it("closes a quoted field that ends a chunk", async () => {
		const rows = await parseCsv(['id,name\n1,"a"', ",extra\n2,", '"b"'])
		expect(rows).toEqual([
			{ id: "1", name: "a", _2: "extra" },
			{ id: "2", name: "b" },
		])
	})

	it("honors a custom escape character across chunks", async () => {
		const rows = await parseCsv(['id,name\n1,"a\\', '"b\\c"\n'], {
			escape: "\\",
		})
		expect(rows).toEqual([{ id: "1", name: 'a"b\\c' }])
	})

	it("does not emit an extra row for CRLF split across chunks", async () => {
		await expect(
			parseCsv(["id,name\r", "\n1,Lyon\r", "\n2\r", "\n"], { strict: true }),
		).rejects.toThrow("Row 3 has 1 cells, expected 2")

		const rows = await parseCsv(["id,name\r", "\n1,Lyon\r", "\n", "2,Nice"], {
			strict: true,
		})
		expect(rows).toEqual([
			{ id: "1", name: "Lyon" },
			{ id: "2", name: "Nice" },
		])
	})

	it("emits the last row without a trailing newline", async () => {
		const rows = await parseCsv(["id,name_en\n1,Lyon\n2,", '""'])
		expect(rows).toEqual([
			{ id: "1", name_en: "Lyon" },
			{ id: "2", name_en: "" },
		])
	})

	it("skips empty lines", async () => {
		const rows = await parseCsv(["id\n\n1\n\n2\n"])
		expect(rows).toEqual([{ id: "1" }, { id: "2" }])
	})

	it("supports comment skipping + header/value mapping", async () => {
		const rows = await parseCsv(
			["# comment\n", "id,name\n", "1, Lyon\n", "2,Nice \n"],
			{
				skipComments: true,
				mapHeaders: ({ header }) => header.toUpperCase(),
				mapValues: ({ value }) => value.trim(),
			},
		)

		expect(rows).toEqual([
			{ ID: "1", NAME: "Lyon" },
			{ ID: "2", NAME: "Nice" },
		])
	})

	it("uses explicit headers and a custom separator", async () => {
		const rows = await parseCsv(["1;Lyon\n2;Nice\n"], {
			separator: ";",
			headers: ["id", "name"],
		})
		expect(rows).toEqual([
			{ id: "1", name: "Lyon" },
			{ id: "2", name: "Nice" },
		])
	})

	it("names cells beyond the header by position", async () => {
		const rows = await parseCsv(["id\n1,extra\n"])
		expect(rows).toEqual([{ id: "1", _1: "extra" }])
	})

	it("rejects ragged rows in strict mode", async () => {
		await expect(
			parseCsv(["id,name\n1\n"], { strict: true }),
		).rejects.toThrow("Row 2 has 1 cells, expected 2")
	})
})

describe("parseCsvText", () => {
	it("parses an in-memory document", async () => {
		const rows = await parseCsvText("source_id,target_id\n1,2\n")
		expect(rows).toEqual([{ source_id: "1", target_id: "2" }])
	})

	it("returns no rows for a header-only document", async () => {
		expect(await parseCsvText("id,name_en\n")).toEqual([])
	})
})
