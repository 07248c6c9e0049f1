/**
 * Streaming CSV parser built on Web Streams.
 *
 * Accepts decoded text chunks of any size and emits one record per row, keyed
 * by the header row. Quoted fields may contain separators, newlines and
 * doubled quotes.
 *
 * @module
 */

export interface CsvParseStreamOptions {
	separator?: string
	quote?: string
	escape?: string
	/** Explicit headers. When omitted the first row is used. */
	headers?: string[]
	/** Skip rows whose first cell starts with this prefix ("#" when `true`). */
	skipComments?: boolean | string
	/** Skip rows made of a single empty cell. Default: true. */
	skipEmptyLines?: boolean
	/** Throw when a row's length differs from the header length. */
	strict?: boolean
	mapHeaders?: (args: { header: string; index: number }) => string
	mapValues?: (args: { header: string; index: number; value: string }) => string
}

type ResolvedOptions = Required<Omit<CsvParseStreamOptions, "headers">> & {
	headers: string[] | null
}

function resolveOptions(opts: CsvParseStreamOptions): ResolvedOptions {
	return {
		separator: opts.separator ?? ",",
		quote: opts.quote ?? '"',
		escape: opts.escape ?? '"',
		headers: opts.headers ?? null,
		skipComments: opts.skipComments ?? false,
		skipEmptyLines: opts.skipEmptyLines ?? true,
		strict: opts.strict ?? false,
		mapHeaders: opts.mapHeaders ?? (({ header }) => header),
		mapValues: opts.mapValues ?? (({ value }) => value),
	}
}

/**
 * TransformStream-like wrapper for CSV parsing.
 *
 * Exposes `writable` + `readable` so it can be used directly in `pipeThrough`.
 *
 * @example
 * ```ts
 * const rows = textStream.pipeThrough(new CsvParseStream())
 * ```
 */
export class CsvParseStream {
	readonly readable: ReadableStream<Record<string, string>>
	readonly writable: WritableStream<string>

	constructor(opts: CsvParseStreamOptions = {}) {
		const options = resolveOptions(opts)
		const commentPrefix =
			typeof options.skipComments === "string" ? options.skipComments : "#"

		let headers = options.headers
		let rowNumber = 0
		let row: string[] = []
		let field = ""
		let inQuotes = false
		// A quoted field that was just closed may be empty and still count
		let fieldStarted = false
		// Escape seen inside quotes; the next character, possibly in the next chunk, resolves it
		let pendingEscape = false
		// Last row ended on "\r"; a following "\n" belongs to it
		let skipLineFeed = false

		const emitRow = (
			cells: string[],
			controller: TransformStreamDefaultController<Record<string, string>>,
		) => {
			rowNumber++
			if (options.skipEmptyLines && cells.length === 1 && cells[0] === "") {
				return
			}
			if (options.skipComments && (cells[0] ?? "").startsWith(commentPrefix)) {
				return
			}

			if (headers === null) {
				headers = cells.map((header, index) =>
					options.mapHeaders({ header, index }),
				)
				return
			}

			if (options.strict && cells.length !== headers.length) {
				throw new RangeError(
					`Row ${rowNumber} has ${cells.length} cells, expected ${headers.length}`,
				)
			}

			const out: Record<string, string> = {}
			for (let index = 0; index < cells.length; index++) {
				const header = headers[index] ?? `_${index}`
				out[header] = options.mapValues({
					header,
					index,
					value: cells[index] ?? "",
				})
			}
			controller.enqueue(out)
		}

		const endRow = (
			controller: TransformStreamDefaultController<Record<string, string>>,
		) => {
			row.push(field)
			emitRow(row, controller)
			row = []
			field = ""
			fieldStarted = false
		}

		const consume = (
			ch: string,
			controller: TransformStreamDefaultController<Record<string, string>>,
		) => {
			if (skipLineFeed) {
				skipLineFeed = false
				if (ch === "\n") return
			}

			if (pendingEscape) {
				pendingEscape = false
				if (ch === options.quote) {
					field += options.quote
					return
				}
				// The quote closed the field, or a lone escape is literal text
				if (options.escape === options.quote) inQuotes = false
				else field += options.escape
			}

			if (inQuotes) {
				if (ch === options.escape) pendingEscape = true
				else if (ch === options.quote) inQuotes = false
				else field += ch
				return
			}

			if (ch === options.quote) {
				inQuotes = true
				fieldStarted = true
			} else if (ch === options.separator) {
				row.push(field)
				field = ""
				fieldStarted = false
			} else if (ch === "\n" || ch === "\r") {
				endRow(controller)
				skipLineFeed = ch === "\r"
			} else {
				field += ch
			}
		}

		const stream = new TransformStream<string, Record<string, string>>({
			transform(chunk, controller) {
				for (const ch of chunk) consume(ch, controller)
			},
			flush(controller) {
				if (pendingEscape) {
					pendingEscape = false
					if (options.escape === options.quote) inQuotes = false
					else field += options.escape
				}
				if (field.length > 0 || fieldStarted || row.length > 0) {
					endRow(controller)
				}
			},
		})

		this.readable = stream.readable
		this.writable = stream.writable
	}
}

/**
 * Parse a complete CSV document held in memory.
 */
export async function parseCsvText(
	text: string,
	opts: CsvParseStreamOptions = {},
): Promise<Record<string, string>[]> {
	const source = new ReadableStream<string>({
		start(controller) {
			controller.enqueue(text)
			controller.close()
		},
	})
	return collectRows(source.pipeThrough(new CsvParseStream(opts)))
}

/**
 * Drain a stream of parsed rows into an array.
 */
export async function collectRows<T>(stream: ReadableStream<T>): Promise<T[]> {
	const reader = stream.getReader()
	const rows: T[] = []
	while (true) {
		const { done, value } = await reader.read()
		if (done) break
		rows.push(value)
	}
	return rows
}
