/**
 * Line indexing over a source text.
 *
 * Offsets, lines and columns are zero-based UTF-16 positions. The indexer
 * behaves as if the text ended with an implicit newline, so the position
 * one past the last character starts a final, empty line.
 */

export interface LineColumn {
	readonly line: number
	readonly column: number
}

/** Half-open `[start, end)` range of offsets. */
export type OffsetRange = readonly [start: number, end: number]

export interface Indexer {
	/** Line and column of `pos`. */
	lineColAt(pos: number): LineColumn
	/** Range of the line containing `pos`, including its newline. */
	lineSpanAt(pos: number): OffsetRange
	/**
	 * Range of the lines covering `[start, end)`, widened by the given number
	 * of context lines on each side and clamped to the document.
	 */
	spanWithContextLines(start: number, end: number, before: number, after: number): OffsetRange
}

const NEWLINE = /\r\n|\n|\r/g

interface SearchResult {
	readonly found: boolean
	readonly index: number
}

/**
 * An {@link Indexer} that stores the end offset of every line, newline
 * included, followed by the length of the text.
 */
export class LineIndexer implements Indexer {
	private readonly lineEnds: readonly number[]

	constructor(text: string) {
		const ends: number[] = []
		for (const match of text.matchAll(NEWLINE)) {
			ends.push((match.index ?? 0) + match[0].length)
		}
		ends.push(text.length)
		this.lineEnds = ends
	}

	lineColAt(pos: number): LineColumn {
		const { line, start } = this.lineAndStartAt(pos)
		return { column: pos - start, line }
	}

	lineSpanAt(pos: number): OffsetRange {
		const result = this.search(pos)
		const last = this.lineEnds.length - 1
		if (result.found) {
			return result.index === last
				? [this.endAt(result.index), this.endAt(result.index)]
				: [this.endAt(result.index), this.endAt(result.index + 1)]
		}
		if (result.index === 0) return [0, this.endAt(0)]
		if (result.index > last) return [this.endAt(last), this.endAt(last)]
		return [this.endAt(result.index - 1), this.endAt(result.index)]
	}

	spanWithContextLines(start: number, end: number, before: number, after: number): OffsetRange {
		let from: number
		if (before === 0) {
			from = this.lineStartAt(start)
		} else {
			const firstLine = Math.max(0, this.lineAt(start) - before)
			from = firstLine === 0 ? 0 : this.endAt(firstLine - 1)
		}

		let to: number
		if (after === 0) {
			to = this.lineSpanAt(end)[1]
		} else {
			const lastLine = Math.min(this.lineAt(end) + after, this.lineEnds.length - 1)
			to = this.endAt(lastLine)
		}

		return [from, to]
	}

	private endAt(index: number): number {
		const end = this.lineEnds[index]
		if (end === undefined) throw new RangeError(`Invalid line index: ${index}`)
		return end
	}

	/** Lower-bound binary search over the line ends. */
	private search(pos: number): SearchResult {
		let low = 0
		let high = this.lineEnds.length
		while (low < high) {
			const mid = (low + high) >>> 1
			if (this.endAt(mid) < pos) low = mid + 1
			else high = mid
		}
		const found = low < this.lineEnds.length && this.endAt(low) === pos
		return { found, index: low }
	}

	private lineAndStartAt(pos: number): { line: number; start: number } {
		const result = this.search(pos)
		if (result.found) return { line: result.index + 1, start: this.endAt(result.index) }
		if (result.index === 0) return { line: 0, start: 0 }
		return { line: result.index, start: this.endAt(result.index - 1) }
	}

	private lineStartAt(pos: number): number {
		return this.lineAndStartAt(pos).start
	}

	private lineAt(pos: number): number {
		return this.lineAndStartAt(pos).line
	}
}
