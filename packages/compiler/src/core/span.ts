/**
 * Source spans.
 *
 * `SourceSpan` is the plain offset pair the compiler threads through its
 * data structures. `Span` is the richer contract renderers consume: it knows
 * its document, and can index it into lines and columns.
 */

import { type Indexer, LineIndexer } from './indexer.ts'

/** Half-open range of UTF-16 offsets into a source text. */
export interface SourceSpan {
	readonly start: number
	readonly end: number
}

export interface Span {
	start(): number
	end(): number
	/** Identifier of the document (file path, URL, `<input>`). */
	uri(): string
	sourceText(): string
	sourceIndex(): Indexer
}

/**
 * A named source text with a lazily built line index.
 * Spans into the same file share one index.
 */
export class SourceFile {
	readonly uri: string
	readonly text: string
	private indexer: LineIndexer | null = null

	constructor(uri: string, text: string) {
		this.uri = uri
		this.text = text
	}

	get index(): LineIndexer {
		this.indexer ??= new LineIndexer(this.text)
		return this.indexer
	}

	span(start: number, end: number): SimpleSpan {
		return new SimpleSpan(this, start, end)
	}
}

export class SimpleSpan implements Span {
	private readonly file: SourceFile
	private readonly startOffset: number
	private readonly endOffset: number

	constructor(file: SourceFile, start: number, end: number) {
		this.file = file
		this.startOffset = start
		this.endOffset = end
	}

	/** Span over a standalone text. */
	static of(uri: string, source: string, start: number, end: number): SimpleSpan {
		return new SimpleSpan(new SourceFile(uri, source), start, end)
	}

	/** The span of a diagnostic with no known location. */
	static empty(): SimpleSpan {
		return SimpleSpan.of('', '', 0, 0)
	}

	start(): number {
		return this.startOffset
	}

	end(): number {
		return this.endOffset
	}

	uri(): string {
		return this.file.uri
	}

	sourceText(): string {
		return this.file.text
	}

	sourceIndex(): Indexer {
		return this.file.index
	}

	/** The covered text. */
	text(): string {
		return this.file.text.slice(this.startOffset, this.endOffset)
	}
}

/**
 * Check whether a runtime value satisfies the {@link Span} contract.
 */
export function isSpan(value: unknown): value is Span {
	if (typeof value !== 'object' || value === null) return false
	return ['start', 'end', 'uri', 'sourceText', 'sourceIndex'].every(
		(method) => typeof Reflect.get(value, method) === 'function'
	)
}
