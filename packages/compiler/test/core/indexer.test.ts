import assert from 'node:assert'
import { describe, it } from 'node:test'
import { LineIndexer } from '../../src/core/indexer.ts'
import { isSpan, SimpleSpan, SourceFile } from '../../src/core/span.ts'

const TEXT = 'Hello\nWorld\nThis is a test.'

describe('core/indexer', () => {
	describe('LineIndexer.lineColAt', () => {
		const index = new LineIndexer(TEXT)

		it('should place the first offset at line 0, column 0', () => {
			assert.deepStrictEqual(index.lineColAt(0), { column: 0, line: 0 })
		})

		it('should start a new line after each newline', () => {
			assert.deepStrictEqual(index.lineColAt(6), { column: 0, line: 1 })
			assert.deepStrictEqual(index.lineColAt(12), { column: 0, line: 2 })
		})

		it('should count columns within a line', () => {
			assert.deepStrictEqual(index.lineColAt(11), { column: 5, line: 1 })
		})

		it('should treat the end of text as the start of a final line', () => {
			assert.deepStrictEqual(index.lineColAt(27), { column: 0, line: 3 })
			assert.deepStrictEqual(index.lineColAt(30), { column: 3, line: 3 })
		})
	})

	describe('LineIndexer.lineSpanAt', () => {
		const index = new LineIndexer(TEXT)

		it('should return each line including its newline', () => {
			assert.deepStrictEqual(index.lineSpanAt(0), [0, 6])
			assert.deepStrictEqual(index.lineSpanAt(6), [6, 12])
			assert.deepStrictEqual(index.lineSpanAt(12), [12, 27])
		})

		it('should return an empty range at and past the end of text', () => {
			assert.deepStrictEqual(index.lineSpanAt(27), [27, 27])
			assert.deepStrictEqual(index.lineSpanAt(30), [27, 27])
		})
	})

	describe('LineIndexer.spanWithContextLines', () => {
		const index = new LineIndexer(TEXT)

		it('should widen to the enclosing line without context', () => {
			assert.deepStrictEqual(index.spanWithContextLines(7, 11, 0, 0), [6, 12])
		})

		it('should add lines before', () => {
			assert.deepStrictEqual(index.spanWithContextLines(7, 11, 1, 0), [0, 12])
		})

		it('should clamp at both ends of the document', () => {
			assert.deepStrictEqual(index.spanWithContextLines(7, 11, 2, 2), [0, 27])
			assert.deepStrictEqual(index.spanWithContextLines(0, 5, 1, 1), [0, 12])
			assert.deepStrictEqual(index.spanWithContextLines(22, 26, 1, 1), [6, 27])
		})
	})

	describe('line breaks', () => {
		it('should accept CRLF and CR line endings', () => {
			const index = new LineIndexer('a\r\nb\rc')
			assert.deepStrictEqual(index.lineColAt(3), { column: 0, line: 1 })
			assert.deepStrictEqual(index.lineColAt(5), { column: 0, line: 2 })
			assert.deepStrictEqual(index.lineSpanAt(0), [0, 3])
		})

		it('should give an empty text a single empty line', () => {
			const index = new LineIndexer('')
			assert.deepStrictEqual(index.lineSpanAt(0), [0, 0])
			assert.deepStrictEqual(index.spanWithContextLines(0, 0, 1, 1), [0, 0])
		})
	})
})

describe('core/span', () => {
	it('should expose offsets, uri and text', () => {
		const span = SimpleSpan.of('input.txt', TEXT, 6, 11)
		assert.strictEqual(span.start(), 6)
		assert.strictEqual(span.end(), 11)
		assert.strictEqual(span.uri(), 'input.txt')
		assert.strictEqual(span.sourceText(), TEXT)
		assert.strictEqual(span.text(), 'World')
	})

	it('should share one index between spans of a file', () => {
		const file = new SourceFile('input.txt', TEXT)
		assert.strictEqual(file.span(0, 1).sourceIndex(), file.span(6, 8).sourceIndex())
	})

	it('should create an empty span without a document', () => {
		const span = SimpleSpan.empty()
		assert.strictEqual(span.uri(), '')
		assert.strictEqual(span.sourceText(), '')
		assert.strictEqual(span.start(), 0)
		assert.strictEqual(span.end(), 0)
	})

	it('should recognise span-like values', () => {
		assert.strictEqual(isSpan(SimpleSpan.empty()), true)
		assert.strictEqual(isSpan({ end: 1, start: 0 }), false)
		assert.strictEqual(isSpan('span'), false)
		assert.strictEqual(isSpan(null), false)
	})
})
