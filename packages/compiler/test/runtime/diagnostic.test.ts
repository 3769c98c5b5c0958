import assert from 'node:assert'
import { describe, it } from 'node:test'
import { DiagnosticSeverity } from '../../src/core/diagnostics.ts'
import { SimpleSpan } from '../../src/core/span.ts'
import { compile } from '../../src/index.ts'
import { defineTaxonomy, materialize, VariantDiagnostic } from '../../src/runtime/diagnostic.ts'

const SOURCE = `Errors {
    #[kind = "Error", msg = "errors"]
    {
        #[number = "01", msg = "File {path} not found.", label = "missing {path:?}"]
        FileNotFound { path: string, #[span] at: Span },
        #[number = "02", msg = "bad count {0:>3}"]
        BadCount(number),
        #[number = "03", msg = "{0}", nested]
        FileError(FileNotFound),
        #[number = "04", kind = "Warn", msg = "unit"]
        Unit,
    },
}`

const errors = defineTaxonomy(compile(SOURCE, { filename: 'errors.flt' }))
const location = SimpleSpan.of('input.txt', 'cat a.txt', 4, 9)

describe('runtime/diagnostic', () => {
	describe('create', () => {
		it('should answer kind, codes, message and label', () => {
			const diagnostic = errors.create('FileNotFound', { at: location, path: 'a.txt' })

			assert.strictEqual(diagnostic.kind(), DiagnosticSeverity.Error)
			assert.strictEqual(diagnostic.numericCode(), '01')
			assert.strictEqual(diagnostic.code(), 'E01')
			assert.strictEqual(diagnostic.primaryMessage(), 'File a.txt not found.')
			assert.strictEqual(diagnostic.primaryLabel(), 'missing "a.txt"')
		})

		it('should be a throwable error named after the variant', () => {
			const diagnostic = errors.create('FileNotFound', { at: location, path: 'a.txt' })

			assert.ok(diagnostic instanceof Error)
			assert.ok(diagnostic instanceof VariantDiagnostic)
			assert.strictEqual(diagnostic.name, 'FileNotFound')
			assert.strictEqual(diagnostic.message, 'File a.txt not found.')
		})

		it('should format positional values', () => {
			assert.strictEqual(errors.create('BadCount', [7]).primaryMessage(), 'bad count   7')
		})

		it('should create unit variants without values', () => {
			const diagnostic = errors.create('Unit')

			assert.strictEqual(diagnostic.primaryMessage(), 'unit')
			assert.strictEqual(diagnostic.code(), 'W04')
		})

		it('should list every variant', () => {
			assert.deepStrictEqual([...errors.variants.keys()], ['FileNotFound', 'BadCount', 'FileError', 'Unit'])
		})
	})

	describe('primarySpan', () => {
		it('should read the span field', () => {
			const diagnostic = errors.create('FileNotFound', { at: location, path: 'a.txt' })
			assert.strictEqual(diagnostic.primarySpan(), location)
		})

		it('should fall back to the given span when the field holds no span', () => {
			const diagnostic = errors.create('FileNotFound', { at: 'nowhere', path: 'a.txt' }, location)
			assert.strictEqual(diagnostic.primarySpan(), location)
		})

		it('should default to an empty span', () => {
			const span = errors.create('Unit').primarySpan()

			assert.strictEqual(span.uri(), '')
			assert.strictEqual(span.sourceText(), '')
		})
	})

	describe('nested variants', () => {
		it('should render the wrapped diagnostic', () => {
			const inner = errors.create('FileNotFound', { at: location, path: 'a.txt' })
			const outer = errors.create('FileError', [inner])

			assert.strictEqual(outer.primaryMessage(), 'File a.txt not found.')
			assert.strictEqual(outer.code(), 'E03')
			assert.strictEqual(outer.inner(), inner)
			assert.strictEqual(outer.cause, inner)
		})

		it('should report no inner diagnostic for plain variants', () => {
			assert.strictEqual(errors.create('BadCount', [1]).inner(), null)
		})
	})

	describe('value checks', () => {
		it('should reject unknown variants', () => {
			assert.throws(() => errors.create('Missing'), { message: 'Unknown variant `Missing`', name: 'TypeError' })
		})

		it('should reject missing named fields', () => {
			assert.throws(() => errors.create('FileNotFound', { path: 'a.txt' }), {
				message: '`FileNotFound` is missing field `at`',
				name: 'TypeError',
			})
		})

		it('should not count inherited members as named fields', () => {
			const taxonomy = defineTaxonomy(compile('Errors { #[msg = "{toString}"] A { toString: string } }'))
			assert.throws(() => taxonomy.create('A', {}), {
				message: '`A` is missing field `toString`',
				name: 'TypeError',
			})
		})

		it('should reject arrays for named fields', () => {
			assert.throws(() => errors.create('FileNotFound', ['a.txt', location]), TypeError)
		})

		it('should reject the wrong number of positional values', () => {
			assert.throws(() => errors.create('BadCount', [1, 2]), {
				message: '`BadCount` expects an array of 1 value(s)',
				name: 'TypeError',
			})
		})

		it('should reject values for unit variants', () => {
			assert.throws(() => errors.create('Unit', ['extra']), TypeError)
		})

		it('should reject a nested value that is not a diagnostic', () => {
			assert.throws(() => errors.create('FileError', ['plain text']), {
				message: '`FileError` wraps a diagnostic, got string',
				name: 'TypeError',
			})
		})
	})

	describe('materialize', () => {
		it('should bind a descriptor directly', () => {
			const descriptor = errors.variants.get('BadCount')
			assert.ok(descriptor !== undefined)
			assert.strictEqual(materialize(descriptor, [12]).message, 'bad count  12')
		})
	})
})
