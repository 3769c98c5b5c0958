import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext } from '../../src/core/context.ts'
import { ParseError } from '../../src/core/errors.ts'
import type { ErrorTree, GroupNode, LeafNode, Taxonomy } from '../../src/core/nodes.ts'
import { matchOnly, parse } from '../../src/parse/parser.ts'
import { expectTaxonomyError, spanOf } from '../helpers.ts'

function parseSource(source: string): Taxonomy {
	return parse(new CompilationContext(source, 'test.flt'))
}

function asLeaf(node: ErrorTree | undefined): LeafNode {
	assert.ok(node !== undefined && node.kind === 'leaf', 'expected a leaf')
	return node
}

function asGroup(node: ErrorTree | undefined): GroupNode {
	assert.ok(node !== undefined && node.kind === 'group', 'expected a group')
	return node
}

const FILE_ERRORS = `#[kind = "Error"]
FileSystemError {
    #[number = "0", msg = "file errors"]
    {
        #[number = "1", msg = "File {path:?} not found."]
        FileNotFound { path: string, #[span] at: Span },
        #[number = "2", msg = "access denied."]
        AccessDenied,
    },
}`

describe('parse/parser', () => {
	describe('taxonomy', () => {
		it('should read the taxonomy name and root attributes', () => {
			const taxonomy = parseSource(FILE_ERRORS)

			assert.strictEqual(taxonomy.name, 'FileSystemError')
			assert.deepStrictEqual(taxonomy.nameSpan, spanOf(FILE_ERRORS, 'FileSystemError'))
			assert.strictEqual(taxonomy.generics, null)
			assert.strictEqual(taxonomy.attrs.length, 1)
			assert.strictEqual(taxonomy.attrs[0]?.key, 'kind')
			assert.deepStrictEqual(taxonomy.attrs[0]?.value, {
				span: spanOf(FILE_ERRORS, '"Error"'),
				type: 'string',
				value: 'Error',
			})
		})

		it('should keep groups and leaves in declared order', () => {
			const taxonomy = parseSource(FILE_ERRORS)
			const group = asGroup(taxonomy.roots[0])

			assert.strictEqual(taxonomy.roots.length, 1)
			assert.deepStrictEqual(
				group.attrs.map((attr) => attr.key),
				['number', 'msg']
			)
			assert.deepStrictEqual(
				group.children.map((child) => (child.kind === 'leaf' ? child.name : 'group')),
				['FileNotFound', 'AccessDenied']
			)
		})

		it('should capture generic parameters as written', () => {
			const taxonomy = parseSource('Errors<S> { #[msg = "x"] A }')
			assert.strictEqual(taxonomy.generics, '<S>')
		})

		it('should accept an empty taxonomy', () => {
			const taxonomy = parseSource('Errors {}')
			assert.deepStrictEqual(taxonomy.roots, [])
		})

		it('should treat comments as whitespace', () => {
			const source = `// line comment
Errors {
    /* block
       comment */
    A, // trailing
    B
}`
			const taxonomy = parseSource(source)
			assert.deepStrictEqual(
				taxonomy.roots.map((node) => asLeaf(node).name),
				['A', 'B']
			)
		})
	})

	describe('spans', () => {
		it('should point a leaf at its identifier', () => {
			const leaf = asLeaf(asGroup(parseSource(FILE_ERRORS).roots[0]).children[1])
			assert.deepStrictEqual(leaf.span, spanOf(FILE_ERRORS, 'AccessDenied'))
		})

		it('should point a group at its opening brace', () => {
			const group = asGroup(parseSource(FILE_ERRORS).roots[0])
			assert.deepStrictEqual(group.span, spanOf(FILE_ERRORS, '{', 2))
		})
	})

	describe('fields', () => {
		it('should read named fields and the span marker', () => {
			const leaf = asLeaf(asGroup(parseSource(FILE_ERRORS).roots[0]).children[0])
			const at = spanOf(FILE_ERRORS, 'at:').start

			assert.deepStrictEqual(leaf.fields, {
				fields: [
					{ name: 'path', span: spanOf(FILE_ERRORS, 'path', 2), type: 'string' },
					{ name: 'at', span: { end: at + 2, start: at }, type: 'Span' },
				],
				kind: 'named',
			})
			assert.deepStrictEqual(leaf.spanField, { kind: 'named', name: 'at' })
		})

		it('should read positional fields with balanced type text', () => {
			const source = 'Errors { A(Map<string, number>, #[span] Span, (a, b) ) }'
			const leaf = asLeaf(parseSource(source).roots[0])

			assert.ok(leaf.fields.kind === 'positional')
			assert.deepStrictEqual(
				leaf.fields.fields.map((field) => field.type),
				['Map<string, number>', 'Span', '(a, b)']
			)
			assert.deepStrictEqual(leaf.spanField, { index: 1, kind: 'positional' })
		})

		it('should read arrows inside field types', () => {
			const source = 'Errors { A(Box<dyn Fn() -> u8>), B { run: (x: number) => void } }'
			const [first, second] = parseSource(source).roots
			const a = asLeaf(first)
			const b = asLeaf(second)

			assert.ok(a.fields.kind === 'positional')
			assert.deepStrictEqual(
				a.fields.fields.map((field) => field.type),
				['Box<dyn Fn() -> u8>']
			)
			assert.ok(b.fields.kind === 'named')
			assert.deepStrictEqual(
				b.fields.fields.map((field) => field.type),
				['(x: number) => void']
			)
		})

		it('should read a leaf without fields as unit', () => {
			const leaf = asLeaf(parseSource('Errors { A }').roots[0])
			assert.deepStrictEqual(leaf.fields, { kind: 'unit' })
			assert.strictEqual(leaf.spanField, null)
		})

		it('should accept trailing commas in field lists', () => {
			const leaf = asLeaf(parseSource('Errors { A { a: string, }, }').roots[0])
			assert.ok(leaf.fields.kind === 'named')
			assert.strictEqual(leaf.fields.fields.length, 1)
		})
	})

	describe('attribute literals', () => {
		it('should keep integer literals as written', () => {
			const leaf = asLeaf(parseSource('Errors { #[number = 01] A }').roots[0])
			assert.deepStrictEqual(leaf.attrs[0]?.value?.type, 'integer')
			assert.strictEqual(leaf.attrs[0]?.value?.value, '01')
		})

		it('should record bare flags without a value', () => {
			const leaf = asLeaf(parseSource('Errors { #[nested] A(Inner) }').roots[0])
			assert.strictEqual(leaf.attrs[0]?.key, 'nested')
			assert.strictEqual(leaf.attrs[0]?.value, null)
		})

		it('should decode escape sequences in strings', () => {
			const source = String.raw`Errors { #[msg = "say \"hi\"\t\u{41}\\"] A }`
			const leaf = asLeaf(parseSource(source).roots[0])
			assert.strictEqual(leaf.attrs[0]?.value?.value, 'say "hi"\tA\\')
		})

		it('should merge several attribute blocks in order', () => {
			const leaf = asLeaf(parseSource('Errors { #[number = "1"] #[msg = "m", label = "l"] A }').roots[0])
			assert.deepStrictEqual(
				leaf.attrs.map((attr) => attr.key),
				['number', 'msg', 'label']
			)
		})
	})

	describe('errors', () => {
		it('should report a syntax error near the offending input', () => {
			const source = 'Errors { A B }'
			const error = expectTaxonomyError(() => parseSource(source), ParseError, 'FLPARSE001')

			assert.ok(error.span.start > source.indexOf('A'))
			assert.ok(error.span.start <= source.indexOf('B'))
			assert.match(error.message, /^syntax error: /)
		})

		it('should leave the position out of the syntax error detail', () => {
			const error = expectTaxonomyError(() => parseSource('Errors {\n  A'), ParseError, 'FLPARSE001')

			assert.doesNotMatch(error.message, /Line \d+, col \d+/)
			assert.strictEqual(error.span.start, 12)
		})

		it('should reject a missing taxonomy name', () => {
			expectTaxonomyError(() => parseSource('{ A }'), ParseError, 'FLPARSE001')
		})

		it('should reject a second span marker at the second marker', () => {
			const source = 'Errors { A { #[span] a: Span, #[span] b: Span } }'
			const error = expectTaxonomyError(() => parseSource(source), ParseError, 'FLPARSE002')

			assert.deepStrictEqual(error.span, spanOf(source, 'span', 2))
			assert.strictEqual(error.message, 'duplicate span marker in `A`')
		})

		it('should reject field attributes other than span', () => {
			const source = 'Errors { A { #[skip] a: string } }'
			const error = expectTaxonomyError(() => parseSource(source), ParseError, 'FLPARSE003')

			assert.deepStrictEqual(error.span, spanOf(source, 'skip'))
			assert.strictEqual(error.message, 'unexpected field attribute `skip`')
		})

		it('should reject a span marker with a value', () => {
			const source = 'Errors { A { #[span = "x"] a: Span } }'
			expectTaxonomyError(() => parseSource(source), ParseError, 'FLPARSE003')
		})

		it('should reject unknown escape sequences', () => {
			const source = String.raw`Errors { #[msg = "bad \q"] A }`
			const error = expectTaxonomyError(() => parseSource(source), ParseError, 'FLPARSE004')

			assert.strictEqual(error.message, String.raw`invalid escape sequence ` + '`\\q`')
			assert.deepStrictEqual(error.span, spanOf(source, String.raw`\q`))
		})

		it('should reject code points beyond the unicode range', () => {
			const source = String.raw`Errors { #[msg = "\u{110000}"] A }`
			expectTaxonomyError(() => parseSource(source), ParseError, 'FLPARSE004')
		})
	})

	describe('matchOnly', () => {
		it('should report whether source is well formed', () => {
			assert.strictEqual(matchOnly(new CompilationContext('Errors { A }')), true)
			assert.strictEqual(matchOnly(new CompilationContext('Errors { A')), false)
		})
	})
})
