/**
 * Message and label templates.
 *
 * A placeholder is `{` [index | name] [`:` format] `}`. `{{` and `}}` stand
 * for literal braces. An empty reference `{}` takes the next positional
 * index, counting only empty references.
 */

import type { CompilationContext } from '../core/context.ts'
import { TemplateError } from '../core/errors.ts'
import { type FieldRef, type FieldShape, fieldNames } from '../core/nodes.ts'
import type { SourceSpan } from '../core/span.ts'
import type { TemplateSource } from '../resolve/config.ts'
import { type FormatSpec, parseFormatSpec } from './format.ts'

export interface TextSegment {
	readonly kind: 'text'
	readonly text: string
}

export interface FieldSegment {
	readonly kind: 'field'
	readonly field: FieldRef
	readonly format: FormatSpec
}

export type Segment = TextSegment | FieldSegment

export interface CompiledTemplate {
	/** Template text as written */
	readonly source: string
	readonly span: SourceSpan
	readonly segments: readonly Segment[]
}

const POSITIONAL = /^\d+$/
const IDENTIFIER = /^[A-Za-z_]\w*$/

let placeholderPattern: RegExp | null = null

/**
 * Shared scanning pattern. `matchAll` copies it, so concurrent scans never
 * share `lastIndex`.
 */
function placeholders(): RegExp {
	placeholderPattern ??= /\{\{|\}\}|\{([^{}]*)\}|[{}]/g
	return placeholderPattern
}

function resolveReference(
	reference: string,
	placeholder: string,
	implicitIndex: () => number,
	shape: FieldShape,
	variant: string,
	span: SourceSpan,
	context: CompilationContext
): FieldRef {
	if (reference === '' || POSITIONAL.test(reference)) {
		const index = reference === '' ? implicitIndex() : Number.parseInt(reference, 10)
		const count = shape.kind === 'positional' ? shape.fields.length : 0
		if (index >= count) {
			throw context.fail(TemplateError, 'FLTPL002', span, { count, index, variant })
		}
		return { index, kind: 'positional' }
	}

	if (!IDENTIFIER.test(reference)) {
		throw context.fail(TemplateError, 'FLTPL004', span, { text: placeholder })
	}

	const names = fieldNames(shape)
	if (!names.includes(reference)) {
		throw context.fail(TemplateError, 'FLTPL001', span, {
			fields: names.length > 0 ? names.map((name) => `\`${name}\``).join(', ') : 'none',
			name: reference,
			variant,
		})
	}
	return { kind: 'named', name: reference }
}

/**
 * Compile a template against the field shape of the variant it belongs to.
 *
 * @throws {TemplateError} On an unknown or out-of-range reference, a stray
 *   brace, or an unsupported format suffix. The error points at the
 *   template literal.
 */
export function compileTemplate(
	template: TemplateSource,
	shape: FieldShape,
	variant: string,
	context: CompilationContext
): CompiledTemplate {
	const segments: Segment[] = []
	let text = ''
	let last = 0
	let nextImplicit = 0
	const implicitIndex = (): number => nextImplicit++

	const flushText = (): void => {
		if (text !== '') segments.push({ kind: 'text', text })
		text = ''
	}

	for (const match of template.text.matchAll(placeholders())) {
		const offset = match.index ?? 0
		const token = match[0]
		text += template.text.slice(last, offset)
		last = offset + token.length

		if (token === '{{' || token === '}}') {
			text += token.charAt(0)
			continue
		}

		const body = match[1]
		if (body === undefined) {
			throw context.fail(TemplateError, 'FLTPL003', template.span, { brace: token, offset })
		}

		const colon = body.indexOf(':')
		const reference = colon === -1 ? body : body.slice(0, colon)
		const formatText = colon === -1 ? '' : body.slice(colon + 1)

		const field = resolveReference(
			reference,
			token,
			implicitIndex,
			shape,
			variant,
			template.span,
			context
		)
		const format = parseFormatSpec(formatText)
		if (format === null) {
			throw context.fail(TemplateError, 'FLTPL005', template.span, { spec: formatText })
		}

		flushText()
		segments.push({ field, format, kind: 'field' })
	}

	text += template.text.slice(last)
	flushText()

	return { segments, source: template.text, span: template.span }
}
