/**
 * Attribute resolution.
 *
 * Every node derives its `Config` from its parent's by copy-with-override;
 * a parent's config is never mutated.
 *
 * | key      | value                                  | effect    |
 * |----------|----------------------------------------|-----------|
 * | `kind`   | `"Error"`, `"error"`, `"Warn"`, `"warn"` | overrides |
 * | `number` | string of digits, or integer literal   | appended  |
 * | `msg`    | string                                 | overrides |
 * | `label`  | string                                 | overrides |
 * | `nested` | flag                                   | inherited |
 */

import type { CompilationContext } from '../core/context.ts'
import { DiagnosticSeverity } from '../core/diagnostics.ts'
import { AttributeError } from '../core/errors.ts'
import {
	type AttrLiteral,
	type ErrorTree,
	type FieldRef,
	fieldCount,
	type RawAttr,
	type Taxonomy,
} from '../core/nodes.ts'
import type { SourceSpan } from '../core/span.ts'

/** Template text together with the location of its literal. */
export interface TemplateSource {
	readonly text: string
	readonly span: SourceSpan
}

export interface Config {
	readonly kind: DiagnosticSeverity
	/** Concatenated number fragments, root first */
	readonly number: string
	readonly msg: TemplateSource | null
	readonly label: TemplateSource | null
	/** The node's own `msg`, not inherited */
	readonly summary: string | null
	readonly spanField: FieldRef | null
	/** 1 for the taxonomy itself */
	readonly depth: number
	/** Nearest `#[nested]` flag, on this node or an ancestor */
	readonly nestedAt: SourceSpan | null
}

const KIND_VALUES: Readonly<Record<string, DiagnosticSeverity>> = {
	error: DiagnosticSeverity.Error,
	Error: DiagnosticSeverity.Error,
	warn: DiagnosticSeverity.Warn,
	Warn: DiagnosticSeverity.Warn,
}

const DIGITS = /^\d*$/

export function initialConfig(): Config {
	return {
		depth: 0,
		kind: DiagnosticSeverity.Error,
		label: null,
		msg: null,
		nestedAt: null,
		number: '',
		spanField: null,
		summary: null,
	}
}

function expectString(attr: RawAttr, context: CompilationContext): AttrLiteral & { type: 'string' } {
	const value = attr.value
	if (value === null || value.type !== 'string') {
		throw context.fail(AttributeError, 'FLATTR004', attr.span, {
			expected: 'a string',
			key: attr.key,
		})
	}
	return value
}

function numberFragment(attr: RawAttr, context: CompilationContext): string {
	const value = attr.value
	if (value === null) {
		throw context.fail(AttributeError, 'FLATTR004', attr.span, {
			expected: 'a string of digits or an integer',
			key: attr.key,
		})
	}
	if (!DIGITS.test(value.value)) {
		throw context.fail(AttributeError, 'FLATTR003', value.span, { value: value.value })
	}
	return value.value
}

/**
 * Apply one node's attributes, in declaration order, onto `base`.
 */
function applyAttrs(
	base: Config,
	attrs: readonly RawAttr[],
	context: CompilationContext
): Config {
	let config = base

	for (const attr of attrs) {
		switch (attr.key) {
			case 'kind': {
				const value = expectString(attr, context)
				const kind = KIND_VALUES[value.value]
				if (kind === undefined) {
					throw context.fail(AttributeError, 'FLATTR002', value.span, { value: value.value })
				}
				config = { ...config, kind }
				break
			}
			case 'number':
				config = { ...config, number: config.number + numberFragment(attr, context) }
				break
			case 'msg': {
				const value = expectString(attr, context)
				config = { ...config, msg: { span: value.span, text: value.value }, summary: value.value }
				break
			}
			case 'label': {
				const value = expectString(attr, context)
				config = { ...config, label: { span: value.span, text: value.value } }
				break
			}
			case 'nested':
				if (attr.value !== null) {
					throw context.fail(AttributeError, 'FLATTR004', attr.span, {
						expected: 'no value',
						key: attr.key,
					})
				}
				config = { ...config, nestedAt: attr.span }
				break
			default:
				throw context.fail(AttributeError, 'FLATTR001', attr.span, { key: attr.key })
		}
	}

	return config
}

/**
 * Config of the taxonomy itself, from its own attributes.
 */
export function rootConfig(taxonomy: Taxonomy, context: CompilationContext): Config {
	return applyAttrs({ ...initialConfig(), depth: 1 }, taxonomy.attrs, context)
}

/**
 * Merge a node's attributes onto the config inherited from its parent.
 *
 * @throws {AttributeError} On an unknown key, a malformed value, or a
 *   nested leaf that does not have exactly one field.
 */
export function resolveConfig(
	parent: Config,
	node: ErrorTree,
	context: CompilationContext
): Config {
	const base: Config = {
		...parent,
		depth: parent.depth + 1,
		spanField: node.kind === 'leaf' ? node.spanField : null,
		summary: null,
	}
	const config = applyAttrs(base, node.attrs, context)

	if (node.kind === 'leaf' && config.nestedAt !== null) {
		const count = fieldCount(node.fields)
		if (count !== 1) {
			throw context.fail(AttributeError, 'FLATTR005', config.nestedAt, {
				count,
				variant: node.name,
			})
		}
	}

	return config
}
