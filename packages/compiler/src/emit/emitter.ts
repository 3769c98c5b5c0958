import type { CompilationContext } from '../core/context.ts'
import { type DiagnosticSeverity, SEVERITY_MARKERS } from '../core/diagnostics.ts'
import { type CompileWarning, EmissionError } from '../core/errors.ts'
import type { FieldRef, FieldShape, LeafNode, Taxonomy } from '../core/nodes.ts'
import type { SourceSpan } from '../core/span.ts'
import type { Config } from '../resolve/config.ts'
import { walkTaxonomy } from '../resolve/walker.ts'
import { type CompiledTemplate, compileTemplate } from '../template/compiler.ts'
import { type DocEntry, docEntry, variantDoc } from './documentation.ts'

/** Where a diagnostic finds its location at runtime. */
export type SpanRule = { readonly kind: 'field'; readonly field: FieldRef } | { readonly kind: 'default' }

/**
 * Everything the runtime needs to build one variant.
 */
export interface VariantDescriptor {
	readonly name: string
	readonly fields: FieldShape
	readonly severity: DiagnosticSeverity
	readonly numericCode: string
	/** Severity marker followed by the numeric code, e.g. `E01` */
	readonly code: string
	readonly message: CompiledTemplate
	readonly label: CompiledTemplate
	readonly spanRule: SpanRule
	readonly nested: boolean
	readonly doc: string
	/** Identifier of the variant in the taxonomy source */
	readonly span: SourceSpan
}

export interface EmitOptions {
	/** Fail instead of warning when two variants share a code */
	readonly denyDuplicateCodes?: boolean
}

export interface EmitResult {
	readonly name: string
	readonly generics: string | null
	readonly descriptors: readonly VariantDescriptor[]
	readonly documentation: readonly DocEntry[]
	readonly warnings: readonly CompileWarning[]
}

export function displayCode(config: Config): string {
	return SEVERITY_MARKERS[config.kind] + config.number
}

function emitVariant(config: Config, leaf: LeafNode, context: CompilationContext): VariantDescriptor {
	if (config.msg === null) {
		throw context.fail(EmissionError, 'FLEMIT001', leaf.span, { variant: leaf.name })
	}

	const message = compileTemplate(config.msg, leaf.fields, leaf.name, context)
	const label =
		config.label === null ? message : compileTemplate(config.label, leaf.fields, leaf.name, context)
	const code = displayCode(config)

	return {
		code,
		doc: variantDoc(code, config.msg.text),
		fields: leaf.fields,
		label,
		message,
		name: leaf.name,
		nested: config.nestedAt !== null,
		numericCode: config.number,
		severity: config.kind,
		span: leaf.span,
		spanRule: config.spanField === null ? { kind: 'default' } : { field: config.spanField, kind: 'field' },
	}
}

/**
 * Fold a taxonomy into variant descriptors and its documentation listing,
 * both in declared order.
 *
 * @throws {EmissionError} On a variant without a message, a duplicate
 *   variant name, or a duplicate code when `denyDuplicateCodes` is set
 */
export function emit(
	taxonomy: Taxonomy,
	context: CompilationContext,
	options: EmitOptions = {}
): EmitResult {
	const descriptors: VariantDescriptor[] = []
	const documentation: DocEntry[] = []
	const names = new Set<string>()
	const codes = new Map<string, string>()

	for (const { config, node } of walkTaxonomy(taxonomy, context)) {
		if (node.kind === 'group') {
			documentation.push(docEntry(config.depth, displayCode(config), null, config.summary))
			continue
		}

		if (names.has(node.name)) {
			throw context.fail(EmissionError, 'FLEMIT002', node.span, { variant: node.name })
		}
		names.add(node.name)

		const descriptor = emitVariant(config, node, context)

		const other = codes.get(descriptor.code)
		if (other !== undefined) {
			const args = { code: descriptor.code, other, variant: descriptor.name }
			if (options.denyDuplicateCodes === true) {
				throw context.fail(EmissionError, 'FLEMIT003', node.span, args)
			}
			context.warn('FLEMIT050', node.span, args)
		} else {
			codes.set(descriptor.code, descriptor.name)
		}

		descriptors.push(descriptor)
		documentation.push(
			docEntry(config.depth, descriptor.code, descriptor.name, config.msg?.text ?? null)
		)
	}

	return {
		descriptors,
		documentation,
		generics: taxonomy.generics,
		name: taxonomy.name,
		warnings: context.getWarnings(),
	}
}
