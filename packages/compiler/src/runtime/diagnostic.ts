/**
 * Runtime side of a compiled taxonomy: descriptors plus field values become
 * diagnostics.
 *
 * ```ts
 * const errors = defineTaxonomy(compile(source))
 * throw errors.create('FileNotFound', { path: 'a.txt', at: span })
 * ```
 */

import type { DiagnosticSeverity } from '../core/diagnostics.ts'
import { type Diagnostic, isDiagnostic } from '../core/facade.ts'
import { type FieldRef, fieldNames } from '../core/nodes.ts'
import { isSpan, SimpleSpan, type Span } from '../core/span.ts'
import type { VariantDescriptor } from '../emit/emitter.ts'
import { type FieldValues, fieldValue, renderTemplate } from '../template/render.ts'

const NESTED_FIELD: FieldRef = { index: 0, kind: 'positional' }

function nestedField(descriptor: VariantDescriptor): FieldRef {
	const [name] = fieldNames(descriptor.fields)
	return name === undefined ? NESTED_FIELD : { kind: 'named', name }
}

function causeOf(descriptor: VariantDescriptor, values: FieldValues): ErrorOptions | undefined {
	return descriptor.nested ? { cause: fieldValue(values, nestedField(descriptor)) } : undefined
}

/**
 * One materialized variant. Its `message` is the rendered message template.
 */
export class VariantDiagnostic extends Error implements Diagnostic {
	readonly descriptor: VariantDescriptor
	readonly values: FieldValues
	private readonly defaultSpan: Span

	constructor(descriptor: VariantDescriptor, values: FieldValues, span?: Span) {
		super(renderTemplate(descriptor.message, values), causeOf(descriptor, values))
		this.name = descriptor.name
		this.descriptor = descriptor
		this.values = values
		this.defaultSpan = span ?? SimpleSpan.empty()
	}

	kind(): DiagnosticSeverity {
		return this.descriptor.severity
	}

	numericCode(): string {
		return this.descriptor.numericCode
	}

	code(): string {
		return this.descriptor.code
	}

	/**
	 * The value of the span field when it holds a {@link Span}, otherwise the
	 * span given at construction, otherwise an empty span.
	 */
	primarySpan(): Span {
		const rule = this.descriptor.spanRule
		if (rule.kind === 'field') {
			const value = fieldValue(this.values, rule.field)
			if (isSpan(value)) return value
		}
		return this.defaultSpan
	}

	primaryMessage(): string {
		return this.message
	}

	primaryLabel(): string {
		return renderTemplate(this.descriptor.label, this.values)
	}

	/** The wrapped diagnostic of a nested variant. */
	inner(): Diagnostic | null {
		if (!this.descriptor.nested) return null
		const value = fieldValue(this.values, nestedField(this.descriptor))
		return isDiagnostic(value) ? value : null
	}
}

function checkValues(descriptor: VariantDescriptor, values: FieldValues): void {
	const shape = descriptor.fields
	const name = descriptor.name

	switch (shape.kind) {
		case 'unit':
			if (Array.isArray(values) ? values.length > 0 : Object.keys(values).length > 0) {
				throw new TypeError(`\`${name}\` has no fields`)
			}
			break
		case 'positional':
			if (!Array.isArray(values) || values.length !== shape.fields.length) {
				throw new TypeError(`\`${name}\` expects an array of ${shape.fields.length} value(s)`)
			}
			break
		case 'named': {
			if (Array.isArray(values)) {
				throw new TypeError(`\`${name}\` expects an object of named fields`)
			}
			const missing = shape.fields.find((field) => !Object.hasOwn(values, field.name))
			if (missing !== undefined) {
				throw new TypeError(`\`${name}\` is missing field \`${missing.name}\``)
			}
			break
		}
	}

	if (descriptor.nested) {
		const inner = fieldValue(values, nestedField(descriptor))
		if (!isDiagnostic(inner)) {
			throw new TypeError(`\`${name}\` wraps a diagnostic, got ${typeof inner}`)
		}
	}
}

/**
 * Bind a descriptor to field values.
 *
 * @param span - Location used when the variant has no span field, or its
 *   span field holds no {@link Span}
 * @throws {TypeError} If the values do not match the variant's fields
 */
export function materialize(
	descriptor: VariantDescriptor,
	values: FieldValues = [],
	span?: Span
): VariantDiagnostic {
	checkValues(descriptor, values)
	return new VariantDiagnostic(descriptor, values, span)
}

export interface DiagnosticFactory {
	readonly variants: ReadonlyMap<string, VariantDescriptor>
	/**
	 * @throws {TypeError} On an unknown variant name or mismatched values
	 */
	create(name: string, values?: FieldValues, span?: Span): VariantDiagnostic
}

/**
 * Index compiled descriptors by variant name.
 */
export function defineTaxonomy(result: {
	readonly descriptors: readonly VariantDescriptor[]
}): DiagnosticFactory {
	const variants = new Map(
		result.descriptors.map((descriptor): [string, VariantDescriptor] => [descriptor.name, descriptor])
	)

	return {
		create(name, values, span) {
			const descriptor = variants.get(name)
			if (descriptor === undefined) {
				throw new TypeError(`Unknown variant \`${name}\``)
			}
			return materialize(descriptor, values, span)
		},
		variants,
	}
}
