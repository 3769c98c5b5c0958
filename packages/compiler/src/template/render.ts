import { inspect } from 'node:util'
import { isDiagnostic } from '../core/facade.ts'
import { type FieldRef, fieldLabel } from '../core/nodes.ts'
import type { CompiledTemplate } from './compiler.ts'
import { applyFormat } from './format.ts'

/**
 * Field values of one variant instance: an object keyed by field name, or an
 * array in field order for positional variants.
 */
export type FieldValues = Readonly<Record<string, unknown>> | readonly unknown[]

function fieldKey(field: FieldRef): string | number {
	return field.kind === 'named' ? field.name : field.index
}

/** Own properties only; inherited members such as `toString` are not field values. */
export function hasFieldValue(values: FieldValues, field: FieldRef): boolean {
	return Object.hasOwn(values, fieldKey(field))
}

export function fieldValue(values: FieldValues, field: FieldRef): unknown {
	const key = fieldKey(field)
	if (!Object.hasOwn(values, key)) return undefined
	const value: unknown = Reflect.get(values, key)
	return value
}

/**
 * Display form of a value. Nested diagnostics show their own message; `?`
 * selects the debug form, which quotes strings.
 */
export function displayValue(value: unknown, debug: boolean): string {
	if (isDiagnostic(value)) return value.primaryMessage()
	if (debug) return typeof value === 'string' ? JSON.stringify(value) : inspect(value)
	if (value instanceof Error) return value.message
	if (typeof value === 'object' && value !== null) return inspect(value)
	return String(value)
}

/**
 * Substitute field values into a compiled template.
 *
 * @throws {TypeError} If a referenced field has no value
 */
export function renderTemplate(template: CompiledTemplate, values: FieldValues): string {
	let result = ''
	for (const segment of template.segments) {
		if (segment.kind === 'text') {
			result += segment.text
			continue
		}
		if (!hasFieldValue(values, segment.field)) {
			throw new TypeError(`Missing value for field \`${fieldLabel(segment.field)}\``)
		}
		const value = fieldValue(values, segment.field)
		const numeric = typeof value === 'number' || typeof value === 'bigint'
		result += applyFormat(displayValue(value, segment.format.debug), segment.format, numeric)
	}
	return result
}
