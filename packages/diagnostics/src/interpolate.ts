import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{\{|\}\}|\{(\w+)\}/g

/**
 * Interpolate template arguments into a catalog message.
 *
 * `{key}` is replaced by `args[key]`; unknown keys are left in place.
 * `{{` and `}}` stand for literal braces, so catalog text can talk about
 * template syntax without being substituted itself.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	return message.replace(PLACEHOLDER, (match: string, key: string | undefined) => {
		if (key === undefined) return match === '{{' ? '{' : '}'
		const value = args?.[key]
		return value !== undefined ? String(value) : `{${key}}`
	})
}
