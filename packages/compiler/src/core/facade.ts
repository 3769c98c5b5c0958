import type { DiagnosticSeverity } from './diagnostics.ts'
import type { Span } from './span.ts'

/**
 * What every diagnostic answers, whether it comes from a compiled taxonomy
 * or from the compiler itself. Renderers depend on this and nothing else.
 */
export interface Diagnostic {
	kind(): DiagnosticSeverity
	/** Code without its severity marker, e.g. `01`. */
	numericCode(): string
	/** Display code, e.g. `E01`. */
	code(): string
	primarySpan(): Span
	primaryMessage(): string
	primaryLabel(): string
}

export function isDiagnostic(value: unknown): value is Diagnostic {
	if (typeof value !== 'object' || value === null) return false
	return ['kind', 'numericCode', 'code', 'primarySpan', 'primaryMessage', 'primaryLabel'].every(
		(method) => typeof Reflect.get(value, method) === 'function'
	)
}
