/**
 * Diagnostic severity levels.
 *
 * Shared by Faultline's own catalog and by compiled taxonomies.
 */
export const DiagnosticSeverity = {
	Error: 'Error',
	Warn: 'Warn',
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Single-letter marker that prefixes a numeric code (`E01`, `W00`).
 */
export const SEVERITY_MARKERS: Readonly<Record<DiagnosticSeverity, string>> = {
	[DiagnosticSeverity.Error]: 'E',
	[DiagnosticSeverity.Warn]: 'W',
}

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
