/**
 * Taxonomy compiler diagnostic definitions.
 *
 * Error code format: FL<PHASE><NUMBER>
 * - FLPARSE: Parser errors (001-099)
 * - FLATTR: Attribute resolution errors (001-099)
 * - FLTPL: Template errors (001-099)
 * - FLEMIT: Emission errors (001-049), warnings (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// PARSER ERRORS (FLPARSE001-099)
// =============================================================================

export const FLPARSE001: DiagnosticDef = {
	code: 'FLPARSE001',
	description: "Faultline couldn't understand this part of the taxonomy.",
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check for a missing comma, brace or closing quote.',
}

export const FLPARSE002: DiagnosticDef = {
	code: 'FLPARSE002',
	description: 'A variant can point at one source location only.',
	message: 'duplicate span marker in `{variant}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Keep `#[span]` on a single field of `{variant}`.',
}

export const FLPARSE003: DiagnosticDef = {
	code: 'FLPARSE003',
	description: 'Fields accept the `span` marker and nothing else.',
	message: 'unexpected field attribute `{key}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write `#[span]` on the field that carries the source location.',
}

export const FLPARSE004: DiagnosticDef = {
	code: 'FLPARSE004',
	description: 'String literals understand a fixed set of escape sequences.',
	message: 'invalid escape sequence `{sequence}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of \\" \\\\ \\n \\r \\t \\0 or \\u{{hex}}.',
}

// =============================================================================
// ATTRIBUTE ERRORS (FLATTR001-099)
// =============================================================================

export const FLATTR001: DiagnosticDef = {
	code: 'FLATTR001',
	description: 'Nodes accept the keys kind, number, msg, label and nested.',
	message: 'unknown attribute key `{key}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of `kind`, `number`, `msg`, `label` or `nested`.',
}

export const FLATTR002: DiagnosticDef = {
	code: 'FLATTR002',
	description: 'Severity decides the letter in front of every code below this node.',
	message: 'invalid kind "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Kind must be either `Error` or `Warn`.',
}

export const FLATTR003: DiagnosticDef = {
	code: 'FLATTR003',
	description: 'Number fragments are concatenated into the numeric code.',
	message: 'invalid number fragment "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write the fragment as digits only, for example `#[number = "01"]`.',
}

export const FLATTR004: DiagnosticDef = {
	code: 'FLATTR004',
	description: 'Each attribute key expects a particular kind of value.',
	message: 'attribute `{key}` expects {expected}',
	severity: DiagnosticSeverity.Error,
}

export const FLATTR005: DiagnosticDef = {
	code: 'FLATTR005',
	description: 'A nested variant wraps exactly one inner diagnostic.',
	message: 'nested variant `{variant}` must have exactly one field, found {count}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Give `{variant}` a single field holding the inner diagnostic.',
}

// =============================================================================
// TEMPLATE ERRORS (FLTPL001-099)
// =============================================================================

export const FLTPL001: DiagnosticDef = {
	code: 'FLTPL001',
	description: 'Named placeholders must refer to a field declared on the variant.',
	message: 'unknown field `{name}` in template for `{variant}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declared fields: {fields}.',
}

export const FLTPL002: DiagnosticDef = {
	code: 'FLTPL002',
	description: 'Positional placeholders count from zero over the positional fields.',
	message: 'placeholder index {index} is out of range for `{variant}` with {count} positional field(s)',
	severity: DiagnosticSeverity.Error,
}

export const FLTPL003: DiagnosticDef = {
	code: 'FLTPL003',
	description: 'Braces in templates open and close placeholders.',
	message: 'unmatched `{brace}` at offset {offset}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write `{{{{` or `}}}}` for a literal brace.',
}

export const FLTPL004: DiagnosticDef = {
	code: 'FLTPL004',
	description: 'A placeholder holds a field index, a field name, or nothing.',
	message: 'invalid placeholder `{text}`',
	severity: DiagnosticSeverity.Error,
}

export const FLTPL005: DiagnosticDef = {
	code: 'FLTPL005',
	description: 'Format suffixes support fill, alignment, width and `?`.',
	message: 'unsupported format spec `{spec}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a suffix such as `:?`, `:>8` or `:*^10`.',
}

// =============================================================================
// EMISSION ERRORS (FLEMIT001-049)
// =============================================================================

export const FLEMIT001: DiagnosticDef = {
	code: 'FLEMIT001',
	description: 'Every variant needs a message, declared on itself or on an enclosing group.',
	message: 'missing message for `{variant}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Consider adding `#[msg = "..."]` to `{variant}`.',
}

export const FLEMIT002: DiagnosticDef = {
	code: 'FLEMIT002',
	description: 'Variant names identify variants at runtime.',
	message: 'duplicate variant `{variant}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename one of the `{variant}` variants.',
}

export const FLEMIT003: DiagnosticDef = {
	code: 'FLEMIT003',
	description: 'Codes must be unique when duplicate codes are denied.',
	message: 'code `{code}` of `{variant}` is already used by `{other}`',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Change a `number` fragment on one of the two paths.',
}

// =============================================================================
// EMISSION WARNINGS (FLEMIT050-099)
// =============================================================================

export const FLEMIT050: DiagnosticDef = {
	code: 'FLEMIT050',
	description: 'Two variants compile to the same code and cannot be told apart by it.',
	message: 'code `{code}` of `{variant}` is already used by `{other}`',
	severity: DiagnosticSeverity.Warn,
	suggestion: 'Change a `number` fragment on one of the two paths.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Attribute errors
	FLATTR001,
	FLATTR002,
	FLATTR003,
	FLATTR004,
	FLATTR005,
	// Emission errors
	FLEMIT001,
	FLEMIT002,
	FLEMIT003,
	// Emission warnings
	FLEMIT050,
	// Parser errors
	FLPARSE001,
	FLPARSE002,
	FLPARSE003,
	FLPARSE004,
	// Template errors
	FLTPL001,
	FLTPL002,
	FLTPL003,
	FLTPL004,
	FLTPL005,
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
