/**
 * CLI diagnostic definitions.
 *
 * Error code format: FLCLI<NUMBER>
 * - FLCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (FLCLI001-099)
// =============================================================================

export const FLCLI001: DiagnosticDef = {
	code: 'FLCLI001',
	description: "Faultline couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const FLCLI002: DiagnosticDef = {
	code: 'FLCLI002',
	description: "The file exists but Faultline can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const FLCLI003: DiagnosticDef = {
	code: 'FLCLI003',
	description: "Faultline couldn't save the output file.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const FLCLI004: DiagnosticDef = {
	code: 'FLCLI004',
	description: "Faultline doesn't recognize this output format.",
	message: 'unknown format "{format}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--format doc`, `--format json` or `--format check`.',
}

export const FLCLI005: DiagnosticDef = {
	code: 'FLCLI005',
	description: 'Something unexpected went wrong during compilation.',
	message: 'compilation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your taxonomy file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	FLCLI001,
	FLCLI002,
	FLCLI003,
	FLCLI004,
	FLCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
