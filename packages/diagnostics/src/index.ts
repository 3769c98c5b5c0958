/**
 * @faultline/diagnostics
 *
 * Shared diagnostic types and definitions for Faultline packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	FLCLI001,
	FLCLI002,
	FLCLI003,
	FLCLI004,
	FLCLI005,
} from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	FLATTR001,
	FLATTR002,
	FLATTR003,
	FLATTR004,
	FLATTR005,
	FLEMIT001,
	FLEMIT002,
	FLEMIT003,
	FLEMIT050,
	FLPARSE001,
	FLPARSE002,
	FLPARSE003,
	FLPARSE004,
	FLTPL001,
	FLTPL002,
	FLTPL003,
	FLTPL004,
	FLTPL005,
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	SEVERITY_MARKERS,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
