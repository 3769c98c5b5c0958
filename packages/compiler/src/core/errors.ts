/**
 * Fatal compile errors and non-fatal compile warnings.
 *
 * Both are catalog diagnostics: the definition supplies the code, severity,
 * message template and help text; the instance supplies the arguments and
 * the location in the taxonomy source.
 */

import {
	type DiagnosticArgs,
	type DiagnosticDef,
	type DiagnosticSeverity,
	interpolateMessage,
} from './diagnostics.ts'
import type { Diagnostic } from './facade.ts'
import type { SimpleSpan, SourceSpan } from './span.ts'

function numericPart(code: string): string {
	return code.replace(/^\D+/, '')
}

function suggestionFor(def: DiagnosticDef, args: DiagnosticArgs | undefined): string | undefined {
	return def.suggestion === undefined ? undefined : interpolateMessage(def.suggestion, args)
}

/**
 * Base class of every error the taxonomy compiler throws.
 */
export class TaxonomyError extends Error implements Diagnostic {
	readonly def: DiagnosticDef
	readonly args: DiagnosticArgs | undefined
	readonly location: SimpleSpan

	constructor(def: DiagnosticDef, location: SimpleSpan, args?: DiagnosticArgs) {
		super(interpolateMessage(def.message, args))
		this.name = 'TaxonomyError'
		this.def = def
		this.args = args
		this.location = location
	}

	/** Offsets of the offending declaration. */
	get span(): SourceSpan {
		return { end: this.location.end(), start: this.location.start() }
	}

	kind(): DiagnosticSeverity {
		return this.def.severity
	}

	numericCode(): string {
		return numericPart(this.def.code)
	}

	code(): string {
		return this.def.code
	}

	primarySpan(): SimpleSpan {
		return this.location
	}

	primaryMessage(): string {
		return this.message
	}

	primaryLabel(): string {
		return this.message
	}

	suggestion(): string | undefined {
		return suggestionFor(this.def, this.args)
	}
}

/** Malformed DSL syntax. */
export class ParseError extends TaxonomyError {
	constructor(def: DiagnosticDef, location: SimpleSpan, args?: DiagnosticArgs) {
		super(def, location, args)
		this.name = 'ParseError'
	}
}

/** Unknown attribute key, or a malformed value for a known key. */
export class AttributeError extends TaxonomyError {
	constructor(def: DiagnosticDef, location: SimpleSpan, args?: DiagnosticArgs) {
		super(def, location, args)
		this.name = 'AttributeError'
	}
}

/** Unresolvable or out-of-range placeholder, or malformed template text. */
export class TemplateError extends TaxonomyError {
	constructor(def: DiagnosticDef, location: SimpleSpan, args?: DiagnosticArgs) {
		super(def, location, args)
		this.name = 'TemplateError'
	}
}

/** A variant that cannot be emitted, e.g. one without a message. */
export class EmissionError extends TaxonomyError {
	constructor(def: DiagnosticDef, location: SimpleSpan, args?: DiagnosticArgs) {
		super(def, location, args)
		this.name = 'EmissionError'
	}
}

export type TaxonomyErrorClass<E extends TaxonomyError> = new (
	def: DiagnosticDef,
	location: SimpleSpan,
	args?: DiagnosticArgs
) => E

/**
 * A non-fatal finding reported alongside a successful compilation.
 */
export class CompileWarning implements Diagnostic {
	readonly def: DiagnosticDef
	readonly args: DiagnosticArgs | undefined
	readonly message: string
	readonly location: SimpleSpan

	constructor(def: DiagnosticDef, location: SimpleSpan, args?: DiagnosticArgs) {
		this.def = def
		this.args = args
		this.message = interpolateMessage(def.message, args)
		this.location = location
	}

	kind(): DiagnosticSeverity {
		return this.def.severity
	}

	numericCode(): string {
		return numericPart(this.def.code)
	}

	code(): string {
		return this.def.code
	}

	primarySpan(): SimpleSpan {
		return this.location
	}

	primaryMessage(): string {
		return this.message
	}

	primaryLabel(): string {
		return this.message
	}

	suggestion(): string | undefined {
		return suggestionFor(this.def, this.args)
	}
}
