/**
 * Compilation context shared by every phase.
 * Holds the source file and collects warnings; errors are built here and
 * thrown by the phase that finds them.
 */

import { type DiagnosticArgs, type DiagnosticCode, getDiagnostic } from './diagnostics.ts'
import { CompileWarning, type TaxonomyError, type TaxonomyErrorClass } from './errors.ts'
import { type SimpleSpan, SourceFile, type SourceSpan } from './span.ts'

/**
 * The unified compilation context.
 *
 * Design principles:
 * - Fail fast: the first error ends compilation, no recovery
 * - Warnings are collected and returned with the result
 * - Every diagnostic points back into the taxonomy source
 */
export class CompilationContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Source file shared by every span of this compilation */
	readonly file: SourceFile

	/** Collected warnings */
	private readonly warnings: CompileWarning[] = []

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.file = new SourceFile(filename, source)
	}

	/** Resolve offsets into a span that knows its file. */
	spanOf(span: SourceSpan): SimpleSpan {
		return this.file.span(span.start, span.end)
	}

	/**
	 * Build the error for `code` at `span`. Callers throw the result:
	 *
	 * ```ts
	 * throw context.fail(ParseError, 'FLPARSE001', span, { detail })
	 * ```
	 */
	fail<E extends TaxonomyError>(
		ErrorType: TaxonomyErrorClass<E>,
		code: DiagnosticCode,
		span: SourceSpan,
		args?: DiagnosticArgs
	): E {
		return new ErrorType(getDiagnostic(code), this.spanOf(span), args)
	}

	/** Record a warning for `code` at `span`. */
	warn(code: DiagnosticCode, span: SourceSpan, args?: DiagnosticArgs): void {
		this.warnings.push(new CompileWarning(getDiagnostic(code), this.spanOf(span), args))
	}

	getWarnings(): readonly CompileWarning[] {
		return this.warnings
	}
}
