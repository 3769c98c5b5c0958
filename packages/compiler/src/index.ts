/**
 * Faultline Compiler Public API
 *
 * Pipeline:
 * - Parse taxonomy source into a tree (ohm-js grammar)
 * - Walk the tree, resolving inherited attributes per node
 * - Compile message and label templates against each variant's fields
 * - Emit one descriptor per variant, plus a documentation listing
 */

import { CompilationContext } from './core/context.ts'
import { type EmitResult, emit } from './emit/emitter.ts'
import { parse } from './parse/parser.ts'

export {
	AttributeError,
	CompilationContext,
	CompileWarning,
	type Diagnostic,
	DiagnosticSeverity,
	EmissionError,
	type ErrorTree,
	type FieldRef,
	type FieldShape,
	type GroupNode,
	type Indexer,
	isDiagnostic,
	isSpan,
	type LeafNode,
	type LineColumn,
	LineIndexer,
	type OffsetRange,
	ParseError,
	type RawAttr,
	SimpleSpan,
	SourceFile,
	type SourceSpan,
	type Span,
	type Taxonomy,
	TaxonomyError,
	TemplateError,
} from './core/index.ts'
export {
	DOCUMENTATION_HEADER,
	type DocEntry,
	renderDocumentation,
} from './emit/documentation.ts'
export {
	type EmitOptions,
	type EmitResult,
	emit,
	type SpanRule,
	type VariantDescriptor,
} from './emit/emitter.ts'
export { matchOnly, parse } from './parse/parser.ts'
export { type Config, resolveConfig, rootConfig, type TemplateSource } from './resolve/config.ts'
export { type LeafVisit, leaves, type NodeVisit, walkTaxonomy } from './resolve/walker.ts'
export {
	type DiagnosticFactory,
	defineTaxonomy,
	materialize,
	VariantDiagnostic,
} from './runtime/diagnostic.ts'
export { formatCompilerDiagnostic, formatDiagnostic, type ReportOptions } from './runtime/report.ts'
export {
	type CompiledTemplate,
	compileTemplate,
	type FieldSegment,
	type Segment,
	type TextSegment,
} from './template/compiler.ts'
export { Alignment, type FormatSpec, parseFormatSpec } from './template/format.ts'
export { type FieldValues, renderTemplate } from './template/render.ts'

/**
 * Options for the compile function.
 */
export interface CompileOptions {
	/** Path to the source file (for error messages) */
	filename?: string
	/** Fail instead of warning when two variants share a code */
	denyDuplicateCodes?: boolean
}

/**
 * Compile a Faultline taxonomy into variant descriptors.
 *
 * This is the main entry point for compilation. It chains all phases:
 * 1. Parsing (source → taxonomy tree)
 * 2. Resolution (tree → per-node configs, lazily)
 * 3. Emission (configs → descriptors, templates compiled on the way)
 *
 * @param source - Taxonomy source
 * @param options - Compilation options
 * @returns Descriptors, documentation listing and warnings
 * @throws {TaxonomyError} On the first error in declaration order
 */
export function compile(source: string, options: CompileOptions = {}): EmitResult {
	const context = new CompilationContext(source, options.filename)
	const taxonomy = parse(context)
	return emit(taxonomy, context, { denyDuplicateCodes: options.denyDuplicateCodes ?? false })
}
