/**
 * Core data structures for the Faultline compiler.
 */

export { CompilationContext } from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	SEVERITY_MARKERS,
} from './diagnostics.ts'
export {
	AttributeError,
	CompileWarning,
	EmissionError,
	ParseError,
	TaxonomyError,
	TemplateError,
} from './errors.ts'
export { type Diagnostic, isDiagnostic } from './facade.ts'
export { type Indexer, type LineColumn, LineIndexer, type OffsetRange } from './indexer.ts'
export {
	type AttrLiteral,
	type ErrorTree,
	type FieldRef,
	type FieldShape,
	fieldCount,
	fieldLabel,
	fieldNames,
	type GroupNode,
	type LeafNode,
	type NamedFieldDecl,
	type PositionalFieldDecl,
	type RawAttr,
	type Taxonomy,
} from './nodes.ts'
export { isSpan, SimpleSpan, type SourceSpan, SourceFile, type Span } from './span.ts'
