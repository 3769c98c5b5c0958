import { DiagnosticSeverity } from '../core/diagnostics.ts'
import type { CompileWarning, TaxonomyError } from '../core/errors.ts'
import type { Diagnostic } from '../core/facade.ts'
import type { Span } from '../core/span.ts'

export interface ReportOptions {
	/** Lines of source shown above the primary span (default 0) */
	readonly contextLinesBefore?: number
	/** Lines of source shown below the primary span (default 0) */
	readonly contextLinesAfter?: number
	/** Help text printed under the excerpt */
	readonly suggestion?: string
}

interface ExcerptLine {
	readonly number: number
	readonly text: string
	/** Carets under the spanned columns, if the line is spanned */
	readonly marker: string | null
}

const SEVERITY_LABELS: Readonly<Record<DiagnosticSeverity, string>> = {
	[DiagnosticSeverity.Error]: 'error',
	[DiagnosticSeverity.Warn]: 'warning',
}

const LINE_BREAK = /(?:\r\n|\n|\r)$/

function hasSource(span: Span): boolean {
	return span.uri() !== '' || span.sourceText() !== ''
}

/**
 * Offset used to find the span's line. A span at the very end of a text
 * with no final newline belongs to the last line, not the empty one after it.
 */
function anchorOf(span: Span): number {
	const start = span.start()
	const text = span.sourceText()
	return start > 0 && start === text.length && !LINE_BREAK.test(text) ? start - 1 : start
}

/**
 * Lines covered by the span plus context. An empty span marks one column.
 */
function buildExcerpt(span: Span, before: number, after: number): ExcerptLine[] {
	const source = span.sourceText()
	const index = span.sourceIndex()
	const start = span.start()
	const end = Math.max(span.end(), start)
	const markEnd = end > start ? end : start + 1
	const [from, to] = index.spanWithContextLines(anchorOf(span), end, before, after)

	const lines: ExcerptLine[] = []
	let position = from
	for (;;) {
		const [lineStart, lineEnd] = index.lineSpanAt(position)
		const text = source.slice(lineStart, lineEnd).replace(LINE_BREAK, '')
		const contentEnd = lineStart + text.length

		let marker: string | null = null
		if (start <= contentEnd && markEnd > lineStart) {
			const caretFrom = Math.max(start, lineStart)
			const caretTo = Math.min(markEnd, contentEnd)
			marker = ' '.repeat(caretFrom - lineStart) + '^'.repeat(Math.max(1, caretTo - caretFrom))
		}

		lines.push({ marker, number: index.lineColAt(lineStart).line + 1, text })
		if (lineEnd <= lineStart || lineEnd >= to) break
		position = lineEnd
	}
	return lines
}

/**
 * Format a diagnostic for display.
 *
 * Example:
 * ```
 * error[E01]: File a.txt not found.
 *   --> input.txt:1:5
 *    |
 *  1 | cat a.txt
 *    |     ^^^^^ File a.txt not found.
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic, options: ReportOptions = {}): string {
	const header = `${SEVERITY_LABELS[diagnostic.kind()]}[${diagnostic.code()}]: ${diagnostic.primaryMessage()}`
	const span = diagnostic.primarySpan()

	if (!hasSource(span)) {
		return options.suggestion === undefined ? header : `${header}\n   = help: ${options.suggestion}`
	}

	const anchor = anchorOf(span)
	const { column, line } = span.sourceIndex().lineColAt(anchor)
	const location = `  --> ${span.uri()}:${line + 1}:${column + span.start() - anchor + 1}`

	const excerpt = buildExcerpt(span, options.contextLinesBefore ?? 0, options.contextLinesAfter ?? 0)
	const width = Math.max(...excerpt.map((entry) => String(entry.number).length))
	const pad = ' '.repeat(width)
	const emptyPrefix = ` ${pad} |`

	const label = diagnostic.primaryLabel()
	const lastMarked = excerpt.reduce(
		(last, entry, position) => (entry.marker === null ? last : position),
		-1
	)

	const lines = [header, location, emptyPrefix]
	excerpt.forEach((entry, position) => {
		const number = String(entry.number).padStart(width)
		lines.push(entry.text === '' ? ` ${number} |` : ` ${number} | ${entry.text}`)
		if (entry.marker === null) return
		const withLabel = position === lastMarked && label !== '' ? `${entry.marker} ${label}` : entry.marker
		lines.push(`${emptyPrefix} ${withLabel}`)
	})

	if (options.suggestion !== undefined) {
		lines.push(emptyPrefix, ` ${pad} = help: ${options.suggestion}`)
	}

	return lines.join('\n')
}

/**
 * Format one of Faultline's own diagnostics, with its catalog help text.
 */
export function formatCompilerDiagnostic(
	diagnostic: TaxonomyError | CompileWarning,
	options: ReportOptions = {}
): string {
	const suggestion = options.suggestion ?? diagnostic.suggestion()
	return formatDiagnostic(diagnostic, suggestion === undefined ? options : { ...options, suggestion })
}
