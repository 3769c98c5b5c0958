import {
	type EmitResult,
	formatCompilerDiagnostic,
	type ReportOptions,
	renderDocumentation,
	TaxonomyError,
} from '@faultline/compiler'
import {
	type DiagnosticDef,
	type DiagnosticArgs,
	FLCLI001,
	FLCLI002,
	FLCLI003,
	FLCLI004,
	FLCLI005,
	interpolateMessage,
} from '@faultline/diagnostics'

export type OutputFormat = 'doc' | 'json' | 'check'

const OUTPUT_FORMATS: readonly string[] = ['doc', 'json', 'check']

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function formatCatalogMessage(def: DiagnosticDef, args: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCatalogMessage(FLCLI001, { path: filePath })
	}
	return formatCatalogMessage(FLCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatCatalogMessage(FLCLI003, { reason: getErrorMessage(error) })
}

export function formatInvalidFormatError(format: string): string {
	return formatCatalogMessage(FLCLI004, { format })
}

/**
 * Render a compile failure. Taxonomy errors get a source excerpt; anything
 * else is reported as an unexpected failure.
 */
export function formatCompileError(error: unknown, options: ReportOptions = {}): string {
	if (error instanceof TaxonomyError) {
		return formatCompilerDiagnostic(error, options)
	}
	return formatCatalogMessage(FLCLI005, { reason: getErrorMessage(error) })
}

export function isValidFormat(value: string): value is OutputFormat {
	return OUTPUT_FORMATS.includes(value)
}

/**
 * Descriptors as plain JSON: templates by their source text, no spans.
 */
export function toJson(result: EmitResult): string {
	const variants = result.descriptors.map((descriptor) => ({
		code: descriptor.code,
		doc: descriptor.doc,
		fieldNames:
			descriptor.fields.kind === 'named' ? descriptor.fields.fields.map((field) => field.name) : null,
		fields: descriptor.fields.kind === 'unit' ? [] : descriptor.fields.fields.map((field) => field.type),
		label: descriptor.label.source,
		message: descriptor.message.source,
		name: descriptor.name,
		nested: descriptor.nested,
		numericCode: descriptor.numericCode,
		severity: descriptor.severity,
		spanRule: descriptor.spanRule,
	}))

	return JSON.stringify(
		{
			documentation: result.documentation.map((entry) => entry.line),
			generics: result.generics,
			name: result.name,
			variants,
		},
		null,
		2
	)
}

export function summarize(result: EmitResult): string {
	return `${result.name}: ${result.descriptors.length} variant(s), ${result.warnings.length} warning(s)`
}

export function renderOutput(result: EmitResult, format: OutputFormat): string {
	switch (format) {
		case 'doc':
			return renderDocumentation(result.documentation)
		case 'json':
			return toJson(result)
		case 'check':
			return summarize(result)
	}
}
