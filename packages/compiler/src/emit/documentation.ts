/**
 * Documentation listing of a taxonomy: one markdown list item per node, in
 * declared order, indented by depth.
 *
 * ```
 * List of error variants:
 * - `E0`: file errors
 *   - `E01`(**FileNotFound**): File {path} not found.
 * ```
 */

export const DOCUMENTATION_HEADER = 'List of error variants:'

const INDENT = '  '

export interface DocEntry {
	/** Depth of the node; top-level nodes have depth 2 */
	readonly depth: number
	readonly code: string
	/** Variant name; null for groups */
	readonly name: string | null
	readonly summary: string | null
	readonly line: string
}

export function docLine(
	depth: number,
	code: string,
	name: string | null,
	summary: string | null
): string {
	const indent = INDENT.repeat(Math.max(0, depth - 2))
	const head = name === null ? `- \`${code}\`` : `- \`${code}\`(**${name}**)`
	return summary === null ? indent + head : `${indent}${head}: ${summary}`
}

export function docEntry(
	depth: number,
	code: string,
	name: string | null,
	summary: string | null
): DocEntry {
	return { code, depth, line: docLine(depth, code, name, summary), name, summary }
}

/** Doc comment of a single variant, e.g. ``"`E01`: File {path} not found."`` */
export function variantDoc(code: string, message: string): string {
	return `\`${code}\`: ${message}`
}

export function renderDocumentation(entries: readonly DocEntry[]): string {
	return [DOCUMENTATION_HEADER, ...entries.map((entry) => entry.line)].join('\n')
}
