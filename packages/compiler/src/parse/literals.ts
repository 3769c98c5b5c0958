import type { CompilationContext } from '../core/context.ts'
import { ParseError } from '../core/errors.ts'

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
	'"': '"',
	"'": "'",
	'0': '\0',
	'\\': '\\',
	n: '\n',
	r: '\r',
	t: '\t',
}

const UNICODE_ESCAPE = /^u\{([0-9a-fA-F]{1,6})\}/

/**
 * Decode the body of a string literal.
 *
 * @param raw - Text between the quotes, escapes still in place
 * @param offset - Source offset of `raw`, for error locations
 */
export function unescapeString(raw: string, offset: number, context: CompilationContext): string {
	let result = ''
	let pos = 0

	while (pos < raw.length) {
		const char = raw.charAt(pos)
		if (char !== '\\') {
			result += char
			pos++
			continue
		}

		const next = raw.charAt(pos + 1)
		const simple = SIMPLE_ESCAPES[next]
		if (simple !== undefined) {
			result += simple
			pos += 2
			continue
		}

		const unicode = UNICODE_ESCAPE.exec(raw.slice(pos + 1))
		const digits = unicode?.[1]
		if (unicode !== null && digits !== undefined) {
			const codePoint = Number.parseInt(digits, 16)
			if (codePoint <= 0x10ffff) {
				result += String.fromCodePoint(codePoint)
				pos += 1 + unicode[0].length
				continue
			}
		}

		const sequence = unicode !== null ? `\\${unicode[0]}` : `\\${next}`
		throw context.fail(
			ParseError,
			'FLPARSE004',
			{ end: offset + pos + sequence.length, start: offset + pos },
			{ sequence }
		)
	}

	return result
}
