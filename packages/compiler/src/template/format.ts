export const Alignment = {
	Center: 'center',
	Left: 'left',
	Right: 'right',
} as const

export type Alignment = (typeof Alignment)[keyof typeof Alignment]

/**
 * Parsed placeholder suffix: `[[fill]align][0][width][?]`.
 */
export interface FormatSpec {
	readonly fill: string
	readonly align: Alignment | null
	readonly width: number
	readonly debug: boolean
	/** `0` flag: numbers keep their sign ahead of the zeros */
	readonly zeroPad: boolean
}

export const DEFAULT_FORMAT: FormatSpec = {
	align: null,
	debug: false,
	fill: ' ',
	width: 0,
	zeroPad: false,
}

const ALIGN_CHARS: Readonly<Record<string, Alignment>> = {
	'<': Alignment.Left,
	'>': Alignment.Right,
	'^': Alignment.Center,
}

const FORMAT_SPEC = /^(?:(.)?([<>^]))?(0)?(\d+)?(\?)?$/u

/**
 * Parse the text after `:` in a placeholder.
 *
 * @returns The spec, or null when the text is not a supported suffix
 */
export function parseFormatSpec(text: string): FormatSpec | null {
	const match = FORMAT_SPEC.exec(text)
	if (match === null) return null

	const [, fill, alignChar, zero, width, debug] = match
	const explicitAlign = alignChar === undefined ? null : (ALIGN_CHARS[alignChar] ?? null)
	const zeroFill = zero !== undefined

	return {
		align: zeroFill ? (explicitAlign ?? Alignment.Right) : explicitAlign,
		debug: debug !== undefined,
		fill: zeroFill ? '0' : (fill ?? ' '),
		width: width === undefined ? 0 : Number.parseInt(width, 10),
		zeroPad: zeroFill,
	}
}

/**
 * Pad `text` to the spec's width. Without an explicit alignment numbers
 * align right and everything else left.
 */
export function applyFormat(text: string, spec: FormatSpec, numeric: boolean): string {
	const length = [...text].length
	if (length >= spec.width) return text

	const padding = spec.width - length
	if (spec.zeroPad && numeric) {
		const sign = text.startsWith('-') || text.startsWith('+') ? text.charAt(0) : ''
		return sign + '0'.repeat(padding) + text.slice(sign.length)
	}

	const align = spec.align ?? (numeric ? Alignment.Right : Alignment.Left)

	switch (align) {
		case Alignment.Left:
			return text + spec.fill.repeat(padding)
		case Alignment.Right:
			return spec.fill.repeat(padding) + text
		case Alignment.Center: {
			const before = Math.floor(padding / 2)
			return spec.fill.repeat(before) + text + spec.fill.repeat(padding - before)
		}
	}
}
