import assert from 'node:assert'
import type { TaxonomyError } from '../src/core/errors.ts'

export function catchError(fn: () => unknown): unknown {
	try {
		fn()
	} catch (error) {
		return error
	}
	return assert.fail('expected an error to be thrown')
}

/**
 * Run `fn`, expecting it to throw an `ErrorType` with catalog code `code`.
 */
export function expectTaxonomyError<E extends TaxonomyError>(
	fn: () => unknown,
	ErrorType: abstract new (...args: never[]) => E,
	code: string
): E {
	const error = catchError(fn)
	assert.ok(error instanceof ErrorType, `expected ${ErrorType.name}, got ${String(error)}`)
	assert.strictEqual(error.code(), code)
	return error
}

/** Offsets of the `occurrence`-th match of `needle` in `source`. */
export function spanOf(source: string, needle: string, occurrence = 1): { end: number; start: number } {
	let start = -1
	for (let i = 0; i < occurrence; i++) {
		start = source.indexOf(needle, start + 1)
	}
	assert.ok(start >= 0, `\`${needle}\` not found`)
	return { end: start + needle.length, start }
}
