/**
 * Taxonomy tree produced by the parser.
 *
 * Groups contribute inherited attributes; leaves are the concrete error
 * variants. Children keep their declared order, which decides both code
 * concatenation and documentation order.
 */

import type { SourceSpan } from './span.ts'

/** A literal attribute value, kept as written. */
export type AttrLiteral =
	| { readonly type: 'string'; readonly value: string; readonly span: SourceSpan }
	| { readonly type: 'integer'; readonly value: string; readonly span: SourceSpan }

/**
 * One `key = value` or bare `key` entry of an attribute, uninterpreted.
 */
export interface RawAttr {
	readonly key: string
	readonly value: AttrLiteral | null
	readonly span: SourceSpan
}

/** A reference to one field of a variant. */
export type FieldRef =
	| { readonly kind: 'named'; readonly name: string }
	| { readonly kind: 'positional'; readonly index: number }

export interface NamedFieldDecl {
	readonly name: string
	/** Field type as written; opaque to the compiler. */
	readonly type: string
	readonly span: SourceSpan
}

export interface PositionalFieldDecl {
	readonly type: string
	readonly span: SourceSpan
}

export type FieldShape =
	| { readonly kind: 'named'; readonly fields: readonly NamedFieldDecl[] }
	| { readonly kind: 'positional'; readonly fields: readonly PositionalFieldDecl[] }
	| { readonly kind: 'unit' }

export interface GroupNode {
	readonly kind: 'group'
	/** Opening brace of the group */
	readonly span: SourceSpan
	readonly attrs: readonly RawAttr[]
	readonly children: readonly ErrorTree[]
}

export interface LeafNode {
	readonly kind: 'leaf'
	/** Identifier of the variant */
	readonly span: SourceSpan
	readonly attrs: readonly RawAttr[]
	readonly name: string
	readonly fields: FieldShape
	/** Field marked `#[span]`, if any */
	readonly spanField: FieldRef | null
}

export type ErrorTree = GroupNode | LeafNode

/**
 * The top-level named taxonomy and its root attributes.
 */
export interface Taxonomy {
	readonly name: string
	readonly nameSpan: SourceSpan
	/** Generic parameter list as written, e.g. `<S>` */
	readonly generics: string | null
	readonly attrs: readonly RawAttr[]
	readonly roots: readonly ErrorTree[]
}

export function fieldCount(shape: FieldShape): number {
	return shape.kind === 'unit' ? 0 : shape.fields.length
}

export function fieldNames(shape: FieldShape): string[] {
	return shape.kind === 'named' ? shape.fields.map((field) => field.name) : []
}

/** Display name of a field: its name, or its index for positional fields. */
export function fieldLabel(ref: FieldRef): string {
	return ref.kind === 'named' ? ref.name : String(ref.index)
}
