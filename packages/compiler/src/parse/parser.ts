import type { FailedMatchResult, Node, Semantics } from 'ohm-js'
import type { CompilationContext } from '../core/context.ts'
import { ParseError } from '../core/errors.ts'
import type {
	AttrLiteral,
	ErrorTree,
	FieldRef,
	FieldShape,
	NamedFieldDecl,
	PositionalFieldDecl,
	RawAttr,
	Taxonomy,
} from '../core/nodes.ts'
import type { SourceSpan } from '../core/span.ts'
import { FaultlineGrammar } from '../grammar/index.ts'
import { unescapeString } from './literals.ts'

interface ParsedField {
	attrs: RawAttr[]
	name: string
	span: SourceSpan
	type: string
}

interface SpanMarker {
	field: FieldRef
	span: SourceSpan
}

interface ParsedFields {
	shape: FieldShape
	spanMarkers: SpanMarker[]
}

interface LeafParts {
	fields: FieldShape
	name: string
	span: SourceSpan
	spanField: FieldRef | null
}

interface GroupParts {
	children: ErrorTree[]
	span: SourceSpan
}

function intervalOf(node: Node): SourceSpan {
	return { end: node.source.endIdx, start: node.source.startIdx }
}

/** Field types end wherever the next separator starts; drop trailing blanks. */
function typeTextOf(node: Node): { span: SourceSpan; text: string } {
	const text = node.sourceString.trimEnd()
	const start = node.source.startIdx
	return { span: { end: start + text.length, start }, text }
}

function collectAttrs(attributes: Node): RawAttr[] {
	return attributes.children.flatMap((attribute: Node): RawAttr[] => attribute['toAttrs']())
}

/**
 * Only `#[span]` is valid on a field.
 */
function spanMarkersOf(
	attrs: readonly RawAttr[],
	field: FieldRef,
	context: CompilationContext
): SpanMarker[] {
	return attrs.map((attr) => {
		if (attr.key !== 'span' || attr.value !== null) {
			throw context.fail(ParseError, 'FLPARSE003', attr.span, { key: attr.key })
		}
		return { field, span: attr.span }
	})
}

function describeFailure(matchResult: FailedMatchResult): string {
	return matchResult.shortMessage.replace(/^Line \d+, col \d+: /, '')
}

function createTreeSemantics(context: CompilationContext): Semantics {
	const semantics = FaultlineGrammar.createSemantics()

	semantics.addOperation<AttrLiteral>('toLiteral', {
		integerLiteral(_digits: Node): AttrLiteral {
			return { span: intervalOf(this), type: 'integer', value: this.sourceString }
		},
		literal(inner: Node): AttrLiteral {
			return inner['toLiteral']()
		},
		stringLiteral(_open: Node, chars: Node, _close: Node): AttrLiteral {
			const bodyStart = this.source.startIdx + 1
			return {
				span: intervalOf(this),
				type: 'string',
				value: unescapeString(chars.sourceString, bodyStart, context),
			}
		},
	})

	semantics.addOperation<RawAttr>('toEntry', {
		AttributeEntry_flag(key: Node): RawAttr {
			return { key: key.sourceString, span: intervalOf(this), value: null }
		},
		AttributeEntry_pair(key: Node, _equals: Node, value: Node): RawAttr {
			return { key: key.sourceString, span: intervalOf(this), value: value['toLiteral']() }
		},
	})

	semantics.addOperation<RawAttr[]>('toAttrs', {
		Attribute(_hash: Node, _open: Node, entries: Node, _close: Node): RawAttr[] {
			return entries.asIteration().children.map((entry: Node): RawAttr => entry['toEntry']())
		},
	})

	semantics.addOperation<ParsedField>('toField', {
		NamedField(attrs: Node, name: Node, _colon: Node, type: Node): ParsedField {
			return {
				attrs: collectAttrs(attrs),
				name: name.sourceString,
				span: intervalOf(name),
				type: typeTextOf(type).text,
			}
		},
		PositionalField(attrs: Node, type: Node): ParsedField {
			const { span, text } = typeTextOf(type)
			return { attrs: collectAttrs(attrs), name: '', span, type: text }
		},
	})

	semantics.addOperation<ParsedFields>('toFields', {
		Fields_named(_open: Node, list: Node, _trailing: Node, _close: Node): ParsedFields {
			const fields: NamedFieldDecl[] = []
			const spanMarkers: SpanMarker[] = []
			for (const node of list.asIteration().children) {
				const field: ParsedField = node['toField']()
				const ref: FieldRef = { kind: 'named', name: field.name }
				spanMarkers.push(...spanMarkersOf(field.attrs, ref, context))
				fields.push({ name: field.name, span: field.span, type: field.type })
			}
			return { shape: { fields, kind: 'named' }, spanMarkers }
		},
		Fields_positional(_open: Node, list: Node, _trailing: Node, _close: Node): ParsedFields {
			const fields: PositionalFieldDecl[] = []
			const spanMarkers: SpanMarker[] = []
			for (const node of list.asIteration().children) {
				const field: ParsedField = node['toField']()
				const ref: FieldRef = { index: fields.length, kind: 'positional' }
				spanMarkers.push(...spanMarkersOf(field.attrs, ref, context))
				fields.push({ span: field.span, type: field.type })
			}
			return { shape: { fields, kind: 'positional' }, spanMarkers }
		},
	})

	semantics.addOperation<LeafParts>('toLeaf', {
		Leaf(ident: Node, optionalFields: Node): LeafParts {
			const name = ident.sourceString
			const fieldsNode = optionalFields.children[0]
			const parsed: ParsedFields =
				fieldsNode !== undefined
					? fieldsNode['toFields']()
					: { shape: { kind: 'unit' }, spanMarkers: [] }

			const [first, second] = parsed.spanMarkers
			if (second !== undefined) {
				throw context.fail(ParseError, 'FLPARSE002', second.span, { variant: name })
			}

			return { fields: parsed.shape, name, span: intervalOf(ident), spanField: first?.field ?? null }
		},
	})

	semantics.addOperation<GroupParts>('toGroup', {
		Group(open: Node, nodes: Node, _close: Node): GroupParts {
			return { children: nodes['toNodes'](), span: intervalOf(open) }
		},
	})

	semantics.addOperation<ErrorTree>('toNode', {
		Node(attrs: Node, body: Node): ErrorTree {
			const attributes = collectAttrs(attrs)
			const inner = body.child(0)
			if (inner.ctorName === 'Leaf') {
				const leaf: LeafParts = inner['toLeaf']()
				return { ...leaf, attrs: attributes, kind: 'leaf' }
			}
			const group: GroupParts = inner['toGroup']()
			return { ...group, attrs: attributes, kind: 'group' }
		},
	})

	semantics.addOperation<ErrorTree[]>('toNodes', {
		Nodes(list: Node, _trailing: Node): ErrorTree[] {
			return list.asIteration().children.map((node: Node): ErrorTree => node['toNode']())
		},
	})

	semantics.addOperation<Taxonomy>('toTaxonomy', {
		Taxonomy(
			attrs: Node,
			ident: Node,
			generics: Node,
			_open: Node,
			nodes: Node,
			_close: Node
		): Taxonomy {
			return {
				attrs: collectAttrs(attrs),
				generics: generics.children[0]?.sourceString ?? null,
				name: ident.sourceString,
				nameSpan: intervalOf(ident),
				roots: nodes['toNodes'](),
			}
		},
	})

	return semantics
}

/**
 * Parse taxonomy source into a tree.
 *
 * @throws {ParseError} On malformed syntax, a second span marker in one
 *   leaf, an invalid field attribute or an invalid escape sequence.
 *   Parsing stops at the first error.
 */
export function parse(context: CompilationContext): Taxonomy {
	const matchResult = FaultlineGrammar.match(context.source)

	if (matchResult.failed()) {
		const position = matchResult.getInterval().startIdx
		throw context.fail(
			ParseError,
			'FLPARSE001',
			{ end: position, start: position },
			{ detail: describeFailure(matchResult) }
		)
	}

	const taxonomy: Taxonomy = createTreeSemantics(context)(matchResult)['toTaxonomy']()
	return taxonomy
}

/**
 * Check whether source is syntactically a taxonomy, without building it.
 */
export function matchOnly(context: CompilationContext): boolean {
	return FaultlineGrammar.match(context.source).succeeded()
}
