import type { CompilationContext } from '../core/context.ts'
import type { ErrorTree, LeafNode, Taxonomy } from '../core/nodes.ts'
import { type Config, resolveConfig, rootConfig } from './config.ts'

export interface NodeVisit {
	readonly node: ErrorTree
	readonly config: Config
}

export interface LeafVisit {
	readonly node: LeafNode
	readonly config: Config
}

interface Frame {
	readonly nodes: readonly ErrorTree[]
	readonly config: Config
	cursor: number
}

/**
 * Visit every node of the taxonomy in declared order, depth first, each with
 * its resolved config.
 *
 * The walk keeps its own stack of frames, so nesting depth is not limited by
 * the call stack. Resolution errors are thrown from the visit that finds
 * them and end the walk.
 */
export function* walkTaxonomy(
	taxonomy: Taxonomy,
	context: CompilationContext
): Generator<NodeVisit, void, undefined> {
	const stack: Frame[] = [{ config: rootConfig(taxonomy, context), cursor: 0, nodes: taxonomy.roots }]

	while (stack.length > 0) {
		const frame = stack[stack.length - 1]
		if (frame === undefined) break

		const node = frame.nodes[frame.cursor]
		if (node === undefined) {
			stack.pop()
			continue
		}
		frame.cursor++

		const config = resolveConfig(frame.config, node, context)
		yield { config, node }

		if (node.kind === 'group') {
			stack.push({ config, cursor: 0, nodes: node.children })
		}
	}
}

/** Narrow a walk to its leaves. */
export function* leaves(visits: Iterable<NodeVisit>): Generator<LeafVisit, void, undefined> {
	for (const { config, node } of visits) {
		if (node.kind === 'leaf') yield { config, node }
	}
}
