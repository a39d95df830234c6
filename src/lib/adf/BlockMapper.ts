// BlockMapper - Maps segmented block spans onto ADF block nodes
// Container spans (lists, blockquotes) are re-segmented and mapped recursively with an explicit depth counter.

import { segmentBlocks } from './BlockSegmenter.js'
import { resolveInlines } from './InlineResolver.js'
import {
	ALLOWED_CHILDREN,
	type AdfBlockNode,
	type AdfBlockType,
	type AdfBulletList,
	type AdfCodeBlock,
	type AdfListItem,
	type AdfOrderedList,
	type AdfParagraph,
	type AdfTable,
	type AdfTableCell,
	type AdfTableRow,
	type AdfText,
	type BlockContainer,
	type BlockSpan,
	type InlineRun,
	type ListItemSpan,
	type QuoteLine,
	type ResolvedConverterOptions,
} from './types.js'

/**
 * Raw markdown each mapped node came from. Scoped to a single conversion.
 */
export type SourceMap = WeakMap<object, string>

export interface MapContext {
	/** Number of list/blockquote nodes enclosing the content being mapped */
	depth: number
	container: BlockContainer
	options: ResolvedConverterOptions
	sources: SourceMap
}

interface ListFrame {
	list: AdfBulletList | AdfOrderedList
	depth: number
	ordered: boolean
}

export function toTextNodes(runs: InlineRun[]): AdfText[] {
	return runs
		.filter((run) => run.text.length > 0)
		.map((run): AdfText => (run.marks.length > 0 ? { type: 'text', text: run.text, marks: run.marks } : { type: 'text', text: run.text }))
}

export function literalParagraph(text: string): AdfParagraph {
	return { type: 'paragraph', content: text ? [{ type: 'text', text }] : [] }
}

function allows(context: MapContext, type: AdfBlockType): boolean {
	return ALLOWED_CHILDREN[context.container].has(type)
}

function record<T extends AdfBlockNode>(context: MapContext, node: T, source: string): T {
	context.sources.set(node, source)
	return node
}

function inlineParagraph(text: string): AdfParagraph {
	return { type: 'paragraph', content: toTextNodes(resolveInlines(text)) }
}

function codeBlock(language: string, text: string): AdfCodeBlock {
	const node: AdfCodeBlock = { type: 'codeBlock', content: text ? [{ type: 'text', text }] : [] }
	if (language) {
		node.attrs = { language }
	}
	return node
}

function table(rows: string[][], options: ResolvedConverterOptions): AdfTable {
	// Every row is normalized to the widest row: short rows padded, overly wide rows truncated
	const widest = rows.reduce((max, cells) => Math.max(max, cells.length), 1)
	const width = Math.min(widest, options.maxTableColumns)

	return {
		type: 'table',
		content: rows.map((cells, rowIndex): AdfTableRow => ({
			type: 'tableRow',
			content: Array.from({ length: width }, (_, column): AdfTableCell => ({
				type: rowIndex === 0 ? 'tableHeader' : 'tableCell',
				content: [inlineParagraph(cells[column] ?? '')],
			})),
		})),
	}
}

function mapSpan(span: Exclude<BlockSpan, ListItemSpan>, context: MapContext): AdfBlockNode[] {
	switch (span.kind) {
		case 'paragraph':
			return [record(context, inlineParagraph(span.text), span.source)]

		case 'heading': {
			const content = toTextNodes(resolveInlines(span.text))
			if (!allows(context, 'heading')) {
				return [record(context, { type: 'paragraph', content }, span.source)]
			}
			return [record(context, { type: 'heading', attrs: { level: span.level }, content }, span.source)]
		}

		case 'codeBlock':
			return [record(context, codeBlock(span.language, span.text), span.source)]

		case 'blockquote':
			return mapQuote(span.lines, 0, span.source, context)

		case 'table':
			if (!allows(context, 'table')) {
				return [record(context, literalParagraph(span.source), span.source)]
			}
			return [record(context, table(span.rows, context.options), span.source)]

		case 'rule':
			if (!allows(context, 'rule')) {
				return [record(context, literalParagraph(span.source), span.source)]
			}
			return [record(context, { type: 'rule' }, span.source)]
	}
}

/**
 * Map quote lines whose marker depth exceeds `level`. Deeper runs of lines become nested quotes
 * where the container and the depth budget allow it, and are flattened into the current quote otherwise.
 */
function mapQuote(lines: QuoteLine[], level: number, source: string, context: MapContext): AdfBlockNode[] {
	const nests = allows(context, 'blockquote') && context.depth < context.options.maxNestingDepth
	const inner: MapContext = nests ? { ...context, container: 'blockquote', depth: context.depth + 1 } : context

	const content: AdfBlockNode[] = []
	let i = 0
	while (i < lines.length) {
		const chunk: string[] = []
		while (i < lines.length && (lines[i]?.depth ?? 0) <= level + 1) {
			chunk.push(lines[i]?.text ?? '')
			i++
		}
		if (chunk.length > 0) {
			content.push(...mapBlocks(segmentBlocks(chunk.join('\n'), context.options), inner))
		}

		const deeper: QuoteLine[] = []
		while (i < lines.length && (lines[i]?.depth ?? 0) > level + 1) {
			const line = lines[i]
			if (line) deeper.push(line)
			i++
		}
		if (deeper.length > 0) {
			content.push(...mapQuote(deeper, level + 1, deeper.map((line) => line.text).join('\n'), inner))
		}
	}

	if (!nests) return content
	return [record(context, { type: 'blockquote', content: content.length > 0 ? content : [literalParagraph('')] }, source)]
}

function createList(item: ListItemSpan): AdfBulletList | AdfOrderedList {
	if (!item.ordered) {
		return { type: 'bulletList', content: [] }
	}
	const list: AdfOrderedList = { type: 'orderedList', content: [] }
	if (item.start !== 1) {
		list.attrs = { order: item.start }
	}
	return list
}

function mapListItem(item: ListItemSpan, context: MapContext): AdfListItem {
	const content = mapBlocks(segmentBlocks(item.content, context.options), context)
	const first = content[0]
	// ADF list items must open with a paragraph or a code block
	if (!first || (first.type !== 'paragraph' && first.type !== 'codeBlock')) {
		content.unshift(literalParagraph(''))
	}
	return { type: 'listItem', content }
}

/**
 * Build nested lists from a run of consecutive list item spans
 */
function mapListRun(items: ListItemSpan[], context: MapContext): AdfBlockNode[] {
	const budget = context.options.maxNestingDepth - context.depth
	if (budget < 1) {
		// No room for another list: each item becomes one paragraph at the current level.
		// Its content is not segmented again, so nested markers stay literal.
		return items.map((item) => record(context, inlineParagraph(item.content), item.source))
	}

	const roots: AdfBlockNode[] = []
	const rootSources = new Map<AdfBlockNode, string[]>()
	const stack: ListFrame[] = []

	for (const item of items) {
		const depth = Math.min(item.depth, budget)
		let top = stack[stack.length - 1]
		while (top && (top.depth > depth || (top.depth === depth && top.ordered !== item.ordered))) {
			stack.pop()
			top = stack[stack.length - 1]
		}

		if (!top || top.depth < depth) {
			const list = createList(item)
			const parentItem = top?.list.content[top.list.content.length - 1]
			if (parentItem) {
				parentItem.content.push(list)
			} else {
				roots.push(list)
				rootSources.set(list, [])
			}
			top = { list, depth, ordered: item.ordered }
			stack.push(top)
		}

		const root = stack[0]?.list
		if (root) rootSources.get(root)?.push(item.source)

		const itemContext: MapContext = { ...context, container: 'listItem', depth: context.depth + stack.length }
		top.list.content.push(mapListItem(item, itemContext))
	}

	for (const [root, sources] of rootSources) {
		record(context, root, sources.join('\n'))
	}

	return roots
}

/**
 * Map a span sequence onto block nodes valid for `context.container`
 */
export function mapBlocks(spans: BlockSpan[], context: MapContext): AdfBlockNode[] {
	const nodes: AdfBlockNode[] = []
	let i = 0

	while (i < spans.length) {
		const span = spans[i]
		if (!span) break

		if (span.kind === 'listItem') {
			const run: ListItemSpan[] = []
			let next = spans[i]
			while (next?.kind === 'listItem') {
				run.push(next)
				i++
				next = spans[i]
			}
			nodes.push(...mapListRun(run, context))
			continue
		}

		nodes.push(...mapSpan(span, context))
		i++
	}

	return nodes
}
