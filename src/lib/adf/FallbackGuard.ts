// FallbackGuard - Final structural check over an assembled ADF document
//
// Rebuilds the tree from validated parts. Any block that fails the check is replaced by a
// paragraph holding the literal markdown it was built from, so callers always get a document
// Jira will accept. Failures here indicate a converter defect and are logged as such.

import { z } from 'zod'
import { getLogger } from '../../utils/logger-context.js'
import { getPlainText, isRecord } from './AdfPlainText.js'
import { literalParagraph, type SourceMap } from './BlockMapper.js'
import { assembleDocument } from './DocumentAssembler.js'
import {
	ALLOWED_CHILDREN,
	type AdfBlockNode,
	type AdfBlockType,
	type AdfDocument,
	type AdfListItem,
	type AdfMark,
	type AdfTableCell,
	type AdfTableRow,
	type AdfText,
	type BlockContainer,
} from './types.js'

const BLOCK_TYPES: readonly AdfBlockType[] = [
	'paragraph', 'heading', 'bulletList', 'orderedList', 'codeBlock', 'blockquote', 'table', 'rule',
]

const MarkSchema = z.discriminatedUnion('type', [
	z.object({ type: z.literal('strong') }).strict(),
	z.object({ type: z.literal('em') }).strict(),
	z.object({ type: z.literal('code') }).strict(),
	z.object({ type: z.literal('strike') }).strict(),
	z.object({ type: z.literal('link'), attrs: z.object({ href: z.string().min(1) }).strict() }).strict(),
])

const TextNodeSchema = z
	.object({
		type: z.literal('text'),
		text: z.string().min(1, 'Text nodes cannot be empty'),
		marks: z.array(MarkSchema).min(1).optional(),
	})
	.strict()
	.refine((node) => new Set(node.marks?.map((mark) => mark.type)).size === (node.marks?.length ?? 0), {
		message: 'A text node carries each mark at most once',
	})
	.refine(
		(node) =>
			!node.marks?.some((mark) => mark.type === 'code') ||
			node.marks.every((mark) => mark.type === 'code' || mark.type === 'link'),
		{ message: 'Code marks only combine with links' }
	)

const PlainTextNodeSchema = z.object({ type: z.literal('text'), text: z.string().min(1) }).strict()

const HeadingAttrsSchema = z.object({ level: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5), z.literal(6)]) })
const OrderedListAttrsSchema = z.object({ order: z.number().int().min(0) })
const CodeBlockAttrsSchema = z.object({ language: z.string().min(1) })

function isBlockType(value: unknown): value is AdfBlockType {
	return BLOCK_TYPES.some((type) => type === value)
}

function toText(node: z.infer<typeof TextNodeSchema>): AdfText {
	const marks: AdfMark[] | undefined = node.marks
	return marks ? { type: 'text', text: node.text, marks } : { type: 'text', text: node.text }
}

class DocumentGuard {
	defects = 0

	constructor(private readonly sources: SourceMap) {}

	/**
	 * Return a valid node for `container`, substituting a literal paragraph when the node fails
	 */
	repairBlock(node: unknown, container: BlockContainer, path: string): AdfBlockNode {
		const checked = this.checkBlock(node, container, path)
		if (checked) return checked

		this.defects++
		const type = isRecord(node) ? String(node.type) : typeof node
		getLogger().warn(`ADF guard replaced invalid ${type} node at ${path} with literal text`)
		return literalParagraph(this.literalTextOf(node))
	}

	private literalTextOf(node: unknown): string {
		if (isRecord(node)) {
			const source = this.sources.get(node)
			if (source !== undefined) return source
		}
		return getPlainText(node)
	}

	private checkBlock(node: unknown, container: BlockContainer, path: string): AdfBlockNode | null {
		if (!isRecord(node) || !isBlockType(node.type)) return null
		if (!ALLOWED_CHILDREN[container].has(node.type)) return null

		switch (node.type) {
			case 'paragraph': {
				const content = this.checkInline(node.content)
				return content ? { type: 'paragraph', content } : null
			}
			case 'heading': {
				const attrs = HeadingAttrsSchema.safeParse(node.attrs)
				const content = this.checkInline(node.content)
				return attrs.success && content ? { type: 'heading', attrs: { level: attrs.data.level }, content } : null
			}
			case 'codeBlock': {
				const content = z.array(PlainTextNodeSchema).max(1).safeParse(node.content)
				if (!content.success) return null
				const text: AdfText[] = content.data.map((child) => ({ type: 'text', text: child.text }))
				if (node.attrs === undefined) return { type: 'codeBlock', content: text }
				const attrs = CodeBlockAttrsSchema.safeParse(node.attrs)
				return attrs.success ? { type: 'codeBlock', attrs: { language: attrs.data.language }, content: text } : null
			}
			case 'bulletList':
			case 'orderedList': {
				const items = this.checkListItems(node.content, `${path}.content`)
				if (!items) return null
				if (node.type === 'bulletList') return { type: 'bulletList', content: items }
				if (node.attrs === undefined) return { type: 'orderedList', content: items }
				const attrs = OrderedListAttrsSchema.safeParse(node.attrs)
				return attrs.success ? { type: 'orderedList', attrs: { order: attrs.data.order }, content: items } : null
			}
			case 'blockquote': {
				const content = this.checkChildren(node.content, 'blockquote', `${path}.content`)
				return content ? { type: 'blockquote', content } : null
			}
			case 'table': {
				const rows = this.checkTableRows(node.content, `${path}.content`)
				return rows ? { type: 'table', content: rows } : null
			}
			case 'rule':
				return { type: 'rule' }
			default:
				return null
		}
	}

	private checkInline(content: unknown): AdfText[] | null {
		if (!Array.isArray(content)) return null
		const nodes: AdfText[] = []
		for (const child of content) {
			const parsed = TextNodeSchema.safeParse(child)
			if (!parsed.success) return null
			nodes.push(toText(parsed.data))
		}
		return nodes
	}

	private checkChildren(content: unknown, container: BlockContainer, path: string): AdfBlockNode[] | null {
		if (!Array.isArray(content) || content.length === 0) return null
		return content.map((child, index) => this.repairBlock(child, container, `${path}[${index}]`))
	}

	private checkListItems(content: unknown, path: string): AdfListItem[] | null {
		if (!Array.isArray(content) || content.length === 0) return null

		return content.map((item, index): AdfListItem => {
			const itemPath = `${path}[${index}]`
			const children = isRecord(item) && item.type === 'listItem' ? this.checkChildren(item.content, 'listItem', `${itemPath}.content`) : null
			const first = children?.[0]
			if (children && first && (first.type === 'paragraph' || first.type === 'codeBlock')) {
				return { type: 'listItem', content: children }
			}

			this.defects++
			getLogger().warn(`ADF guard replaced invalid list item at ${itemPath} with literal text`)
			return { type: 'listItem', content: [literalParagraph(getPlainText(item))] }
		})
	}

	private checkTableRows(content: unknown, path: string): AdfTableRow[] | null {
		if (!Array.isArray(content) || content.length === 0) return null

		const rows: AdfTableRow[] = []
		for (const [index, row] of content.entries()) {
			if (!isRecord(row) || row.type !== 'tableRow' || !Array.isArray(row.content) || row.content.length === 0) {
				return null
			}
			const cells: AdfTableCell[] = []
			for (const [cellIndex, cell] of row.content.entries()) {
				const cellPath = `${path}[${index}].content[${cellIndex}]`
				if (!isRecord(cell) || (cell.type !== 'tableCell' && cell.type !== 'tableHeader')) return null
				const type = cell.type === 'tableHeader' ? 'tableHeader' : 'tableCell'
				const children = this.checkChildren(cell.content, 'tableCell', `${cellPath}.content`)
				if (children) {
					cells.push({ type, content: children })
					continue
				}
				this.defects++
				getLogger().warn(`ADF guard replaced invalid table cell at ${cellPath} with literal text`)
				cells.push({ type, content: [literalParagraph(getPlainText(cell))] })
			}
			rows.push({ type: 'tableRow', content: cells })
		}
		return rows
	}
}

export interface GuardResult {
	document: AdfDocument
	defects: number
}

/**
 * Validate a document and replace every non-conforming block with literal text.
 * The returned document is always schema-valid and never empty.
 */
export function guardDocument(document: AdfDocument, sources: SourceMap = new WeakMap()): GuardResult {
	const guard = new DocumentGuard(sources)
	const content: unknown = document.content
	const blocks = Array.isArray(content)
		? content.map((node, index) => guard.repairBlock(node, 'doc', `content[${index}]`))
		: []

	return { document: assembleDocument(blocks), defects: guard.defects }
}
