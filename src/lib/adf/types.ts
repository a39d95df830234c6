// ADF node model and the intermediate block/inline structures used while converting markdown

/**
 * Heading levels accepted by ADF
 */
export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6

/**
 * Inline marks. Shapes match ADF marks so runs convert to text nodes directly.
 */
export type AdfMark =
	| { type: 'strong' }
	| { type: 'em' }
	| { type: 'code' }
	| { type: 'strike' }
	| { type: 'link'; attrs: { href: string } }

export type MarkType = AdfMark['type']

/**
 * Canonical mark order within a text node. Marks are always emitted in this order
 * so two runs with the same mark set compare equal.
 */
export const MARK_ORDER: readonly MarkType[] = ['link', 'strong', 'em', 'strike', 'code']

export interface AdfText {
	type: 'text'
	text: string
	marks?: AdfMark[]
}

export interface AdfParagraph {
	type: 'paragraph'
	content: AdfText[]
}

export interface AdfHeading {
	type: 'heading'
	attrs: { level: HeadingLevel }
	content: AdfText[]
}

export interface AdfListItem {
	type: 'listItem'
	content: AdfBlockNode[]
}

export interface AdfBulletList {
	type: 'bulletList'
	content: AdfListItem[]
}

export interface AdfOrderedList {
	type: 'orderedList'
	attrs?: { order: number }
	content: AdfListItem[]
}

export interface AdfCodeBlock {
	type: 'codeBlock'
	attrs?: { language: string }
	content: AdfText[]
}

export interface AdfBlockquote {
	type: 'blockquote'
	content: AdfBlockNode[]
}

export interface AdfTableCell {
	type: 'tableCell' | 'tableHeader'
	content: AdfBlockNode[]
}

export interface AdfTableRow {
	type: 'tableRow'
	content: AdfTableCell[]
}

export interface AdfTable {
	type: 'table'
	content: AdfTableRow[]
}

export interface AdfRule {
	type: 'rule'
}

export type AdfBlockNode =
	| AdfParagraph
	| AdfHeading
	| AdfBulletList
	| AdfOrderedList
	| AdfCodeBlock
	| AdfBlockquote
	| AdfTable
	| AdfRule

export type AdfBlockType = AdfBlockNode['type']

export interface AdfDocument {
	version: 1
	type: 'doc'
	content: AdfBlockNode[]
}

/**
 * Containers that hold block nodes, and the block types ADF allows inside each.
 * Jira rejects documents that put e.g. a heading inside a list item or a blockquote inside a blockquote.
 */
export type BlockContainer = 'doc' | 'listItem' | 'blockquote' | 'tableCell'

export const ALLOWED_CHILDREN: Record<BlockContainer, ReadonlySet<AdfBlockType>> = {
	doc: new Set<AdfBlockType>([
		'paragraph', 'heading', 'bulletList', 'orderedList', 'codeBlock', 'blockquote', 'table', 'rule',
	]),
	listItem: new Set<AdfBlockType>(['paragraph', 'bulletList', 'orderedList', 'codeBlock']),
	blockquote: new Set<AdfBlockType>(['paragraph', 'bulletList', 'orderedList', 'codeBlock']),
	tableCell: new Set<AdfBlockType>([
		'paragraph', 'heading', 'bulletList', 'orderedList', 'codeBlock', 'blockquote', 'rule',
	]),
}

/**
 * A contiguous run of text with a resolved mark set
 */
export interface InlineRun {
	text: string
	marks: AdfMark[]
}

/**
 * One line of a blockquote region with its marker count stripped off
 */
export interface QuoteLine {
	depth: number
	text: string
}

/**
 * Block-level spans produced by the segmenter. `source` is the raw markdown the span was built from.
 */
export type BlockSpan =
	| { kind: 'paragraph'; text: string; source: string }
	| { kind: 'heading'; level: HeadingLevel; text: string; source: string }
	| { kind: 'codeBlock'; language: string; text: string; source: string }
	| { kind: 'listItem'; ordered: boolean; start: number; depth: number; content: string; source: string }
	| { kind: 'blockquote'; depth: number; lines: QuoteLine[]; source: string }
	| { kind: 'table'; rows: string[][]; source: string }
	| { kind: 'rule'; source: string }

export type BlockKind = BlockSpan['kind']

export type ListItemSpan = Extract<BlockSpan, { kind: 'listItem' }>

export interface ConverterOptions {
	/** Maximum nesting of lists and blockquotes (default 10). Deeper content is flattened. */
	maxNestingDepth?: number
	/** Maximum number of table columns (default 64). Wider rows are truncated. */
	maxTableColumns?: number
}

export type ResolvedConverterOptions = Required<ConverterOptions>

export const DEFAULT_MAX_NESTING_DEPTH = 10
export const DEFAULT_MAX_TABLE_COLUMNS = 64

export function resolveConverterOptions(options: ConverterOptions = {}): ResolvedConverterOptions {
	return {
		maxNestingDepth: positiveIntegerOr(options.maxNestingDepth, DEFAULT_MAX_NESTING_DEPTH),
		maxTableColumns: positiveIntegerOr(options.maxTableColumns, DEFAULT_MAX_TABLE_COLUMNS),
	}
}

function positiveIntegerOr(value: number | undefined, fallback: number): number {
	if (value === undefined || !Number.isFinite(value) || value < 1) return fallback
	return Math.floor(value)
}
