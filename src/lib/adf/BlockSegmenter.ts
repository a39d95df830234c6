// BlockSegmenter - Splits raw markdown into an ordered stream of block spans
// Recognizes headings, fenced code, list items, blockquotes, tables and thematic breaks.
// Anything else is paragraph text.

import {
	resolveConverterOptions,
	type BlockSpan,
	type ConverterOptions,
	type HeadingLevel,
	type QuoteLine,
	type ResolvedConverterOptions,
} from './types.js'

const TAB_WIDTH = 4

const HEADING = /^ {0,3}(#+)(?:[ \t]+(.*))?$/
const THEMATIC_BREAK = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/
const QUOTE_MARKER = /^[ \t]*>[ \t]?/
const LIST_MARKER = /^([ \t]*)([-*+]|(\d{1,9})[.)])(?:([ \t]+)(.*)|[ \t]*$)/
const TABLE_SEPARATOR = /^\s*\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)*\|?\s*$/
const FENCE = /^[ \t]*(`{3,}|~{3,})(.*)$/

export interface Fence {
	char: '`' | '~'
	length: number
	indent: number
	language: string
}

interface ListMarker {
	indent: number
	contentIndent: number
	ordered: boolean
	start: number
	text: string
}

type BlockStart =
	| { kind: 'codeBlock'; fence: Fence }
	| { kind: 'heading' }
	| { kind: 'rule' }
	| { kind: 'blockquote' }
	| { kind: 'table' }
	| { kind: 'listItem'; marker: ListMarker }

interface OpenListItem {
	marker: ListMarker
	depth: number
	lines: string[]
	fence: Fence | null
	startIndex: number
}

export function isBlank(line: string): boolean {
	return line.trim() === ''
}

function columnsOf(whitespace: string): number {
	let columns = 0
	for (const char of whitespace) {
		columns = char === '\t' ? columns + TAB_WIDTH - (columns % TAB_WIDTH) : columns + 1
	}
	return columns
}

/**
 * Count leading whitespace columns, with tab stops every four columns
 */
export function indentWidth(line: string): number {
	return columnsOf(line.match(/^[ \t]*/)?.[0] ?? '')
}

/**
 * Remove up to `columns` columns of leading whitespace
 */
export function stripIndent(line: string, columns: number): string {
	let consumed = 0
	let i = 0
	while (i < line.length && consumed < columns) {
		const char = line[i]
		if (char === ' ') {
			consumed++
		} else if (char === '\t') {
			consumed += TAB_WIDTH - (consumed % TAB_WIDTH)
		} else {
			break
		}
		i++
	}
	return line.slice(i)
}

function splitLines(markdown: string): string[] {
	return markdown.replace(/\r\n?/g, '\n').split('\n')
}

export function parseFence(line: string): Fence | null {
	const match = line.match(FENCE)
	if (!match) return null

	const marker = match[1] ?? ''
	const info = (match[2] ?? '').trim()
	const char = marker.startsWith('`') ? '`' : '~'
	// Backtick fences cannot carry backticks in their info string
	if (char === '`' && info.includes('`')) return null

	return {
		char,
		length: marker.length,
		indent: indentWidth(line),
		language: info.split(/\s+/)[0] ?? '',
	}
}

export function isClosingFence(line: string, fence: Fence): boolean {
	const trimmed = line.trim()
	if (trimmed.length < fence.length) return false
	for (const char of trimmed) {
		if (char !== fence.char) return false
	}
	return true
}

function parseListMarker(line: string): ListMarker | null {
	const match = line.match(LIST_MARKER)
	if (!match) return null

	const indent = columnsOf(match[1] ?? '')
	const marker = match[2] ?? ''
	const spacing = columnsOf(match[4] ?? '')
	const text = match[5] ?? ''
	const afterMarker = indent + marker.length
	// A marker followed by 5+ spaces starts its content one column after the marker
	const contentIndent = text === '' || spacing > TAB_WIDTH ? afterMarker + 1 : afterMarker + spacing

	return {
		indent,
		contentIndent,
		ordered: match[3] !== undefined,
		start: match[3] !== undefined ? parseInt(match[3], 10) : 1,
		text: spacing > TAB_WIDTH ? ' '.repeat(spacing - 1) + text : text,
	}
}

function parseQuoteLine(line: string): { depth: number; text: string } | null {
	let rest = line
	let depth = 0
	let match = rest.match(QUOTE_MARKER)
	while (match) {
		depth++
		rest = rest.slice(match[0].length)
		match = rest.match(QUOTE_MARKER)
	}
	return depth === 0 ? null : { depth, text: rest }
}

function hasUnescapedPipe(line: string): boolean {
	return /(^|[^\\])\|/.test(line)
}

/**
 * Split a table row into trimmed cell texts. `\|` stays in the cell as a literal pipe.
 */
export function splitTableRow(line: string): string[] {
	let row = line.trim()
	if (row.startsWith('|')) row = row.slice(1)
	if (row.endsWith('|') && !row.endsWith('\\|')) row = row.slice(0, -1)

	const cells: string[] = []
	let cell = ''
	for (let i = 0; i < row.length; i++) {
		const char = row[i]
		if (char === '\\' && row[i + 1] === '|') {
			cell += '|'
			i++
		} else if (char === '|') {
			cells.push(cell.trim())
			cell = ''
		} else {
			cell += char
		}
	}
	cells.push(cell.trim())
	return cells
}

function headingLevel(hashes: number): HeadingLevel {
	switch (Math.min(hashes, 6)) {
		case 1:
			return 1
		case 2:
			return 2
		case 3:
			return 3
		case 4:
			return 4
		case 5:
			return 5
		default:
			return 6
	}
}

function headingText(raw: string | undefined): string {
	const text = (raw ?? '').trim()
	if (/^#+$/.test(text)) return ''
	// Strip an optional closing sequence of hashes
	return text.replace(/[ \t]+#+$/, '').trim()
}

/**
 * Line-oriented segmenter. One instance per conversion; all state lives on the instance.
 */
class BlockSegmenter {
	private readonly lines: string[]
	private readonly spans: BlockSpan[] = []
	private paragraph: string[] = []
	private index = 0

	constructor(
		markdown: string,
		private readonly options: ResolvedConverterOptions
	) {
		this.lines = splitLines(markdown)
	}

	segment(): BlockSpan[] {
		while (this.index < this.lines.length) {
			const line = this.lineAt(this.index)

			if (isBlank(line)) {
				this.flushParagraph()
				this.index++
				continue
			}

			const start = this.blockStartAt(this.index, this.paragraph.length > 0)
			if (!start) {
				this.paragraph.push(line)
				this.index++
				continue
			}

			this.flushParagraph()
			switch (start.kind) {
				case 'codeBlock':
					this.consumeCodeBlock(start.fence)
					break
				case 'heading':
					this.consumeHeading()
					break
				case 'rule':
					this.spans.push({ kind: 'rule', source: line })
					this.index++
					break
				case 'blockquote':
					this.consumeBlockquote()
					break
				case 'table':
					this.consumeTable()
					break
				case 'listItem':
					this.consumeList()
					break
			}
		}

		this.flushParagraph()
		return this.spans
	}

	private lineAt(index: number): string {
		return this.lines[index] ?? ''
	}

	private blockStartAt(index: number, interruptsParagraph: boolean): BlockStart | null {
		const line = this.lineAt(index)

		const fence = parseFence(line)
		if (fence) return { kind: 'codeBlock', fence }
		if (HEADING.test(line)) return { kind: 'heading' }
		if (THEMATIC_BREAK.test(line)) return { kind: 'rule' }
		if (QUOTE_MARKER.test(line)) return { kind: 'blockquote' }
		if (
			hasUnescapedPipe(line) &&
			index + 1 < this.lines.length &&
			TABLE_SEPARATOR.test(this.lineAt(index + 1)) &&
			this.lineAt(index + 1).includes('|')
		) {
			return { kind: 'table' }
		}

		const marker = parseListMarker(line)
		// Only "1." may interrupt running paragraph text, so "2024. was busy" stays a sentence
		if (marker && !(interruptsParagraph && marker.ordered && marker.start !== 1)) {
			return { kind: 'listItem', marker }
		}
		return null
	}

	private flushParagraph(): void {
		if (this.paragraph.length === 0) return

		this.spans.push({
			kind: 'paragraph',
			text: this.paragraph.map((line) => line.trim()).join('\n'),
			source: this.paragraph.join('\n'),
		})
		this.paragraph = []
	}

	private consumeCodeBlock(fence: Fence): void {
		const startIndex = this.index
		const body: string[] = []
		this.index++

		while (this.index < this.lines.length) {
			const line = this.lineAt(this.index)
			this.index++
			if (isClosingFence(line, fence)) break
			body.push(stripIndent(line, fence.indent))
		}

		// An unterminated fence simply closes at end of input
		this.spans.push({
			kind: 'codeBlock',
			language: fence.language,
			text: body.join('\n'),
			source: this.lines.slice(startIndex, this.index).join('\n'),
		})
	}

	private consumeHeading(): void {
		const line = this.lineAt(this.index)
		const match = line.match(HEADING)
		this.index++

		this.spans.push({
			kind: 'heading',
			level: headingLevel(match?.[1]?.length ?? 1),
			text: headingText(match?.[2]),
			source: line,
		})
	}

	private consumeBlockquote(): void {
		const startIndex = this.index
		const lines: QuoteLine[] = []

		while (this.index < this.lines.length) {
			const parsed = parseQuoteLine(this.lineAt(this.index))
			if (!parsed) break
			lines.push({ depth: Math.min(parsed.depth, this.options.maxNestingDepth), text: parsed.text })
			this.index++
		}

		this.spans.push({
			kind: 'blockquote',
			depth: lines.reduce((max, line) => Math.max(max, line.depth), 0),
			lines,
			source: this.lines.slice(startIndex, this.index).join('\n'),
		})
	}

	private consumeTable(): void {
		const startIndex = this.index
		const rows: string[][] = [splitTableRow(this.lineAt(this.index))]
		// Skip header and separator
		this.index += 2

		while (this.index < this.lines.length) {
			const line = this.lineAt(this.index)
			if (isBlank(line) || !hasUnescapedPipe(line)) break
			rows.push(splitTableRow(line))
			this.index++
		}

		this.spans.push({
			kind: 'table',
			rows,
			source: this.lines.slice(startIndex, this.index).join('\n'),
		})
	}

	private consumeList(): void {
		// Marker indentation of each open nesting level
		const levels: number[] = []
		let current: OpenListItem | null = null

		const finish = (): void => {
			if (!current) return
			const source = this.lines.slice(current.startIndex, this.index)
			while (source.length > 0 && isBlank(source[source.length - 1] ?? '')) source.pop()

			this.spans.push({
				kind: 'listItem',
				ordered: current.marker.ordered,
				start: current.marker.start,
				depth: current.depth,
				content: current.lines.join('\n'),
				source: source.join('\n'),
			})
			current = null
		}

		while (this.index < this.lines.length) {
			const line = this.lineAt(this.index)

			if (current?.fence) {
				if (isBlank(line) || indentWidth(line) >= current.marker.contentIndent) {
					const text = stripIndent(line, current.marker.contentIndent)
					current.lines.push(text)
					if (isClosingFence(text, current.fence)) current.fence = null
					this.index++
					continue
				}
				// A shallower line ends the item; its code closes with it
				current.fence = null
			}

			if (isBlank(line)) {
				finish()
				const next = this.nextNonBlank(this.index)
				if (next === null || THEMATIC_BREAK.test(this.lineAt(next)) || !parseListMarker(this.lineAt(next))) {
					break
				}
				this.index = next
				continue
			}

			if (THEMATIC_BREAK.test(line)) break

			const marker = parseListMarker(line)
			if (marker) {
				finish()
				const depth = Math.min(this.nestingDepth(levels, marker.indent), this.options.maxNestingDepth)
				current = {
					marker,
					depth,
					lines: [marker.text],
					fence: parseFence(marker.text),
					startIndex: this.index,
				}
				this.index++
				continue
			}

			if (!current) break

			if (indentWidth(line) >= current.marker.contentIndent) {
				const text = stripIndent(line, current.marker.contentIndent)
				current.lines.push(text)
				current.fence = parseFence(text)
				this.index++
				continue
			}

			// Lazy continuation: unindented paragraph text that starts no other block
			const last = current.lines[current.lines.length - 1] ?? ''
			if (!isBlank(last) && !this.blockStartAt(this.index, true)) {
				current.lines.push(line.trim())
				this.index++
				continue
			}

			break
		}

		finish()
	}

	/**
	 * Map a marker's indentation onto a nesting depth (1 = top-level item)
	 */
	private nestingDepth(levels: number[], indent: number): number {
		let top = levels[levels.length - 1]
		while (top !== undefined && indent < top) {
			levels.pop()
			top = levels[levels.length - 1]
		}
		if (top === undefined || indent >= top + 2) {
			levels.push(indent)
		}
		return levels.length
	}

	private nextNonBlank(from: number): number | null {
		for (let i = from; i < this.lines.length; i++) {
			if (!isBlank(this.lineAt(i))) return i
		}
		return null
	}
}

/**
 * Split markdown into block spans. Never throws: text matching no block pattern becomes a paragraph.
 */
export function segmentBlocks(markdown: string, options: ConverterOptions | ResolvedConverterOptions = {}): BlockSpan[] {
	return new BlockSegmenter(markdown, resolveConverterOptions(options)).segment()
}
