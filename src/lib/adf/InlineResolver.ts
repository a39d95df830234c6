// InlineResolver - Turns one block's text into text runs carrying flat mark sets
//
// Code spans are resolved first and never rescanned. Emphasis, strong and strike are
// matched with a delimiter stack; anything left unmatched is emitted as literal text.

import { MARK_ORDER, type AdfMark, type InlineRun, type MarkType } from './types.js'

type DelimiterChar = '*' | '_' | '~'
type StackMark = 'strong' | 'em' | 'strike'

interface PendingOpen {
	mark: StackMark
	size: number
	matched: boolean
}

interface DelimiterToken {
	type: 'delimiter'
	char: DelimiterChar
	length: number
	canOpen: boolean
	canClose: boolean
	// Filled in while matching
	closes: StackMark[]
	leftover: number
	opens: PendingOpen[]
}

type InlineToken =
	| { type: 'text'; text: string }
	| { type: 'code'; text: string }
	| { type: 'link'; href: string; runs: InlineRun[] }
	| DelimiterToken

interface StackEntry {
	token: DelimiterToken
	open: PendingOpen
}

interface ParsedLink {
	label: string
	href: string
	end: number
}

const ASCII_PUNCTUATION = /[!-/:-@[-`{-~]/
const WORD_CHARACTER = /[\p{L}\p{N}]/u
const WHITESPACE = /\s/
const AUTOLINK = /^<([a-zA-Z][a-zA-Z0-9+.-]{1,31}:[^\s<>]*)>/

function runLength(text: string, start: number, char: string): number {
	let end = start
	while (text[end] === char) end++
	return end - start
}

/**
 * Find the backtick run of exactly `length` that closes a code span, or -1
 */
function findCodeSpanClose(text: string, from: number, length: number): number {
	let i = from
	while (i < text.length) {
		if (text[i] === '`') {
			const run = runLength(text, i, '`')
			if (run === length) return i
			i += run
		} else {
			i++
		}
	}
	return -1
}

function normalizeCodeText(raw: string): string {
	if (raw.length >= 2 && raw.startsWith(' ') && raw.endsWith(' ') && raw.trim() !== '') {
		return raw.slice(1, -1)
	}
	return raw
}

interface PairIndex {
	brackets: Map<number, number>
	parens: Map<number, number>
}

/**
 * Pair every opener with its closer in one stack pass.
 * Characters after a backslash never count; brackets inside code spans do not count either.
 */
function matchPairs(text: string, opener: '[' | '(', closer: ']' | ')'): Map<number, number> {
	const matches = new Map<number, number>()
	const open: number[] = []
	for (let i = 0; i < text.length; i++) {
		const char = text[i]
		if (char === '\\') {
			i++
		} else if (char === '`' && opener === '[') {
			const run = runLength(text, i, '`')
			const close = findCodeSpanClose(text, i + run, run)
			i = (close === -1 ? i + run : close + run) - 1
		} else if (char === opener) {
			open.push(i)
		} else if (char === closer) {
			const start = open.pop()
			if (start !== undefined) matches.set(start, i)
		}
	}
	return matches
}

function indexPairs(text: string): PairIndex {
	return { brackets: matchPairs(text, '[', ']'), parens: matchPairs(text, '(', ')') }
}

function parseDestination(raw: string): string {
	const trimmed = raw.trim()
	if (trimmed.startsWith('<')) {
		const end = trimmed.indexOf('>')
		return end === -1 ? '' : trimmed.slice(1, end)
	}
	// Anything after the first whitespace is an optional title
	return (trimmed.split(/\s+/)[0] ?? '').replace(/\\([!-/:-@[-`{-~])/g, '$1')
}

/**
 * Parse `[label](destination "title")` starting at the opening bracket
 */
function parseLink(text: string, open: number, pairs: PairIndex): ParsedLink | null {
	const close = pairs.brackets.get(open)
	if (close === undefined || text[close + 1] !== '(') return null

	const parenClose = pairs.parens.get(close + 1)
	if (parenClose === undefined) return null

	const href = parseDestination(text.slice(close + 2, parenClose))
	if (!href) return null

	return { label: text.slice(open + 1, close), href, end: parenClose + 1 }
}

function createDelimiter(char: DelimiterChar, length: number, before: string | undefined, after: string | undefined): DelimiterToken {
	const spaceBefore = before === undefined || WHITESPACE.test(before)
	const spaceAfter = after === undefined || WHITESPACE.test(after)
	let canOpen = !spaceAfter
	let canClose = !spaceBefore

	// Intraword underscores are literal (snake_case_names)
	if (char === '_') {
		canOpen = canOpen && !(before !== undefined && WORD_CHARACTER.test(before))
		canClose = canClose && !(after !== undefined && WORD_CHARACTER.test(after))
	}

	return { type: 'delimiter', char, length, canOpen, canClose, closes: [], leftover: 0, opens: [] }
}

function tokenize(text: string, inLink: boolean): InlineToken[] {
	const tokens: InlineToken[] = []
	let buffer = ''

	const flush = (): void => {
		if (buffer) {
			tokens.push({ type: 'text', text: buffer })
			buffer = ''
		}
	}

	let pairs: PairIndex | undefined
	let i = 0
	while (i < text.length) {
		const char = text[i] ?? ''
		const next = text[i + 1]

		if (char === '\\' && next !== undefined && ASCII_PUNCTUATION.test(next)) {
			buffer += next
			i += 2
			continue
		}

		if (char === '`') {
			const run = runLength(text, i, '`')
			const close = findCodeSpanClose(text, i + run, run)
			if (close === -1) {
				buffer += text.slice(i, i + run)
				i += run
				continue
			}
			flush()
			tokens.push({ type: 'code', text: normalizeCodeText(text.slice(i + run, close)) })
			i = close + run
			continue
		}

		if (char === '*' || char === '_' || char === '~') {
			const run = runLength(text, i, char)
			if (char === '~' && run !== 2) {
				buffer += text.slice(i, i + run)
				i += run
				continue
			}
			flush()
			tokens.push(createDelimiter(char, run, text[i - 1], text[i + run]))
			i += run
			continue
		}

		if (!inLink && (char === '[' || (char === '!' && next === '['))) {
			const isImage = char === '!'
			pairs ??= indexPairs(text)
			const link = parseLink(text, isImage ? i + 1 : i, pairs)
			if (link) {
				flush()
				const runs = resolveRuns(link.label, true)
				tokens.push({
					type: 'link',
					href: link.href,
					runs: runs.length > 0 ? runs : [{ text: link.href, marks: [] }],
				})
				i = link.end
				continue
			}
		}

		if (!inLink && char === '<') {
			const match = text.slice(i).match(AUTOLINK)
			if (match?.[1]) {
				flush()
				tokens.push({ type: 'link', href: match[1], runs: [{ text: match[1], marks: [] }] })
				i += match[0].length
				continue
			}
		}

		buffer += char
		i++
	}

	flush()
	return tokens
}

function containsCode(token: InlineToken): boolean {
	if (token.type === 'code') return true
	return token.type === 'link' && token.runs.some((run) => run.marks.some((mark) => mark.type === 'code'))
}

/**
 * Pair openers with closers. Results are recorded on the delimiter tokens themselves.
 */
function matchDelimiters(tokens: InlineToken[]): void {
	const stack: StackEntry[] = []
	// Entries below this index were opened before a code span and may not close after it
	let sealedBelow = 0

	for (const token of tokens) {
		if (containsCode(token)) {
			sealedBelow = stack.length
			continue
		}
		if (token.type !== 'delimiter') continue

		let remaining = token.length

		if (token.canClose) {
			while (remaining > 0) {
				const index = findOpener(stack, token.char)
				const entry = index === -1 ? undefined : stack[index]
				if (!entry || index < sealedBelow || entry.open.size > remaining) break

				// Openers nested inside the one being closed can no longer match
				stack.splice(index)
				sealedBelow = Math.min(sealedBelow, stack.length)
				entry.open.matched = true
				token.closes.push(entry.open.mark)
				remaining -= entry.open.size
			}
		}

		if (remaining > 0 && token.canOpen && token.closes.length === 0) {
			for (const open of openingMarks(token.char, remaining)) {
				token.opens.push(open)
				stack.push({ token, open })
				remaining -= open.size
			}
		}

		token.leftover = remaining
	}
}

function findOpener(stack: StackEntry[], char: DelimiterChar): number {
	for (let i = stack.length - 1; i >= 0; i--) {
		if (stack[i]?.token.char === char) return i
	}
	return -1
}

function openingMarks(char: DelimiterChar, available: number): PendingOpen[] {
	if (char === '~') {
		return [{ mark: 'strike', size: 2, matched: false }]
	}
	if (available >= 3) {
		return [
			{ mark: 'strong', size: 2, matched: false },
			{ mark: 'em', size: 1, matched: false },
		]
	}
	if (available === 2) {
		return [{ mark: 'strong', size: 2, matched: false }]
	}
	return [{ mark: 'em', size: 1, matched: false }]
}

export function sortMarks(marks: AdfMark[]): AdfMark[] {
	const seen = new Set<MarkType>()
	const unique = marks.filter((mark) => {
		if (seen.has(mark.type)) return false
		seen.add(mark.type)
		return true
	})
	return unique.sort((a, b) => MARK_ORDER.indexOf(a.type) - MARK_ORDER.indexOf(b.type))
}

function sameMarks(a: AdfMark[], b: AdfMark[]): boolean {
	if (a.length !== b.length) return false
	return a.every((mark, i) => {
		const other = b[i]
		if (!other || other.type !== mark.type) return false
		if (mark.type === 'link' && other.type === 'link') return mark.attrs.href === other.attrs.href
		return true
	})
}

/**
 * Accumulates runs, merging neighbours that carry identical marks
 */
class RunBuilder {
	readonly runs: InlineRun[] = []

	push(text: string, marks: AdfMark[]): void {
		if (!text) return
		const sorted = sortMarks(marks)
		const last = this.runs[this.runs.length - 1]
		if (last && sameMarks(last.marks, sorted)) {
			last.text += text
			return
		}
		this.runs.push({ text, marks: sorted })
	}
}

function emit(tokens: InlineToken[]): InlineRun[] {
	const builder = new RunBuilder()
	const active = new Map<StackMark, number>()

	const activeMarks = (): AdfMark[] => {
		const marks: AdfMark[] = []
		for (const [mark, count] of active) {
			if (count > 0) marks.push({ type: mark })
		}
		return marks
	}
	const adjust = (mark: StackMark, delta: number): void => {
		active.set(mark, (active.get(mark) ?? 0) + delta)
	}

	for (const token of tokens) {
		switch (token.type) {
			case 'text':
				builder.push(token.text, activeMarks())
				break
			case 'code':
				builder.push(token.text, [{ type: 'code' }])
				break
			case 'link': {
				const link: AdfMark = { type: 'link', attrs: { href: token.href } }
				for (const run of token.runs) {
					const isCode = run.marks.some((mark) => mark.type === 'code')
					builder.push(run.text, isCode ? [link, { type: 'code' }] : [link, ...run.marks, ...activeMarks()])
				}
				break
			}
			case 'delimiter':
				for (const mark of token.closes) adjust(mark, -1)
				builder.push(token.char.repeat(token.leftover), activeMarks())
				for (const open of token.opens) {
					if (open.matched) {
						adjust(open.mark, 1)
					} else {
						builder.push(token.char.repeat(open.size), activeMarks())
					}
				}
				break
		}
	}

	return builder.runs
}

function resolveRuns(text: string, inLink: boolean): InlineRun[] {
	const tokens = tokenize(text, inLink)
	matchDelimiters(tokens)
	return emit(tokens)
}

/**
 * Resolve a block's raw text into ordered text runs. Line breaks inside the block are joined with a space.
 * Never throws on malformed emphasis: unmatched markers come back as literal characters.
 */
export function resolveInlines(text: string): InlineRun[] {
	const joined = text.replace(/(?:\\|[ \t]*)\r?\n[ \t]*/g, ' ')
	return resolveRuns(joined, false)
}
