import { describe, it, expect, vi } from 'vitest'
import fc from 'fast-check'
import { markdownToAdf } from './AdfMarkdownConverter.js'
import { guardDocument } from './FallbackGuard.js'
import { MARK_ORDER, type AdfBlockNode, type AdfText } from './types.js'

vi.mock('../../utils/logger-context.js', () => ({
	getLogger: () => ({
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}))

// Markdown-flavoured fragments so generated input actually exercises the block and inline rules
const fragment = fc.constantFrom(
	'# ', '## ', '- ', '  - ', '    - ', '1. ', '> ', '>> ', '```', '~~~', '| ', ' |', '|---|', '---',
	'*', '**', '_', '~~', '`', '[', '](', ')', '<', '>', '\\', 'text', 'more words', ' ', '\n', '\n\n', '\t'
)
const markdown = fc.oneof(fc.string(), fc.array(fragment, { maxLength: 40 }).map((parts) => parts.join('')))

function collectText(nodes: AdfBlockNode[]): AdfText[] {
	const texts: AdfText[] = []
	const visit = (node: AdfBlockNode): void => {
		switch (node.type) {
			case 'paragraph':
			case 'heading':
			case 'codeBlock':
				texts.push(...node.content)
				break
			case 'bulletList':
			case 'orderedList':
				for (const item of node.content) item.content.forEach(visit)
				break
			case 'blockquote':
				node.content.forEach(visit)
				break
			case 'table':
				for (const row of node.content) for (const cell of row.content) cell.content.forEach(visit)
				break
			case 'rule':
				break
		}
	}
	nodes.forEach(visit)
	return texts
}

function nesting(nodes: AdfBlockNode[]): number {
	let deepest = 0
	for (const node of nodes) {
		if (node.type === 'bulletList' || node.type === 'orderedList') {
			for (const item of node.content) deepest = Math.max(deepest, 1 + nesting(item.content))
		} else if (node.type === 'blockquote') {
			deepest = Math.max(deepest, 1 + nesting(node.content))
		} else if (node.type === 'table') {
			for (const row of node.content) for (const cell of row.content) deepest = Math.max(deepest, nesting(cell.content))
		}
	}
	return deepest
}

describe('markdownToAdf property tests', () => {
	it('should always produce a non-empty document that needs no repair', () => {
		fc.assert(
			fc.property(markdown, (input) => {
				const document = markdownToAdf(input)

				expect(document.version).toBe(1)
				expect(document.type).toBe('doc')
				expect(document.content.length).toBeGreaterThan(0)
				expect(guardDocument(document).defects).toBe(0)
			})
		)
	})

	it('should never emit empty text nodes or duplicate marks', () => {
		fc.assert(
			fc.property(markdown, (input) => {
				for (const text of collectText(markdownToAdf(input).content)) {
					expect(text.text.length).toBeGreaterThan(0)
					const types = (text.marks ?? []).map((mark) => mark.type)
					expect(new Set(types).size).toBe(types.length)
					expect([...types].sort((a, b) => MARK_ORDER.indexOf(a) - MARK_ORDER.indexOf(b))).toEqual(types)
					if (types.includes('code')) {
						expect(types.every((type) => type === 'code' || type === 'link')).toBe(true)
					}
				}
			})
		)
	})

	it('should respect the nesting limit', () => {
		fc.assert(
			fc.property(markdown, fc.integer({ min: 1, max: 4 }), (input, maxNestingDepth) => {
				expect(nesting(markdownToAdf(input, { maxNestingDepth }).content)).toBeLessThanOrEqual(maxNestingDepth)
			})
		)
	})

	it('should be deterministic', () => {
		fc.assert(
			fc.property(markdown, (input) => {
				expect(markdownToAdf(input)).toEqual(markdownToAdf(input))
			})
		)
	})

	it('should keep every word of plain text', () => {
		fc.assert(
			fc.property(fc.array(fc.stringMatching(/^[a-z]{1,8}$/), { minLength: 1, maxLength: 20 }), (words) => {
				const text = collectText(markdownToAdf(words.join(' ')).content)
					.map((node) => node.text)
					.join('')
				expect(text).toBe(words.join(' '))
			})
		)
	})
})
