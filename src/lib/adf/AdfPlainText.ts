// Plain text extraction from ADF trees, used for search result summaries and literal fallbacks

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Nodes whose children are inline and concatenate without separators
const INLINE_PARENTS = new Set(['paragraph', 'heading', 'codeBlock', 'taskItem', 'decisionItem'])

function inlineLeafText(node: Record<string, unknown>): string | null {
	const attrs = isRecord(node.attrs) ? node.attrs : {}
	switch (node.type) {
		case 'text':
			return typeof node.text === 'string' ? node.text : ''
		case 'hardBreak':
			return '\n'
		case 'mention':
			return typeof attrs.text === 'string' ? attrs.text : ''
		case 'emoji':
			return typeof attrs.shortName === 'string' ? attrs.shortName : ''
		case 'inlineCard':
			return typeof attrs.url === 'string' ? attrs.url : ''
		default:
			return null
	}
}

/**
 * Collect the text of an ADF node (or any JSON value shaped like one).
 * Block children are separated by newlines.
 */
export function getPlainText(node: unknown): string {
	if (typeof node === 'string') return node
	if (!isRecord(node)) return ''

	const leaf = inlineLeafText(node)
	if (leaf !== null) return leaf
	if (!Array.isArray(node.content)) return ''

	const separator = typeof node.type === 'string' && INLINE_PARENTS.has(node.type) ? '' : '\n'
	return node.content.map((child) => getPlainText(child)).join(separator)
}
