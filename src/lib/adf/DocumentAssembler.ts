import type { AdfBlockNode, AdfDocument } from './types.js'

/**
 * Wrap mapped blocks in the ADF document envelope.
 * Content is never empty: blank input yields a single empty paragraph.
 */
export function assembleDocument(blocks: AdfBlockNode[]): AdfDocument {
	return {
		version: 1,
		type: 'doc',
		content: blocks.length > 0 ? blocks : [{ type: 'paragraph', content: [] }],
	}
}
