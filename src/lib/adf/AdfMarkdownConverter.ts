// AdfMarkdownConverter - Converts markdown into Atlassian Document Format for Jira fields
//
// Pipeline: segment blocks -> map to ADF nodes -> assemble -> guard. Conversion never throws;
// unexpected failures fall back to a plain-text document so issue writes still go through.

import { getLogger } from '../../utils/logger-context.js'
import { mapBlocks, literalParagraph, type SourceMap } from './BlockMapper.js'
import { segmentBlocks } from './BlockSegmenter.js'
import { assembleDocument } from './DocumentAssembler.js'
import { guardDocument } from './FallbackGuard.js'
import { resolveConverterOptions, type AdfDocument, type ConverterOptions } from './types.js'

/**
 * Document holding the input as literal paragraphs, one per blank-line separated chunk
 */
export function plainTextDocument(markdown: string): AdfDocument {
	const paragraphs = markdown
		.replace(/\r\n?/g, '\n')
		.split(/\n[ \t]*\n/)
		.map((chunk) => chunk.trim())
		.filter((chunk) => chunk.length > 0)
		.map((chunk) => literalParagraph(chunk))
	return assembleDocument(paragraphs)
}

/**
 * Convert markdown to an ADF document
 *
 * The result always satisfies the ADF structure Jira validates against. Constructs the
 * converter cannot express (headings inside lists, nesting past `maxNestingDepth`) are
 * flattened or kept as literal text rather than dropped.
 */
export function markdownToAdf(markdown: string, options: ConverterOptions = {}): AdfDocument {
	try {
		const resolved = resolveConverterOptions(options)
		const sources: SourceMap = new WeakMap()
		const spans = segmentBlocks(markdown, resolved)
		const blocks = mapBlocks(spans, { depth: 0, container: 'doc', options: resolved, sources })
		const { document, defects } = guardDocument(assembleDocument(blocks), sources)
		if (defects > 0) {
			getLogger().debug(`Markdown conversion repaired ${defects} invalid ADF node(s)`)
		}
		return document
	} catch (error) {
		const message = error instanceof Error ? error.message : 'Unknown error'
		getLogger().error(`Markdown to ADF conversion failed, sending plain text: ${message}`)
		return plainTextDocument(markdown)
	}
}
