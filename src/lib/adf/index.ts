export { markdownToAdf, plainTextDocument } from './AdfMarkdownConverter.js'
export { getPlainText } from './AdfPlainText.js'
export { guardDocument, type GuardResult } from './FallbackGuard.js'
export { segmentBlocks } from './BlockSegmenter.js'
export { resolveInlines } from './InlineResolver.js'
export * from './types.js'
