/**
 * Conversion Module - document to Markdown
 */

export { MarkdownConverter } from './conversion.service';
export { createMarkitdownExtractor, isMarkitdownAvailable } from './providers';
export { cleanMarkdownContent } from './utils/markdownCleaner';
export * from './conversion.types';
