/**
 * Markdown cleanup applied to every converted document
 *
 * Strips classification banners, page counters and copyright lines that
 * document exporters repeat on every page, then normalizes whitespace.
 */

interface Replacement {
  pattern: RegExp;
  replacement: string;
}

const REPLACEMENTS: Replacement[] = [
  { pattern: /RESTRICTED, NON-SENSITIVE/gi, replacement: '' },
  { pattern: /RESTRICTED NON-SENSITIVE/gi, replacement: '' },
  { pattern: /RESTRICTED,NON-SENSITIVE/gi, replacement: '' },
  { pattern: /RESTRICTED - NON-SENSITIVE/gi, replacement: '' },
  { pattern: /RESTRICTED-NON-SENSITIVE/gi, replacement: '' },
  { pattern: /Page \d+ of \d+/gi, replacement: '' },
  { pattern: /Copyright.*\d{4}/gi, replacement: '' },
  { pattern: /# File:/gi, replacement: 'File:' },
  { pattern: /# Path:/gi, replacement: 'Path:' },
];

export function cleanMarkdownContent(content: string): string {
  if (!content) return '';

  let cleaned = content;
  for (const { pattern, replacement } of REPLACEMENTS) {
    cleaned = cleaned.replace(pattern, replacement);
  }

  return cleaned
    .replace(/\n{3,}/g, '\n\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/^[ \t]+$/gm, '')
    .trim();
}

/**
 * Header identifying the source document, prepended before cleaning
 */
export function buildHeader(fileName: string, absolutePath: string): string {
  return `# File: ${fileName}\n# Path: ${absolutePath}\n\n`;
}
