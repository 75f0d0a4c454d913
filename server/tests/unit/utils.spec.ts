import { describe, it, expect } from 'vitest';
import { generateOutputPath, getExtension, hasGlobMagic } from '../../src/common/utils';
import { ConversionError, ConversionTimeoutError, ValidationError, describeError } from '../../src/common/errors';
import { isTerminalStatus } from '../../src/common/constants';

describe('utils', () => {
  it('derives the Markdown output path beside the source', () => {
    expect(generateOutputPath('/docs/report.pdf')).toBe('/docs/report.md');
    expect(generateOutputPath('/docs/archive.tar.docx')).toBe('/docs/archive.tar.md');
    expect(generateOutputPath('/docs/notes.md')).toBe('/docs/notes.converted.md');
    expect(generateOutputPath('/docs/NOTES.MD')).toBe('/docs/NOTES.converted.md');
  });

  it('reads extensions in lower case without the dot', () => {
    expect(getExtension('/docs/Report.PDF')).toBe('pdf');
    expect(getExtension('/docs/README')).toBe('');
  });

  it('detects wildcard characters', () => {
    expect(hasGlobMagic('docs/*.pdf')).toBe(true);
    expect(hasGlobMagic('docs/file?.pdf')).toBe(true);
    expect(hasGlobMagic('docs/[ab].pdf')).toBe(true);
    expect(hasGlobMagic('docs/report.pdf')).toBe(false);
  });

  it('knows which statuses are terminal', () => {
    expect(isTerminalStatus('Completed')).toBe(true);
    expect(isTerminalStatus('Error')).toBe(true);
    expect(isTerminalStatus('Queued')).toBe(false);
    expect(isTerminalStatus('Processing')).toBe(false);
  });
});

describe('errors', () => {
  it('carries status codes and stable codes', () => {
    const timeout = new ConversionTimeoutError(30);

    expect(timeout.message).toBe('Conversion timed out after 30s');
    expect(timeout.statusCode).toBe(504);
    expect(timeout.code).toBe('CONVERSION_TIMEOUT');
    expect(timeout.name).toBe('ConversionTimeoutError');
    expect(new ValidationError('bad').statusCode).toBe(400);
  });

  it('describes errors for status messages', () => {
    expect(describeError(new ConversionError('failed', 'stderr line'))).toBe('failed: stderr line');
    expect(describeError(new ConversionError('failed'))).toBe('failed');
    expect(describeError(new TypeError('wrong type'))).toBe('wrong type');
    expect(describeError('plain')).toBe('plain');
  });
});
