/**
 * Conversion Service - document to Markdown
 *
 * Steps for one file:
 *
 * 1. Copy the source into a private temp directory, so the extractor never
 *    holds a handle on the user's file
 * 2. Extract Markdown from the copy (markitdown by default)
 * 3. Prefix a File/Path header and clean the result
 * 4. Write <stem>.md next to the source
 */

import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { ConversionError } from '../../common/errors';
import type { Logger } from '../../common/logger';
import { generateOutputPath } from '../../common/utils';
import { ConversionOptions, ConversionResult, Converter, MarkdownExtractor } from './conversion.types';
import { buildHeader, cleanMarkdownContent } from './utils/markdownCleaner';

export interface MarkdownConverterOptions {
  extract: MarkdownExtractor;
  logger: Logger;
}

export class MarkdownConverter implements Converter {
  private readonly extract: MarkdownExtractor;
  private readonly log: Logger;

  constructor({ extract, logger }: MarkdownConverterOptions) {
    this.extract = extract;
    this.log = logger.child({ module: 'conversion' });
  }

  async convert(inputPath: string, options: ConversionOptions): Promise<ConversionResult> {
    const startTime = Date.now();
    const sourcePath = path.resolve(inputPath);

    if (!await fs.pathExists(sourcePath)) {
      throw new ConversionError(`File does not exist: ${inputPath}`);
    }

    const outputPath = generateOutputPath(sourcePath);
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'md-convert-'));
    const tempPath = path.join(tempDir, path.basename(sourcePath));

    this.log.info({ inputPath: sourcePath }, 'Starting conversion');

    try {
      try {
        await fs.copy(sourcePath, tempPath, { preserveTimestamps: true });
      } catch (err) {
        throw new ConversionError(
          'File is in use and cannot be accessed',
          err instanceof Error ? err.message : String(err)
        );
      }

      options.signal?.throwIfAborted();
      const markdown = await this.extract(tempPath, options);
      options.signal?.throwIfAborted();

      const content = cleanMarkdownContent(buildHeader(path.basename(sourcePath), sourcePath) + markdown);
      await fs.outputFile(outputPath, content, 'utf8');

      const duration = Date.now() - startTime;
      this.log.info({ inputPath: sourcePath, outputPath, duration }, 'Conversion successful');
      return { outputPath, duration };
    } finally {
      await fs.remove(tempDir).catch(err => {
        this.log.warn({ err, tempDir }, 'Failed to delete temp directory');
      });
    }
  }
}
