import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MarkdownConverter } from '../../src/modules/conversion/conversion.service';
import { ConversionError } from '../../src/common/errors';
import type { MarkdownExtractor } from '../../src/modules/conversion';
import { makeTempDir, silentLogger, touch } from '../helpers';

describe('MarkdownConverter', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await touch(root, 'report.pdf', 'notes.md');
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('writes cleaned Markdown with a header next to the source', async () => {
    const extract = vi.fn<MarkdownExtractor>(async () => 'Hello   world\n\n\n\nPage 1 of 2\nbody');
    const converter = new MarkdownConverter({ extract, logger: silentLogger });
    const source = path.join(root, 'report.pdf');

    const result = await converter.convert(source, { timeoutSeconds: 5 });

    expect(result.outputPath).toBe(path.join(root, 'report.md'));
    expect(await fs.readFile(result.outputPath, 'utf8')).toBe(
      `File: report.pdf\nPath: ${source}\n\nHello world\n\nbody`
    );
  });

  it('extracts from a temporary copy and removes it afterwards', async () => {
    let seenPath = '';
    let copyExisted = false;
    const converter = new MarkdownConverter({
      extract: async inputPath => {
        seenPath = inputPath;
        copyExisted = await fs.pathExists(inputPath);
        return 'text';
      },
      logger: silentLogger,
    });

    await converter.convert(path.join(root, 'report.pdf'), { timeoutSeconds: 5 });

    expect(path.basename(seenPath)).toBe('report.pdf');
    expect(path.dirname(seenPath)).not.toBe(root);
    expect(copyExisted).toBe(true);
    expect(await fs.pathExists(path.dirname(seenPath))).toBe(false);
    expect(await fs.pathExists(path.join(root, 'report.pdf'))).toBe(true);
  });

  it('never overwrites a Markdown source', async () => {
    const converter = new MarkdownConverter({ extract: async () => 'converted', logger: silentLogger });

    const result = await converter.convert(path.join(root, 'notes.md'), { timeoutSeconds: 5 });

    expect(result.outputPath).toBe(path.join(root, 'notes.converted.md'));
    expect(await fs.readFile(path.join(root, 'notes.md'), 'utf8')).toBe('content');
  });

  it('fails for a source that does not exist', async () => {
    const extract = vi.fn<MarkdownExtractor>(async () => 'unused');
    const converter = new MarkdownConverter({ extract, logger: silentLogger });
    const missing = path.join(root, 'missing.pdf');

    await expect(converter.convert(missing, { timeoutSeconds: 5 })).rejects.toThrow(`File does not exist: ${missing}`);
    expect(extract).not.toHaveBeenCalled();
  });

  it('passes extractor failures through and writes nothing', async () => {
    const failure = new ConversionError('markitdown conversion failed with exit code 1', 'unsupported');
    const converter = new MarkdownConverter({
      extract: async () => {
        throw failure;
      },
      logger: silentLogger,
    });

    await expect(converter.convert(path.join(root, 'report.pdf'), { timeoutSeconds: 5 })).rejects.toBe(failure);
    expect(await fs.pathExists(path.join(root, 'report.md'))).toBe(false);
  });

  it('stops before extracting when the signal is already aborted', async () => {
    const extract = vi.fn<MarkdownExtractor>(async () => 'unused');
    const converter = new MarkdownConverter({ extract, logger: silentLogger });
    const controller = new AbortController();
    controller.abort();

    await expect(
      converter.convert(path.join(root, 'report.pdf'), { timeoutSeconds: 5, signal: controller.signal })
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(extract).not.toHaveBeenCalled();
    expect(await fs.pathExists(path.join(root, 'report.md'))).toBe(false);
  });
});
