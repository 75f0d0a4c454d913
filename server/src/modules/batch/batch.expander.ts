/**
 * Pattern Expander - turns user-supplied paths and wildcards into source files
 *
 * Supported syntax per path segment: `*`, `?`, `[abc]` / `[!abc]`, and a
 * whole `**` segment for any number of directories. Results keep filesystem
 * traversal order; nothing is re-sorted.
 */

import path from 'path';
import fs from 'fs-extra';
import type { Dirent } from 'fs';
import type { Logger } from '../../common/logger';
import { getExtension, hasGlobMagic } from '../../common/utils';
import { ExpansionResult } from './batch.types';

export interface PatternExpanderOptions {
  baseDir: string;
  supportedExtensions: readonly string[];
  logger: Logger;
}

type EntryKind = 'file' | 'dir' | 'other';

const GLOBSTAR = '**';
const NEVER_MATCHES = /(?!)/;
const caseInsensitive = process.platform === 'win32';

export class PatternExpander {
  private readonly baseDir: string;
  private readonly extensions: ReadonlySet<string>;
  private readonly log: Logger;

  constructor(options: PatternExpanderOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.extensions = new Set(options.supportedExtensions.map(ext => ext.toLowerCase()));
    this.log = options.logger.child({ module: 'expander' });
  }

  /**
   * Expand patterns in input order. A file reached by several patterns is kept
   * at its first position; a pattern that yields no supported file is reported
   * as unmatched.
   */
  async expand(patterns: readonly string[]): Promise<ExpansionResult> {
    const seen = new Set<string>();
    const files: string[] = [];
    const unmatched: string[] = [];

    for (const raw of patterns) {
      const pattern = raw.trim();
      if (!pattern) continue;

      const matches = (await this.resolvePattern(pattern)).filter(file => this.isSupported(file));
      if (matches.length === 0) {
        this.log.debug({ pattern }, 'Pattern matched no supported files');
        unmatched.push(pattern);
        continue;
      }

      for (const file of matches) {
        if (seen.has(file)) continue;
        seen.add(file);
        files.push(file);
      }
    }

    return { files, unmatched };
  }

  isSupported(filePath: string): boolean {
    return this.extensions.has(getExtension(filePath));
  }

  private async resolvePattern(pattern: string): Promise<string[]> {
    const absolute = path.resolve(this.baseDir, normalizeSeparators(pattern));

    // An existing path is taken literally, even when its name contains [ or ?
    const kind = await this.kindOf(absolute);
    if (kind === 'file') return [absolute];
    if (kind === 'dir') return this.filesIn(absolute);

    if (!hasGlobMagic(pattern)) return [];

    const segments = absolute.split(path.sep);
    const firstMagic = segments.findIndex(segment => segment === GLOBSTAR || hasGlobMagic(segment));
    const root = segments.slice(0, firstMagic).join(path.sep) || path.sep;

    const found: string[] = [];
    await this.walk(root, segments.slice(firstMagic), 0, found);
    return [...new Set(found)];
  }

  private async walk(dir: string, segments: string[], index: number, found: string[]): Promise<void> {
    const segment = segments[index];
    const isLast = index === segments.length - 1;

    if (segment === GLOBSTAR) {
      if (!isLast) {
        await this.walk(dir, segments, index + 1, found);
      }
      for (const entry of await this.list(dir)) {
        if (isHidden(entry.name)) continue;
        const child = path.join(dir, entry.name);
        // Symlinked directories are not followed here, so cycles cannot recurse forever
        if (entry.isDirectory()) {
          await this.walk(child, segments, index, found);
        } else if (isLast && (await this.kindOfEntry(child, entry)) === 'file') {
          found.push(child);
        }
      }
      return;
    }

    if (!hasGlobMagic(segment)) {
      const child = path.join(dir, segment);
      const kind = await this.kindOf(child);
      if (isLast && kind === 'file') found.push(child);
      if (!isLast && kind === 'dir') await this.walk(child, segments, index + 1, found);
      return;
    }

    const matcher = segmentToRegExp(segment);
    const matchHidden = segment.startsWith('.');

    for (const entry of await this.list(dir)) {
      if (!matchHidden && isHidden(entry.name)) continue;
      if (!matcher.test(entry.name)) continue;

      const child = path.join(dir, entry.name);
      const kind = await this.kindOfEntry(child, entry);
      if (isLast && kind === 'file') found.push(child);
      if (!isLast && kind === 'dir') await this.walk(child, segments, index + 1, found);
    }
  }

  /**
   * Supported files directly inside a directory named as a literal path
   */
  private async filesIn(dir: string): Promise<string[]> {
    const files: string[] = [];
    for (const entry of await this.list(dir)) {
      if (isHidden(entry.name)) continue;
      const child = path.join(dir, entry.name);
      if ((await this.kindOfEntry(child, entry)) === 'file') files.push(child);
    }
    return files;
  }

  private async list(dir: string): Promise<Dirent[]> {
    try {
      return await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.log.debug({ err, dir }, 'Skipping unreadable directory');
      return [];
    }
  }

  private async kindOf(target: string): Promise<EntryKind | null> {
    try {
      const stats = await fs.stat(target);
      if (stats.isFile()) return 'file';
      if (stats.isDirectory()) return 'dir';
      return 'other';
    } catch {
      return null;
    }
  }

  private async kindOfEntry(target: string, entry: Dirent): Promise<EntryKind | null> {
    if (entry.isFile()) return 'file';
    if (entry.isDirectory()) return 'dir';
    if (entry.isSymbolicLink()) return this.kindOf(target);
    return 'other';
  }
}

/**
 * Compile one path segment of a wildcard pattern
 */
export function segmentToRegExp(segment: string): RegExp {
  let source = '';

  for (let i = 0; i < segment.length; i++) {
    const char = segment[i];

    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      let start = i + 1;
      const negated = segment[start] === '!';
      if (negated) start++;
      // A ] right after the opening bracket is a member, not the end
      const close = segment.indexOf(']', start + 1);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      const body = segment
        .slice(start, close)
        .replace(/\\/g, '\\\\')
        .replace(/^[\]^]/, '\\$&');
      source += `[${negated ? '^' : ''}${body}]`;
      i = close;
    } else {
      source += char.replace(/[.+^${}()|\]\\]/g, '\\$&');
    }
  }

  try {
    return new RegExp(`^${source}$`, caseInsensitive ? 'i' : '');
  } catch {
    // e.g. a reversed range such as [z-a]
    return NEVER_MATCHES;
  }
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

function normalizeSeparators(pattern: string): string {
  return path.sep === '\\' ? pattern.replace(/\//g, '\\') : pattern;
}
