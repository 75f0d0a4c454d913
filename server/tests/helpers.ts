import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import pino from 'pino';
import { generateOutputPath, delay } from '../src/common/utils';
import type { ConversionOptions, ConversionResult, Converter } from '../src/modules/conversion';

export const silentLogger = pino({ level: 'silent' });

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'batch-test-'));
}

export async function touch(root: string, ...relativePaths: string[]): Promise<void> {
  for (const relativePath of relativePaths) {
    await fs.outputFile(path.join(root, relativePath), 'content');
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

type Handler = (inputPath: string, options: ConversionOptions) => Promise<ConversionResult>;

/**
 * Converter stand-in that records calls and peak concurrency
 */
export class FakeConverter implements Converter {
  readonly calls: string[] = [];
  readonly signals: AbortSignal[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly handler: Handler = succeedAfter(0)) {}

  async convert(inputPath: string, options: ConversionOptions): Promise<ConversionResult> {
    this.calls.push(inputPath);
    if (options.signal) this.signals.push(options.signal);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.handler(inputPath, options);
    } finally {
      this.active--;
    }
  }
}

export function succeedAfter(ms: number): Handler {
  return async inputPath => {
    await delay(ms);
    return { outputPath: generateOutputPath(inputPath), duration: ms };
  };
}
