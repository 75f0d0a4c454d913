/**
 * markitdown Provider - runs the markitdown CLI and captures its Markdown output
 *
 * markitdown reads PDF, Word, PowerPoint and plain text files and prints
 * Markdown on stdout. The child process is killed when the caller's signal
 * fires or when its own timeout elapses.
 */

import { spawn } from 'child_process';
import { ConversionError } from '../../../common/errors';
import type { Logger } from '../../../common/logger';
import { ConversionOptions, MarkdownExtractor } from '../conversion.types';

export interface MarkitdownOptions {
  command: string;
  logger: Logger;
}

/**
 * Build an extractor bound to a markitdown executable
 */
export function createMarkitdownExtractor({ command, logger }: MarkitdownOptions): MarkdownExtractor {
  const log = logger.child({ module: 'markitdown' });

  return (inputPath: string, options: ConversionOptions) =>
    new Promise<string>((resolve, reject) => {
      log.debug({ command, inputPath }, 'Running markitdown');

      const proc = spawn(command, [inputPath], {
        signal: options.signal,
        timeout: Math.ceil(options.timeoutSeconds * 1000),
        windowsHide: true,
      });

      const stdout: Buffer[] = [];
      let stderr = '';

      proc.stdout.on('data', (chunk: Buffer) => {
        stdout.push(chunk);
      });

      proc.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      proc.on('error', error => {
        log.error({ err: error, inputPath }, 'markitdown process error');
        reject(new ConversionError(`markitdown process error: ${error.message}`));
      });

      proc.on('close', (code, signal) => {
        if (code !== 0) {
          const reason = signal ? `was terminated by ${signal}` : `failed with exit code ${code}`;
          reject(new ConversionError(`markitdown conversion ${reason}`, lastLine(stderr)));
          return;
        }
        resolve(Buffer.concat(stdout).toString('utf8'));
      });
    });
}

/**
 * Check if the markitdown command can be started
 */
export async function isMarkitdownAvailable(command: string): Promise<boolean> {
  return new Promise(resolve => {
    const proc = spawn(command, ['--version'], { timeout: 10000, windowsHide: true });
    proc.on('error', () => resolve(false));
    proc.on('close', code => resolve(code === 0));
  });
}

function lastLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
  return lines.length > 0 ? lines[lines.length - 1] : undefined;
}
