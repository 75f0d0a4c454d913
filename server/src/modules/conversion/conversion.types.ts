/**
 * Conversion collaborator contract
 */

export interface ConversionOptions {
  /** Wall-clock budget the caller enforces; providers may use it for their own child processes */
  timeoutSeconds: number;
  /** Fired when the caller gives up on the conversion */
  signal?: AbortSignal;
}

export interface ConversionResult {
  outputPath: string;
  duration: number;
}

/**
 * Turns one source document into a derived file next to it.
 * Failures are thrown as ConversionError.
 */
export interface Converter {
  convert(inputPath: string, options: ConversionOptions): Promise<ConversionResult>;
}

/**
 * Extracts raw Markdown text from a document
 */
export type MarkdownExtractor = (inputPath: string, options: ConversionOptions) => Promise<string>;
