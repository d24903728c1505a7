import { readFile as fsReadFile } from 'node:fs/promises';
import path from 'node:path';
import * as cheerio from 'cheerio';
import type { ParsedSource, SourceFormat, TextSource } from '../types';
import { segmentText } from './tokenizer';

export type ParseErrorReason = 'unsupported-extension' | 'malformed-content' | 'io-failure';

export class ParseError extends Error {
  readonly reason: ParseErrorReason;

  constructor(reason: ParseErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
    this.reason = reason;
  }
}

/**
 * Turns the raw bytes of one source format into words.
 */
export interface SourceParser {
  readonly format: SourceFormat;
  readonly extensions: readonly string[];
  parse(content: Uint8Array | string): ParsedSource;
}

function decodeUtf8(content: Uint8Array | string): string {
  if (typeof content === 'string') return content;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(content);
  } catch (err) {
    throw new ParseError('malformed-content', 'Content is not valid UTF-8', { cause: err });
  }
}

export const plainTextParser: SourceParser = {
  format: 'text',
  extensions: ['txt', 'text', 'md'],
  parse(content) {
    return { words: segmentText(decodeUtf8(content)) };
  },
};

// Leaf-most block elements become paragraphs
const BLOCK_SELECTOR = 'p, h1, h2, h3, h4, h5, h6, li, blockquote, pre, td, dt, dd';
const UNWANTED_SELECTOR = 'script, style, nav, header, footer, aside, noscript';

/**
 * Reduce an HTML or XHTML document to plain paragraphs separated by blank lines.
 */
export function extractMarkupSections(markup: string): { title?: string; sections: string[] } {
  const $ = cheerio.load(markup);
  $(UNWANTED_SELECTOR).remove();

  const title = ($('title').first().text() || $('h1').first().text()).replace(/\s+/g, ' ').trim();

  const sections: string[] = [];
  $(BLOCK_SELECTOR).each((_, el) => {
    const block = $(el);
    if (block.find(BLOCK_SELECTOR).length > 0) return;
    const text = block.text().replace(/\s+/g, ' ').trim();
    if (text.length > 0) sections.push(text);
  });

  if (sections.length === 0) {
    const bodyText = $('body').text().replace(/\s+/g, ' ').trim();
    if (bodyText.length > 0) sections.push(bodyText);
  }

  return { title: title.length > 0 ? title : undefined, sections };
}

export const markupParser: SourceParser = {
  format: 'markup',
  extensions: ['html', 'htm', 'xhtml'],
  parse(content) {
    const { title, sections } = extractMarkupSections(decodeUtf8(content));
    if (sections.length === 0) {
      throw new ParseError('malformed-content', 'Document contains no readable text');
    }
    return { title, words: segmentText(sections.join('\n\n')) };
  },
};

const PARSERS: readonly SourceParser[] = [plainTextParser, markupParser];

function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * Returns an appropriate parser for the given file path, or null if unsupported.
 */
export function parserForPath(filePath: string): SourceParser | null {
  const ext = extensionOf(filePath);
  return PARSERS.find(parser => parser.extensions.includes(ext)) ?? null;
}

export function supportedExtensions(): string[] {
  return PARSERS.flatMap(parser => parser.extensions);
}

/**
 * Tab name suggested by a file path: the file name without its extension.
 */
export function fileStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath)) || 'Untitled';
}

export interface ParseSourceOptions {
  signal?: AbortSignal;
  readFile?: (filePath: string, signal?: AbortSignal) => Promise<Uint8Array>;
}

function defaultReadFile(filePath: string, signal?: AbortSignal): Promise<Uint8Array> {
  return fsReadFile(filePath, { signal });
}

/**
 * Read and segment a source. Never returns a partial sequence: any failure
 * rejects with a ParseError. An abort rejects with the signal's reason.
 */
export async function parseSource(
  source: TextSource,
  options: ParseSourceOptions = {}
): Promise<ParsedSource> {
  const { signal, readFile = defaultReadFile } = options;
  signal?.throwIfAborted();

  if (source.kind === 'text') {
    return plainTextParser.parse(source.text);
  }

  const parser = parserForPath(source.path);
  if (!parser) {
    throw new ParseError(
      'unsupported-extension',
      `No parser for '${path.basename(source.path)}' (supported: ${supportedExtensions().join(', ')})`
    );
  }

  let bytes: Uint8Array;
  try {
    bytes = await readFile(source.path, signal);
  } catch (err) {
    signal?.throwIfAborted();
    throw new ParseError('io-failure', `Failed to read '${source.path}'`, { cause: err });
  }
  signal?.throwIfAborted();

  return parser.parse(bytes);
}
