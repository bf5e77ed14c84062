/**
 * Text Extraction
 *
 * Turns uploaded file bytes into plain text:
 * - .pdf via pdfjs-dist, page by page (unreadable pages are skipped)
 * - .docx via mammoth
 * - .txt / .md by decoding with the first encoding that fits
 *
 * Extraction never throws for bad input. A file that cannot be read yields
 * an empty string and a warning; callers decide what to tell the user.
 */

import * as path from 'node:path';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import mammoth from 'mammoth';

import { consoleLogger, type Logger } from '../../utils/index.js';

export type FileKind = 'pdf' | 'docx' | 'text';

/**
 * An uploaded file: a display name plus its raw bytes.
 */
export interface UploadedFile {
  name: string;
  data: Uint8Array;
}

const EXTENSION_TO_KIND: Record<string, FileKind> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'text',
  '.md': 'text',
};

export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_TO_KIND);

/**
 * Map a filename to the extractor that handles it.
 * Returns null for unsupported extensions.
 */
export function detectFileKind(filename: string): FileKind | null {
  return EXTENSION_TO_KIND[path.extname(filename).toLowerCase()] ?? null;
}

function tryDecode(data: Uint8Array, encoding: string): string | null {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(data);
  } catch {
    return null;
  }
}

/**
 * Decode text bytes: strict UTF-8, then strict UTF-16 (little-endian unless
 * a big-endian BOM says otherwise), then Latin-1. Latin-1 maps every byte,
 * so decoding always produces a string.
 */
export function decodeText(data: Uint8Array): string {
  const utf8 = tryDecode(data, 'utf-8');
  if (utf8 !== null) {
    return utf8;
  }

  const bigEndian = data.length >= 2 && data[0] === 0xfe && data[1] === 0xff;
  const utf16 = tryDecode(data, bigEndian ? 'utf-16be' : 'utf-16le');
  if (utf16 !== null) {
    return utf16;
  }

  return Buffer.from(data).toString('latin1');
}

async function extractPdf(data: Uint8Array, logger: Logger): Promise<string> {
  // pdfjs transfers the buffer to its worker; hand it a copy
  const loadingTask = pdfjsLib.getDocument({ data: new Uint8Array(data) });
  const pdf = await loadingTask.promise;

  try {
    const pages: string[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      try {
        const page = await pdf.getPage(i);
        const content = await page.getTextContent();
        const pageText = content.items
          .map((item) => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
          .join('');
        pages.push(pageText);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.debug?.(`Skipping unreadable PDF page ${i}: ${message}`);
      }
    }
    return pages.join('\n');
  } finally {
    await loadingTask.destroy();
  }
}

async function extractDocx(data: Uint8Array): Promise<string> {
  const { value } = await mammoth.extractRawText({ buffer: Buffer.from(data) });
  return value;
}

/**
 * Extract text from file bytes of a known kind.
 * Unsupported kinds and unreadable files yield "".
 */
export async function extractText(
  data: Uint8Array,
  kind: FileKind | null,
  logger: Logger = consoleLogger
): Promise<string> {
  try {
    switch (kind) {
      case 'pdf':
        return await extractPdf(data, logger);
      case 'docx':
        return await extractDocx(data);
      case 'text':
        return decodeText(data);
      case null:
        return '';
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not extract ${kind} text: ${message}`);
    return '';
  }
}

/**
 * Detect the kind from the file name and extract its text.
 */
export async function readUploadedFile(
  file: UploadedFile,
  logger: Logger = consoleLogger
): Promise<string> {
  const kind = detectFileKind(file.name);
  if (kind === null) {
    logger.warn(
      `Unsupported file type: ${file.name} (supported: ${SUPPORTED_EXTENSIONS.join(', ')})`
    );
    return '';
  }
  return extractText(file.data, kind, logger);
}
