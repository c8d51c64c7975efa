/**
 * File Parser Utility
 *
 * Extracts page texts from book files:
 * - PDF (.pdf), one page per PDF page
 * - Plain text (.txt) and Markdown (.md), pages separated by form feeds
 * - Word documents (.docx), a single page
 */

import mammoth from 'mammoth';
import { PDFParse } from 'pdf-parse';
import { InvalidInputError } from '@/lib/rag/errors';

// =============================================================================
// Types
// =============================================================================

export interface ParseResult {
  content: string;     // Pages joined with a blank line
  pages: string[];
  metadata: {
    pageCount: number;
    wordCount: number;
    charCount: number;
  };
}

export type SupportedMimeType =
  | 'application/pdf'
  | 'text/plain'
  | 'text/markdown'
  | 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md', '.docx'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const MIME_TYPE_MAP: Record<SupportedExtension, SupportedMimeType> = {
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

export const MAX_FILE_SIZE = 50 * 1024 * 1024; // 50MB, long novels as PDF

const PAGE_SEPARATOR = '\f';

// =============================================================================
// File Type Detection
// =============================================================================

/**
 * Get file extension from filename.
 */
export function getFileExtension(filename: string): string {
  const lastDot = filename.lastIndexOf('.');
  if (lastDot === -1) return '';
  return filename.slice(lastDot).toLowerCase();
}

function toSupportedExtension(filename: string): SupportedExtension | null {
  const ext = getFileExtension(filename);
  return SUPPORTED_EXTENSIONS.find(supported => supported === ext) ?? null;
}

/**
 * Check if file type is supported.
 */
export function isSupportedFileType(filename: string): boolean {
  return toSupportedExtension(filename) !== null;
}

/**
 * Get MIME type from filename.
 */
export function getMimeType(filename: string): SupportedMimeType | null {
  const ext = toSupportedExtension(filename);
  return ext ? MIME_TYPE_MAP[ext] : null;
}

// =============================================================================
// Parsers
// =============================================================================

function normalizePage(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function toResult(pages: string[]): ParseResult {
  const content = pages.join('\n\n');

  return {
    content,
    pages,
    metadata: {
      pageCount: pages.length,
      wordCount: content.split(/\s+/).filter(Boolean).length,
      charCount: content.length,
    },
  };
}

/**
 * Parse PDF file, keeping page boundaries for citations.
 * Blank pages stay in place so page numbers match the printed book.
 */
async function parsePDF(buffer: Buffer): Promise<ParseResult> {
  const parser = new PDFParse({ data: buffer });

  try {
    const result = await parser.getText();
    return toResult(result.pages.map(page => normalizePage(page.text)));
  } finally {
    await parser.destroy();
  }
}

/**
 * Parse plain text or Markdown. Form feeds mark page breaks;
 * trailing empty pages are dropped.
 */
async function parseText(buffer: Buffer): Promise<ParseResult> {
  const pages = buffer.toString('utf-8').split(PAGE_SEPARATOR).map(normalizePage);

  while (pages.length > 1 && pages[pages.length - 1] === '') {
    pages.pop();
  }

  return toResult(pages);
}

/**
 * Parse DOCX file. Word files carry no page layout, so the text is one page.
 */
async function parseDOCX(buffer: Buffer): Promise<ParseResult> {
  const result = await mammoth.extractRawText({ buffer });
  return toResult([normalizePage(result.value)]);
}

// =============================================================================
// Main Parser
// =============================================================================

/**
 * Parse a file and extract its pages.
 *
 * @param buffer - File contents
 * @param filename - Original filename (for type detection)
 * @throws InvalidInputError if the file type is not supported
 */
export async function parseFile(
  buffer: Buffer,
  filename: string
): Promise<ParseResult> {
  const ext = toSupportedExtension(filename);

  switch (ext) {
    case '.pdf':
      return parsePDF(buffer);
    case '.txt':
    case '.md':
      return parseText(buffer);
    case '.docx':
      return parseDOCX(buffer);
    case null:
      throw new InvalidInputError(
        `Unsupported file type: ${getFileExtension(filename) || filename}. ` +
        `Supported types: ${SUPPORTED_EXTENSIONS.join(', ')}`
      );
  }
}

/**
 * Validate file before parsing.
 */
export function validateFile(
  file: { name: string; size: number }
): { valid: boolean; error?: string } {
  if (!isSupportedFileType(file.name)) {
    return {
      valid: false,
      error: `Unsupported file type. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`,
    };
  }

  if (file.size > MAX_FILE_SIZE) {
    return {
      valid: false,
      error: `File too large. Maximum size: ${MAX_FILE_SIZE / 1024 / 1024}MB`,
    };
  }

  if (file.size === 0) {
    return {
      valid: false,
      error: 'File is empty',
    };
  }

  return { valid: true };
}
