/**
 * Document Parser Service
 * Extracts paragraph-separable text from PDF, DOCX and plain-text files
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';

import { createLogger } from '@/lib/logger.js';
import type { Result } from '@/types/index.js';
import { errorMessage, failure, success } from '@/types/index.js';

const log = createLogger('document-parser');

type PdfParseFunction = (buffer: Buffer) => Promise<{ text: string }>;

interface MammothModule {
  extractRawText: (input: { buffer: Buffer }) => Promise<{ value: string }>;
}

// Lazy-loaded module references
let pdfParse: PdfParseFunction | null = null;
let mammoth: MammothModule | null = null;

async function loadPdfParse(): Promise<PdfParseFunction> {
  if (pdfParse === null) {
    // The package index runs a self-test when imported from ESM
    const module = await import('pdf-parse/lib/pdf-parse.js');
    pdfParse = module.default;
  }
  return pdfParse;
}

async function loadMammoth(): Promise<MammothModule> {
  if (mammoth === null) {
    mammoth = await import('mammoth');
  }
  return mammoth;
}

/**
 * Supported file extensions
 */
export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.txt', '.md'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

/**
 * Check if a file extension is supported for extraction
 */
export function isSupportedExtension(extension: string): extension is SupportedExtension {
  return (SUPPORTED_EXTENSIONS as readonly string[]).includes(extension.toLowerCase());
}

/**
 * Collapse any run of two or more newlines (whitespace allowed between them)
 * into a single blank line. PDF extraction produces uneven spacing.
 */
export function normalizeParagraphBreaks(text: string): string {
  return text.replace(/(\n\s*){2,}/g, '\n\n');
}

async function extractPdf(buffer: Buffer): Promise<string> {
  const pdf = await loadPdfParse();
  const data = await pdf(buffer);
  return normalizeParagraphBreaks(data.text);
}

async function extractDocx(buffer: Buffer): Promise<string> {
  const mam = await loadMammoth();
  const result = await mam.extractRawText({ buffer });
  return result.value;
}

/**
 * Extract raw text from a document on disk
 */
export async function extractText(filePath: string): Promise<Result<string>> {
  const extension = extname(filePath).toLowerCase();
  log.info(`Processing file: ${filePath}`, { extension });

  if (!isSupportedExtension(extension)) {
    log.error(`Unsupported file format: ${extension}`);
    return failure(
      'VALIDATION_ERROR',
      `Unsupported file format: ${extension || '(none)'}. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.error(`File not found: ${filePath}`);
      return failure('VALIDATION_ERROR', `File not found: ${filePath}`);
    }
    return failure(
      'DOCUMENT_PROCESSING_ERROR',
      `Failed to read file ${filePath}: ${errorMessage(error)}`
    );
  }

  let text: string;
  try {
    switch (extension) {
      case '.pdf':
        text = await extractPdf(buffer);
        break;
      case '.docx':
        text = await extractDocx(buffer);
        break;
      case '.txt':
      case '.md':
        text = buffer.toString('utf-8');
        break;
    }
  } catch (error) {
    const message = errorMessage(error);
    log.error(`Failed to process file ${filePath}`, { error: message });
    return failure(
      'DOCUMENT_PROCESSING_ERROR',
      `Failed to process file ${filePath}: ${message}`
    );
  }

  if (text.trim() === '') {
    log.error(`File is empty: ${filePath}`);
    return failure('VALIDATION_ERROR', `File is empty: ${filePath}`);
  }

  log.debug(`Text length: ${text.length} characters`);
  return success(text);
}

/**
 * List supported files directly inside a folder, sorted by name
 */
export async function listSupportedFiles(
  folderPath: string
): Promise<Result<string[]>> {
  try {
    const info = await stat(folderPath);
    if (!info.isDirectory()) {
      return failure('VALIDATION_ERROR', `Not a folder: ${folderPath}`);
    }

    const entries = await readdir(folderPath, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && isSupportedExtension(extname(entry.name)))
      .map((entry) => entry.name)
      .sort()
      .map((name) => join(folderPath, name));

    return success(files);
  } catch (error) {
    log.error(`Error listing files in '${folderPath}'`, {
      error: errorMessage(error),
    });
    return failure(
      'VALIDATION_ERROR',
      `Cannot read folder ${folderPath}: ${errorMessage(error)}`
    );
  }
}
