/**
 * Paragraph Chunker
 *
 * SCOPE: Split raw document or query text into retrieval units
 *
 * GUARDRAILS:
 * - A run of blank lines (whitespace-only lines included) is one break
 * - Chunks are trimmed; empty chunks are dropped
 * - Empty or whitespace-only text is a validation failure
 */

import { createLogger } from '@/lib/logger.js';
import { failure, success, type Result } from '@/types/index.js';

const log = createLogger('chunker');

/**
 * A newline, then one or more lines holding only whitespace
 */
const PARAGRAPH_BREAK = /\r?\n(?:[ \t\f\v]*\r?\n)+/;

/**
 * Split text into paragraph chunks, preserving source order
 */
export function chunkByParagraphs(text: string): Result<string[]> {
  if (text.trim() === '') {
    log.error('Text is empty');
    return failure('VALIDATION_ERROR', 'Cannot chunk empty text');
  }

  const chunks = text
    .split(PARAGRAPH_BREAK)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.length > 0);

  log.debug(`Split into ${chunks.length} paragraphs`);
  return success(chunks);
}

/**
 * Join chunks back into paragraph-separated text
 */
export function joinParagraphs(chunks: readonly string[]): string {
  return chunks.join('\n\n');
}
