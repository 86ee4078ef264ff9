// node/src/services/fileProcessingService.ts
// File processing for user-uploaded documents: text extraction and chunking for embedding

import path from 'path';
import type { SourceDocument } from '../types/core';
import { RetrievalFailureError } from './pipeline-errors';

export type DocumentFormat = 'pdf' | 'docx' | 'text';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

/**
 * Detect the format from MIME type first, then from the file extension.
 * Returns null for anything we cannot extract text from.
 */
export function detectFormat(fileName: string, mimeType: string): DocumentFormat | null {
  const ext = path.extname(fileName).toLowerCase();
  if (mimeType === 'application/pdf' || ext === '.pdf') return 'pdf';
  if (mimeType === DOCX_MIME || ext === '.docx') return 'docx';
  if (mimeType.startsWith('text/') || ext === '.txt' || ext === '.md') return 'text';
  return null;
}

/**
 * Extract text content from an uploaded document.
 * Parsers are loaded lazily so the server starts without touching them.
 */
export async function extractTextFromDocument(doc: SourceDocument): Promise<string> {
  const format = detectFormat(doc.fileName, doc.mimeType);
  if (!format) {
    throw new RetrievalFailureError(`Unsupported document type for ${doc.fileName} (${doc.mimeType})`);
  }

  try {
    switch (format) {
      case 'text':
        return doc.content.toString('utf-8');
      case 'pdf': {
        // The package entry runs a self-test when loaded through import(); the library file does not.
        const { default: pdfParse } = await import('pdf-parse/lib/pdf-parse.js');
        const data = await pdfParse(doc.content);
        return data.text ?? '';
      }
      case 'docx': {
        const mammoth = await import('mammoth');
        const result = await mammoth.extractRawText({ buffer: doc.content });
        return result.value ?? '';
      }
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RetrievalFailureError(`Text extraction failed for ${doc.fileName}: ${reason}`, error);
  }
}

/**
 * Chunk text into overlapping windows of roughly chunkSize characters.
 * A window is cut at the last sentence end or newline when that lies past its midpoint.
 */
export function chunkText(text: string, chunkSize: number = 800, overlap: number = 100): string[] {
  if (!text || text.trim().length === 0) {
    return [];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      const lastPeriod = text.lastIndexOf('.', end - 1);
      const lastNewline = text.lastIndexOf('\n', end - 1);
      const breakPoint = Math.max(lastPeriod, lastNewline);

      if (breakPoint > start + chunkSize * 0.5) {
        end = breakPoint + 1;
      }
    }

    const chunk = text.substring(start, end).trim();
    if (chunk.length > 0) {
      chunks.push(chunk);
    }

    if (end >= text.length) break;
    start = Math.max(end - overlap, start + 1);
  }

  return chunks;
}
