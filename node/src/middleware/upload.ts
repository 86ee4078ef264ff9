import multer from 'multer';
import type { Request } from 'express';
import type { SourceDocument } from '../types/core';
import { detectFormat } from '../services/fileProcessingService';
import { logger } from '../services/logger';

export const DOCUMENT_FIELD = 'documents';
export const MAX_DOCUMENTS = 10;

export class UnsupportedFileTypeError extends Error {
  constructor(fileName: string, mimeType: string) {
    super(`Invalid file type for ${fileName} (${mimeType}). Allowed: PDF, DOCX, TXT, MD`);
    this.name = 'UnsupportedFileTypeError';
  }
}

const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  if (detectFormat(file.originalname, file.mimetype)) {
    cb(null, true);
    return;
  }
  logger.warn('upload:rejected', { name: file.originalname, mimeType: file.mimetype });
  cb(new UnsupportedFileTypeError(file.originalname, file.mimetype));
};

/** Documents are kept in memory for the duration of one run; nothing is written to disk. */
export function createDocumentUpload(maxFileBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    fileFilter,
    limits: {
      fileSize: maxFileBytes,
      files: MAX_DOCUMENTS,
    },
  }).array(DOCUMENT_FIELD, MAX_DOCUMENTS);
}

/** User-facing message for upload errors; null when the error is not an upload problem. */
export function uploadErrorMessage(error: unknown, maxFileBytes: number): string | null {
  if (error instanceof multer.MulterError) {
    switch (error.code) {
      case 'LIMIT_FILE_SIZE':
        return `File too large. Maximum size is ${Math.round(maxFileBytes / (1024 * 1024))}MB.`;
      case 'LIMIT_FILE_COUNT':
      case 'LIMIT_UNEXPECTED_FILE':
        return `Upload up to ${MAX_DOCUMENTS} files in the "${DOCUMENT_FIELD}" field.`;
      default:
        return error.message;
    }
  }
  if (error instanceof UnsupportedFileTypeError) return error.message;
  return null;
}

export function toSourceDocuments(files: Express.Multer.File[] | undefined): SourceDocument[] {
  return (files ?? []).map((f) => ({
    fileName: f.originalname,
    mimeType: f.mimetype,
    content: f.buffer,
  }));
}
