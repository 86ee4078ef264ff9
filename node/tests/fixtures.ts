// Binary document fixtures under node/tests/fixtures.
import fs from 'fs';
import path from 'path';
import type { SourceDocument } from '../src/types/core';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

function fixture(fileName: string, mimeType: string): SourceDocument {
  return { fileName, mimeType, content: fs.readFileSync(path.join(__dirname, 'fixtures', fileName)) };
}

/** One page, two lines: the error budget sentence, then the on-call sentence. */
export const pdfDocument = (): SourceDocument => fixture('slo.pdf', 'application/pdf');

/** Same two sentences as two paragraphs. */
export const docxDocument = (): SourceDocument => fixture('slo.docx', DOCX_MIME);

export const ERROR_BUDGET_SENTENCE = 'The error budget is 0.1% of requests per quarter.';
export const ON_CALL_SENTENCE = 'On-call rotations last one week.';
