import pdfParse from 'pdf-parse';
import * as mammoth from 'mammoth';
import { AppError } from './errorHandler';
import { logger } from './logger';

export const MIN_TEXT_LENGTH = 100;
export const MAX_TEXT_LENGTH = 50000;

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export type ResumeFileKind = 'pdf' | 'docx' | 'txt';

export type UploadedFile = Pick<Express.Multer.File, 'originalname' | 'mimetype' | 'buffer'>;

export function detectFileKind(file: UploadedFile): ResumeFileKind | null {
  const name = file.originalname.toLowerCase();
  if (file.mimetype === 'application/pdf' || name.endsWith('.pdf')) {
    return 'pdf';
  }
  if (file.mimetype === DOCX_MIME || name.endsWith('.docx')) {
    return 'docx';
  }
  if (file.mimetype === 'text/plain' || name.endsWith('.txt')) {
    return 'txt';
  }
  return null;
}

async function extractRawText(file: UploadedFile, kind: ResumeFileKind): Promise<string> {
  switch (kind) {
    case 'pdf': {
      const pdfData = await pdfParse(file.buffer);
      return pdfData.text;
    }
    case 'docx': {
      const result = await mammoth.extractRawText({ buffer: file.buffer });
      return result.value;
    }
    case 'txt':
      return file.buffer.toString('utf-8');
  }
}

export async function parseFile(file: UploadedFile): Promise<string> {
  const kind = detectFileKind(file);
  if (!kind) {
    throw new AppError(`Unsupported file type: ${file.mimetype || file.originalname}`, 415);
  }

  let text: string;
  try {
    text = await extractRawText(file, kind);
  } catch (error) {
    logger.error('Failed to parse file', { filename: file.originalname, kind, error });
    throw new AppError('Could not extract text from file', 422);
  }

  // Normalize whitespace
  text = text.replace(/\s+/g, ' ').trim();

  if (text.length < MIN_TEXT_LENGTH) {
    throw new AppError(`Extracted text too short (less than ${MIN_TEXT_LENGTH} characters)`, 422);
  }

  if (text.length > MAX_TEXT_LENGTH) {
    logger.warn('Document truncated for analysis', { originalLength: text.length });
    text = text.substring(0, MAX_TEXT_LENGTH);
  }

  return text;
}
